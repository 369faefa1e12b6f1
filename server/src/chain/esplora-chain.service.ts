import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { BitcoinChain } from "./bitcoin-chain";

const BLOCK_HASH = /^[0-9a-f]{64}$/;

/**
 * Esplora REST client (mempool.space, blockstream.info or a self-hosted
 * instance) reached through ESPLORA_URL.
 */
@Injectable()
export class EsploraChainService extends BitcoinChain {
	private readonly logger = new Logger(EsploraChainService.name);
	private readonly baseUrl: string;

	constructor(config: ConfigService) {
		super();
		this.baseUrl = config
			.get<string>("ESPLORA_URL", "https://mempool.space/api")
			.replace(/\/+$/, "");
		this.logger.log(`ESPLORA_URL=${this.baseUrl}`);
	}

	async getTipHeight(): Promise<number> {
		const body = await this.getText("/blocks/tip/height");
		const height = Number(body);
		if (!Number.isSafeInteger(height) || height < 0) {
			throw new Error(`Unexpected tip height from Esplora: ${body}`);
		}
		return height;
	}

	async getBlockHash(height: number): Promise<string | null> {
		const res = await fetch(`${this.baseUrl}/block-height/${height}`);
		if (res.status === 404) return null;
		if (!res.ok) {
			throw new Error(`Esplora /block-height/${height} returned ${res.status}`);
		}
		const hash = (await res.text()).trim().toLowerCase();
		if (!BLOCK_HASH.test(hash)) {
			throw new Error(`Unexpected block hash from Esplora: ${hash}`);
		}
		return hash;
	}

	private async getText(path: string): Promise<string> {
		const res = await fetch(`${this.baseUrl}${path}`);
		if (!res.ok) {
			this.logger.warn(`Esplora ${path} returned ${res.status}`);
			throw new Error(`Esplora ${path} returned ${res.status}`);
		}
		return (await res.text()).trim();
	}
}
