import { Module } from "@nestjs/common";
import { MerkleInclusionVerifier } from "@inscription-escrow/sdk";
import { BitcoinChain } from "./bitcoin-chain";
import { EsploraChainService } from "./esplora-chain.service";
import { INCLUSION_VERIFIER } from "./chain.constants";

@Module({
	providers: [
		{ provide: BitcoinChain, useClass: EsploraChainService },
		{
			provide: INCLUSION_VERIFIER,
			inject: [BitcoinChain],
			useFactory: (chain: BitcoinChain) => new MerkleInclusionVerifier(chain),
		},
	],
	exports: [BitcoinChain, INCLUSION_VERIFIER],
})
export class ChainModule {}
