import type { HeaderSource } from "@inscription-escrow/sdk";

/**
 * Read access to the Bitcoin chain. The tip height is the clock for every
 * listing expiry.
 */
export abstract class BitcoinChain implements HeaderSource {
	abstract getTipHeight(): Promise<number>;

	/** Block hash at `height` in display order hex, or null past the tip */
	abstract getBlockHash(height: number): Promise<string | null>;
}
