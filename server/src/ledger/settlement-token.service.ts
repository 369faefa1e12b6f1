import { Injectable, Logger } from "@nestjs/common";
import type { EntityManager } from "typeorm";
import { TokenBalance } from "./token-balance.entity";
import { TokenTransferError } from "./token-transfer.error";
import { LedgerTransactions } from "./ledger-transactions.service";

/**
 * Fungible settlement token held per account id.
 *
 * `transfer` runs on the caller's transaction so token movements commit or
 * roll back together with the listing change that caused them.
 */
@Injectable()
export class SettlementTokenService {
	private readonly logger = new Logger(SettlementTokenService.name);

	constructor(private readonly tx: LedgerTransactions) {}

	async transfer(
		manager: EntityManager,
		amount: number,
		from: string,
		to: string,
	): Promise<void> {
		assertAmount(amount);
		const balances = manager.getRepository(TokenBalance);
		const source = await balances.findOne({ where: { account: from } });
		const available = source?.balance ?? 0;
		if (available < amount) {
			throw new TokenTransferError(
				"InsufficientBalance",
				`Account ${from} holds ${available}, needs ${amount}`,
			);
		}
		if (from === to) return;

		await this.credit(manager, to, amount);
		await balances.save({ account: from, balance: available - amount });
		this.logger.debug(`transfer ${amount} ${from} -> ${to}`);
	}

	/**
	 * Create `amount` tokens for `to`. Setup and test helper.
	 *
	 * @returns The new balance of `to`
	 */
	mint(amount: number, to: string): Promise<number> {
		return this.tx.run(async (manager) => {
			assertAmount(amount);
			const balance = await this.credit(manager, to, amount);
			this.logger.log(`minted ${amount} to ${to}`);
			return balance;
		});
	}

	balanceOf(account: string): Promise<number> {
		return this.tx.run(async (manager) => {
			const row = await manager
				.getRepository(TokenBalance)
				.findOne({ where: { account } });
			return row?.balance ?? 0;
		});
	}

	private async credit(
		manager: EntityManager,
		account: string,
		amount: number,
	): Promise<number> {
		const balances = manager.getRepository(TokenBalance);
		const row = await balances.findOne({ where: { account } });
		const balance = (row?.balance ?? 0) + amount;
		if (!Number.isSafeInteger(balance)) {
			throw new TokenTransferError(
				"InvalidAmount",
				`Balance of ${account} would overflow`,
			);
		}
		await balances.save({ account, balance });
		return balance;
	}
}

function assertAmount(amount: number) {
	if (!Number.isSafeInteger(amount) || amount <= 0) {
		throw new TokenTransferError(
			"InvalidAmount",
			`Amount must be a positive integer, got ${amount}`,
		);
	}
}
