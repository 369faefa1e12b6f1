import { Injectable } from "@nestjs/common";
import { DataSource, EntityManager } from "typeorm";

/**
 * Runs units of work one at a time, each inside a database transaction.
 *
 * better-sqlite3 hands TypeORM a single connection, so two transactions must
 * never overlap. Work queued here observes every write committed before it and
 * none of a unit that threw.
 */
@Injectable()
export class LedgerTransactions {
	private tail: Promise<unknown> = Promise.resolve();

	constructor(private readonly dataSource: DataSource) {}

	run<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
		const result = this.tail.then(() =>
			this.dataSource.transaction((manager) => work(manager)),
		);
		// the caller gets the failure through `result`; the queue moves on
		this.tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}
}
