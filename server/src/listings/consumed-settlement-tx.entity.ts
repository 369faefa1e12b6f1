import { Column, CreateDateColumn, Entity, PrimaryColumn } from "typeorm";

/**
 * Bitcoin transactions that settled a listing. Never deleted.
 */
@Entity("consumed_settlement_txs")
export class ConsumedSettlementTx {
	@PrimaryColumn({ type: "text" })
	txid!: string;

	@Column({ type: "integer" })
	listingId!: number;

	@Column({ type: "integer" })
	consumedAtHeight!: number;

	@CreateDateColumn()
	createdAt!: Date;
}
