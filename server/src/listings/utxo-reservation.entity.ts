import { Column, CreateDateColumn, Entity, PrimaryColumn } from "typeorm";

/**
 * Uniqueness index over inscription outpoints. Written only together with the
 * listing row it points to.
 */
@Entity("utxo_reservations")
export class UtxoReservation {
	@PrimaryColumn({ type: "text" })
	foreignTxid!: string;

	@PrimaryColumn({ type: "integer" })
	foreignVout!: number;

	@Column({ type: "integer" })
	listingId!: number;

	@CreateDateColumn()
	createdAt!: Date;
}
