import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryColumn,
	UpdateDateColumn,
} from "typeorm";
import type { ListingStatus } from "@inscription-escrow/sdk";

@Entity("listings")
export class Listing {
	/** Sequential from 0, allocated from the `listing` counter */
	@PrimaryColumn({ type: "integer" })
	id!: number;

	/** Inscription outpoint txid, lowercase hex in display order */
	@Index()
	@Column({ type: "text" })
	foreignTxid!: string;

	@Column({ type: "integer" })
	foreignVout!: number;

	@Column({ type: "integer" })
	price!: number;

	@Column({ type: "integer" })
	premium!: number;

	@Index()
	@Column({ type: "text" })
	seller!: string;

	@Index()
	@Column({ type: "text", nullable: true })
	buyer!: string | null;

	@Column({ type: "text" })
	sellerDest!: string;

	@Column({ type: "text", nullable: true })
	buyerDest!: string | null;

	@Column({ type: "integer", default: 0 })
	collateral!: number;

	@Index()
	@Column({ type: "text" })
	status!: ListingStatus;

	@Column({ type: "integer" })
	lastChangeHeight!: number;

	@Column({ type: "text", nullable: true })
	settlementTxid!: string | null;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
