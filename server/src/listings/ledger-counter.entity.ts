import { Column, Entity, PrimaryColumn } from "typeorm";

@Entity("ledger_counters")
export class LedgerCounter {
	@PrimaryColumn({ type: "text" })
	name!: string;

	/** Next value to hand out */
	@Column({ type: "integer" })
	value!: number;
}
