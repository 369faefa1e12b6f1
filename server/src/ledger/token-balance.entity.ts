import { Column, Entity, PrimaryColumn, UpdateDateColumn } from "typeorm";

@Entity("token_balances")
export class TokenBalance {
	@PrimaryColumn({ type: "text" })
	account!: string;

	@Column({ type: "integer", default: 0 })
	balance!: number;

	@UpdateDateColumn()
	updatedAt!: Date;
}
