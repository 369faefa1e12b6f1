import { Column, CreateDateColumn, Entity, PrimaryColumn } from "typeorm";

@Entity("accounts")
export class Account {
	/** x-only secp256k1 public key, hex. Also the settlement-token account id. */
	@PrimaryColumn({ type: "text" })
	publicKey!: string;

	@Column({ type: "text", nullable: true })
	pendingChallenge!: string | null;

	@Column({ type: "text", nullable: true })
	challengeId!: string | null;

	@Column({ type: "datetime", nullable: true })
	challengeExpiresAt!: Date | null;

	@Column({ type: "datetime", nullable: true })
	lastLoginAt!: Date | null;

	@CreateDateColumn()
	createdAt!: Date;
}
