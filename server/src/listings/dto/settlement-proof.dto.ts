import { ApiProperty } from "@nestjs/swagger";
import { Type } from "class-transformer";
import {
	ArrayMaxSize,
	IsArray,
	IsInt,
	IsString,
	Max,
	MaxLength,
	Min,
	ValidateNested,
} from "class-validator";
import {
	EscrowError,
	tryHexToBytes,
	type LegacyInclusionClaim,
	type SegwitInclusionClaim,
} from "@inscription-escrow/sdk";

// Bitcoin blocks are at most 4M weight units, so no path is deeper than this.
const MAX_TREE_DEPTH = 32;
const MAX_TX_HEX = 8_000_000;
const HASH_HEX_EXAMPLE = "ab".repeat(32);

export class MerkleProofDto {
	@ApiProperty({ example: 5, description: "Position of the transaction in the block" })
	@IsInt()
	@Min(0)
	txIndex!: number;

	@ApiProperty({
		type: [String],
		example: [HASH_HEX_EXAMPLE],
		description: "Sibling hashes from the leaf upwards, display order hex",
	})
	@IsArray()
	@ArrayMaxSize(MAX_TREE_DEPTH)
	@IsString({ each: true })
	@MaxLength(64, { each: true })
	hashes!: string[];

	@ApiProperty({ example: 12 })
	@IsInt()
	@Min(0)
	@Max(MAX_TREE_DEPTH)
	treeDepth!: number;
}

export class LegacySettlementInDto {
	@ApiProperty({ example: 820_000 })
	@IsInt()
	@Min(0)
	height!: number;

	@ApiProperty({ description: "Serialized transaction, hex" })
	@IsString()
	@MaxLength(MAX_TX_HEX)
	tx!: string;

	@ApiProperty({ description: "80-byte block header, hex" })
	@IsString()
	@MaxLength(160)
	header!: string;

	@ApiProperty({ type: MerkleProofDto })
	@ValidateNested()
	@Type(() => MerkleProofDto)
	proof!: MerkleProofDto;
}

export class SegwitSettlementInDto {
	@ApiProperty({ example: 820_000 })
	@IsInt()
	@Min(0)
	height!: number;

	@ApiProperty({ description: "Serialized transaction with witness data, hex" })
	@IsString()
	@MaxLength(MAX_TX_HEX)
	tx!: string;

	@ApiProperty({ description: "80-byte block header, hex" })
	@IsString()
	@MaxLength(160)
	header!: string;

	@ApiProperty({ example: 5 })
	@IsInt()
	@Min(0)
	txIndex!: number;

	@ApiProperty({ example: 12 })
	@IsInt()
	@Min(0)
	@Max(MAX_TREE_DEPTH)
	treeDepth!: number;

	@ApiProperty({
		type: [String],
		description: "Path from the wtxid to the witness merkle root, display order hex",
	})
	@IsArray()
	@ArrayMaxSize(MAX_TREE_DEPTH)
	@IsString({ each: true })
	@MaxLength(64, { each: true })
	witnessProof!: string[];

	@ApiProperty({ example: HASH_HEX_EXAMPLE })
	@IsString()
	@MaxLength(64)
	witnessMerkleRoot!: string;

	@ApiProperty({ description: "Coinbase witness reserved value, raw hex" })
	@IsString()
	@MaxLength(64)
	witnessReservedValue!: string;

	@ApiProperty({ description: "Serialized coinbase transaction, hex" })
	@IsString()
	@MaxLength(MAX_TX_HEX)
	coinbaseTx!: string;

	@ApiProperty({
		type: [String],
		description: "Path from the coinbase txid to the header merkle root",
	})
	@IsArray()
	@ArrayMaxSize(MAX_TREE_DEPTH)
	@IsString({ each: true })
	@MaxLength(64, { each: true })
	coinbaseProof!: string[];
}

export function toLegacyClaim(dto: LegacySettlementInDto): LegacyInclusionClaim {
	return {
		kind: "legacy",
		height: dto.height,
		tx: decodeHex(dto.tx, "tx"),
		header: decodeHex(dto.header, "header"),
		proof: {
			txIndex: dto.proof.txIndex,
			hashes: dto.proof.hashes.map((h, i) => decodeHex(h, `proof.hashes[${i}]`)),
			treeDepth: dto.proof.treeDepth,
		},
	};
}

export function toSegwitClaim(dto: SegwitSettlementInDto): SegwitInclusionClaim {
	return {
		kind: "segwit",
		height: dto.height,
		tx: decodeHex(dto.tx, "tx"),
		header: decodeHex(dto.header, "header"),
		txIndex: dto.txIndex,
		treeDepth: dto.treeDepth,
		witnessProof: dto.witnessProof.map((h, i) =>
			decodeHex(h, `witnessProof[${i}]`),
		),
		witnessMerkleRoot: decodeHex(dto.witnessMerkleRoot, "witnessMerkleRoot"),
		witnessReservedValue: decodeHex(
			dto.witnessReservedValue,
			"witnessReservedValue",
		),
		coinbaseTx: decodeHex(dto.coinbaseTx, "coinbaseTx"),
		coinbaseProof: dto.coinbaseProof.map((h, i) =>
			decodeHex(h, `coinbaseProof[${i}]`),
		),
	};
}

function decodeHex(value: string, field: string): Uint8Array {
	const bytes = tryHexToBytes(value);
	if (!bytes) {
		throw new EscrowError("OutOfBounds", `${field} is not valid hex`, { field });
	}
	return bytes;
}
