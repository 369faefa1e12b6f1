import {
	Body,
	Controller,
	Get,
	HttpCode,
	NotFoundException,
	Param,
	ParseIntPipe,
	Patch,
	Post,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { AuthGuard } from "../auth/auth.guard";
import { AccountFromJwt } from "../auth/account.decorator";
import type { AuthenticatedAccount } from "../auth/auth.service";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	ApiErrorDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { CreateListingInDto } from "./dto/create-listing.dto";
import {
	AcceptListingInDto,
	CommitListingInDto,
} from "./dto/listing-actions.dto";
import {
	CancelListingOutDto,
	ListingOutDto,
	NextListingIdOutDto,
} from "./dto/listing.dto";
import {
	LegacySettlementInDto,
	MerkleProofDto,
	SegwitSettlementInDto,
	toLegacyClaim,
	toSegwitClaim,
} from "./dto/settlement-proof.dto";
import { ListingsService } from "./listings.service";

@ApiTags("2 - Listings")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	ApiErrorDto,
	ListingOutDto,
	CancelListingOutDto,
	NextListingIdOutDto,
	MerkleProofDto,
)
@Controller("api/v1/listings")
export class ListingsController {
	constructor(private readonly listings: ListingsService) {}

	@Post("")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({ summary: "List an inscription UTXO for sale" })
	@ApiBody({ type: CreateListingInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(ListingOutDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiConflictResponse({
		type: ApiErrorDto,
		description: "The outpoint is already listed",
	})
	async create(
		@Body() dto: CreateListingInDto,
		@AccountFromJwt() account: AuthenticatedAccount,
	): Promise<ApiEnvelope<ListingOutDto>> {
		return envelope(await this.listings.createListing(account.publicKey, dto));
	}

	@Get("next-id")
	@ApiOperation({ summary: "Id the next listing will receive" })
	@ApiOkResponse({ schema: getSchemaPathForDto(NextListingIdOutDto) })
	async nextId(): Promise<ApiEnvelope<NextListingIdOutDto>> {
		return envelope({ nextId: await this.listings.getNextId() });
	}

	@Get(":id")
	@ApiOperation({ summary: "Get a listing by id" })
	@ApiParam({ name: "id", type: Number })
	@ApiOkResponse({ schema: getSchemaPathForDto(ListingOutDto) })
	@ApiNotFoundResponse({ description: "Listing not found" })
	async getOne(
		@Param("id", ParseIntPipe) id: number,
	): Promise<ApiEnvelope<ListingOutDto>> {
		const listing = await this.listings.getListing(id);
		if (!listing) throw new NotFoundException(`Listing ${id} not found`);
		return envelope(listing);
	}

	@Patch(":id/accept")
	@HttpCode(200)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({
		summary: "Buy a listing, escrowing price and premium from the caller",
	})
	@ApiParam({ name: "id", type: Number })
	@ApiBody({ type: AcceptListingInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(ListingOutDto) })
	@ApiForbiddenResponse({ type: ApiErrorDto, description: "Seller cannot buy" })
	@ApiConflictResponse({ type: ApiErrorDto, description: "Listing not open" })
	@ApiUnprocessableEntityResponse({
		type: ApiErrorDto,
		description: "Insufficient token balance",
	})
	async accept(
		@Param("id", ParseIntPipe) id: number,
		@Body() dto: AcceptListingInDto,
		@AccountFromJwt() account: AuthenticatedAccount,
	): Promise<ApiEnvelope<ListingOutDto>> {
		return envelope(
			await this.listings.acceptListing(account.publicKey, id, dto.buyerDest),
		);
	}

	@Patch(":id/commit")
	@HttpCode(200)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({
		summary: "Seller commits to delivering the inscription and posts collateral",
	})
	@ApiParam({ name: "id", type: Number })
	@ApiBody({ type: CommitListingInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(ListingOutDto) })
	@ApiForbiddenResponse({ type: ApiErrorDto, description: "Caller is not the seller" })
	@ApiConflictResponse({
		type: ApiErrorDto,
		description: "Listing not escrowed or commit window closed",
	})
	async commit(
		@Param("id", ParseIntPipe) id: number,
		@Body() dto: CommitListingInDto,
		@AccountFromJwt() account: AuthenticatedAccount,
	): Promise<ApiEnvelope<ListingOutDto>> {
		return envelope(
			await this.listings.commitListing(account.publicKey, id, dto.collateral),
		);
	}

	@Patch(":id/cancel")
	@HttpCode(200)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({
		summary:
			"Cancel an open listing (seller) or an expired one (anyone, buyer refunded)",
	})
	@ApiParam({ name: "id", type: Number })
	@ApiOkResponse({ schema: getSchemaPathForDto(CancelListingOutDto) })
	@ApiForbiddenResponse({ type: ApiErrorDto })
	@ApiConflictResponse({
		type: ApiErrorDto,
		description: "Listing finished or not yet expired",
	})
	async cancel(
		@Param("id", ParseIntPipe) id: number,
		@AccountFromJwt() account: AuthenticatedAccount,
	): Promise<ApiEnvelope<CancelListingOutDto>> {
		return envelope(await this.listings.cancelListing(account.publicKey, id));
	}

	@Post(":id/settlement/legacy")
	@HttpCode(200)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({
		summary: "Settle with a mined transaction proven by its merkle path",
	})
	@ApiParam({ name: "id", type: Number })
	@ApiBody({ type: LegacySettlementInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(ListingOutDto) })
	@ApiConflictResponse({
		type: ApiErrorDto,
		description: "Listing not committed or transaction already used",
	})
	@ApiUnprocessableEntityResponse({
		type: ApiErrorDto,
		description: "Invalid proof or the transaction does not deliver",
	})
	async settleLegacy(
		@Param("id", ParseIntPipe) id: number,
		@Body() dto: LegacySettlementInDto,
		@AccountFromJwt() account: AuthenticatedAccount,
	): Promise<ApiEnvelope<ListingOutDto>> {
		return envelope(
			await this.listings.submitSettlementProof(
				account.publicKey,
				id,
				toLegacyClaim(dto),
			),
		);
	}

	@Post(":id/settlement/segwit")
	@HttpCode(200)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({
		summary: "Settle with a mined transaction proven through the witness commitment",
	})
	@ApiParam({ name: "id", type: Number })
	@ApiBody({ type: SegwitSettlementInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(ListingOutDto) })
	@ApiConflictResponse({
		type: ApiErrorDto,
		description: "Listing not committed or transaction already used",
	})
	@ApiUnprocessableEntityResponse({
		type: ApiErrorDto,
		description: "Invalid proof or the transaction does not deliver",
	})
	async settleSegwit(
		@Param("id", ParseIntPipe) id: number,
		@Body() dto: SegwitSettlementInDto,
		@AccountFromJwt() account: AuthenticatedAccount,
	): Promise<ApiEnvelope<ListingOutDto>> {
		return envelope(
			await this.listings.submitSettlementProof(
				account.publicKey,
				id,
				toSegwitClaim(dto),
			),
		);
	}
}
