import { Body, Controller, Get, HttpCode, Param, Post } from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiBody,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import {
	type ApiEnvelope,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { BalanceOutDto, MintInDto } from "./dto/mint.dto";
import { SettlementTokenService } from "./settlement-token.service";

@ApiTags("3 - Settlement Token")
@ApiExtraModels(BalanceOutDto)
@Controller("api/v1/ledger")
export class LedgerController {
	constructor(private readonly tokens: SettlementTokenService) {}

	@Post("mint")
	@HttpCode(200)
	@ApiBasicAuth()
	@ApiOperation({ summary: "Create settlement tokens for an account" })
	@ApiBody({ type: MintInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(BalanceOutDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid basic auth" })
	async mint(@Body() dto: MintInDto): Promise<ApiEnvelope<BalanceOutDto>> {
		const balance = await this.tokens.mint(dto.amount, dto.to);
		return envelope({ account: dto.to, balance });
	}

	@Get("balances/:account")
	@ApiOperation({ summary: "Settlement token balance of an account" })
	@ApiParam({ name: "account", description: "Account id" })
	@ApiOkResponse({ schema: getSchemaPathForDto(BalanceOutDto) })
	async balanceOf(
		@Param("account") account: string,
	): Promise<ApiEnvelope<BalanceOutDto>> {
		return envelope({ account, balance: await this.tokens.balanceOf(account) });
	}
}
