import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
} from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { TokenBalance } from "./token-balance.entity";
import { SettlementTokenService } from "./settlement-token.service";
import { LedgerTransactions } from "./ledger-transactions.service";
import { LedgerController } from "./ledger.controller";
import { BasicAuthMiddleware } from "../common/middlewares/basic-auth.middleware";

@Module({
	imports: [TypeOrmModule.forFeature([TokenBalance])],
	providers: [LedgerTransactions, SettlementTokenService],
	controllers: [LedgerController],
	exports: [LedgerTransactions, SettlementTokenService],
})
export class LedgerModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(BasicAuthMiddleware)
			.forRoutes({ path: "api/v1/ledger/mint", method: RequestMethod.POST });
	}
}
