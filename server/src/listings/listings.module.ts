import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { AuthModule } from "../auth/auth.module";
import { ChainModule } from "../chain/chain.module";
import { LedgerModule } from "../ledger/ledger.module";
import { Listing } from "./listing.entity";
import { UtxoReservation } from "./utxo-reservation.entity";
import { ConsumedSettlementTx } from "./consumed-settlement-tx.entity";
import { LedgerCounter } from "./ledger-counter.entity";
import { ListingsService } from "./listings.service";
import { ListingsController } from "./listings.controller";
import { SettlementLoggerService } from "./settlement-logger.service";

@Module({
	imports: [
		TypeOrmModule.forFeature([
			Listing,
			UtxoReservation,
			ConsumedSettlementTx,
			LedgerCounter,
		]),
		AuthModule,
		LedgerModule,
		ChainModule,
	],
	providers: [ListingsService, SettlementLoggerService],
	controllers: [ListingsController],
	exports: [ListingsService],
})
export class ListingsModule {}
