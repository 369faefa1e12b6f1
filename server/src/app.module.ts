import { ConfigModule } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
} from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { AuthModule } from "./auth/auth.module";
import { ChainModule } from "./chain/chain.module";
import { HealthModule } from "./health.module";
import { LedgerModule } from "./ledger/ledger.module";
import { ListingsModule } from "./listings/listings.module";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";

const isTest = process.env.NODE_ENV === "test";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true }),
		TypeOrmModule.forRootAsync({
			useFactory: () => ({
				type: "better-sqlite3",
				database: isTest
					? ":memory:"
					: (process.env.SQLITE_DB_PATH ?? "escrow.sqlite"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		AuthModule,
		LedgerModule,
		ChainModule,
		ListingsModule,
		HealthModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "api/v1/health", method: RequestMethod.ALL })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
