import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { JwtModule } from "@nestjs/jwt";
import { TypeOrmModule } from "@nestjs/typeorm";
import { Account } from "../accounts/account.entity";
import { AuthController } from "./auth.controller";
import { AuthGuard } from "./auth.guard";
import { AuthService } from "./auth.service";

@Module({
	imports: [
		TypeOrmModule.forFeature([Account]),
		JwtModule.registerAsync({
			inject: [ConfigService],
			useFactory: (config: ConfigService) => {
				const secret =
					config.get<string>("JWT_SECRET") ??
					(config.get<string>("NODE_ENV") === "test" ? "test-secret" : undefined);
				if (!secret) {
					throw new Error("JWT_SECRET is not set");
				}
				return {
					secret,
					signOptions: {
						expiresIn: config.get<string>("JWT_EXPIRES_IN", "12h"),
					},
				};
			},
		}),
	],
	providers: [AuthService, AuthGuard],
	controllers: [AuthController],
	exports: [AuthService, AuthGuard],
})
export class AuthModule {}
