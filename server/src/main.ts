import "reflect-metadata";
import { Logger, ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { EscrowExceptionFilter } from "./common/filters/escrow-exception.filter";

dotenv.config();

async function bootstrap() {
	const app = await NestFactory.create(AppModule);

	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new EscrowExceptionFilter());
	app.enableCors();

	const config = new DocumentBuilder()
		.setTitle("Inscription Escrow API")
		.setDescription("Custom header auth: `Authorization: Bearer <jwt>`")
		.setVersion("0.1.0")
		.addBearerAuth(
			{ type: "http", scheme: "bearer", bearerFormat: "JWT", in: "header" },
			"bearer",
		)
		.addBasicAuth()
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
			persistAuthorization: true,
		},
	});

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	new Logger("Bootstrap").log(`API listening on http://0.0.0.0:${port}`);
}

bootstrap().catch((e: unknown) => {
	new Logger("Bootstrap").error(e);
	process.exit(1);
});
