import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";

dotenv.config();

async function bootstrap() {
	const app = await NestFactory.create(AppModule);
	const logger = new Logger("Bootstrap");

	app.enableCors();
	app.enableShutdownHooks();

	const config = new DocumentBuilder()
		.setTitle("Escrow Settlement API")
		.setDescription(
			"Caller identity travels in the `X-Account-Id` header. Amounts are decimal strings in base units.",
		)
		.setVersion("0.1.0")
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
		},
	});

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	logger.log(`API listening on http://0.0.0.0:${port}`);
}

bootstrap().catch((error: unknown) => {
	Logger.error(
		"Failed to start",
		error instanceof Error ? error.stack : String(error),
		"Bootstrap",
	);
	process.exit(1);
});
