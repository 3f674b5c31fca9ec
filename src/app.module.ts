import { ConfigModule } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
	ValidationPipe,
} from "@nestjs/common";
import { APP_FILTER, APP_PIPE } from "@nestjs/core";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { HealthModule } from "./health.module";
import { EscrowsModule } from "./escrows/escrows.module";
import { AssetLedgerModule } from "./asset-ledger/asset-ledger.module";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";
import { EscrowExceptionFilter } from "./common/filters/escrow-exception.filter";

const isTest = process.env.NODE_ENV === "test";

@Module({
	imports: [
		EventEmitterModule.forRoot({ wildcard: true, delimiter: "." }),
		ConfigModule.forRoot({ isGlobal: true }),
		TypeOrmModule.forRootAsync({
			useFactory: () => ({
				type: "better-sqlite3",
				database: isTest
					? ":memory:"
					: (process.env.SQLITE_DB_PATH ?? "data/escrow.sqlite"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		EscrowsModule,
		AssetLedgerModule,
		HealthModule,
	],
	providers: [
		{
			provide: APP_PIPE,
			useValue: new ValidationPipe({
				whitelist: true,
				forbidNonWhitelisted: true,
				transform: true,
			}),
		},
		{ provide: APP_FILTER, useClass: EscrowExceptionFilter },
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
