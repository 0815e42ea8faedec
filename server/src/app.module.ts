import { ConfigModule } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
} from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { HealthController } from "./health.controller";
import { LedgerModule } from "./ledger/ledger.module";
import { LoansModule } from "./loans/loans.module";
import { loansConfig } from "./config/loans.config";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";

const isTest = process.env.NODE_ENV === "test";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true, load: [loansConfig] }),
		TypeOrmModule.forRootAsync({
			useFactory: () => ({
				type: "better-sqlite3",
				database: isTest ? ":memory:" : (process.env.SQLITE_DB_PATH ?? "loanvault.sqlite"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		LedgerModule,
		LoansModule,
	],
	controllers: [HealthController],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "api/v1/health", method: RequestMethod.ALL })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
