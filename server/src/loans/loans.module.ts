import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { CreditLinesController } from "../credit-lines/credit-lines.controller";
import { CreditLinesService } from "../credit-lines/credit-lines.service";
import { LedgerModule } from "../ledger/ledger.module";
import { LoanEntity } from "./loan.entity";
import { loanEngineProviders } from "./loan-engines.providers";
import { LoanEventsService } from "./loan-events.service";
import { LoansController } from "./loans.controller";
import { LoansService } from "./loans.service";

@Module({
	imports: [TypeOrmModule.forFeature([LoanEntity]), LedgerModule],
	providers: [...loanEngineProviders, LoansService, CreditLinesService, LoanEventsService],
	controllers: [LoansController, CreditLinesController],
	exports: [LoansService, CreditLinesService],
})
export class LoansModule {}
