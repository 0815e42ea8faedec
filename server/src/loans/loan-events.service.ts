import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Observable, Subject } from "rxjs";
import {
	EXTENSION_PROPOSAL_MADE_ID,
	type ExtensionProposalMade,
	LOAN_CLAIMED_ID,
	LOAN_CREATED_ID,
	LOAN_EXTENDED_ID,
	LOAN_REFINANCED_ID,
	LOAN_REPAID_ID,
	type LoanClaimed,
	type LoanCreated,
	type LoanExtended,
	type LoanId,
	type LoanRefinanced,
	type LoanRepaid,
	type LoanVariant,
} from "../common/loan.events";

export type LoanSse = {
	type:
		| "new_loan"
		| "loan_repaid"
		| "loan_refinanced"
		| "loan_claimed"
		| "loan_extended"
		| "extension_proposed";
	variant: LoanVariant;
	loanId: LoanId;
};

export type SseEvent<T = LoanSse> = {
	data: T;
};

/** Loan id filter from a query string; anything but digits means no filter */
export function optionalLoanId(raw: string | undefined): LoanId | undefined {
	if (raw === undefined || !/^\d+$/.test(raw)) return undefined;
	return Number(raw);
}

/**
 * Relays committed loan events to server-sent-event subscribers.
 */
@Injectable()
export class LoanEventsService {
	private readonly events$ = new Subject<LoanSse>();

	stream(variant: LoanVariant, loanId?: LoanId): Observable<LoanSse> {
		return this.events$.pipe(
			filter(
				(e) => e.variant === variant && (loanId === undefined || e.loanId === loanId),
			),
		);
	}

	@OnEvent(LOAN_CREATED_ID)
	onLoanCreated(evt: LoanCreated) {
		this.events$.next({ type: "new_loan", variant: evt.variant, loanId: evt.loanId });
	}

	@OnEvent(LOAN_REPAID_ID)
	onLoanRepaid(evt: LoanRepaid) {
		this.events$.next({ type: "loan_repaid", variant: evt.variant, loanId: evt.loanId });
	}

	@OnEvent(LOAN_REFINANCED_ID)
	onLoanRefinanced(evt: LoanRefinanced) {
		this.events$.next({
			type: "loan_refinanced",
			variant: evt.variant,
			loanId: evt.loanId,
		});
		this.events$.next({ type: "new_loan", variant: evt.variant, loanId: evt.newLoanId });
	}

	@OnEvent(LOAN_CLAIMED_ID)
	onLoanClaimed(evt: LoanClaimed) {
		this.events$.next({ type: "loan_claimed", variant: evt.variant, loanId: evt.loanId });
	}

	@OnEvent(LOAN_EXTENDED_ID)
	onLoanExtended(evt: LoanExtended) {
		this.events$.next({ type: "loan_extended", variant: evt.variant, loanId: evt.loanId });
	}

	@OnEvent(EXTENSION_PROPOSAL_MADE_ID)
	onExtensionProposed(evt: ExtensionProposalMade) {
		this.events$.next({
			type: "extension_proposed",
			variant: evt.variant,
			loanId: evt.loanId,
		});
	}
}
