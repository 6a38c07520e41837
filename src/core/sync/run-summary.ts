// src/core/sync/run-summary.ts
import { AppError } from '../common/errors';
import {
    FailedOutcome, FailureKind, RunSummary, SucceededOutcome, SyncOutcome, SyncTrigger
} from '../common/interfaces/models';

export function succeeded(invoiceNumber: string, erpInvoiceId: string): SucceededOutcome {
    const outcome: SucceededOutcome = { invoiceNumber, status: 'Succeeded', erpInvoiceId };
    return Object.freeze(outcome);
}

export function failed(
    invoiceNumber: string,
    errorKind: FailureKind,
    error: string,
    erpInvoiceId?: string
): FailedOutcome {
    const outcome: FailedOutcome = erpInvoiceId === undefined
        ? { invoiceNumber, status: 'Failed', errorKind, error }
        : { invoiceNumber, status: 'Failed', errorKind, error, erpInvoiceId };
    return Object.freeze(outcome);
}

export interface RunHeader {
    runId: string;
    trigger: SyncTrigger;
    fromDate: Date;
    toDate: Date;
    startedAt: Date;
}

/**
 * Accumulates outcomes for one run, in arrival order.
 * finalize() freezes the result; further records are rejected.
 */
export class RunSummaryBuilder {
    private readonly outcomes: SyncOutcome[] = [];
    private cancelled = false;
    private finalized: RunSummary | null = null;

    constructor(
        private readonly header: RunHeader,
        private readonly clock: () => Date = () => new Date()
    ) { }

    record(outcome: SyncOutcome): void {
        this.assertOpen();
        this.outcomes.push(outcome);
    }

    markCancelled(): void {
        this.assertOpen();
        this.cancelled = true;
    }

    get succeededCount(): number {
        return this.outcomes.filter(outcome => outcome.status === 'Succeeded').length;
    }

    get failedCount(): number {
        return this.failedOutcomes().length;
    }

    failedOutcomes(): FailedOutcome[] {
        return this.outcomes.filter((outcome): outcome is FailedOutcome => outcome.status === 'Failed');
    }

    /** Idempotent: every call after the first returns the same frozen summary. */
    finalize(): RunSummary {
        if (this.finalized) {
            return this.finalized;
        }
        const outcomes = Object.freeze([...this.outcomes]);
        const failedList = Object.freeze(this.failedOutcomes());
        this.finalized = Object.freeze({
            ...this.header,
            finishedAt: this.clock(),
            succeededCount: outcomes.length - failedList.length,
            failedCount: failedList.length,
            outcomes,
            failed: failedList,
            cancelled: this.cancelled,
        });
        return this.finalized;
    }

    private assertOpen(): void {
        if (this.finalized) {
            throw new AppError('RunSummaryFinalized', `Run ${this.header.runId} is already finalized`, 500, false);
        }
    }
}
