// src/core/sync/interfaces/services.ts
import { RunSummary, SyncTrigger } from '../../common/interfaces/models';

/** Parameters for a single run */
export interface SyncRunRequest {
    fromDate: Date;
    toDate: Date;
    trigger: SyncTrigger;
    /** Stops dispatching new invoices; in-flight invoices still finish */
    signal?: AbortSignal;
}

/** Defines the contract for the batch orchestrator */
export interface IInvoiceSyncService {
    /**
     * Runs fetch → map → submit → write-back for every unprocessed invoice in the window.
     * Per-invoice failures end up in the summary; they never reject.
     * @throws {FatalRunError} when invoices could not be fetched.
     * @throws {ConflictError} when a run is already active.
     */
    runSync(request: SyncRunRequest): Promise<RunSummary>;

    /** True while a run is active */
    readonly isRunning: boolean;

    /** Cancels the active run, if any. */
    cancelActiveRun(reason?: string): void;
}

export type NotificationSeverity = 'failure' | 'critical';

/**
 * The escalation channel. Implementations decide where messages go.
 */
export interface INotifier {
    notify(severity: NotificationSeverity, message: string): Promise<void>;
}

export const NOTIFIER_TOKEN = Symbol.for('Notifier');
export const INVOICE_SYNC_SERVICE_TOKEN = Symbol.for('InvoiceSyncService');
