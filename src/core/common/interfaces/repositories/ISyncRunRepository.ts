// src/core/common/interfaces/repositories/ISyncRunRepository.ts

import { RunSummary, UnconfirmedSubmission } from '../models';

/** A persisted run, as read back for operators. */
export interface StoredSyncRun {
    summary: RunSummary;
    /** Set when the run aborted before any invoice was processed */
    fatalError: string | null;
}

/**
 * Defines the contract for persisting invoice sync run history
 * and the invoices that reached the ERP but were never confirmed.
 */
export interface ISyncRunRepository {
    /**
     * Saves a finalized run summary together with its outcomes.
     * @param fatalError message of the FatalRunError that aborted the run, if any.
     */
    saveRun(summary: RunSummary, fatalError?: string): Promise<void>;

    /**
     * Finds a run by id.
     * @returns the stored run, or null if unknown.
     */
    findRun(runId: string): Promise<StoredSyncRun | null>;

    /**
     * Lists invoices whose ERP submission succeeded but whose write-back failed,
     * newest first. These need manual reconciliation.
     */
    findUnconfirmed(): Promise<UnconfirmedSubmission[]>;
}

// Define a unique symbol token for DI registration
export const SYNC_RUN_REPOSITORY_TOKEN = Symbol.for("ISyncRunRepository");
