// src/infrastructure/database/repositories/sync-run.repository.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { DataSource } from 'typeorm';
import winston from 'winston';

import { LOGGER_TOKEN } from '../../logger';
import { AppDataSource } from '../providers/data-source.provider';

import { SyncOutcomeRecord, SyncRunRecord } from '../../../core/common/entities';
import { AppError, errorMessage } from '../../../core/common/errors';
import {
    FailedOutcome, FailureKind, RunSummary, SyncOutcome, UnconfirmedSubmission
} from '../../../core/common/interfaces/models';
import { ISyncRunRepository, StoredSyncRun } from '../../../core/common/interfaces/repositories';

const FAILURE_KINDS: readonly FailureKind[] = ['mapping', 'submission', 'reconciliation'];

const isFailureKind = (value: string | null): value is FailureKind =>
    FAILURE_KINDS.some(kind => kind === value);

// --- Entity mapping ---

export function toRunRecord(summary: RunSummary, fatalError?: string): SyncRunRecord {
    const record = new SyncRunRecord();
    record.runId = summary.runId;
    record.trigger = summary.trigger;
    record.fromDate = summary.fromDate;
    record.toDate = summary.toDate;
    record.startedAt = summary.startedAt;
    record.finishedAt = summary.finishedAt;
    record.succeededCount = summary.succeededCount;
    record.failedCount = summary.failedCount;
    record.cancelled = summary.cancelled;
    record.fatalError = fatalError ?? null;
    return record;
}

export function toOutcomeRecords(summary: RunSummary): SyncOutcomeRecord[] {
    return summary.outcomes.map((outcome, index) => {
        const record = new SyncOutcomeRecord();
        record.runId = summary.runId;
        record.sequence = index;
        record.invoiceNumber = outcome.invoiceNumber;
        record.status = outcome.status;
        record.recordedAt = summary.finishedAt;
        if (outcome.status === 'Failed') {
            record.errorKind = outcome.errorKind;
            record.errorMessage = outcome.error;
            record.erpInvoiceId = outcome.erpInvoiceId ?? null;
        } else {
            record.errorKind = null;
            record.errorMessage = null;
            record.erpInvoiceId = outcome.erpInvoiceId;
        }
        return record;
    });
}

function toOutcome(record: SyncOutcomeRecord): SyncOutcome {
    if (record.status === 'Succeeded') {
        return { invoiceNumber: record.invoiceNumber, status: 'Succeeded', erpInvoiceId: record.erpInvoiceId ?? '' };
    }
    const failed: FailedOutcome = {
        invoiceNumber: record.invoiceNumber,
        status: 'Failed',
        errorKind: isFailureKind(record.errorKind) ? record.errorKind : 'submission',
        error: record.errorMessage ?? '',
        ...(record.erpInvoiceId ? { erpInvoiceId: record.erpInvoiceId } : {}),
    };
    return failed;
}

/** Rebuilds a summary from stored rows. Outcome rows must be in sequence order. */
export function toStoredSyncRun(run: SyncRunRecord, outcomeRecords: SyncOutcomeRecord[]): StoredSyncRun {
    const outcomes = outcomeRecords.map(toOutcome);
    const failed = outcomes.filter((outcome): outcome is FailedOutcome => outcome.status === 'Failed');
    return {
        summary: {
            runId: run.runId,
            trigger: run.trigger === 'manual' ? 'manual' : 'scheduled',
            fromDate: run.fromDate,
            toDate: run.toDate,
            startedAt: run.startedAt,
            finishedAt: run.finishedAt,
            succeededCount: run.succeededCount,
            failedCount: run.failedCount,
            outcomes,
            failed,
            cancelled: run.cancelled,
        },
        fatalError: run.fatalError,
    };
}

@singleton()
@injectable()
export class SyncRunRepository implements ISyncRunRepository {

    private initPromise: Promise<DataSource> | null = null;

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: winston.Logger,
        @inject(AppDataSource) private readonly dataSourceProvider: AppDataSource
    ) {
        this.logger.info("SyncRunRepository initialized.");
    }

    /**
     * Ensures the TypeORM DataSource is initialized. A failed attempt is retried on the next call.
     */
    private async getDataSource(): Promise<DataSource> {
        if (!this.initPromise) {
            this.initPromise = this.dataSourceProvider.init();
        }
        try {
            return await this.initPromise;
        } catch (error) {
            this.initPromise = null;
            this.logger.error("SyncRunRepository initialization failed.", { message: errorMessage(error) });
            throw new AppError('DatabaseError', 'Repository could not be initialized.', 500, false);
        }
    }

    async saveRun(summary: RunSummary, fatalError?: string): Promise<void> {
        const dataSource = await this.getDataSource();
        this.logger.debug(`SyncRunRepository: Saving run ${summary.runId} with ${summary.outcomes.length} outcome(s)...`);

        try {
            await dataSource.transaction(async manager => {
                await manager.save(SyncRunRecord, toRunRecord(summary, fatalError));
                const outcomes = toOutcomeRecords(summary);
                if (outcomes.length > 0) {
                    await manager.save(SyncOutcomeRecord, outcomes, { chunk: 100 });
                }
            });
            this.logger.info(`SyncRunRepository: Saved run ${summary.runId}.`);
        } catch (error) {
            this.logger.error(`SyncRunRepository: Error saving run ${summary.runId}.`, {
                errorMessage: errorMessage(error),
                stack: error instanceof Error ? error.stack : undefined,
            });
            throw new AppError('DatabaseError', `Failed to save sync run: ${errorMessage(error)}`, 500, false);
        }
    }

    async findRun(runId: string): Promise<StoredSyncRun | null> {
        const dataSource = await this.getDataSource();
        try {
            const run = await dataSource.getRepository(SyncRunRecord).findOneBy({ runId });
            if (!run) {
                this.logger.debug(`SyncRunRepository: Run ${runId} not found.`);
                return null;
            }
            const outcomes = await dataSource.getRepository(SyncOutcomeRecord).find({
                where: { runId },
                order: { sequence: 'ASC' },
            });
            return toStoredSyncRun(run, outcomes);
        } catch (error) {
            this.logger.error(`SyncRunRepository: Error finding run ${runId}.`, { errorMessage: errorMessage(error) });
            throw new AppError('DatabaseError', `Failed to find sync run: ${errorMessage(error)}`, 500, false);
        }
    }

    async findUnconfirmed(): Promise<UnconfirmedSubmission[]> {
        const dataSource = await this.getDataSource();
        try {
            const records = await dataSource.getRepository(SyncOutcomeRecord).find({
                where: { errorKind: 'reconciliation' },
                order: { recordedAt: 'DESC', sequence: 'ASC' },
            });
            return records.map(record => ({
                runId: record.runId,
                invoiceNumber: record.invoiceNumber,
                erpInvoiceId: record.erpInvoiceId,
                error: record.errorMessage ?? '',
                recordedAt: record.recordedAt,
            }));
        } catch (error) {
            this.logger.error('SyncRunRepository: Error listing unconfirmed submissions.', { errorMessage: errorMessage(error) });
            throw new AppError('DatabaseError', `Failed to list unconfirmed submissions: ${errorMessage(error)}`, 500, false);
        }
    }
}
