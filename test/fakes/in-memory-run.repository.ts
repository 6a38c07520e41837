// test/fakes/in-memory-run.repository.ts
import { AppError } from '../../src/core/common/errors';
import { RunSummary, UnconfirmedSubmission } from '../../src/core/common/interfaces/models';
import { ISyncRunRepository, StoredSyncRun } from '../../src/core/common/interfaces/repositories';

export class InMemoryRunRepository implements ISyncRunRepository {
    readonly runs = new Map<string, StoredSyncRun>();
    failSaves = false;

    async saveRun(summary: RunSummary, fatalError?: string): Promise<void> {
        if (this.failSaves) {
            throw new AppError('DatabaseError', 'Failed to save sync run: connection lost', 500, false);
        }
        this.runs.set(summary.runId, { summary, fatalError: fatalError ?? null });
    }

    async findRun(runId: string): Promise<StoredSyncRun | null> {
        return this.runs.get(runId) ?? null;
    }

    async findUnconfirmed(): Promise<UnconfirmedSubmission[]> {
        return [...this.runs.values()]
            .flatMap(({ summary }) => summary.failed
                .filter(outcome => outcome.errorKind === 'reconciliation')
                .map(outcome => ({
                    runId: summary.runId,
                    invoiceNumber: outcome.invoiceNumber,
                    erpInvoiceId: outcome.erpInvoiceId ?? null,
                    error: outcome.error,
                    recordedAt: summary.finishedAt,
                })))
            .sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime());
    }
}
