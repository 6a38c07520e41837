// test/core/sync/run-summary.spec.ts
import { failed, RunSummaryBuilder, succeeded } from '../../../src/core/sync';

const header = {
    runId: 'run-1',
    trigger: 'manual' as const,
    fromDate: new Date('2024-03-01T00:00:00Z'),
    toDate: new Date('2024-03-02T00:00:00Z'),
    startedAt: new Date('2024-03-02T01:00:00Z'),
};
const finishedAt = new Date('2024-03-02T01:05:00Z');

describe('RunSummaryBuilder', () => {
    it('keeps outcomes in arrival order and counts them', () => {
        const builder = new RunSummaryBuilder(header, () => finishedAt);
        builder.record(succeeded('INV-1', 'ERP-1'));
        builder.record(failed('INV-2', 'submission', 'HTTP 400'));
        builder.record(succeeded('INV-3', 'ERP-3'));

        expect(builder.succeededCount).toBe(2);
        expect(builder.failedCount).toBe(1);

        const summary = builder.finalize();
        expect(summary.outcomes.map(outcome => outcome.invoiceNumber)).toEqual(['INV-1', 'INV-2', 'INV-3']);
        expect(summary.failed).toEqual([
            { invoiceNumber: 'INV-2', status: 'Failed', errorKind: 'submission', error: 'HTTP 400' },
        ]);
        expect(summary).toMatchObject({
            runId: 'run-1',
            trigger: 'manual',
            finishedAt,
            succeededCount: 2,
            failedCount: 1,
            cancelled: false,
        });
    });

    it('returns the same frozen summary on every finalize', () => {
        const builder = new RunSummaryBuilder(header, () => finishedAt);
        builder.record(failed('INV-1', 'reconciliation', 'write-back failed', 'ERP-1'));

        const first = builder.finalize();
        expect(builder.finalize()).toBe(first);
        expect(Object.isFrozen(first)).toBe(true);
        expect(Object.isFrozen(first.outcomes)).toBe(true);
        expect(first.failed[0].erpInvoiceId).toBe('ERP-1');
    });

    it('rejects outcomes after finalization', () => {
        const builder = new RunSummaryBuilder(header);
        builder.finalize();

        expect(() => builder.record(succeeded('INV-1', 'ERP-1'))).toThrow('Run run-1 is already finalized');
    });

    it('records cancellation', () => {
        const builder = new RunSummaryBuilder(header);
        builder.markCancelled();

        expect(builder.finalize().cancelled).toBe(true);
    });
});
