// test/core/sync/escalation.service.spec.ts
import { FatalRunError } from '../../../src/core/common/errors';
import { EscalationService, failed, RunSummaryBuilder, succeeded } from '../../../src/core/sync';
import { createTestLogger } from '../../fakes/logger';
import { RecordingNotifier } from '../../fakes/recording.notifier';

const header = {
    runId: 'run-1',
    trigger: 'scheduled' as const,
    fromDate: new Date('2024-03-01T00:00:00Z'),
    toDate: new Date('2024-03-02T00:00:00Z'),
    startedAt: new Date('2024-03-02T01:00:00Z'),
};

describe('EscalationService', () => {
    let notifier: RecordingNotifier;
    let escalation: EscalationService;

    beforeEach(() => {
        notifier = new RecordingNotifier();
        escalation = new EscalationService(createTestLogger(), notifier);
    });

    it('stays quiet for a clean run', async () => {
        const builder = new RunSummaryBuilder(header);
        builder.record(succeeded('INV-1', 'ERP-1'));

        expect(await escalation.escalateRun(builder.finalize())).toBe(false);
        expect(notifier.notifications).toEqual([]);
    });

    it('sends one failure notification listing the failed invoices', async () => {
        const builder = new RunSummaryBuilder(header);
        builder.record(succeeded('INV-1', 'ERP-1'));
        builder.record(failed('INV-2', 'submission', 'ERP returned HTTP 400 for invoice INV-2'));

        expect(await escalation.escalateRun(builder.finalize())).toBe(true);
        expect(notifier.notifications).toEqual([{
            severity: 'failure',
            message: 'Invoice sync run run-1 (2024-03-01 to 2024-03-02) completed with 1 failed and 1 succeeded invoice(s).\n' +
                '- INV-2 [submission]: ERP returned HTTP 400 for invoice INV-2',
        }]);
    });

    it('calls out invoices that need manual reconciliation', async () => {
        const builder = new RunSummaryBuilder(header);
        builder.record(failed('INV-1', 'reconciliation', 'write-back failed', 'ERP-1'));

        await escalation.escalateRun(builder.finalize());

        expect(notifier.notifications[0].message).toBe(
            'Invoice sync run run-1 (2024-03-01 to 2024-03-02) completed with 1 failed and 0 succeeded invoice(s).\n' +
            '1 invoice(s) exist in the ERP but were not confirmed in the billing system and need manual reconciliation.\n' +
            '- INV-1 [reconciliation] (ERP invoice ERP-1): write-back failed'
        );
    });

    it('sends a critical notification for a fatal abort', async () => {
        const error = new FatalRunError('Failed to retrieve invoices from billing system', new Error('down'));

        await escalation.escalateFatal(error, header);

        expect(notifier.notifications).toEqual([{
            severity: 'critical',
            message: 'Invoice sync run run-1 (2024-03-01 to 2024-03-02) aborted: Failed to retrieve invoices from billing system: down',
        }]);
    });

    it('swallows notifier failures', async () => {
        notifier.failWith = new Error('smtp down');
        const builder = new RunSummaryBuilder(header);
        builder.record(failed('INV-1', 'mapping', 'Customer code is required (invoice INV-1)'));

        await expect(escalation.escalateRun(builder.finalize())).resolves.toBe(true);
    });
});
