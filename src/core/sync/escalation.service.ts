// src/core/sync/escalation.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { errorMessage, FatalRunError } from '../common/errors';
import { RunSummary } from '../common/interfaces/models';
import { formatIsoDate } from '../common/utils';
import { INotifier, NOTIFIER_TOKEN, NotificationSeverity } from './interfaces/services';

// Keep notification bodies readable when a large batch fails
const MAX_LISTED_FAILURES = 20;

/**
 * Decides when a run needs human attention and sends the notification.
 */
@singleton()
@injectable()
export class EscalationService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(NOTIFIER_TOKEN) private notifier: INotifier
    ) {
        this.logger.info('EscalationService initialized.');
    }

    /**
     * Sends one 'failure' notification when the finalized summary holds failed outcomes.
     * @returns whether a notification was sent.
     */
    async escalateRun(summary: RunSummary): Promise<boolean> {
        if (summary.failedCount === 0) {
            return false;
        }

        const lines = summary.failed
            .slice(0, MAX_LISTED_FAILURES)
            .map(outcome => {
                const erpNote = outcome.erpInvoiceId ? ` (ERP invoice ${outcome.erpInvoiceId})` : '';
                return `- ${outcome.invoiceNumber} [${outcome.errorKind}]${erpNote}: ${outcome.error}`;
            });
        if (summary.failedCount > MAX_LISTED_FAILURES) {
            lines.push(`- ... and ${summary.failedCount - MAX_LISTED_FAILURES} more`);
        }

        const reconciliationCount = summary.failed.filter(outcome => outcome.errorKind === 'reconciliation').length;
        const header = `Invoice sync run ${summary.runId} (${formatIsoDate(summary.fromDate)} to ${formatIsoDate(summary.toDate)}) ` +
            `completed with ${summary.failedCount} failed and ${summary.succeededCount} succeeded invoice(s).`;
        const reconciliationNote = reconciliationCount > 0
            ? `\n${reconciliationCount} invoice(s) exist in the ERP but were not confirmed in the billing system and need manual reconciliation.`
            : '';

        await this.dispatch('failure', `${header}${reconciliationNote}\n${lines.join('\n')}`);
        return true;
    }

    /**
     * Sends a 'critical' notification for a run that aborted before touching any invoice.
     */
    async escalateFatal(error: FatalRunError, context: { runId: string; fromDate: Date; toDate: Date }): Promise<void> {
        await this.dispatch(
            'critical',
            `Invoice sync run ${context.runId} (${formatIsoDate(context.fromDate)} to ${formatIsoDate(context.toDate)}) aborted: ${error.message}`
        );
    }

    private async dispatch(severity: NotificationSeverity, message: string): Promise<void> {
        try {
            await this.notifier.notify(severity, message);
        } catch (error) {
            // A broken channel must not change the run result; the log still carries the message
            this.logger.error(`Failed to send ${severity} notification: ${errorMessage(error)}`, { notification: message });
        }
    }
}
