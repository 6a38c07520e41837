// src/core/sync/invoice-sync.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { BILLING_SYSTEM_PROVIDER_TOKEN, IBillingSystemProvider } from '../billing';
import {
    ConflictError, errorMessage, FatalRunError, MappingError, ReconciliationError, SubmissionError
} from '../common/errors';
import {
    RunSummary, SourceInvoice, SyncOutcome, TargetInvoice
} from '../common/interfaces/models';
import { ISyncRunRepository, SYNC_RUN_REPOSITORY_TOKEN } from '../common/interfaces/repositories';
import { IntegrationSettings, SETTINGS_TOKEN } from '../common/interfaces/settings';
import { attempt, fail, ok, Result } from '../common/result';
import { formatIsoDate, generateUniqueId, sleep, withTimeout } from '../common/utils';
import { ERP_GATEWAY_TOKEN, IErpGateway } from '../erp';
import { IInvoiceMapper, INVOICE_MAPPER_TOKEN } from '../mapping';
import { EscalationService } from './escalation.service';
import { IInvoiceSyncService, SyncRunRequest } from './interfaces/services';
import { failed, RunSummaryBuilder, succeeded } from './run-summary';

const toSubmissionError = (error: unknown): SubmissionError =>
    error instanceof SubmissionError
        ? error
        : new SubmissionError(errorMessage(error), 'transient'); // timeouts and network faults

const toError = (error: unknown): Error =>
    error instanceof Error ? error : new Error(String(error));

/**
 * Batch orchestrator. Drives every unprocessed invoice in a window through
 * Fetched → Mapped → Submitted → Confirmed | Failed and reports the run.
 */
@singleton()
@injectable()
export class InvoiceSyncService implements IInvoiceSyncService {
    private activeRun: AbortController | null = null;

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(SETTINGS_TOKEN) private settings: IntegrationSettings,
        @inject(BILLING_SYSTEM_PROVIDER_TOKEN) private billingProvider: IBillingSystemProvider,
        @inject(INVOICE_MAPPER_TOKEN) private mapper: IInvoiceMapper,
        @inject(ERP_GATEWAY_TOKEN) private erpGateway: IErpGateway,
        @inject(EscalationService) private escalation: EscalationService,
        @inject(SYNC_RUN_REPOSITORY_TOKEN) private runRepository: ISyncRunRepository
    ) {
        this.logger.info('InvoiceSyncService initialized.');
    }

    get isRunning(): boolean {
        return this.activeRun !== null;
    }

    cancelActiveRun(reason: string = 'Invoice sync run cancelled'): void {
        if (!this.activeRun || this.activeRun.signal.aborted) {
            return;
        }
        this.logger.warn(`Cancelling active invoice sync run: ${reason}`);
        this.activeRun.abort(reason);
    }

    async runSync(request: SyncRunRequest): Promise<RunSummary> {
        if (this.activeRun) {
            throw new ConflictError();
        }

        const controller = new AbortController();
        this.activeRun = controller;
        const external = request.signal;
        const forwardAbort = (): void => controller.abort(external?.reason);
        if (external?.aborted) {
            forwardAbort();
        } else {
            external?.addEventListener('abort', forwardAbort, { once: true });
        }

        try {
            return await this.execute(request, controller.signal);
        } finally {
            external?.removeEventListener('abort', forwardAbort);
            this.activeRun = null;
        }
    }

    private async execute(request: SyncRunRequest, signal: AbortSignal): Promise<RunSummary> {
        const header = {
            runId: generateUniqueId(),
            trigger: request.trigger,
            fromDate: request.fromDate,
            toDate: request.toDate,
            startedAt: new Date(),
        };
        const builder = new RunSummaryBuilder(header);
        this.logger.info(
            `Starting ${header.trigger} invoice sync run ${header.runId} for ${formatIsoDate(header.fromDate)} to ${formatIsoDate(header.toDate)}`
        );

        if (signal.aborted) {
            builder.markCancelled();
            return this.complete(builder);
        }

        let invoices: SourceInvoice[];
        try {
            invoices = await withTimeout(
                'Billing system fetch',
                this.settings.sync.remoteCallTimeoutMs,
                timeoutSignal => this.billingProvider.fetchUnprocessedInvoices(header.fromDate, header.toDate, timeoutSignal)
            );
        } catch (error) {
            const fatal = new FatalRunError('Failed to retrieve invoices from billing system', toError(error));
            this.logger.error(`Invoice sync run ${header.runId} aborted: ${fatal.message}`);
            const summary = builder.finalize();
            await this.escalation.escalateFatal(fatal, header);
            await this.persist(summary, fatal.message);
            throw fatal;
        }

        if (invoices.length === 0) {
            this.logger.info('No invoices to process');
            return this.complete(builder);
        }

        this.logger.info(`Retrieved ${invoices.length} invoice(s) to process`);
        await this.processAll(invoices, builder, signal);
        return this.complete(builder);
    }

    /**
     * Bounded worker pool. Each worker takes the next undispatched invoice until
     * the queue drains or the run is cancelled.
     */
    private async processAll(invoices: SourceInvoice[], builder: RunSummaryBuilder, signal: AbortSignal): Promise<void> {
        const dispatched = new Set<string>();
        let next = 0;

        const worker = async (): Promise<void> => {
            while (next < invoices.length && !signal.aborted) {
                const invoice = invoices[next++];
                const invoiceNumber = invoice.invoiceNumber;
                if (dispatched.has(invoiceNumber)) {
                    this.logger.warn(`Skipping duplicate invoice ${invoiceNumber} in fetched batch`);
                    builder.record(failed(invoiceNumber, 'mapping', `Duplicate invoice number ${invoiceNumber} in fetched batch`));
                    continue;
                }
                dispatched.add(invoiceNumber);
                builder.record(await this.processInvoice(invoice));
            }
        };

        const poolSize = Math.max(1, Math.min(this.settings.sync.concurrency, invoices.length));
        await Promise.all(Array.from({ length: poolSize }, () => worker()));

        if (next < invoices.length) {
            this.logger.warn(`Invoice sync run cancelled with ${invoices.length - next} invoice(s) not dispatched`);
            builder.markCancelled();
        }
    }

    private async processInvoice(invoice: SourceInvoice): Promise<SyncOutcome> {
        const invoiceNumber = invoice.invoiceNumber;

        const mapped = this.mapInvoice(invoice);
        if (!mapped.ok) {
            this.logger.warn(`Invoice ${invoiceNumber} could not be mapped: ${mapped.error.message}`);
            return failed(invoiceNumber, 'mapping', mapped.error.message);
        }

        const submitted = await this.submitWithRetry(invoiceNumber, mapped.value);
        if (!submitted.ok) {
            return failed(invoiceNumber, 'submission', submitted.error.message);
        }

        const erpInvoiceId = submitted.value;
        const confirmed = await attempt(
            () => withTimeout(
                `Write-back of invoice ${invoiceNumber}`,
                this.settings.sync.remoteCallTimeoutMs,
                timeoutSignal => this.billingProvider.writeBackReference(invoiceNumber, erpInvoiceId, timeoutSignal)
            ),
            error => new ReconciliationError(
                `ERP invoice ${erpInvoiceId} created but write-back failed: ${errorMessage(error)}`,
                erpInvoiceId
            )
        );
        if (!confirmed.ok) {
            this.logger.error(`Invoice ${invoiceNumber} needs manual reconciliation: ${confirmed.error.message}`);
            return failed(invoiceNumber, 'reconciliation', confirmed.error.message, erpInvoiceId);
        }

        this.logger.info(`Invoice ${invoiceNumber} synchronized as ERP invoice ${erpInvoiceId}`);
        return succeeded(invoiceNumber, erpInvoiceId);
    }

    private mapInvoice(invoice: SourceInvoice): Result<TargetInvoice, MappingError> {
        try {
            return ok(this.mapper.map(invoice));
        } catch (error) {
            return fail(new MappingError(errorMessage(error)));
        }
    }

    /**
     * 'transient' failures are retried until maxRetryAttempts attempts have failed,
     * with linear back-off. 'auth' gets one extra attempt on a fresh token.
     * 'rejected' is terminal.
     */
    private async submitWithRetry(invoiceNumber: string, target: TargetInvoice): Promise<Result<string, SubmissionError>> {
        const { maxRetryAttempts, retryDelayMs, remoteCallTimeoutMs } = this.settings.sync;
        let transientFailures = 0;
        let authRetried = false;

        for (;;) {
            const result = await attempt(
                () => withTimeout(
                    `ERP submission of invoice ${invoiceNumber}`,
                    remoteCallTimeoutMs,
                    timeoutSignal => this.erpGateway.submit(target, timeoutSignal)
                ),
                toSubmissionError
            );
            if (result.ok) {
                return result;
            }

            const error = result.error;
            if (error.kind === 'auth' && !authRetried) {
                authRetried = true;
                this.logger.warn(`ERP rejected the token for invoice ${invoiceNumber}; retrying with a fresh token`);
                continue;
            }
            if (error.kind === 'transient') {
                transientFailures++;
                if (transientFailures < maxRetryAttempts) {
                    const delay = retryDelayMs * transientFailures;
                    this.logger.warn(
                        `Submission of invoice ${invoiceNumber} failed (attempt ${transientFailures}/${maxRetryAttempts}): ${error.message}. Retrying in ${delay} ms`
                    );
                    await sleep(delay);
                    continue;
                }
            }

            this.logger.error(`Submission of invoice ${invoiceNumber} failed [${error.kind}]: ${error.message}`, {
                remoteStatus: error.remoteStatus,
                responseBody: error.responseBody,
            });
            return result;
        }
    }

    private async complete(builder: RunSummaryBuilder): Promise<RunSummary> {
        const summary = builder.finalize();
        this.logger.info(
            `Invoice sync run ${summary.runId} completed: ${summary.succeededCount} successful, ${summary.failedCount} failed` +
            (summary.cancelled ? ' (cancelled)' : '')
        );
        for (const outcome of summary.failed) {
            this.logger.error(`Invoice ${outcome.invoiceNumber} failed [${outcome.errorKind}]: ${outcome.error}`);
        }

        await this.escalation.escalateRun(summary);
        await this.persist(summary);
        return summary;
    }

    private async persist(summary: RunSummary, fatalError?: string): Promise<void> {
        try {
            await this.runRepository.saveRun(summary, fatalError);
        } catch (error) {
            this.logger.error(`Failed to persist invoice sync run ${summary.runId}: ${errorMessage(error)}`);
        }
    }
}
