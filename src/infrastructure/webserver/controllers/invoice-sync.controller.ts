// src/infrastructure/webserver/controllers/invoice-sync.controller.ts
import { NextFunction, Request, Response } from 'express';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { NotFoundError, ValidationError } from '../../../core/common/errors';
import { ISyncRunRepository, SYNC_RUN_REPOSITORY_TOKEN } from '../../../core/common/interfaces/repositories';
import { formatIsoDate, parseDateValue } from '../../../core/common/utils';
import { IRunReportService, RUN_REPORT_SERVICE_TOKEN } from '../../../core/reporting';
import { IInvoiceSyncService, INVOICE_SYNC_SERVICE_TOKEN } from '../../../core/sync';
import { LOGGER_TOKEN } from '../../logger';

const isBlank = (value: unknown): boolean =>
    value === undefined || value === null || (typeof value === 'string' && value.trim() === '');

/**
 * Validates the body of a manual sync request: `{ "FromDate": <date>, "ToDate": <date> }`.
 * @throws {ValidationError} when a field is missing, unparseable or the range is inverted.
 */
export function parseDateRangeRequest(body: unknown): { fromDate: Date; toDate: Date } {
    const rawFrom: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, 'FromDate') : undefined;
    const rawTo: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, 'ToDate') : undefined;
    if (isBlank(rawFrom) || isBlank(rawTo)) {
        throw new ValidationError('FromDate and ToDate are required');
    }

    const fromDate = parseDateValue(rawFrom);
    if (!fromDate) {
        throw new ValidationError('FromDate is not a valid date');
    }
    const toDate = parseDateValue(rawTo);
    if (!toDate) {
        throw new ValidationError('ToDate is not a valid date');
    }
    if (fromDate.getTime() > toDate.getTime()) {
        throw new ValidationError('FromDate must not be after ToDate');
    }
    return { fromDate, toDate };
}

@singleton()
@injectable()
export class InvoiceSyncController {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(INVOICE_SYNC_SERVICE_TOKEN) private syncService: IInvoiceSyncService,
        @inject(SYNC_RUN_REPOSITORY_TOKEN) private runRepository: ISyncRunRepository,
        @inject(RUN_REPORT_SERVICE_TOKEN) private reporter: IRunReportService
    ) {
        this.logger.info('InvoiceSyncController initialized.');
    }

    /**
     * Runs a sync for the requested window. Per-invoice failures are reported
     * through escalation and run history, never in this response.
     */
    public handleManualSync = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        this.logger.info('Received manual invoice sync request.');
        try {
            const { fromDate, toDate } = parseDateRangeRequest(req.body);
            const summary = await this.syncService.runSync({ fromDate, toDate, trigger: 'manual' });

            res.status(200).json({
                status: 'success',
                message: `Processed invoices from ${formatIsoDate(fromDate)} to ${formatIsoDate(toDate)}`,
                runId: summary.runId,
            });
        } catch (error) {
            next(error);
        }
    };

    public handleGetRun = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const runId = req.params.runId;
        try {
            const stored = await this.runRepository.findRun(runId);
            if (!stored) {
                throw new NotFoundError(`Sync run ${runId} not found`);
            }
            res.status(200).json({ ...stored.summary, fatalError: stored.fatalError });
        } catch (error) {
            next(error);
        }
    };

    public handleDownloadReport = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const runId = req.params.runId;
        this.logger.info(`Received request to export report for sync run ${runId}.`);
        try {
            const stored = await this.runRepository.findRun(runId);
            if (!stored) {
                throw new NotFoundError(`Sync run ${runId} not found`);
            }
            const reportBuffer = await this.reporter.generateReport(stored.summary);

            const filename = `invoice-sync-${runId}.xlsx`;
            res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
            res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
            res.send(reportBuffer);
        } catch (error) {
            next(error);
        }
    };

    /** Invoices the ERP accepted but the billing system never confirmed. */
    public handleListUnconfirmed = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const unconfirmed = await this.runRepository.findUnconfirmed();
            res.status(200).json({ count: unconfirmed.length, items: unconfirmed });
        } catch (error) {
            next(error);
        }
    };
}
