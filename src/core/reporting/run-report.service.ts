// src/core/reporting/run-report.service.ts
import ExcelJS, { Row, Workbook, Worksheet } from 'exceljs';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { AppError, errorMessage } from '../common/errors';
import { RunSummary } from '../common/interfaces/models';
import { IRunReportService } from './interfaces/services';

const DATE_FORMAT = 'yyyy-mm-dd';
const TIMESTAMP_FORMAT = 'yyyy-mm-dd hh:mm:ss';
const COUNT_FORMAT = '#,##0';

export const SUMMARY_SHEET = 'Summary';
export const FAILED_INVOICES_SHEET = 'Failed Invoices';
const FAILED_INVOICE_HEADERS = ['Invoice Number', 'Failure Kind', 'Error', 'ERP Invoice ID'];

@singleton()
@injectable()
export class RunReportService implements IRunReportService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('RunReportService initialized.');
    }

    async generateReport(summary: RunSummary): Promise<Buffer> {
        this.logger.info(`Generating Excel report for invoice sync run ${summary.runId}...`);
        try {
            const workbook = this.buildWorkbook(summary);
            const buffer = Buffer.from(await workbook.xlsx.writeBuffer());
            this.logger.info('Excel report generated successfully.');
            return buffer;
        } catch (error) {
            this.logger.error('Failed to generate Excel report:', { message: errorMessage(error) });
            if (error instanceof AppError) throw error;
            throw new AppError('ReportGenerationError', 'Failed to generate Excel report', 500, false);
        }
    }

    /** Builds the in-memory workbook; exposed so callers can add sheets before writing. */
    buildWorkbook(summary: RunSummary): Workbook {
        const workbook = new ExcelJS.Workbook();
        workbook.creator = 'Invoice Sync Service';
        workbook.created = summary.finishedAt;
        workbook.modified = new Date();

        this.createSummarySheet(workbook, summary);
        this.createFailedInvoicesSheet(workbook, summary);
        return workbook;
    }

    private createSummarySheet(workbook: Workbook, summary: RunSummary): void {
        const sheet = workbook.addWorksheet(SUMMARY_SHEET);

        const titleRow = sheet.addRow(['Invoice Sync Run Summary']);
        titleRow.font = { bold: true, size: 16 };
        sheet.mergeCells('A1:B1');

        sheet.addRow(['Run ID', summary.runId]);
        sheet.addRow(['Trigger', summary.trigger]);
        sheet.addRow(['From Date', summary.fromDate]).getCell(2).numFmt = DATE_FORMAT;
        sheet.addRow(['To Date', summary.toDate]).getCell(2).numFmt = DATE_FORMAT;
        sheet.addRow(['Started At', summary.startedAt]).getCell(2).numFmt = TIMESTAMP_FORMAT;
        sheet.addRow(['Finished At', summary.finishedAt]).getCell(2).numFmt = TIMESTAMP_FORMAT;
        sheet.addRow(['Succeeded', summary.succeededCount]).getCell(2).numFmt = COUNT_FORMAT;
        sheet.addRow(['Failed', summary.failedCount]).getCell(2).numFmt = COUNT_FORMAT;
        sheet.addRow(['Cancelled', summary.cancelled ? 'Yes' : 'No']);

        for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
            sheet.getRow(rowNumber).getCell(1).font = { bold: true };
        }
        sheet.getColumn(1).width = 18;
        sheet.getColumn(2).width = 40;
    }

    private createFailedInvoicesSheet(workbook: Workbook, summary: RunSummary): void {
        const sheet = workbook.addWorksheet(FAILED_INVOICES_SHEET);
        this.styleHeaderRow(sheet.addRow(FAILED_INVOICE_HEADERS), FAILED_INVOICE_HEADERS.length);
        sheet.views = [{ state: 'frozen', ySplit: 1 }];

        summary.failed.forEach(outcome => {
            sheet.addRow([
                outcome.invoiceNumber,
                outcome.errorKind,
                outcome.error,
                outcome.erpInvoiceId ?? '',
            ]);
        });

        this.autoFitColumns(sheet, FAILED_INVOICE_HEADERS);
    }

    private styleHeaderRow(row: Row, columnCount: number): void {
        for (let i = 1; i <= columnCount; i++) {
            const cell = row.getCell(i);
            cell.font = { bold: true, color: { argb: 'FFFFFFFF' } };
            cell.alignment = { vertical: 'middle', horizontal: 'center', wrapText: true };
            cell.fill = {
                type: 'pattern',
                pattern: 'solid',
                fgColor: { argb: 'FF1F4E79' }
            };
            cell.border = {
                top: { style: 'thin' },
                left: { style: 'thin' },
                bottom: { style: 'thin' },
                right: { style: 'thin' }
            };
        }
    }

    /** Sizes columns to their longest value, capped so long error messages stay readable */
    private autoFitColumns(sheet: Worksheet, headers: string[]): void {
        headers.forEach((header, index) => {
            const column = sheet.getColumn(index + 1);
            let maxLength = header.length;
            column.eachCell({ includeEmpty: false }, cell => {
                const length = cell.value === null || cell.value === undefined ? 0 : String(cell.value).length;
                maxLength = Math.max(maxLength, length);
            });
            column.width = Math.min(maxLength + 2, 80);
        });
    }
}
