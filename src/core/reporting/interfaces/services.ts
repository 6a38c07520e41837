// src/core/reporting/interfaces/services.ts
import { RunSummary } from '../../common/interfaces/models';

/** Defines the contract for the run report service */
export interface IRunReportService {
    /**
     * Renders a run summary as an Excel workbook.
     * @returns the .xlsx file content.
     */
    generateReport(summary: RunSummary): Promise<Buffer>;
}

export const RUN_REPORT_SERVICE_TOKEN = Symbol.for('RunReportService');
