// src/core/reporting/index.ts

export * from './run-report.service';
export * from './interfaces/services';
