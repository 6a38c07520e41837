// src/core/mapping/interfaces/services.ts
import { SourceInvoice, TargetInvoice } from '../../common/interfaces/models';

/** Defines the contract for the source-to-ERP invoice mapper */
export interface IInvoiceMapper {
    /**
     * Maps a billing-system invoice to the ERP invoice shape. Pure and deterministic.
     * @throws {ValidationError} when the invoice number or customer code is missing.
     */
    map(source: SourceInvoice): TargetInvoice;
}

export const INVOICE_MAPPER_TOKEN = Symbol.for('InvoiceMapper');
