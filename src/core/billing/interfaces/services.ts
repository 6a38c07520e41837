// src/core/billing/interfaces/services.ts
import { SourceInvoice } from '../../common/interfaces/models';

/**
 * The engine's only view of the billing system.
 */
export interface IBillingSystemProvider {
    /**
     * Returns invoices in the window whose ERP reference is still empty.
     * Filtering out already-synchronized invoices is the provider's job, not the caller's.
     * @throws {BillingSystemError} when the billing system cannot be reached or answers garbage.
     */
    fetchUnprocessedInvoices(startDate: Date, endDate: Date, signal?: AbortSignal): Promise<SourceInvoice[]>;

    /**
     * Records the ERP invoice id against the billing invoice, marking it processed.
     * The component call itself cannot be interrupted: if `signal` aborts while it runs,
     * the update may still land after the caller has recorded a failure.
     * @throws {BillingSystemError} when the billing system refuses the update.
     */
    writeBackReference(invoiceNumber: string, erpReference: string, signal?: AbortSignal): Promise<void>;
}

export const BILLING_SYSTEM_PROVIDER_TOKEN = Symbol.for('BillingSystemProvider');
