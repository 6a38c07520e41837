// src/core/common/interfaces/models.ts

/**
 * A line on a billing-system invoice. The billing component may omit any field;
 * the mapper substitutes zero values.
 */
export interface SourceLineItem {
    productCode?: string;
    description?: string;
    quantity?: number;
    unitPrice?: number;
    discountAmount?: number;
    taxAmount?: number;
    /** Percentage, e.g. 5 for 5% */
    taxRate?: number;
}

/**
 * An invoice as extracted from the billing system.
 */
export interface SourceInvoice {
    /** Stable, unique per billing system. Idempotency key for the whole pipeline. */
    invoiceNumber: string;
    customerCode: string;
    invoiceDate: Date;
    dueDate: Date;
    currencyCode: string;
    totalAmount: number;
    taxAmount: number;
    lineItems: SourceLineItem[];
    /** ERP invoice id written back after a successful sync. Empty until then. */
    erpReference?: string | null;
}

export type TaxGroup = 'EXEMPT' | 'GST5' | 'VAT7' | 'STANDARD';

export interface TargetLineItem {
    itemId: string;
    description: string;
    quantity: number;
    unitPrice: number;
    discountAmount: number;
    taxAmount: number;
    taxGroup: TaxGroup;
}

/**
 * An invoice in the shape the ERP accepts.
 */
export interface TargetInvoice {
    customerId: string;
    invoiceDate: Date;
    dueDate: Date;
    currencyCode: string;
    /** The source invoice number, kept for later reconciliation */
    externalInvoiceNumber: string;
    invoiceLines: TargetLineItem[];
}

/** Which step an invoice failed in. */
export type FailureKind = 'mapping' | 'submission' | 'reconciliation';

export interface SucceededOutcome {
    readonly invoiceNumber: string;
    readonly status: 'Succeeded';
    readonly erpInvoiceId: string;
}

export interface FailedOutcome {
    readonly invoiceNumber: string;
    readonly status: 'Failed';
    readonly errorKind: FailureKind;
    readonly error: string;
    /** Set when the ERP accepted the invoice but write-back failed */
    readonly erpInvoiceId?: string;
}

export type SyncOutcome = SucceededOutcome | FailedOutcome;

export type SyncTrigger = 'scheduled' | 'manual';

/**
 * Frozen result of one run.
 */
export interface RunSummary {
    readonly runId: string;
    readonly trigger: SyncTrigger;
    readonly fromDate: Date;
    readonly toDate: Date;
    readonly startedAt: Date;
    readonly finishedAt: Date;
    readonly succeededCount: number;
    readonly failedCount: number;
    /** Every outcome, in arrival order */
    readonly outcomes: readonly SyncOutcome[];
    /** The failed subset, in arrival order */
    readonly failed: readonly FailedOutcome[];
    /** True when a cancellation stopped dispatch before every invoice was attempted */
    readonly cancelled: boolean;
}

/**
 * Bearer credential held by the ERP gateway.
 */
export interface AuthToken {
    readonly accessToken: string;
    readonly issuedAt: Date;
    readonly expiresAt: Date;
}

/**
 * A submission the ERP accepted but the billing system never confirmed.
 */
export interface UnconfirmedSubmission {
    runId: string;
    invoiceNumber: string;
    erpInvoiceId: string | null;
    error: string;
    recordedAt: Date;
}
