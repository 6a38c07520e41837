// src/infrastructure/billing/billing-payload.parser.ts
import { BillingSystemError } from '../../core/common/errors';
import { SourceInvoice, SourceLineItem } from '../../core/common/interfaces/models';
import { parseDateValue } from '../../core/common/utils';

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/** Reads a field by its PascalCase name, falling back to camelCase. */
function field(record: JsonRecord, pascalName: string): unknown {
    if (pascalName in record) {
        return record[pascalName];
    }
    const camelName = pascalName.charAt(0).toLowerCase() + pascalName.slice(1);
    return record[camelName];
}

function asString(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return undefined;
}

function asNumber(value: unknown): number | undefined {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
}

// Unparseable dates become Invalid Date; the mapper rejects them per invoice
const asDate = (value: unknown): Date => parseDateValue(value) ?? new Date(NaN);

function parseLineItem(value: unknown): SourceLineItem {
    if (!isRecord(value)) {
        return {};
    }
    return {
        productCode: asString(field(value, 'ProductCode')),
        description: asString(field(value, 'Description')),
        quantity: asNumber(field(value, 'Quantity')),
        unitPrice: asNumber(field(value, 'UnitPrice')),
        discountAmount: asNumber(field(value, 'DiscountAmount')),
        taxAmount: asNumber(field(value, 'TaxAmount')),
        taxRate: asNumber(field(value, 'TaxRate')),
    };
}

function parseInvoice(value: unknown, index: number): SourceInvoice {
    if (!isRecord(value)) {
        throw new BillingSystemError(`Invoice payload entry ${index} is not an object`);
    }
    const lineItems = field(value, 'LineItems');
    const erpReference = asString(field(value, 'ERPReference') ?? field(value, 'ErpReference'));

    return {
        invoiceNumber: asString(field(value, 'InvoiceNumber')) ?? '',
        customerCode: asString(field(value, 'CustomerCode')) ?? '',
        invoiceDate: asDate(field(value, 'InvoiceDate')),
        dueDate: asDate(field(value, 'DueDate')),
        currencyCode: asString(field(value, 'CurrencyCode')) ?? '',
        totalAmount: asNumber(field(value, 'TotalAmount')) ?? 0,
        taxAmount: asNumber(field(value, 'TaxAmount')) ?? 0,
        lineItems: Array.isArray(lineItems) ? lineItems.map(parseLineItem) : [],
        erpReference: erpReference ?? null,
    };
}

/**
 * Parses the JSON invoice list returned by the billing component.
 * A null or empty payload is an empty list.
 * @throws {BillingSystemError} when the payload is not a JSON array of objects.
 */
export function parseBillingInvoices(payload: string | null | undefined): SourceInvoice[] {
    if (payload === null || payload === undefined || payload.trim() === '') {
        return [];
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(payload);
    } catch (error) {
        throw new BillingSystemError('Billing system returned invalid JSON', error instanceof Error ? error : undefined);
    }

    if (parsed === null) {
        return [];
    }
    if (!Array.isArray(parsed)) {
        throw new BillingSystemError('Billing system returned a payload that is not an invoice list');
    }
    return parsed.map((entry, index) => parseInvoice(entry, index));
}

/** True when the invoice already carries an ERP reference, i.e. was synchronized before. */
export const hasErpReference = (invoice: SourceInvoice): boolean =>
    typeof invoice.erpReference === 'string' && invoice.erpReference.trim() !== '';
