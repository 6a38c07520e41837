// src/core/mapping/invoice-mapper.service.ts
import 'reflect-metadata';
import { injectable, singleton } from 'tsyringe';
import { ValidationError } from '../common/errors';
import {
    SourceInvoice, SourceLineItem, TargetInvoice, TargetLineItem, TaxGroup
} from '../common/interfaces/models';
import { IInvoiceMapper } from './interfaces/services';

// Rates with a dedicated ERP tax group. Everything else is STANDARD.
const TAX_GROUP_BY_RATE: ReadonlyMap<number, TaxGroup> = new Map<number, TaxGroup>([
    [0, 'EXEMPT'],
    [5, 'GST5'],
    [7, 'VAT7'],
]);

/**
 * Maps a tax rate (percent) to its ERP tax group.
 * Unmapped rates, including negatives, fractions and NaN, fall back to STANDARD.
 */
export function mapTaxGroup(taxRate: number): TaxGroup {
    return TAX_GROUP_BY_RATE.get(taxRate) ?? 'STANDARD';
}

const numberOrZero = (value: number | undefined): number =>
    typeof value === 'number' && Number.isFinite(value) ? value : 0;

const isValidDate = (value: Date): boolean =>
    value instanceof Date && !isNaN(value.getTime());

function mapLineItem(line: SourceLineItem): TargetLineItem {
    return {
        itemId: line.productCode ?? '',
        description: line.description ?? '',
        quantity: numberOrZero(line.quantity),
        unitPrice: numberOrZero(line.unitPrice),
        discountAmount: numberOrZero(line.discountAmount),
        taxAmount: numberOrZero(line.taxAmount),
        // Only an absent rate means zero; a present but unusable one falls back like any unmapped rate
        taxGroup: mapTaxGroup(line.taxRate === undefined ? 0 : line.taxRate),
    };
}

@singleton()
@injectable()
export class InvoiceMapperService implements IInvoiceMapper {

    map(source: SourceInvoice): TargetInvoice {
        if (!source.invoiceNumber || source.invoiceNumber.trim() === '') {
            throw new ValidationError('Invoice number is required');
        }
        if (!source.customerCode || source.customerCode.trim() === '') {
            throw new ValidationError(`Customer code is required (invoice ${source.invoiceNumber})`);
        }
        if (!isValidDate(source.invoiceDate) || !isValidDate(source.dueDate)) {
            throw new ValidationError(`Invoice date and due date must be valid dates (invoice ${source.invoiceNumber})`);
        }

        return {
            customerId: source.customerCode,
            invoiceDate: source.invoiceDate,
            dueDate: source.dueDate,
            currencyCode: source.currencyCode,
            externalInvoiceNumber: source.invoiceNumber,
            invoiceLines: (source.lineItems ?? []).map(mapLineItem),
        };
    }
}
