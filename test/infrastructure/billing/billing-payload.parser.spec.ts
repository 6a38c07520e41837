// test/infrastructure/billing/billing-payload.parser.spec.ts
import { BillingSystemError } from '../../../src/core/common/errors';
import { InvoiceMapperService } from '../../../src/core/mapping';
import { hasErpReference, parseBillingInvoices } from '../../../src/infrastructure/billing';
import { toErpRequestBody } from '../../../src/infrastructure/erp';
import { sourceInvoice } from '../../fakes/invoices';

describe('parseBillingInvoices', () => {
    it.each([null, undefined, '', '   ', 'null'])('treats %p as an empty list', payload => {
        expect(parseBillingInvoices(payload)).toEqual([]);
    });

    it('reads PascalCase fields', () => {
        const payload = JSON.stringify([{
            InvoiceNumber: 'INV-1001',
            CustomerCode: 'CUST-9',
            InvoiceDate: '2024-03-01T00:00:00Z',
            DueDate: '2024-03-31T00:00:00Z',
            CurrencyCode: 'EUR',
            TotalAmount: 107,
            TaxAmount: 7,
            LineItems: [{ ProductCode: 'SKU-1', Description: 'Service', Quantity: 1, UnitPrice: 100, DiscountAmount: 0, TaxAmount: 7, TaxRate: 7 }],
            ERPReference: null,
        }]);

        expect(parseBillingInvoices(payload)).toEqual([{
            invoiceNumber: 'INV-1001',
            customerCode: 'CUST-9',
            invoiceDate: new Date('2024-03-01T00:00:00Z'),
            dueDate: new Date('2024-03-31T00:00:00Z'),
            currencyCode: 'EUR',
            totalAmount: 107,
            taxAmount: 7,
            lineItems: [{
                productCode: 'SKU-1', description: 'Service', quantity: 1, unitPrice: 100, discountAmount: 0, taxAmount: 7, taxRate: 7,
            }],
            erpReference: null,
        }]);
    });

    it('falls back to camelCase fields and numeric strings', () => {
        const [invoice] = parseBillingInvoices(JSON.stringify([{
            invoiceNumber: 42,
            customerCode: 'CUST-2',
            invoiceDate: '2024-04-01',
            dueDate: '2024-04-15',
            currencyCode: 'USD',
            totalAmount: '10.50',
            lineItems: [{ quantity: '3' }],
            erpReference: 'ERP-42',
        }]));

        expect(invoice.invoiceNumber).toBe('42');
        expect(invoice.totalAmount).toBe(10.5);
        expect(invoice.taxAmount).toBe(0);
        expect(invoice.lineItems).toEqual([{
            productCode: undefined, description: undefined, quantity: 3, unitPrice: undefined,
            discountAmount: undefined, taxAmount: undefined, taxRate: undefined,
        }]);
        expect(invoice.erpReference).toBe('ERP-42');
    });

    it('keeps the calendar day of offset-less timestamps through to the ERP body', () => {
        const [invoice] = parseBillingInvoices(JSON.stringify([{
            InvoiceNumber: 'INV-1',
            CustomerCode: 'CUST-1',
            InvoiceDate: '2024-03-01T00:00:00',
            DueDate: '2024-03-31T00:00:00',
            CurrencyCode: 'USD',
            LineItems: [],
        }]));

        const body = toErpRequestBody(new InvoiceMapperService().map(invoice));

        expect(body.InvoiceDate).toBe('2024-03-01');
        expect(body.DueDate).toBe('2024-03-31');
    });

    it('keeps an unparseable date as an invalid Date', () => {
        const [invoice] = parseBillingInvoices('[{"InvoiceNumber":"INV-1","InvoiceDate":"not a date"}]');

        expect(Number.isNaN(invoice.invoiceDate.getTime())).toBe(true);
        expect(Number.isNaN(invoice.dueDate.getTime())).toBe(true);
    });

    it('rejects invalid JSON', () => {
        expect(() => parseBillingInvoices('[{')).toThrow(BillingSystemError);
        expect(() => parseBillingInvoices('[{')).toThrow(/^Billing system returned invalid JSON: /);
    });

    it('rejects a payload that is not a list', () => {
        expect(() => parseBillingInvoices('{"InvoiceNumber":"INV-1"}'))
            .toThrow('Billing system returned a payload that is not an invoice list');
    });

    it('rejects a list entry that is not an object', () => {
        expect(() => parseBillingInvoices('[{"InvoiceNumber":"INV-1"}, 7]'))
            .toThrow('Invoice payload entry 1 is not an object');
    });
});

describe('hasErpReference', () => {
    it.each([
        [null, false],
        [undefined, false],
        ['', false],
        ['  ', false],
        ['ERP-1', true],
    ])('is %p → %p', (erpReference, expected) => {
        expect(hasErpReference(sourceInvoice('INV-1', { erpReference }))).toBe(expected);
    });
});
