// test/infrastructure/erp/erp-api.gateway.spec.ts
import { SubmissionError } from '../../../src/core/common/errors';
import { AuthToken, TargetInvoice } from '../../../src/core/common/interfaces/models';
import { ITokenProvider } from '../../../src/core/erp';
import { InvoiceMapperService } from '../../../src/core/mapping';
import { EscalationService, InvoiceSyncService } from '../../../src/core/sync';
import { ErpApiGateway, readErpInvoiceNumber } from '../../../src/infrastructure/erp';
import { InMemoryBillingProvider } from '../../fakes/in-memory-billing.provider';
import { InMemoryRunRepository } from '../../fakes/in-memory-run.repository';
import { sourceInvoice } from '../../fakes/invoices';
import { createTestLogger } from '../../fakes/logger';
import { RecordingNotifier } from '../../fakes/recording.notifier';
import { buildSettings } from '../../fakes/settings';

class CountingTokenProvider implements ITokenProvider {
    acquisitions = 0;

    constructor(private lifetimeMs = 60 * 60 * 1000, private delayMs = 0) { }

    async acquireToken(): Promise<AuthToken> {
        this.acquisitions++;
        const count = this.acquisitions;
        if (this.delayMs > 0) {
            await new Promise(resolve => setTimeout(resolve, this.delayMs));
        }
        const issuedAt = new Date();
        return { accessToken: `token-${count}`, issuedAt, expiresAt: new Date(issuedAt.getTime() + this.lifetimeMs) };
    }
}

const target: TargetInvoice = {
    customerId: 'CUST-1',
    invoiceDate: new Date('2024-03-01T00:00:00Z'),
    dueDate: new Date('2024-03-31T00:00:00Z'),
    currencyCode: 'USD',
    externalInvoiceNumber: 'INV-1',
    invoiceLines: [{
        itemId: 'WIDGET', description: 'Widget', quantity: 2, unitPrice: 50, discountAmount: 0, taxAmount: 5, taxGroup: 'GST5',
    }],
};

const jsonResponse = (status: number, body: unknown) =>
    new Response(typeof body === 'string' ? body : JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

async function captureError(promise: Promise<unknown>): Promise<SubmissionError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof SubmissionError) return error;
        throw error;
    }
    throw new Error('Expected a SubmissionError');
}

describe('ErpApiGateway', () => {
    let fetchMock: jest.SpiedFunction<typeof fetch>;
    const settings = buildSettings();

    beforeEach(() => {
        fetchMock = jest.spyOn(global, 'fetch');
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('posts the invoice with a bearer token and returns the ERP invoice number', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse(201, { InvoiceNumber: 'ERP-100', RecId: 5637144576 }));
        const gateway = new ErpApiGateway(createTestLogger(), settings, new CountingTokenProvider());

        await expect(gateway.submit(target)).resolves.toBe('ERP-100');

        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('https://erp.example.test/data/CustomerInvoiceHeaders');
        expect(init).toMatchObject({
            method: 'POST',
            headers: { Authorization: 'Bearer token-1', 'Content-Type': 'application/json' },
        });
        expect(JSON.parse(String(init?.body))).toEqual({
            CustomerId: 'CUST-1',
            InvoiceDate: '2024-03-01',
            DueDate: '2024-03-31',
            CurrencyCode: 'USD',
            ExternalInvoiceNumber: 'INV-1',
            InvoiceLines: [{
                ItemId: 'WIDGET', Description: 'Widget', Quantity: 2, UnitPrice: 50, DiscountAmount: 0, TaxAmount: 5, TaxGroup: 'GST5',
            }],
        });
    });

    it('reuses a valid token across submissions', async () => {
        fetchMock.mockImplementation(async () => jsonResponse(201, { InvoiceNumber: 'ERP-1' }));
        const tokens = new CountingTokenProvider();
        const gateway = new ErpApiGateway(createTestLogger(), settings, tokens);

        await gateway.submit(target);
        await gateway.submit(target);

        expect(tokens.acquisitions).toBe(1);
    });

    it('shares one token acquisition between concurrent callers', async () => {
        fetchMock.mockImplementation(async () => jsonResponse(201, { InvoiceNumber: 'ERP-1' }));
        const tokens = new CountingTokenProvider(60 * 60 * 1000, 10);
        const gateway = new ErpApiGateway(createTestLogger(), settings, tokens);

        await Promise.all([gateway.submit(target), gateway.submit(target), gateway.submit(target)]);

        expect(tokens.acquisitions).toBe(1);
    });

    it('refreshes a token that is inside the expiry skew', async () => {
        fetchMock.mockImplementation(async () => jsonResponse(201, { InvoiceNumber: 'ERP-1' }));
        const tokens = new CountingTokenProvider(30 * 1000); // skew is 60 s
        const gateway = new ErpApiGateway(createTestLogger(), settings, tokens);

        await gateway.submit(target);
        await gateway.submit(target);

        expect(tokens.acquisitions).toBe(2);
    });

    it('drops the token on 401 and reports an auth failure', async () => {
        fetchMock
            .mockResolvedValueOnce(jsonResponse(401, 'expired'))
            .mockResolvedValueOnce(jsonResponse(201, { InvoiceNumber: 'ERP-2' }));
        const tokens = new CountingTokenProvider();
        const gateway = new ErpApiGateway(createTestLogger(), settings, tokens);

        const error = await captureError(gateway.submit(target));
        expect(error).toMatchObject({ kind: 'auth', remoteStatus: 401, responseBody: 'expired' });

        await expect(gateway.submit(target)).resolves.toBe('ERP-2');
        expect(tokens.acquisitions).toBe(2);
    });

    it.each([
        [400, 'rejected'],
        [422, 'rejected'],
        [429, 'transient'],
        [500, 'transient'],
        [503, 'transient'],
    ])('classifies HTTP %i as %s', async (status, kind) => {
        fetchMock.mockResolvedValueOnce(jsonResponse(status, '{"error":"nope"}'));
        const gateway = new ErpApiGateway(createTestLogger(), settings, new CountingTokenProvider());

        const error = await captureError(gateway.submit(target));

        expect(error.kind).toBe(kind);
        expect(error.remoteStatus).toBe(status);
        expect(error.responseBody).toBe('{"error":"nope"}');
        expect(error.message).toBe(`ERP returned HTTP ${status} for invoice INV-1`);
    });

    it('treats a network failure as transient', async () => {
        fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
        const gateway = new ErpApiGateway(createTestLogger(), settings, new CountingTokenProvider());

        const error = await captureError(gateway.submit(target));

        expect(error.kind).toBe('transient');
        expect(error.message).toBe('ERP request for invoice INV-1 failed: fetch failed');
    });

    it('rejects a success response without an invoice number', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse(201, { RecId: 1 }));
        const gateway = new ErpApiGateway(createTestLogger(), settings, new CountingTokenProvider());

        const error = await captureError(gateway.submit(target));

        expect(error.kind).toBe('rejected');
        expect(error.message).toBe('ERP did not return an invoice number');
    });

    it('confirms an invoice after one token refresh when the first call gets 401', async () => {
        fetchMock
            .mockResolvedValueOnce(jsonResponse(401, ''))
            .mockResolvedValueOnce(jsonResponse(201, { InvoiceNumber: 'ERP-7' }));
        const tokens = new CountingTokenProvider();
        const logger = createTestLogger();
        const billing = new InMemoryBillingProvider([sourceInvoice('INV-1')]);
        const service = new InvoiceSyncService(
            logger,
            settings,
            billing,
            new InvoiceMapperService(),
            new ErpApiGateway(logger, settings, tokens),
            new EscalationService(logger, new RecordingNotifier()),
            new InMemoryRunRepository()
        );

        const summary = await service.runSync({
            fromDate: new Date('2024-03-01T00:00:00Z'),
            toDate: new Date('2024-03-02T00:00:00Z'),
            trigger: 'manual',
        });

        expect(summary.outcomes).toEqual([{ invoiceNumber: 'INV-1', status: 'Succeeded', erpInvoiceId: 'ERP-7' }]);
        expect(tokens.acquisitions).toBe(2);
        expect(billing.writeBacks).toEqual([{ invoiceNumber: 'INV-1', erpReference: 'ERP-7' }]);
    });
});

describe('readErpInvoiceNumber', () => {
    it.each([
        ['{"InvoiceNumber":"CI-001"}', 'CI-001'],
        ['{"invoiceNumber":"CI-002"}', 'CI-002'],
        ['{"InvoiceNumber":12}', '12'],
        ['{"InvoiceNumber":""}', null],
        ['not json', null],
        ['null', null],
    ])('reads %s as %p', (body, expected) => {
        expect(readErpInvoiceNumber(body)).toBe(expected);
    });
});
