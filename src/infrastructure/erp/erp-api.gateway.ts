// src/infrastructure/erp/erp-api.gateway.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { errorMessage, SubmissionError, SubmissionErrorKind } from '../../core/common/errors';
import { AuthToken, TargetInvoice } from '../../core/common/interfaces/models';
import { IntegrationSettings, SETTINGS_TOKEN } from '../../core/common/interfaces/settings';
import { formatIsoDate, withTimeout } from '../../core/common/utils';
import { IErpGateway, ITokenProvider, TOKEN_PROVIDER_TOKEN } from '../../core/erp';
import { LOGGER_TOKEN } from '../logger';

// Throttling and request timeouts are worth retrying even though they are 4xx
const TRANSIENT_CLIENT_STATUSES = new Set([408, 429]);

/** Serializes a mapped invoice in the ERP's field naming, dates as yyyy-MM-dd. */
export function toErpRequestBody(target: TargetInvoice): Record<string, unknown> {
    return {
        CustomerId: target.customerId,
        InvoiceDate: formatIsoDate(target.invoiceDate),
        DueDate: formatIsoDate(target.dueDate),
        CurrencyCode: target.currencyCode,
        ExternalInvoiceNumber: target.externalInvoiceNumber,
        InvoiceLines: target.invoiceLines.map(line => ({
            ItemId: line.itemId,
            Description: line.description,
            Quantity: line.quantity,
            UnitPrice: line.unitPrice,
            DiscountAmount: line.discountAmount,
            TaxAmount: line.taxAmount,
            TaxGroup: line.taxGroup,
        })),
    };
}

/** Pulls the assigned invoice number out of a create response, or null. */
export function readErpInvoiceNumber(body: string): string | null {
    let data: unknown;
    try {
        data = JSON.parse(body);
    } catch {
        return null;
    }
    if (typeof data !== 'object' || data === null) {
        return null;
    }
    const value: unknown = Reflect.get(data, 'InvoiceNumber') ?? Reflect.get(data, 'invoiceNumber');
    if (typeof value === 'number') return String(value);
    return typeof value === 'string' && value.trim() !== '' ? value : null;
}

const classifyStatus = (status: number): SubmissionErrorKind => {
    if (status === 401) return 'auth';
    if (status >= 500 || TRANSIENT_CLIENT_STATUSES.has(status)) return 'transient';
    return 'rejected';
};

/**
 * Posts invoices to the ERP's OData endpoint. Caches one bearer token for all callers,
 * and only one token acquisition runs at a time. Never retries.
 */
@singleton()
@injectable()
export class ErpApiGateway implements IErpGateway {
    private cachedToken: AuthToken | null = null;
    private pendingToken: Promise<AuthToken> | null = null;

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(SETTINGS_TOKEN) private settings: IntegrationSettings,
        @inject(TOKEN_PROVIDER_TOKEN) private tokenProvider: ITokenProvider
    ) {
        this.logger.info('ErpApiGateway initialized.');
    }

    get invoiceUrl(): string {
        return `${this.settings.erp.apiUrl}${this.settings.erp.invoicePath}`;
    }

    async submit(target: TargetInvoice, signal?: AbortSignal): Promise<string> {
        const invoiceNumber = target.externalInvoiceNumber;
        const token = await this.getToken();

        let response: Response;
        let body: string;
        try {
            response = await fetch(this.invoiceUrl, {
                method: 'POST',
                headers: {
                    Authorization: `Bearer ${token.accessToken}`,
                    'Content-Type': 'application/json',
                    Accept: 'application/json',
                },
                body: JSON.stringify(toErpRequestBody(target)),
                signal,
            });
            body = await response.text();
        } catch (error) {
            throw new SubmissionError(`ERP request for invoice ${invoiceNumber} failed: ${errorMessage(error)}`, 'transient');
        }

        if (!response.ok) {
            const kind = classifyStatus(response.status);
            if (kind === 'auth') {
                this.invalidateToken(token);
            }
            this.logger.error(`ERP API error: ${response.status} - ${body}`);
            throw new SubmissionError(
                `ERP returned HTTP ${response.status} for invoice ${invoiceNumber}`,
                kind,
                { remoteStatus: response.status, responseBody: body }
            );
        }

        const erpInvoiceId = readErpInvoiceNumber(body);
        if (!erpInvoiceId) {
            throw new SubmissionError('ERP did not return an invoice number', 'rejected', {
                remoteStatus: response.status,
                responseBody: body,
            });
        }
        return erpInvoiceId;
    }

    /** Returns the cached token while it is fresh; otherwise joins or starts one acquisition. */
    private async getToken(): Promise<AuthToken> {
        if (this.cachedToken && this.isFresh(this.cachedToken)) {
            return this.cachedToken;
        }
        if (!this.pendingToken) {
            this.pendingToken = this.acquireToken().finally(() => {
                this.pendingToken = null;
            });
        }
        return this.pendingToken;
    }

    private async acquireToken(): Promise<AuthToken> {
        this.logger.info('Acquiring ERP access token...');
        try {
            const token = await withTimeout(
                'ERP token acquisition',
                this.settings.sync.remoteCallTimeoutMs,
                timeoutSignal => this.tokenProvider.acquireToken(timeoutSignal)
            );
            this.cachedToken = token;
            return token;
        } catch (error) {
            this.cachedToken = null;
            if (error instanceof SubmissionError) throw error;
            throw new SubmissionError(`Failed to acquire ERP access token: ${errorMessage(error)}`, 'transient');
        }
    }

    private isFresh(token: AuthToken): boolean {
        const skewMs = this.settings.erp.tokenExpirySkewSeconds * 1000;
        return token.expiresAt.getTime() - skewMs > Date.now();
    }

    // A newer token may already have replaced the rejected one
    private invalidateToken(rejected: AuthToken): void {
        if (this.cachedToken === rejected) {
            this.logger.warn('ERP rejected the cached access token; it will be refreshed on the next call');
            this.cachedToken = null;
        }
    }
}
