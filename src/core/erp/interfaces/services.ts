// src/core/erp/interfaces/services.ts
import { AuthToken, TargetInvoice } from '../../common/interfaces/models';

/**
 * Submits mapped invoices to the ERP. Owns the bearer token; performs no retries.
 */
export interface IErpGateway {
    /**
     * @returns The invoice number the ERP assigned.
     * @throws {SubmissionError} with kind 'auth' on 401, 'rejected' on other 4xx,
     *         'transient' on 5xx, network failures and timeouts.
     */
    submit(target: TargetInvoice, signal?: AbortSignal): Promise<string>;
}

/**
 * Issues bearer tokens for the ERP API.
 */
export interface ITokenProvider {
    acquireToken(signal?: AbortSignal): Promise<AuthToken>;
}

export const ERP_GATEWAY_TOKEN = Symbol.for('ErpGateway');
export const TOKEN_PROVIDER_TOKEN = Symbol.for('ErpTokenProvider');
