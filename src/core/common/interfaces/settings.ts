// src/core/common/interfaces/settings.ts

/**
 * Integration settings, built once at process start and injected wherever needed.
 * Core services never read the environment themselves.
 */
export interface IntegrationSettings {
    readonly billing: {
        /** Module exporting the billing component factory */
        readonly modulePath: string;
        /** Opaque connection blob handed to the component's initialize() */
        readonly connectionConfig: string;
    };
    readonly erp: {
        readonly apiUrl: string;
        readonly invoicePath: string;
        readonly authorityUrl: string;
        readonly resource: string;
        readonly tenantId: string;
        readonly clientId: string;
        readonly clientSecret: string;
        /** Tokens are treated as expired this many seconds early */
        readonly tokenExpirySkewSeconds: number;
    };
    readonly sync: {
        /** Total submission attempts for transient failures, first try included */
        readonly maxRetryAttempts: number;
        readonly retryDelayMs: number;
        readonly remoteCallTimeoutMs: number;
        /** 1 = sequential */
        readonly concurrency: number;
        readonly lookbackDays: number;
        readonly intervalMinutes: number;
        readonly schedulerEnabled: boolean;
    };
    readonly notification: {
        readonly webhookUrl?: string;
    };
}

export const SETTINGS_TOKEN = Symbol.for('IntegrationSettings');
