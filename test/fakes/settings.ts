// test/fakes/settings.ts
import { IntegrationSettings } from '../../src/core/common/interfaces/settings';

interface SettingsOverrides {
    erp?: Partial<IntegrationSettings['erp']>;
    sync?: Partial<IntegrationSettings['sync']>;
    notification?: Partial<IntegrationSettings['notification']>;
}

export function buildSettings(overrides: SettingsOverrides = {}): IntegrationSettings {
    return {
        billing: {
            modulePath: '/opt/billing/component.js',
            connectionConfig: 'Server=billing.test;User=test;Password=test-secret',
        },
        erp: {
            apiUrl: 'https://erp.example.test',
            invoicePath: '/data/CustomerInvoiceHeaders',
            authorityUrl: 'https://login.example.test',
            resource: 'https://erp.example.test',
            tenantId: 'tenant-1',
            clientId: 'client-1',
            clientSecret: 'test-secret',
            tokenExpirySkewSeconds: 60,
            ...overrides.erp,
        },
        sync: {
            maxRetryAttempts: 3,
            retryDelayMs: 0,
            remoteCallTimeoutMs: 1000,
            concurrency: 1,
            lookbackDays: 1,
            intervalMinutes: 60,
            schedulerEnabled: true,
            ...overrides.sync,
        },
        notification: {
            ...overrides.notification,
        },
    };
}
