// src/config/index.ts
import { ConfigurationError } from '../core/common/errors';
import { IntegrationSettings } from '../core/common/interfaces/settings';

// --- Interfaces ---

type Env = Record<string, string | undefined>;

// Define the structure for Database Configuration
interface DatabaseConfig {
    readonly type: 'mssql'; // Currently fixed to mssql
    readonly host: string;
    readonly port: number;
    readonly username: string;
    readonly password?: string;
    readonly database: string;
    readonly synchronize: boolean;
    readonly logging: boolean;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';
export type NodeEnv = 'development' | 'production' | 'test';

// Define the structure of our main application configuration
export interface AppConfig {
    readonly nodeEnv: NodeEnv;
    readonly port: number;
    readonly logLevel: LogLevel;
    readonly database: DatabaseConfig;
}

// --- Helper Functions ---
function parseIntEnv(env: Env, varName: string, defaultValue?: number): number {
    const valueStr = env[varName];
    if (valueStr) {
        const valueInt = parseInt(valueStr, 10);
        if (!isNaN(valueInt)) {
            return valueInt;
        }
        throw new ConfigurationError(`Invalid integer format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${varName}`);
}

function parseBoolEnv(env: Env, varName: string, defaultValue: boolean): boolean {
    const valueStr = env[varName];
    if (valueStr === undefined || valueStr === '') {
        return defaultValue;
    }
    return valueStr.toLowerCase() === 'true';
}

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

function isNodeEnv(value: string | undefined): value is NodeEnv {
    return NODE_ENVS.some(candidate => candidate === value);
}

function isLogLevel(value: string | undefined): value is LogLevel {
    return LOG_LEVELS.some(candidate => candidate === value);
}

// --- Load, Validate, and Export Configuration ---
export function loadAppConfig(env: Env = process.env): AppConfig {
    const rawLogLevel = env.LOG_LEVEL;
    if (rawLogLevel && !isLogLevel(rawLogLevel)) {
        // Logger may not exist yet, so console it is
        console.warn(`Invalid LOG_LEVEL: ${rawLogLevel}. Defaulting to 'info'.`);
    }

    const appConfig: AppConfig = {
        nodeEnv: isNodeEnv(env.NODE_ENV) ? env.NODE_ENV : 'development',
        port: parseIntEnv(env, 'APP_PORT', 3000),
        logLevel: isLogLevel(rawLogLevel) ? rawLogLevel : 'info',

        database: {
            type: 'mssql',
            host: env.DB_HOST || 'localhost',
            port: parseIntEnv(env, 'DB_PORT', 1433),
            username: env.DB_USER || 'sa',
            password: env.DB_PASS,
            database: env.DB_NAME || 'invoice_sync',
            synchronize: parseBoolEnv(env, 'DB_SYNCHRONIZE', false),
            logging: parseBoolEnv(env, 'DB_LOGGING', false),
        },
    };

    // --- Freeze Configuration ---
    Object.freeze(appConfig.database);
    return Object.freeze(appConfig);
}

const REQUIRED_SETTINGS = [
    'BILLING_SYSTEM_MODULE_PATH',
    'BILLING_SYSTEM_CONFIG',
    'ERP_API_URL',
    'ERP_TENANT_ID',
    'ERP_CLIENT_ID',
    'ERP_CLIENT_SECRET',
] as const;

type RequiredSetting = typeof REQUIRED_SETTINGS[number];

/**
 * Builds the integration settings from the environment. Throws a ConfigurationError
 * naming every missing required variable.
 */
export function loadIntegrationSettings(env: Env = process.env): IntegrationSettings {
    const missing = REQUIRED_SETTINGS.filter(key => !env[key]);
    if (missing.length > 0) {
        throw new ConfigurationError(`Missing required settings: ${missing.join(', ')}`);
    }
    const required = (key: RequiredSetting): string => env[key] ?? '';

    const apiUrl = required('ERP_API_URL').replace(/\/+$/, '');

    const settings: IntegrationSettings = {
        billing: {
            modulePath: required('BILLING_SYSTEM_MODULE_PATH'),
            connectionConfig: required('BILLING_SYSTEM_CONFIG'),
        },
        erp: {
            apiUrl,
            invoicePath: env.ERP_INVOICE_PATH || '/data/CustomerInvoiceHeaders',
            authorityUrl: (env.ERP_AUTHORITY_URL || 'https://login.microsoftonline.com').replace(/\/+$/, ''),
            resource: env.ERP_RESOURCE || apiUrl,
            tenantId: required('ERP_TENANT_ID'),
            clientId: required('ERP_CLIENT_ID'),
            clientSecret: required('ERP_CLIENT_SECRET'),
            tokenExpirySkewSeconds: parseIntEnv(env, 'TOKEN_EXPIRY_SKEW_SECONDS', 60),
        },
        sync: {
            maxRetryAttempts: Math.max(1, parseIntEnv(env, 'MAX_RETRY_ATTEMPTS', 3)),
            retryDelayMs: parseIntEnv(env, 'RETRY_DELAY_MS', 1000),
            remoteCallTimeoutMs: parseIntEnv(env, 'REMOTE_CALL_TIMEOUT_MS', 30000),
            concurrency: Math.max(1, parseIntEnv(env, 'SYNC_CONCURRENCY', 1)),
            lookbackDays: Math.max(1, parseIntEnv(env, 'INVOICE_LOOKBACK_DAYS', 1)),
            intervalMinutes: Math.max(1, parseIntEnv(env, 'INVOICE_SYNC_INTERVAL_MINUTES', 1440)),
            schedulerEnabled: parseBoolEnv(env, 'SCHEDULER_ENABLED', true),
        },
        notification: {
            webhookUrl: env.NOTIFICATION_WEBHOOK_URL || undefined,
        },
    };

    Object.freeze(settings.billing);
    Object.freeze(settings.erp);
    Object.freeze(settings.sync);
    Object.freeze(settings.notification);
    return Object.freeze(settings);
}

const SECRET = '[SECRET]';

/**
 * Log-safe view of the settings: secrets and the billing connection blob are masked.
 */
export function describeSettings(settings: IntegrationSettings): Record<string, string | number | boolean> {
    return {
        billingModulePath: settings.billing.modulePath,
        billingConnectionConfig: SECRET,
        erpApiUrl: settings.erp.apiUrl,
        erpInvoicePath: settings.erp.invoicePath,
        erpAuthorityUrl: settings.erp.authorityUrl,
        erpTenantId: settings.erp.tenantId,
        erpClientId: settings.erp.clientId,
        erpClientSecret: SECRET,
        maxRetryAttempts: settings.sync.maxRetryAttempts,
        retryDelayMs: settings.sync.retryDelayMs,
        remoteCallTimeoutMs: settings.sync.remoteCallTimeoutMs,
        concurrency: settings.sync.concurrency,
        lookbackDays: settings.sync.lookbackDays,
        intervalMinutes: settings.sync.intervalMinutes,
        schedulerEnabled: settings.sync.schedulerEnabled,
        notificationWebhook: settings.notification.webhookUrl ? 'configured' : 'not configured',
    };
}

// --- Export ---
const config = loadAppConfig();
export default config;
