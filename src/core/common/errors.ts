// src/core/common/errors.ts

/**
 * Base class for custom application errors.
 * Allows for operational errors (expected, like validation) vs programmer errors.
 */
export class AppError extends Error {
    public readonly statusCode: number;
    public readonly isOperational: boolean;

    constructor(
        name: string,
        message: string,
        statusCode: number = 500, // Default to Internal Server Error
        isOperational: boolean = true // Assume operational unless specified
        ) {
        super(message);
        this.name = name;
        this.statusCode = statusCode;
        this.isOperational = isOperational;

        // Maintain proper stack trace (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }

        // Set the prototype explicitly for extending built-in classes
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Error for issues during configuration loading or validation.
 */
export class ConfigurationError extends AppError {
    constructor(message: string) {
        // Configuration errors are typically not operational; they prevent startup.
        super('ConfigurationError', message, 500, false);
    }
}

/**
 * Bad input to a manual trigger, or a violated mapper precondition.
 */
export class ValidationError extends AppError {
    constructor(message: string = 'Data validation failed') {
        super('ValidationError', message, 400, true); // 400 Bad Request
    }
}

/**
 * Error for resources not found.
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super('NotFoundError', message, 404, true); // 404 Not Found
    }
}

/**
 * Another sync run is already active in this process.
 */
export class ConflictError extends AppError {
    constructor(message: string = 'An invoice sync run is already in progress') {
        super('ConflictError', message, 409, true);
    }
}

/**
 * Bad or unexpected source data for a single invoice.
 */
export class MappingError extends AppError {
    constructor(message: string) {
        super('MappingError', message, 422, true);
    }
}

/** How the orchestrator should treat a failed ERP submission. */
export type SubmissionErrorKind = 'auth' | 'transient' | 'rejected';

/**
 * The ERP rejected a submission or could not be reached.
 */
export class SubmissionError extends AppError {
    public readonly kind: SubmissionErrorKind;
    public readonly remoteStatus?: number;
    public readonly responseBody?: string;

    constructor(
        message: string,
        kind: SubmissionErrorKind,
        details: { remoteStatus?: number; responseBody?: string } = {}
    ) {
        super('SubmissionError', message, 502, true);
        this.kind = kind;
        this.remoteStatus = details.remoteStatus;
        this.responseBody = details.responseBody;
    }
}

/**
 * The billing component reported a failure (fetch or write-back).
 */
export class BillingSystemError extends AppError {
    constructor(message: string, originalError?: Error) {
        const fullMessage = originalError
            ? `${message}: ${originalError.message}`
            : message;
        super('BillingSystemError', fullMessage, 502, true);
        if (originalError) {
            this.stack = originalError.stack; // Preserve original stack if available
        }
    }
}

/**
 * Write-back failed after the ERP accepted the invoice.
 * The ERP now holds a record the billing system does not know about.
 */
export class ReconciliationError extends AppError {
    public readonly erpInvoiceId: string;

    constructor(message: string, erpInvoiceId: string) {
        super('ReconciliationError', message, 500, true);
        this.erpInvoiceId = erpInvoiceId;
    }
}

/**
 * The run aborted before any invoice was touched.
 */
export class FatalRunError extends AppError {
    constructor(message: string, originalError?: Error) {
        const fullMessage = originalError
            ? `${message}: ${originalError.message}`
            : message;
        super('FatalRunError', fullMessage, 502, true);
        if (originalError) {
            this.stack = originalError.stack;
        }
    }
}

/**
 * A remote call exceeded its time budget. Treated as transient.
 */
export class TimeoutError extends AppError {
    constructor(operation: string, timeoutMs: number) {
        super('TimeoutError', `${operation} timed out after ${timeoutMs} ms`, 504, true);
    }
}

/** Normalises anything thrown into a message string. */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
