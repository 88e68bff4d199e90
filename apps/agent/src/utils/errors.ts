// Agent Error Utilities
// Typed error classes for the live session pipeline and error handling helpers

import type { SessionErrorInfo, SessionErrorKind } from '@earshot/contracts';

/**
 * Base application error with typed error codes
 */
export class AppError extends Error {
    public readonly statusCode: number;
    public readonly code: string;
    public readonly isOperational: boolean;
    public readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        statusCode: number = 500,
        code: string = 'INTERNAL_ERROR',
        isOperational: boolean = true,
        context?: Record<string, unknown>
    ) {
        super(message);
        this.statusCode = statusCode;
        this.code = code;
        this.isOperational = isOperational;
        this.context = context;
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

// ============================================
// GENERAL ERROR TYPES
// ============================================

export class ValidationError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 400, 'VALIDATION_ERROR', true, context);
    }
}

export class NotFoundError extends AppError {
    constructor(resource: string, id?: string) {
        super(
            id ? `${resource} with id '${id}' not found` : `${resource} not found`,
            404,
            'NOT_FOUND',
            true,
            { resource, id }
        );
    }
}

export class ConflictError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 409, 'CONFLICT', true, context);
    }
}

export class ExternalServiceError extends AppError {
    public readonly service: string;
    public readonly originalError?: Error;

    constructor(service: string, message: string, originalError?: Error) {
        super(message, 502, 'EXTERNAL_SERVICE_ERROR', true, { service });
        this.service = service;
        this.originalError = originalError;
    }
}

/**
 * Raised into waits and delays that were aborted by a disconnect
 */
export class CancelledError extends AppError {
    constructor(message: string = 'Operation cancelled') {
        super(message, 499, 'CANCELLED', true);
    }
}

// ============================================
// SESSION ERROR TYPES
// ============================================

export abstract class SessionError extends AppError {
    abstract readonly kind: SessionErrorKind;
    public readonly detail: string;

    constructor(message: string, detail: string, statusCode: number, code: string) {
        super(message, statusCode, code, true, { detail });
        this.detail = detail;
    }

    toInfo(): SessionErrorInfo {
        return { kind: this.kind, message: this.message };
    }
}

export class TransportFailureError extends SessionError {
    readonly kind = 'transport-failure' as const;

    constructor(detail: string, cause?: unknown) {
        super(`Transport failure: ${detail}`, detail, 502, 'TRANSPORT_FAILURE');
        this.cause = cause;
    }
}

export class SetupTimeoutError extends SessionError {
    readonly kind = 'setup-timeout' as const;

    constructor(timeoutMs: number) {
        super(`Setup not acknowledged within ${timeoutMs}ms`, `${timeoutMs}ms`, 504, 'SETUP_TIMEOUT');
    }
}

export class ProviderError extends SessionError {
    readonly kind = 'provider-error' as const;

    constructor(detail: string) {
        super(`Provider error: ${detail}`, detail, 502, 'PROVIDER_ERROR');
    }
}

export class DecodeFailureError extends SessionError {
    readonly kind = 'decode-failure' as const;
    public readonly raw: string;

    constructor(detail: string, raw: string) {
        super(`Failed to decode provider message: ${detail}`, detail, 502, 'DECODE_FAILURE');
        this.raw = raw;
    }
}

/**
 * Transport failures and setup timeouts are worth another connection attempt;
 * a provider-reported error is not.
 */
export function isTransientSessionError(error: unknown): boolean {
    return error instanceof TransportFailureError || error instanceof SetupTimeoutError;
}

/**
 * Normalize anything thrown on the connection path into a session error
 */
export function toSessionError(error: unknown): SessionError {
    if (error instanceof SessionError) {
        return error;
    }
    return new TransportFailureError(getErrorMessage(error), error);
}

// ============================================
// ERROR RESPONSE FORMATTING
// ============================================

export interface ErrorResponse {
    ok: false;
    error: string;
    code: string;
    statusCode: number;
    context?: Record<string, unknown>;
    timestamp: string;
}

export function formatErrorResponse(error: unknown): ErrorResponse {
    if (error instanceof AppError) {
        return {
            ok: false,
            error: error.message,
            code: error.code,
            statusCode: error.statusCode,
            context: error.isOperational ? error.context : undefined,
            timestamp: new Date().toISOString(),
        };
    }

    // Unknown error - don't expose details
    return {
        ok: false,
        error: 'An unexpected error occurred',
        code: 'INTERNAL_ERROR',
        statusCode: 500,
        timestamp: new Date().toISOString(),
    };
}

// ============================================
// LOGGING HELPERS
// ============================================

export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Log error with context prefix
 */
export function logError(error: unknown, context: string): void {
    const message = getErrorMessage(error);
    const stack = error instanceof Error ? error.stack : undefined;

    if (error instanceof AppError && error.isOperational) {
        // Operational errors are expected - log at warn level
        console.warn(`[${context}] ${error.code}: ${message}`);
    } else {
        // Programming errors - log full stack
        console.error(`[${context}] Error: ${message}`);
        if (stack) {
            console.error(stack);
        }
    }
}
