import { ERROR_CODES, ErrorCode } from '../../shared/errorCodes';

export class AppError extends Error {
    public readonly errorCode: ErrorCode;
    public readonly isOperational: boolean;
    public readonly details?: Record<string, unknown>;

    constructor(errorCode: ErrorCode, message?: string, isOperational = true, details?: Record<string, unknown>) {
        super(message ?? ERROR_CODES[errorCode].message);
        this.name = 'AppError';
        this.errorCode = errorCode;
        this.isOperational = isOperational;
        this.details = details;

        Object.setPrototypeOf(this, new.target.prototype);
        Error.captureStackTrace(this);
    }
}

export class PreflightError extends AppError {
    constructor(errorCode: ErrorCode, message: string, details?: Record<string, unknown>) {
        super(errorCode, message, true, details);
        this.name = 'PreflightError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
