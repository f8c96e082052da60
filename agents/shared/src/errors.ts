export class AppError extends Error {
    public readonly code: string;
    public readonly statusCode: number;
    public readonly isOperational: boolean;

    constructor(message: string, code: string = 'INTERNAL_ERROR', statusCode: number = 500, isOperational: boolean = true) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.statusCode = statusCode;
        this.isOperational = isOperational;
        Object.setPrototypeOf(this, new.target.prototype);
        Error.captureStackTrace(this);
    }
}

export class ConfigError extends AppError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', 500, false); // Usually fatal at startup
    }
}

export class ValidationError extends AppError {
    public readonly details: unknown;

    constructor(message: string, details?: unknown) {
        super(message, 'VALIDATION_ERROR', 400);
        this.details = details;
    }
}

/**
 * Message of anything that was thrown.
 */
export function toErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    try {
        return JSON.stringify(error);
    } catch {
        return String(error);
    }
}
