import { ZodIssue } from 'zod';

export type ApiErrorKind = 'transport' | 'request' | 'decode';

/**
 * Base class for every failure surfaced by ApiClient.
 * Branch on `kind` (or instanceof) to tell the variants apart.
 */
export abstract class ApiError extends Error {
    abstract readonly kind: ApiErrorKind;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The request never produced a response: connection refused, DNS, timeout or abort
 */
export class TransportError extends ApiError {
    readonly kind = 'transport';
    readonly code?: string;

    constructor(message: string, code?: string, cause?: unknown) {
        super(message, { cause });
        this.code = code;
    }
}

/**
 * The server answered with a non-2xx status
 */
export class RequestFailedError extends ApiError {
    readonly kind = 'request';
    readonly status: number;
    readonly body: string;

    constructor(status: number, body: string) {
        super(`Request failed with status ${status}`);
        this.status = status;
        this.body = body;
    }
}

/**
 * The response body was not JSON, or not the expected shape
 */
export class DecodeError extends ApiError {
    readonly kind = 'decode';
    readonly body: string;
    readonly issues: ZodIssue[];

    constructor(message: string, body: string, issues: ZodIssue[] = [], cause?: unknown) {
        super(message, { cause });
        this.body = body;
        this.issues = issues;
    }
}

export type ApiFailure = TransportError | RequestFailedError | DecodeError;

export function isApiError(error: unknown): error is ApiFailure {
    return error instanceof TransportError
        || error instanceof RequestFailedError
        || error instanceof DecodeError;
}
