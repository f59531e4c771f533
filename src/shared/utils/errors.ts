import { ApiError as GenAIApiError } from "@google/genai";

export type GenerationErrorKind = "quota" | "transient" | "fatal";

/**
 * Base class for failures of a single upstream generation call.
 * `kind` drives the retry and fallback decisions of the caller and orchestrator.
 */
export abstract class GenerationError extends Error {
    abstract readonly kind: GenerationErrorKind;
    /** Upstream requests made for the invocation that raised this error. */
    attempts = 1;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class QuotaExceededError extends GenerationError {
    readonly kind = "quota";

    constructor(message: string, public readonly retryDelayMs?: number, options?: ErrorOptions) {
        super(message, options);
    }
}

export class TransientGenerationError extends GenerationError {
    readonly kind = "transient";
}

export class FatalGenerationError extends GenerationError {
    readonly kind = "fatal";
}

export class NoImageError extends FatalGenerationError {
    constructor(message = "generation produced no image") {
        super(message);
    }
}

/**
 * Rejected request input. Raised before any upstream call is made.
 */
export class InputValidationError extends Error {
    readonly status = 400;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'InputValidationError';
    }
}

export function extractErrorMessage(error: unknown): string {
    // Handle Error instances
    if (error instanceof GenAIApiError) {
        return `API Error (Code ${error.status}): ${error.message}`;
    }
    if (error instanceof Error) {
        return error.message || error.toString();
    }

    if (error && typeof error === 'object') {
        if ('message' in error && typeof error.message === 'string') {
            return error.message;
        }

        try {
            return JSON.stringify(error);
        } catch {
            return String(error);
        }
    }

    return String(error);
}

export function extractStatusCode(error: unknown): number | undefined {
    if (error instanceof GenAIApiError) {
        return error.status;
    }
    if (error && typeof error === 'object') {
        if ('status' in error && typeof error.status === 'number') return error.status;
        if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
        if ('code' in error && typeof error.code === 'number') return error.code;
    }
    return undefined;
}

const QUOTA_PATTERN = /RESOURCE_EXHAUSTED|\b429\b|quota|rate[\s_-]?limit/i;
const NETWORK_ERROR_CODES = new Set([ "ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "UND_ERR_CONNECT_TIMEOUT", "UND_ERR_SOCKET" ]);

export function isQuotaError(error: unknown): boolean {
    if (error instanceof QuotaExceededError) return true;
    if (extractStatusCode(error) === 429) return true;
    return QUOTA_PATTERN.test(extractErrorMessage(error));
}

function isTransientError(error: unknown): boolean {
    const status = extractStatusCode(error);
    if (status !== undefined) {
        return status >= 500 || status === 408;
    }
    if (error instanceof TypeError && error.message === "fetch failed") return true;

    const cause = error instanceof Error ? error.cause : undefined;
    const code = cause && typeof cause === 'object' && 'code' in cause ? cause.code : undefined;
    return typeof code === 'string' && NETWORK_ERROR_CODES.has(code);
}

/**
 * Reads the server-suggested wait from a quota error body,
 * e.g. `"retryDelay": "12s"`.
 */
export function parseRetryDelayMs(message: string): number | undefined {
    const match = /"retryDelay"\s*:\s*"(\d+(?:\.\d+)?)s"/.exec(message);
    return match ? Math.round(Number(match[ 1 ]) * 1000) : undefined;
}

export function classifyGenerationError(error: unknown): GenerationError {
    if (error instanceof GenerationError) return error;

    const message = extractErrorMessage(error);
    if (isQuotaError(error)) {
        return new QuotaExceededError(message, parseRetryDelayMs(message), { cause: error });
    }
    if (isTransientError(error)) {
        return new TransientGenerationError(message, { cause: error });
    }
    return new FatalGenerationError(message, { cause: error });
}
