// ============================================================================
// Errors — taxonomy shared by the NASA and Instagram clients
// ============================================================================
//  ClientError
//   ├─ ValidationError      bad arguments, nothing was sent
//   └─ ApiError             non-2xx, non-JSON, network or Graph API error
//       └─ RequestTimeoutError
// ============================================================================

export class ClientError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ClientError';
    }
}

export class ValidationError extends ClientError {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export interface ApiErrorDetails {
    url: string;
    status: number;
    bodyText?: string;
    /** Graph API error code (190, 100, 10 ...) */
    code?: number;
    type?: string;
    fbtraceId?: string;
    cause?: unknown;
}

export class ApiError extends ClientError {
    readonly url: string;
    readonly status: number;
    readonly bodyText: string;
    readonly code?: number;
    readonly type?: string;
    readonly fbtraceId?: string;

    constructor(message: string, details: ApiErrorDetails) {
        super(message, { cause: details.cause });
        this.name = 'ApiError';
        this.url = redactUrl(details.url);
        this.status = details.status;
        this.bodyText = details.bodyText ?? '';
        this.code = details.code;
        this.type = details.type;
        this.fbtraceId = details.fbtraceId;
    }
}

export class RequestTimeoutError extends ApiError {
    readonly timeoutMs: number;

    constructor(url: string, timeoutMs: number) {
        super(`Request to ${redactUrl(url)} timed out after ${timeoutMs}ms`, { url, status: 0 });
        this.name = 'RequestTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

const SECRET_PARAMS = [
    'api_key',
    'access_token',
    'input_token',
    'client_secret',
    'fb_exchange_token',
];

/**
 * Replaces credential query parameters with "***" so URLs can be logged.
 */
export function redactUrl(url: string): string {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        return url;
    }
    for (const key of SECRET_PARAMS) {
        if (parsed.searchParams.has(key)) parsed.searchParams.set(key, '***');
    }
    return parsed.toString();
}

/**
 * First and last eight characters of a token, for logs.
 */
export function maskToken(token: string): string {
    if (token.length <= 16) return '***MASKED***';
    return `${token.slice(0, 8)}...${token.slice(-8)}`;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
