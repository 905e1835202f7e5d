/**
 * Weather Collector — Errors and Results
 */

export class HttpRequestError extends Error {
    readonly url: string;
    /** HTTP status, or null when the request never produced a response */
    readonly status: number | null;

    constructor(message: string, options: { url: string; status?: number | null; cause?: unknown }) {
        super(message, { cause: options.cause });
        this.name = 'HttpRequestError';
        this.url = options.url;
        this.status = options.status ?? null;
    }
}

export class StorageError extends Error {
    readonly key: string;
    readonly operation: 'get' | 'put';

    constructor(message: string, options: { key: string; operation: 'get' | 'put'; cause?: unknown }) {
        super(message, { cause: options.cause });
        this.name = 'StorageError';
        this.key = options.key;
        this.operation = options.operation;
    }
}

export class CsvParseError extends Error {
    /** 1-based line where the malformed field started */
    readonly line: number;

    constructor(message: string, line: number) {
        super(`${message} (line ${line})`);
        this.name = 'CsvParseError';
        this.line = line;
    }
}

export class ConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

// =============================================================================
// Result
// =============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
