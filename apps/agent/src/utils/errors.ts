// Agent Error Utilities
// Error taxonomy, retry logic and error handling helpers

export type GlimpseErrorCode =
    | 'DEVICE_UNAVAILABLE'
    | 'CAPTURE_FAILED'
    | 'SYNTHESIS_FAILED'
    | 'CONNECTION_LOST'
    | 'CONFIG_INVALID';

export class GlimpseError extends Error {
    readonly code: GlimpseErrorCode;

    constructor(code: GlimpseErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Camera busy, missing, or refused to open. */
export class DeviceUnavailableError extends GlimpseError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('DEVICE_UNAVAILABLE', message, options);
    }
}

export class CaptureFailedError extends GlimpseError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CAPTURE_FAILED', message, options);
    }
}

export class SynthesisFailedError extends GlimpseError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('SYNTHESIS_FAILED', message, options);
    }
}

export class ConnectionLostError extends GlimpseError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CONNECTION_LOST', message, options);
    }
}

export class ConfigError extends GlimpseError {
    readonly issues: readonly string[];

    constructor(message: string, issues: readonly string[] = []) {
        super('CONFIG_INVALID', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.issues = issues;
    }
}

/**
 * Retry options for async operations
 */
export interface RetryOptions {
    maxAttempts?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    backoffMultiplier?: number;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    /** Stop retrying early, e.g. when the caller has been closed. */
    shouldAbort?: () => boolean;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry' | 'shouldAbort'>> = {
    maxAttempts: 3,
    initialDelayMs: 500,
    maxDelayMs: 5000,
    backoffMultiplier: 2,
};

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Delay before the retry that follows `attempt` (1-based)
 */
export function backoffDelay(attempt: number, options: RetryOptions = {}): number {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    return Math.min(
        opts.initialDelayMs * Math.pow(opts.backoffMultiplier, attempt - 1),
        opts.maxDelayMs
    );
}

/**
 * Wrap an async function with retry logic
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    let lastError: unknown;

    for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            lastError = error;

            if (attempt >= opts.maxAttempts || options.shouldAbort?.()) {
                break;
            }

            const delay = backoffDelay(attempt, opts);

            if (options.onRetry) {
                options.onRetry(error, attempt, delay);
            }

            await sleep(delay);

            if (options.shouldAbort?.()) {
                break;
            }
        }
    }

    throw lastError;
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Log error with context prefix
 */
export function logError(error: unknown, context: string): void {
    console.error(`[${context}] Error: ${errorMessage(error)}`);
}
