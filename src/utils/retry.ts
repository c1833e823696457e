import { getLogger } from './logger.js';
import { errorMessage, isAbortError, throwIfAborted } from './errors.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 500 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 5000 */
    maxDelayMs?: number;
    /** Label used in log messages for traceability. */
    label?: string;
    /** Return false to stop retrying and rethrow immediately. */
    shouldRetry?: (err: unknown) => boolean;
    signal?: AbortSignal;
}

const DEFAULTS = {
    maxAttempts: 3,
    baseDelayMs: 500,
    backoffFactor: 2,
    maxDelayMs: 5_000,
};

/**
 * Execute an async function with bounded exponential backoff retry.
 * Rethrows the last error once attempts are exhausted. Cancellation is
 * never retried.
 *
 * @example
 * ```ts
 * await withRetry(() => bot.sendMessage(chatId, text), { label: 'telegram:sendMessage' });
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const label = options.label ?? 'unnamed';
    const logger = getLogger('retry');

    for (let attempt = 1; ; attempt++) {
        throwIfAborted(options.signal);
        try {
            const value = await fn();
            if (attempt > 1) {
                logger.info({ label, attempt }, 'Retry succeeded');
            }
            return value;
        } catch (err) {
            const retryable = !isAbortError(err) && (options.shouldRetry?.(err) ?? true);
            if (!retryable || attempt >= maxAttempts) {
                if (retryable) {
                    logger.warn({ label, attempts: attempt, err: errorMessage(err) }, 'Retry attempts exhausted');
                }
                throw err;
            }

            const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
            logger.debug({ label, attempt, delay, err: errorMessage(err) }, 'Attempt failed, retrying');
            await sleep(delay, options.signal);
        }
    }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        const onAbort = (): void => {
            clearTimeout(timer);
            try {
                throwIfAborted(signal);
            } catch (err) {
                reject(err);
            }
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
