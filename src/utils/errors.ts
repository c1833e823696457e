/**
 * Error taxonomy for the inbound pipeline.
 *
 * Messages of `MediaRejectedError` and `TransientMediaError` are safe to show
 * to users. Everything else is internal and must go through `toUserMessage`.
 */

export type MediaRejectionCode =
    | 'empty'
    | 'too_large'
    | 'extension_not_allowed'
    | 'type_not_allowed'
    | 'type_unverified'
    | 'type_mismatch';

/** Media failed validation. `reason` never contains paths or detected MIME strings. */
export class MediaRejectedError extends Error {
    readonly code: MediaRejectionCode;

    constructor(code: MediaRejectionCode, reason: string) {
        super(reason);
        this.name = 'MediaRejectedError';
        this.code = code;
    }
}

/** Download timed out or the connection to the media store failed. */
export class TransientMediaError extends Error {
    constructor(message = 'Could not download the file right now. Please try sending it again in a moment.', options?: ErrorOptions) {
        super(message, options);
        this.name = 'TransientMediaError';
    }
}

/** Audio extraction or transcription failed after a successful download. */
export class MediaProcessingError extends Error {
    readonly stage: 'extraction' | 'transcription' | 'read';

    constructor(stage: MediaProcessingError['stage'], message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'MediaProcessingError';
        this.stage = stage;
    }
}

export const GENERIC_FAILURE_NOTICE = 'Error processing your message. Please try again.';

/** Cancellation shows up as an AbortError regardless of which API raised it. */
export function isAbortError(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError';
}

export function createAbortError(message = 'The operation was aborted'): Error {
    const error = new Error(message);
    error.name = 'AbortError';
    return error;
}

export function throwIfAborted(signal?: AbortSignal): void {
    if (!signal?.aborted) return;
    if (isAbortError(signal.reason)) {
        throw signal.reason;
    }
    throw createAbortError();
}

const TRANSIENT_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'EAI_AGAIN', 'ENOTFOUND', 'EPIPE']);

/** True for network-level failures worth a "try again" message. */
export function isTransientNetworkError(err: unknown): boolean {
    if (err instanceof TransientMediaError) return true;
    if (typeof err !== 'object' || err === null) return false;
    if ('code' in err && typeof err.code === 'string' && TRANSIENT_CODES.has(err.code)) return true;
    if ('name' in err && (err.name === 'TimeoutError' || err.name === 'FetchError')) return true;
    return 'cause' in err && err.cause !== err && isTransientNetworkError(err.cause);
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** Map an error to the text a user may see. Internal details never leave this function. */
export function toUserMessage(err: unknown): string {
    if (err instanceof MediaRejectedError || err instanceof TransientMediaError) {
        return err.message;
    }
    return GENERIC_FAILURE_NOTICE;
}
