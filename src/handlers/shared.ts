import type { AssetScope, ManagedAsset } from '../services/asset-manager.js';
import type { MediaPolicyKind, ValidatedMedia } from '../services/media-validator.js';
import { describeForward } from '../services/combined-message.js';
import { buildReplyPrompt } from '../services/reply-context.js';
import type { AgentRequestMode } from '../types/collaborators.js';
import type { CombinedMessage, HandlerResult, MediaRef } from '../types/messaging.js';
import { MediaRejectedError, TransientMediaError, throwIfAborted } from '../utils/errors.js';
import type { HandlerDeps } from './types.js';

/** Why one item of a multi-item burst was skipped. */
export interface ItemFailure {
    status: 'rejected' | 'transient';
    reason: string;
}

export type AcquireResult =
    | { ok: true; asset: ManagedAsset; validated: ValidatedMedia }
    | { ok: false; failure: ItemFailure };

export function modeFor(agentMode: boolean): AgentRequestMode {
    return agentMode ? 'agent' : 'assistant';
}

/** Prefix `body` with forward and reply context from the combined message. */
export function composePrompt(combined: CombinedMessage, body: string): string {
    const forward = describeForward(combined);
    const withForward = forward ? `${forward}\n${body}` : body;
    return combined.replyContext ? buildReplyPrompt(combined.replyContext, withForward) : withForward;
}

export async function askAgent(
    deps: HandlerDeps,
    combined: CombinedMessage,
    request: { agentMode: boolean; prompt: string; attachments?: string[]; source: string },
    signal?: AbortSignal,
): Promise<string> {
    return deps.agent.processMessage(
        {
            conversationId: combined.conversationId,
            senderId: combined.senderId,
            mode: modeFor(request.agentMode),
            prompt: composePrompt(combined, request.prompt),
            attachments: request.attachments ?? [],
            source: request.source,
        },
        signal,
    );
}

/**
 * Download and validate one item inside `scope`. A rejected item is released
 * immediately; a transient download failure leaves nothing behind either.
 */
export async function acquireValidated(
    scope: AssetScope,
    deps: HandlerDeps,
    media: MediaRef,
    kind: MediaPolicyKind,
): Promise<AcquireResult> {
    let asset: ManagedAsset | undefined;
    try {
        deps.validator.checkDeclared(media, kind);
        asset = await scope.acquire(media);
        const validated = await deps.validator.validate(asset.path, media, kind);
        return { ok: true, asset, validated };
    } catch (err) {
        if (err instanceof MediaRejectedError) {
            if (asset) await scope.release(asset);
            return { ok: false, failure: { status: 'rejected', reason: err.message } };
        }
        if (err instanceof TransientMediaError) {
            return { ok: false, failure: { status: 'transient', reason: err.message } };
        }
        throw err;
    }
}

/**
 * Transcribe an asset. Video containers are first reduced to an audio track
 * written beside the original, so both go away with the asset.
 */
export async function transcribeAsset(
    scope: AssetScope,
    deps: HandlerDeps,
    asset: ManagedAsset,
    fromVideo: boolean,
    signal?: AbortSignal,
): Promise<string> {
    if (!deps.transcriber) {
        throw new Error('[Handlers] transcribeAsset called without a transcriber.');
    }

    let audioPath = asset.path;
    if (fromVideo) {
        audioPath = scope.derivePath(asset, 'extracted-audio.ogg');
        await deps.extractor.extractAudio(asset.path, audioPath, signal);
    }
    throwIfAborted(signal);
    return deps.transcriber.transcribeFile(audioPath);
}

/** Result for a burst where no item made it through. */
export function resultFromFailures(failures: ItemFailure[]): HandlerResult {
    const rejected = failures.find((failure) => failure.status === 'rejected');
    if (rejected) return { status: 'rejected', reason: rejected.reason };
    const transient = failures[0];
    if (transient) return { status: 'transient', reason: transient.reason };
    return { status: 'rejected', reason: 'Nothing in this message could be processed.' };
}

/** Per-item notices for a burst where some, not all, items failed. */
export function partialFailureNotices(failures: ItemFailure[], noun: string): string[] {
    if (failures.length === 0) return [];
    const reasons = [...new Set(failures.map((failure) => failure.reason))];
    const label = failures.length === 1 ? noun : `${noun}s`;
    return [`Skipped ${failures.length} ${label}: ${reasons.join(' ')}`];
}
