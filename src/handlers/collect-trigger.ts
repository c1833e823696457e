import type { CombinedMessage, HandlerResult } from '../types/messaging.js';
import { errorMessage, isAbortError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import type { HandlerDeps } from './types.js';
import { documentSection } from './document.js';
import { formatContact, formatPoll } from './structured.js';
import {
    acquireValidated,
    askAgent,
    partialFailureNotices,
    resultFromFailures,
    transcribeAsset,
    type ItemFailure,
} from './shared.js';

const NO_TRANSCRIBER: ItemFailure = { status: 'rejected', reason: 'Voice and video messages are not supported right now.' };

/** Trigger phrase matching, as the collect-mode collaborator provides it. */
export interface TriggerPhrases {
    matchesTrigger(text: string): boolean;
    stripTriggers(text: string): string;
}

/**
 * Processes everything queued during a collect session plus the triggering
 * message as one agent request. All assets of all queued messages share one
 * scope and are released together once the agent has answered.
 */
export class CollectTriggerHandler {
    readonly #deps: HandlerDeps;
    readonly #triggers?: TriggerPhrases;
    readonly #logger: Logger;
    /** Voice transcripts made while checking queued messages for a spoken trigger. */
    readonly #transcripts: WeakMap<CombinedMessage, string[]> = new WeakMap();

    constructor(deps: HandlerDeps, triggers?: TriggerPhrases) {
        this.#deps = deps;
        this.#triggers = triggers;
        this.#logger = deps.logger ?? getLogger('collect-trigger');
    }

    /**
     * Transcribe the voice notes of a message arriving during a collect
     * session and report whether one of them says a trigger phrase. The
     * transcripts are kept for the collect request, so nothing is
     * transcribed twice. A failed check counts as no trigger.
     */
    async hasSpokenTrigger(message: CombinedMessage, signal?: AbortSignal): Promise<boolean> {
        const triggers = this.#triggers;
        if (!triggers || !this.#deps.transcriber || message.voices.length === 0) return false;

        try {
            const transcripts = await this.#deps.assets.withScope(
                async (scope) => {
                    const texts: string[] = [];
                    for (const event of message.voices) {
                        const acquired = await acquireValidated(scope, this.#deps, event.payload.media, 'voice');
                        if (!acquired.ok) return undefined;
                        const fromVideo = acquired.validated.mimeType.startsWith('video/');
                        texts.push(await transcribeAsset(scope, this.#deps, acquired.asset, fromVideo, signal));
                        await scope.release(acquired.asset);
                    }
                    return texts;
                },
                { owner: `collect-voice:${message.conversationId}`, signal },
            );
            if (!transcripts) return false;

            this.#transcripts.set(message, transcripts);
            return transcripts.some((text) => triggers.matchesTrigger(text));
        } catch (err) {
            if (isAbortError(err)) throw err;
            this.#logger.warn(
                { conversationId: message.conversationId, err: errorMessage(err) },
                'Spoken trigger check failed, queueing the message',
            );
            return false;
        }
    }

    async handle(messages: CombinedMessage[], agentMode: boolean, signal?: AbortSignal): Promise<HandlerResult> {
        const current = messages[messages.length - 1];
        if (!current) return { status: 'rejected', reason: 'Nothing was collected.' };

        return this.#deps.assets.withScope(
            async (scope) => {
                const sections: string[] = [];
                const attachments: string[] = [];
                const failures: ItemFailure[] = [];

                for (const [index, message] of messages.entries()) {
                    const parts: string[] = [];
                    const text =
                        message === current && this.#triggers
                            ? this.#triggers.stripTriggers(message.combinedText)
                            : message.combinedText;
                    if (text) parts.push(text);

                    for (const event of message.images) {
                        const acquired = await acquireValidated(scope, this.#deps, event.payload.media, 'image');
                        if (!acquired.ok) {
                            failures.push(acquired.failure);
                            continue;
                        }
                        attachments.push(acquired.asset.path);
                        parts.push(`[Image attached #${attachments.length}]`);
                    }

                    const spoken = this.#transcripts.get(message);
                    if (spoken) {
                        parts.push(...spoken.map((transcript) => `[Voice transcription] ${transcript || '(no speech detected)'}`));
                    }

                    for (const event of [...(spoken ? [] : message.voices), ...message.videos]) {
                        if (!this.#deps.transcriber) {
                            failures.push(NO_TRANSCRIBER);
                            continue;
                        }
                        const isVideo = event.kind === 'video';
                        const acquired = await acquireValidated(scope, this.#deps, event.payload.media, isVideo ? 'video' : 'voice');
                        if (!acquired.ok) {
                            failures.push(acquired.failure);
                            continue;
                        }
                        const fromVideo = isVideo || acquired.validated.mimeType.startsWith('video/');
                        const transcript = await transcribeAsset(scope, this.#deps, acquired.asset, fromVideo, signal);
                        await scope.release(acquired.asset);
                        parts.push(`[${isVideo ? 'Video' : 'Voice'} transcription] ${transcript || '(no speech detected)'}`);
                    }

                    for (const event of message.documents) {
                        const media = event.payload.media;
                        const acquired = await acquireValidated(scope, this.#deps, media, 'document');
                        if (!acquired.ok) {
                            failures.push(acquired.failure);
                            continue;
                        }
                        const { section, attachment } = await documentSection(scope, this.#deps, media, acquired);
                        parts.push(section);
                        if (attachment) attachments.push(attachment.path);
                    }

                    parts.push(...message.polls.map(formatPoll), ...message.contacts.map(formatContact));

                    if (parts.length > 0) {
                        sections.push(`--- Message ${index + 1} ---\n${parts.join('\n')}`);
                    }
                }

                if (sections.length === 0) return resultFromFailures(failures);

                const prompt = `[Collected ${messages.length} message(s)]\n\n${sections.join('\n\n')}`;
                const reply = await askAgent(
                    this.#deps,
                    current,
                    { agentMode, prompt, attachments, source: 'collect' },
                    signal,
                );
                return { status: 'ok', reply, notices: partialFailureNotices(failures, 'item') };
            },
            { owner: `collect:${current.conversationId}`, signal },
        );
    }
}
