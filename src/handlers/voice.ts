import type { CombinedMessage, HandlerResult } from '../types/messaging.js';
import type { ContentHandler, HandlerDeps } from './types.js';
import {
    acquireValidated,
    askAgent,
    partialFailureNotices,
    resultFromFailures,
    transcribeAsset,
    type ItemFailure,
} from './shared.js';

/**
 * Transcribes every voice item of the burst. An item declared as video (a
 * round video note, say) has its audio track extracted first. In assistant
 * mode the transcript is also echoed back to the user.
 */
export class VoiceHandler implements ContentHandler {
    readonly kind = 'voice' as const;
    readonly #deps: HandlerDeps;

    constructor(deps: HandlerDeps) {
        this.#deps = deps;
    }

    async handle(combined: CombinedMessage, agentMode: boolean, signal?: AbortSignal): Promise<HandlerResult> {
        if (!this.#deps.transcriber) {
            return { status: 'rejected', reason: 'Voice messages are not supported right now.' };
        }

        return this.#deps.assets.withScope(
            async (scope) => {
                const transcripts: string[] = [];
                const failures: ItemFailure[] = [];

                for (const event of combined.voices) {
                    const acquired = await acquireValidated(scope, this.#deps, event.payload.media, 'voice');
                    if (!acquired.ok) {
                        failures.push(acquired.failure);
                        continue;
                    }
                    const fromVideo =
                        acquired.validated.mimeType.startsWith('video/') ||
                        (event.payload.media.declaredMime ?? '').toLowerCase().startsWith('video/');
                    const transcript = await transcribeAsset(scope, this.#deps, acquired.asset, fromVideo, signal);
                    await scope.release(acquired.asset);
                    if (transcript) transcripts.push(transcript);
                }

                if (transcripts.length === 0) {
                    return failures.length > 0
                        ? resultFromFailures(failures)
                        : { status: 'rejected', reason: 'No speech was detected in the voice message.' };
                }

                const transcript = transcripts.join('\n');
                const prompt = combined.combinedText
                    ? `${combined.combinedText}\n\n[Voice message transcription]\n${transcript}`
                    : `[Voice message transcription]\n${transcript}`;
                const reply = await askAgent(this.#deps, combined, { agentMode, prompt, source: 'voice' }, signal);

                const notices = partialFailureNotices(failures, 'voice message');
                if (!agentMode) notices.unshift(`Transcript: ${transcript}`);
                return { status: 'ok', reply, notices };
            },
            { owner: `voice:${combined.conversationId}`, signal },
        );
    }
}
