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

/** Extracts and transcribes the audio of each video, then forwards transcripts plus caption. */
export class VideoHandler implements ContentHandler {
    readonly kind = 'video' as const;
    readonly #deps: HandlerDeps;

    constructor(deps: HandlerDeps) {
        this.#deps = deps;
    }

    async handle(combined: CombinedMessage, agentMode: boolean, signal?: AbortSignal): Promise<HandlerResult> {
        if (!this.#deps.transcriber) {
            return { status: 'rejected', reason: 'Video messages are not supported right now.' };
        }

        return this.#deps.assets.withScope(
            async (scope) => {
                const sections: string[] = [];
                const failures: ItemFailure[] = [];

                for (const [index, event] of combined.videos.entries()) {
                    const acquired = await acquireValidated(scope, this.#deps, event.payload.media, 'video');
                    if (!acquired.ok) {
                        failures.push(acquired.failure);
                        continue;
                    }
                    const transcript = await transcribeAsset(scope, this.#deps, acquired.asset, true, signal);
                    await scope.release(acquired.asset);
                    const label = combined.videos.length > 1 ? `[Video ${index + 1} audio transcript]` : '[Video audio transcript]';
                    sections.push(`${label}\n${transcript || '(no speech detected)'}`);
                }

                if (sections.length === 0) return resultFromFailures(failures);

                const body = sections.join('\n\n');
                const prompt = combined.combinedText ? `${combined.combinedText}\n\n${body}` : body;
                const reply = await askAgent(this.#deps, combined, { agentMode, prompt, source: 'video' }, signal);
                return { status: 'ok', reply, notices: partialFailureNotices(failures, 'video') };
            },
            { owner: `video:${combined.conversationId}`, signal },
        );
    }
}
