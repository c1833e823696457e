import type { ManagedAsset } from '../services/asset-manager.js';
import type { CombinedMessage, HandlerResult } from '../types/messaging.js';
import type { ContentHandler, HandlerDeps } from './types.js';
import {
    acquireValidated,
    askAgent,
    partialFailureNotices,
    resultFromFailures,
    type ItemFailure,
} from './shared.js';

const DEFAULT_IMAGE_PROMPT = 'Please describe and analyze the attached image.';

/**
 * Downloads and validates every image in the burst, then sends the accepted
 * ones to the agent in a single request together with the caption text.
 */
export class ImageHandler implements ContentHandler {
    readonly kind = 'image' as const;
    readonly #deps: HandlerDeps;

    constructor(deps: HandlerDeps) {
        this.#deps = deps;
    }

    async handle(combined: CombinedMessage, agentMode: boolean, signal?: AbortSignal): Promise<HandlerResult> {
        return this.#deps.assets.withScope(
            async (scope) => {
                const accepted: ManagedAsset[] = [];
                const failures: ItemFailure[] = [];

                for (const event of combined.images) {
                    const result = await acquireValidated(scope, this.#deps, event.payload.media, 'image');
                    if (result.ok) accepted.push(result.asset);
                    else failures.push(result.failure);
                }

                if (accepted.length === 0) return resultFromFailures(failures);

                const reply = await askAgent(
                    this.#deps,
                    combined,
                    {
                        agentMode,
                        prompt: combined.combinedText || DEFAULT_IMAGE_PROMPT,
                        attachments: accepted.map((asset) => asset.path),
                        source: 'image',
                    },
                    signal,
                );
                return { status: 'ok', reply, notices: partialFailureNotices(failures, 'image') };
            },
            { owner: `image:${combined.conversationId}`, signal },
        );
    }
}
