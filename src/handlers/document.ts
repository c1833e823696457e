import { readFile } from 'node:fs/promises';
import type { AssetScope, ManagedAsset } from '../services/asset-manager.js';
import type { ValidatedMedia } from '../services/media-validator.js';
import type { CombinedMessage, HandlerResult, MediaRef } from '../types/messaging.js';
import type { ContentHandler, HandlerDeps } from './types.js';
import {
    acquireValidated,
    askAgent,
    partialFailureNotices,
    resultFromFailures,
    type ItemFailure,
} from './shared.js';

function isTextLike(mimeType: string): boolean {
    return mimeType.startsWith('text/') || mimeType === 'application/json';
}

/**
 * Prompt section for an accepted document. Text is read and the asset
 * released at once; anything else is returned as an attachment that stays
 * alive until the scope ends.
 */
export async function documentSection(
    scope: AssetScope,
    deps: HandlerDeps,
    media: MediaRef,
    acquired: { asset: ManagedAsset; validated: ValidatedMedia },
): Promise<{ section: string; attachment?: ManagedAsset }> {
    const name = media.fileName ?? 'document';
    if (!isTextLike(acquired.validated.mimeType)) {
        return { section: `[Document attached: ${name}]`, attachment: acquired.asset };
    }

    const content = await readFile(acquired.asset.path, 'utf8');
    await scope.release(acquired.asset);
    const limit = deps.maxDocumentChars;
    const inlined = content.length > limit ? `${content.slice(0, limit)}\n[...truncated]` : content;
    return { section: `[Document: ${name}]\n${inlined}` };
}

/**
 * Text-like documents are inlined into the prompt (bounded); binary ones such
 * as PDF are passed to the agent as attachments.
 */
export class DocumentHandler implements ContentHandler {
    readonly kind = 'document' as const;
    readonly #deps: HandlerDeps;

    constructor(deps: HandlerDeps) {
        this.#deps = deps;
    }

    async handle(combined: CombinedMessage, agentMode: boolean, signal?: AbortSignal): Promise<HandlerResult> {
        return this.#deps.assets.withScope(
            async (scope) => {
                const sections: string[] = [];
                const attachments: ManagedAsset[] = [];
                const failures: ItemFailure[] = [];

                for (const event of combined.documents) {
                    const media = event.payload.media;
                    const acquired = await acquireValidated(scope, this.#deps, media, 'document');
                    if (!acquired.ok) {
                        failures.push(acquired.failure);
                        continue;
                    }

                    const { section, attachment } = await documentSection(scope, this.#deps, media, acquired);
                    sections.push(section);
                    if (attachment) attachments.push(attachment);
                }

                if (sections.length === 0) return resultFromFailures(failures);

                const body = sections.join('\n\n');
                const prompt = combined.combinedText ? `${combined.combinedText}\n\n${body}` : body;
                const reply = await askAgent(
                    this.#deps,
                    combined,
                    { agentMode, prompt, attachments: attachments.map((asset) => asset.path), source: 'document' },
                    signal,
                );
                return { status: 'ok', reply, notices: partialFailureNotices(failures, 'document') };
            },
            { owner: `document:${combined.conversationId}`, signal },
        );
    }
}
