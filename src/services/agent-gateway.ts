import Groq from 'groq-sdk';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileTypeFromFile } from 'file-type';
import type { AgentGateway, AgentRequest, AgentRequestMode } from '../types/collaborators.js';
import { isAbortError, isTransientNetworkError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';

type ContentPart =
    | { type: 'text'; text: string }
    | { type: 'image_url'; image_url: { url: string } };

export interface GroqAgentGatewayOptions {
    apiKey: string;
    model: string;
    maxTokens?: number;
    logger?: Logger;
}

const SYSTEM_PROMPTS: Record<AgentRequestMode, string> = {
    assistant: 'You are a helpful assistant in a chat conversation. Answer concisely.',
    agent:
        'You are an autonomous agent working for the user in a chat conversation. ' +
        'Work through the request step by step and report what you did and what remains.',
};

const EMPTY_REPLY = 'I have nothing to add.';

/**
 * Agent back end on Groq chat completions. Image attachments are inlined as
 * data URLs; other attachments are mentioned by file name only. Attachments
 * are read before the request is sent, so they only need to exist for the
 * duration of `processMessage`.
 */
export class GroqAgentGateway implements AgentGateway {
    readonly #client: Groq;
    readonly #model: string;
    readonly #maxTokens: number;
    readonly #logger: Logger;

    constructor(options: GroqAgentGatewayOptions) {
        this.#client = new Groq({ apiKey: options.apiKey });
        this.#model = options.model;
        this.#maxTokens = options.maxTokens ?? 1024;
        this.#logger = options.logger ?? getLogger('agent-gateway');
    }

    async processMessage(request: AgentRequest, signal?: AbortSignal): Promise<string> {
        const content: ContentPart[] = [{ type: 'text', text: request.prompt }];
        for (const attachment of request.attachments) {
            content.push(await this.#attachmentPart(attachment));
        }

        const completion = await withRetry(
            () =>
                this.#client.chat.completions.create(
                    {
                        model: this.#model,
                        max_tokens: this.#maxTokens,
                        messages: [
                            { role: 'system', content: SYSTEM_PROMPTS[request.mode] },
                            { role: 'user', content },
                        ],
                    },
                    { signal },
                ),
            {
                label: 'groq:chat',
                signal,
                shouldRetry: (err) => !isAbortError(err) && isTransientNetworkError(err),
            },
        );

        const reply = completion.choices[0]?.message.content?.trim();
        this.#logger.debug(
            { conversationId: request.conversationId, source: request.source, mode: request.mode, attachments: request.attachments.length },
            'Agent replied',
        );
        return reply || EMPTY_REPLY;
    }

    async #attachmentPart(filePath: string): Promise<ContentPart> {
        const detected = await fileTypeFromFile(filePath);
        if (detected?.mime.startsWith('image/')) {
            const data = await readFile(filePath);
            return { type: 'image_url', image_url: { url: `data:${detected.mime};base64,${data.toString('base64')}` } };
        }
        return { type: 'text', text: `[Attachment: ${path.basename(filePath)}]` };
    }
}
