import type { CombinedMessage, EventOfKind, HandlerResult } from '../types/messaging.js';
import type { ContentHandler, HandlerDeps } from './types.js';
import { askAgent } from './shared.js';

export function formatPoll(event: EventOfKind<'poll'>): string {
    const { question, options, allowsMultipleAnswers } = event.payload;
    const lines = [`[Poll] ${question}`, ...options.map((option, index) => `${index + 1}. ${option}`)];
    if (allowsMultipleAnswers) lines.push('(multiple answers allowed)');
    return lines.join('\n');
}

export function formatContact(event: EventOfKind<'contact'>): string {
    const { firstName, lastName, phoneNumber } = event.payload;
    const name = [firstName, lastName].filter(Boolean).join(' ');
    return `[Contact] ${name}, phone: ${phoneNumber}`;
}

function withText(combined: CombinedMessage, body: string): string {
    return combined.combinedText ? `${combined.combinedText}\n\n${body}` : body;
}

export class PollHandler implements ContentHandler {
    readonly kind = 'poll' as const;
    readonly #deps: HandlerDeps;

    constructor(deps: HandlerDeps) {
        this.#deps = deps;
    }

    async handle(combined: CombinedMessage, agentMode: boolean, signal?: AbortSignal): Promise<HandlerResult> {
        const prompt = withText(combined, combined.polls.map(formatPoll).join('\n\n'));
        const reply = await askAgent(this.#deps, combined, { agentMode, prompt, source: 'poll' }, signal);
        return { status: 'ok', reply };
    }
}

export class ContactHandler implements ContentHandler {
    readonly kind = 'contact' as const;
    readonly #deps: HandlerDeps;

    constructor(deps: HandlerDeps) {
        this.#deps = deps;
    }

    async handle(combined: CombinedMessage, agentMode: boolean, signal?: AbortSignal): Promise<HandlerResult> {
        const prompt = withText(combined, combined.contacts.map(formatContact).join('\n'));
        const reply = await askAgent(this.#deps, combined, { agentMode, prompt, source: 'contact' }, signal);
        return { status: 'ok', reply };
    }
}

export class TextHandler implements ContentHandler {
    readonly kind = 'text' as const;
    readonly #deps: HandlerDeps;

    constructor(deps: HandlerDeps) {
        this.#deps = deps;
    }

    async handle(combined: CombinedMessage, agentMode: boolean, signal?: AbortSignal): Promise<HandlerResult> {
        const reply = await askAgent(
            this.#deps,
            combined,
            { agentMode, prompt: combined.combinedText, source: 'text' },
            signal,
        );
        return { status: 'ok', reply };
    }
}
