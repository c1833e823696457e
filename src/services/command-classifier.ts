import type { CommandClassifier } from '../types/collaborators.js';
import type { ClassifiedCommand, InboundEvent } from '../types/messaging.js';

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]{1,32})(?:@([A-Za-z0-9_]+))?(?:\s+([\s\S]*))?$/;

export interface SlashCommandClassifierOptions {
    /** Command names (without the slash) this gateway handles. */
    knownCommands: Iterable<string>;
    /** Own bot username; `/cmd@other_bot` addressed elsewhere is ignored. */
    botUsername?: string;
}

/**
 * Recognizes `/name [args]` in command and text events. Only names in
 * `knownCommands` are recognized, so slash-prefixed trigger words and other
 * bots' commands fall through to later routing steps.
 */
export class SlashCommandClassifier implements CommandClassifier {
    readonly #known: Set<string>;
    readonly #botUsername?: string;

    constructor(options: SlashCommandClassifierOptions) {
        this.#known = new Set([...options.knownCommands].map((name) => name.toLowerCase()));
        this.#botUsername = options.botUsername?.replace(/^@/, '').toLowerCase();
    }

    classify(event: InboundEvent): ClassifiedCommand | null {
        if (event.kind !== 'command' && event.kind !== 'text') return null;

        const match = COMMAND_PATTERN.exec(event.payload.text.trim());
        if (!match) return null;

        const [, rawName = '', addressee, rest] = match;
        const name = rawName.toLowerCase();
        if (!this.#known.has(name)) return null;
        if (addressee && this.#botUsername && addressee.toLowerCase() !== this.#botUsername) return null;

        const args = (rest ?? '').split(/\s+/).filter(Boolean);
        return { name, args, eventId: event.eventId };
    }
}
