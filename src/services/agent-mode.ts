import type { AgentModeProvider } from '../types/collaborators.js';
import { getLogger, type Logger } from '../utils/logger.js';

/**
 * Per-conversation agent-mode flag. Conversations without an explicit
 * setting use `defaultEnabled`.
 */
export class AgentModeStore implements AgentModeProvider {
    readonly #overrides: Map<string, boolean> = new Map();
    readonly #defaultEnabled: boolean;
    readonly #logger: Logger;

    constructor(options: { defaultEnabled?: boolean; logger?: Logger } = {}) {
        this.#defaultEnabled = options.defaultEnabled ?? false;
        this.#logger = options.logger ?? getLogger('agent-mode');
    }

    async isAgentMode(conversationId: string): Promise<boolean> {
        return this.#overrides.get(conversationId) ?? this.#defaultEnabled;
    }

    async setAgentMode(conversationId: string, enabled: boolean): Promise<void> {
        this.#overrides.set(conversationId, enabled);
        this.#logger.info({ conversationId, enabled }, 'Agent mode updated');
    }
}
