import type { PluginHandler } from '../types/collaborators.js';
import type { CombinedMessage } from '../types/messaging.js';
import { errorMessage, isAbortError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

export interface GatewayPlugin extends PluginHandler {
    readonly name: string;
}

/**
 * Ordered plugin chain. The first plugin that claims a message wins; a plugin
 * that throws is logged and skipped so the rest of the chain still runs.
 */
export class PluginRegistry implements PluginHandler {
    readonly #plugins: GatewayPlugin[] = [];
    readonly #logger: Logger;

    constructor(logger?: Logger) {
        this.#logger = logger ?? getLogger('plugins');
    }

    register(plugin: GatewayPlugin): void {
        if (this.#plugins.some((existing) => existing.name === plugin.name)) {
            throw new Error(`[PluginRegistry] Plugin '${plugin.name}' is already registered.`);
        }
        this.#plugins.push(plugin);
        this.#logger.info({ plugin: plugin.name }, 'Plugin registered');
    }

    unregister(name: string): boolean {
        const index = this.#plugins.findIndex((plugin) => plugin.name === name);
        if (index === -1) return false;
        this.#plugins.splice(index, 1);
        return true;
    }

    list(): string[] {
        return this.#plugins.map((plugin) => plugin.name);
    }

    async tryHandle(combined: CombinedMessage): Promise<boolean> {
        for (const plugin of this.#plugins) {
            try {
                if (await plugin.tryHandle(combined)) {
                    this.#logger.debug({ plugin: plugin.name, conversationId: combined.conversationId }, 'Plugin claimed message');
                    return true;
                }
            } catch (err) {
                if (isAbortError(err)) throw err;
                this.#logger.error(
                    { plugin: plugin.name, conversationId: combined.conversationId, err: errorMessage(err) },
                    'Plugin failed, continuing',
                );
            }
        }
        return false;
    }
}
