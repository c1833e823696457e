import type { AgentModeStore } from '../services/agent-mode.js';
import type { CollectService } from '../services/collect-service.js';
import type { TaskTracker } from '../services/task-tracker.js';
import type { ClassifiedCommand, CombinedMessage, HandlerResult } from '../types/messaging.js';

export const BUILTIN_COMMANDS = ['help', 'status', 'collect', 'agent'] as const;

export interface CommandHandlerDeps {
    collect: CollectService;
    agentMode: AgentModeStore;
    tasks: TaskTracker;
    triggerKeywords: string[];
}

const HELP_TEXT = [
    'Available commands:',
    '/help - show this message',
    '/status - show agent mode, collect mode and background work',
    '/collect start|stop|status - queue messages until a trigger phrase',
    '/agent on|off - toggle agent mode',
].join('\n');

/** Built-in slash commands. */
export class CommandHandler {
    readonly #deps: CommandHandlerDeps;

    constructor(deps: CommandHandlerDeps) {
        this.#deps = deps;
    }

    async handle(command: ClassifiedCommand, combined: CombinedMessage): Promise<HandlerResult> {
        const conversationId = combined.conversationId;
        switch (command.name) {
            case 'help':
                return { status: 'ok', reply: HELP_TEXT };
            case 'status':
                return { status: 'ok', reply: await this.#status(conversationId) };
            case 'collect':
                return this.#collect(command.args[0]?.toLowerCase() ?? 'start', combined);
            case 'agent':
                return this.#agent(command.args[0]?.toLowerCase(), conversationId);
            default:
                return { status: 'rejected', reason: `Unknown command /${command.name}. Send /help for the list.` };
        }
    }

    async #status(conversationId: string): Promise<string> {
        const agentOn = await this.#deps.agentMode.isAgentMode(conversationId);
        const collect = await this.#deps.collect.status(conversationId);
        return [
            `Agent mode: ${agentOn ? 'on' : 'off'}`,
            `Collect mode: ${collect ? `on (${collect.itemCount} queued)` : 'off'}`,
            `Background tasks: ${this.#deps.tasks.activeCount()}`,
        ].join('\n');
    }

    async #collect(action: string, combined: CombinedMessage): Promise<HandlerResult> {
        const { collect } = this.#deps;
        const conversationId = combined.conversationId;

        switch (action) {
            case 'start': {
                await collect.start(conversationId, combined.senderId);
                const triggers = this.#deps.triggerKeywords.map((keyword) => `"${keyword}"`).join(', ');
                return {
                    status: 'ok',
                    reply: `Collect mode started. Send your messages, then say ${triggers} to process them together.`,
                };
            }
            case 'stop': {
                const discarded = await collect.stop(conversationId);
                return { status: 'ok', reply: `Collect mode stopped. ${discarded} queued message(s) discarded.` };
            }
            case 'status': {
                const status = await collect.status(conversationId);
                return {
                    status: 'ok',
                    reply: status ? `Collect mode is on: ${status.itemCount} message(s) queued.` : 'Collect mode is off.',
                };
            }
            default:
                return { status: 'rejected', reason: 'Usage: /collect start|stop|status' };
        }
    }

    async #agent(action: string | undefined, conversationId: string): Promise<HandlerResult> {
        const { agentMode } = this.#deps;
        if (action === undefined) {
            const enabled = await agentMode.isAgentMode(conversationId);
            return { status: 'ok', reply: `Agent mode is ${enabled ? 'on' : 'off'}.` };
        }
        if (action !== 'on' && action !== 'off') {
            return { status: 'rejected', reason: 'Usage: /agent on|off' };
        }
        await agentMode.setAgentMode(conversationId, action === 'on');
        return { status: 'ok', reply: action === 'on' ? 'Agent mode enabled.' : 'Agent mode disabled.' };
    }
}
