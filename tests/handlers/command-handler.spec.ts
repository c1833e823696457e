import { beforeEach, describe, expect, it } from 'vitest';
import { CommandHandler } from '../../src/handlers/command.js';
import { AgentModeStore } from '../../src/services/agent-mode.js';
import { CollectService } from '../../src/services/collect-service.js';
import { TaskTracker } from '../../src/services/task-tracker.js';
import { combine, commandEvent, resetEventIds, textEvent } from '../helpers/fixtures.js';

describe('CommandHandler', () => {
    let collect: CollectService;
    let agentMode: AgentModeStore;
    let tasks: TaskTracker;
    let handler: CommandHandler;

    beforeEach(() => {
        resetEventIds();
        collect = new CollectService({ triggerKeywords: ['go ahead'] });
        agentMode = new AgentModeStore();
        tasks = new TaskTracker();
        handler = new CommandHandler({ collect, agentMode, tasks, triggerKeywords: ['go ahead', '/go'] });
    });

    const run = (name: string, args: string[] = []) => {
        const event = commandEvent(`/${[name, ...args].join(' ')}`);
        return handler.handle({ name, args, eventId: event.eventId }, combine([event]));
    };

    it('lists the built-in commands', async () => {
        const result = await run('help');
        expect(result.status).toBe('ok');
        expect(result.status === 'ok' && result.reply?.split('\n')[0]).toBe('Available commands:');
    });

    it('reports agent mode, collect mode and background tasks', async () => {
        await agentMode.setAgentMode('chat-1', true);
        await collect.start('chat-1', 'user-1');
        await collect.enqueue('chat-1', combine([textEvent('queued')]));

        const result = await run('status');

        expect(result).toEqual({
            status: 'ok',
            reply: 'Agent mode: on\nCollect mode: on (1 queued)\nBackground tasks: 0',
        });
    });

    it('starts collect mode and names the trigger phrases', async () => {
        const result = await run('collect');

        expect(result).toEqual({
            status: 'ok',
            reply: 'Collect mode started. Send your messages, then say "go ahead", "/go" to process them together.',
        });
        expect(await collect.isCollecting('chat-1')).toBe(true);
    });

    it('stops collect mode and reports what was discarded', async () => {
        await collect.start('chat-1', 'user-1');
        await collect.enqueue('chat-1', combine([textEvent('one')]));
        await collect.enqueue('chat-1', combine([textEvent('two')]));

        const result = await run('collect', ['STOP']);

        expect(result).toEqual({ status: 'ok', reply: 'Collect mode stopped. 2 queued message(s) discarded.' });
        expect(await collect.isCollecting('chat-1')).toBe(false);
    });

    it('reports collect status', async () => {
        expect(await run('collect', ['status'])).toEqual({ status: 'ok', reply: 'Collect mode is off.' });
    });

    it('rejects an unknown collect action with usage', async () => {
        expect(await run('collect', ['pause'])).toEqual({ status: 'rejected', reason: 'Usage: /collect start|stop|status' });
    });

    it('toggles agent mode', async () => {
        expect(await run('agent', ['on'])).toEqual({ status: 'ok', reply: 'Agent mode enabled.' });
        expect(await agentMode.isAgentMode('chat-1')).toBe(true);

        expect(await run('agent')).toEqual({ status: 'ok', reply: 'Agent mode is on.' });

        expect(await run('agent', ['off'])).toEqual({ status: 'ok', reply: 'Agent mode disabled.' });
        expect(await agentMode.isAgentMode('chat-1')).toBe(false);
    });

    it('rejects an invalid agent argument', async () => {
        expect(await run('agent', ['maybe'])).toEqual({ status: 'rejected', reason: 'Usage: /agent on|off' });
    });
});
