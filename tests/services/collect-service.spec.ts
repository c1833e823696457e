import { beforeEach, describe, expect, it } from 'vitest';
import { CollectService } from '../../src/services/collect-service.js';
import { combine, photoEvent, resetEventIds, textEvent } from '../helpers/fixtures.js';

describe('CollectService', () => {
    let clock: number;
    let collect: CollectService;

    beforeEach(() => {
        resetEventIds();
        clock = 0;
        collect = new CollectService({
            triggerKeywords: ['Go Ahead', ' now respond ', ''],
            maxItems: 2,
            sessionTimeoutMs: 10_000,
            now: () => clock,
        });
    });

    it('is idle until a session starts', async () => {
        expect(await collect.isCollecting('chat-1')).toBe(false);
        expect(await collect.status('chat-1')).toBeNull();
    });

    it('queues messages and drains them in order', async () => {
        await collect.start('chat-1', 'user-1');
        const first = combine([textEvent('one')]);
        const second = combine([photoEvent(), textEvent('two')]);

        await collect.enqueue('chat-1', first);
        await collect.enqueue('chat-1', second);
        clock = 4000;

        expect(await collect.status('chat-1')).toEqual({
            active: true,
            startedBy: 'user-1',
            itemCount: 2,
            startedAt: 0,
            ageMs: 4000,
            summary: { text: 2, photo: 1 },
        });

        expect(await collect.drainAndTrigger('chat-1')).toEqual([first, second]);
        expect(await collect.isCollecting('chat-1')).toBe(false);
    });

    it('refuses messages beyond the per-session limit', async () => {
        await collect.start('chat-1', 'user-1');
        for (const text of ['a', 'b', 'c']) {
            await collect.enqueue('chat-1', combine([textEvent(text)]));
        }

        const drained = await collect.drainAndTrigger('chat-1');
        expect(drained.map((message) => message.combinedText)).toEqual(['a', 'b']);
    });

    it('rejects enqueue without an active session', async () => {
        await expect(collect.enqueue('chat-1', combine([textEvent('x')]))).rejects.toThrow(
            '[Collect] No active collect session for conversation chat-1.',
        );
    });

    it('expires sessions after the timeout', async () => {
        await collect.start('chat-1', 'user-1');
        clock = 10_001;

        expect(await collect.isCollecting('chat-1')).toBe(false);
        expect(await collect.drainAndTrigger('chat-1')).toEqual([]);
    });

    it('reports how many messages stop discards', async () => {
        await collect.start('chat-1', 'user-1');
        await collect.enqueue('chat-1', combine([textEvent('x')]));

        expect(await collect.stop('chat-1')).toBe(1);
        expect(await collect.stop('chat-1')).toBe(0);
    });

    it('matches trigger keywords case-insensitively inside longer text', () => {
        expect(collect.matchesTrigger('OK, go ahead please')).toBe(true);
        expect(collect.matchesTrigger('now respond')).toBe(true);
        expect(collect.matchesTrigger('go on')).toBe(false);
        expect(collect.matchesTrigger('   ')).toBe(false);
    });

    it('strips the first occurrence of each trigger keyword', () => {
        expect(collect.stripTriggers('Ok GO AHEAD please')).toBe('Ok please');
        expect(collect.stripTriggers('go ahead now respond')).toBe('');
        expect(collect.stripTriggers('nothing to strip')).toBe('nothing to strip');
    });
});
