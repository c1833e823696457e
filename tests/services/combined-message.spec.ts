import { beforeEach, describe, expect, it } from 'vitest';
import {
    combine,
    documentEvent,
    photoEvent,
    resetEventIds,
    textEvent,
    videoEvent,
    voiceEvent,
} from '../helpers/fixtures.js';

describe('buildCombinedMessage', () => {
    beforeEach(() => {
        resetEventIds();
    });

    it('exposes each media kind through its own typed view', () => {
        const combined = combine([
            photoEvent({ fileId: 'p1' }, 'look'),
            voiceEvent({ fileId: 'v1', declaredMime: 'audio/ogg' }),
            videoEvent({ fileId: 'm1' }),
            documentEvent({ fileId: 'd1', fileName: 'notes.txt' }),
            textEvent('and this'),
        ]);

        expect(combined.images.map((event) => event.payload.media.fileId)).toEqual(['p1']);
        expect(combined.images[0]?.payload.caption).toBe('look');
        expect(combined.voices.map((event) => event.payload.media.declaredMime)).toEqual(['audio/ogg']);
        expect(combined.videos.map((event) => event.payload.media.fileId)).toEqual(['m1']);
        expect(combined.documents.map((event) => event.payload.media.fileName)).toEqual(['notes.txt']);
        expect(combined.combinedText).toBe('look and this');
    });

    it('keeps the views as subsets of the arrival-ordered events', () => {
        const first = photoEvent({ fileId: 'p1' });
        const second = photoEvent({ fileId: 'p2' });
        const combined = combine([first, textEvent('between'), second]);

        expect(combined.images).toEqual([first, second]);
        expect(combined.events.map((event) => event.eventId)).toEqual([1, 2, 3]);
        expect(Object.isFrozen(combined.images)).toBe(true);
    });
});
