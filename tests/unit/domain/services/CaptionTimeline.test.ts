import {
    buildCaptionCues,
    formatSrtTime,
    splitSentences,
    toSrt,
} from '../../../../src/domain/services/CaptionTimeline';
import { CharacterAlignment } from '../../../../src/domain/entities/TimedClip';

/** One character every 100 ms */
function alignmentFor(text: string): CharacterAlignment {
    const characters = text.split('');
    return {
        characters,
        characterStartTimesSeconds: characters.map((_, i) => i / 10),
        characterEndTimesSeconds: characters.map((_, i) => (i + 1) / 10),
    };
}

describe('CaptionTimeline', () => {
    const narration = 'Hi there. Go now!';

    it('splits sentences and keeps their offsets', () => {
        expect(splitSentences('One. Two?  Three')).toEqual([
            { text: 'One.', start: 0, end: 4 },
            { text: 'Two?', start: 5, end: 9 },
            { text: 'Three', start: 11, end: 16 },
        ]);
    });

    it('times one cue per sentence from the alignment', () => {
        const cues = buildCaptionCues({
            captionText: narration,
            overridden: false,
            alignment: alignmentFor(narration),
            durationSeconds: 2,
        });

        expect(cues).toEqual([
            { startSeconds: 0, endSeconds: 1, text: 'Hi there.' },
            { startSeconds: 1, endSeconds: 2, text: 'Go now!' },
        ]);
    });

    it('uses one cue for the whole shot when the caption is overridden', () => {
        const cues = buildCaptionCues({
            captionText: 'Custom. Caption.',
            overridden: true,
            alignment: alignmentFor(narration),
            durationSeconds: 2,
        });

        expect(cues).toEqual([{ startSeconds: 0, endSeconds: 2, text: 'Custom. Caption.' }]);
    });

    it('uses one cue when there is no alignment', () => {
        expect(buildCaptionCues({ captionText: narration, overridden: false, durationSeconds: 3.25 })).toEqual([
            { startSeconds: 0, endSeconds: 3.25, text: narration },
        ]);
    });

    it('ignores an alignment that does not spell the caption', () => {
        const cues = buildCaptionCues({
            captionText: narration,
            overridden: false,
            alignment: alignmentFor('Hi there. Go later!'),
            durationSeconds: 2,
        });

        expect(cues).toEqual([{ startSeconds: 0, endSeconds: 2, text: narration }]);
    });

    it('returns no cues for an empty caption', () => {
        expect(buildCaptionCues({ captionText: '  ', overridden: true, durationSeconds: 2 })).toEqual([]);
    });

    it('formats SRT timestamps', () => {
        expect(formatSrtTime(0)).toBe('00:00:00,000');
        expect(formatSrtTime(3661.5)).toBe('01:01:01,500');
    });

    it('renders numbered SRT blocks', () => {
        const srt = toSrt([
            { startSeconds: 0, endSeconds: 1, text: 'Hi there.' },
            { startSeconds: 1, endSeconds: 2, text: 'Go now!' },
        ]);

        expect(srt).toBe('1\n00:00:00,000 --> 00:00:01,000\nHi there.\n\n2\n00:00:01,000 --> 00:00:02,000\nGo now!\n');
    });
});
