import { CharacterAlignment } from '../entities/TimedClip';

/**
 * One caption shown between `startSeconds` and `endSeconds` of a shot.
 */
export interface CaptionCue {
    startSeconds: number;
    endSeconds: number;
    text: string;
}

export interface SentenceSpan {
    text: string;
    /** Offset of the first non-space character in the source text */
    start: number;
    /** Offset one past the last character */
    end: number;
}

const SENTENCE_PATTERN = /[^.!?…]+(?:[.!?…]+["'”’)\]]*|$)/g;

/**
 * Splits text into sentences on terminal punctuation, keeping offsets.
 */
export function splitSentences(text: string): SentenceSpan[] {
    const spans: SentenceSpan[] = [];
    for (const match of text.matchAll(SENTENCE_PATTERN)) {
        const raw = match[0];
        const offset = match.index ?? 0;
        const leading = raw.length - raw.trimStart().length;
        const trimmed = raw.trim();
        if (trimmed.length === 0) {
            continue;
        }
        const start = offset + leading;
        spans.push({ text: trimmed, start, end: start + trimmed.length });
    }
    return spans;
}

export interface CaptionTimingInput {
    captionText: string;
    /** True when the caption differs from the narration the audio was made from */
    overridden: boolean;
    alignment?: CharacterAlignment;
    durationSeconds: number;
}

/**
 * Times captions to the narration's sentence boundaries when the audio carries
 * a usable alignment; otherwise a single cue spans the whole shot.
 */
export function buildCaptionCues(input: CaptionTimingInput): CaptionCue[] {
    const text = input.captionText.trim();
    const duration = input.durationSeconds;
    if (text.length === 0) {
        return [];
    }

    const fullSpan: CaptionCue[] = [{ startSeconds: 0, endSeconds: duration, text }];
    if (input.overridden || !input.alignment || !isAlignmentUsable(input.alignment, text)) {
        return fullSpan;
    }

    const sentences = splitSentences(text);
    if (sentences.length <= 1) {
        return fullSpan;
    }

    const starts = input.alignment.characterStartTimesSeconds;
    const cues: CaptionCue[] = [];
    sentences.forEach((sentence, i) => {
        const startSeconds = i === 0 ? 0 : clampTime(starts[sentence.start], duration);
        const next = sentences[i + 1];
        const endSeconds = next ? clampTime(starts[next.start], duration) : duration;
        if (endSeconds > startSeconds) {
            cues.push({ startSeconds, endSeconds, text: sentence.text });
        }
    });
    return cues.length > 0 ? cues : fullSpan;
}

function isAlignmentUsable(alignment: CharacterAlignment, text: string): boolean {
    const { characters, characterStartTimesSeconds, characterEndTimesSeconds } = alignment;
    return (
        characters.length === text.length &&
        characterStartTimesSeconds.length === characters.length &&
        characterEndTimesSeconds.length === characters.length &&
        characters.join('') === text
    );
}

function clampTime(seconds: number, duration: number): number {
    return Math.min(Math.max(seconds, 0), duration);
}

/**
 * Formats seconds as an SRT timestamp (HH:MM:SS,mmm).
 */
export function formatSrtTime(seconds: number): string {
    const totalMs = Math.max(0, Math.round(seconds * 1000));
    const ms = totalMs % 1000;
    const totalSeconds = Math.floor(totalMs / 1000);
    const s = totalSeconds % 60;
    const m = Math.floor(totalSeconds / 60) % 60;
    const h = Math.floor(totalSeconds / 3600);
    const pad = (n: number, width: number) => n.toString().padStart(width, '0');
    return `${pad(h, 2)}:${pad(m, 2)}:${pad(s, 2)},${pad(ms, 3)}`;
}

export function toSrt(cues: CaptionCue[]): string {
    return cues
        .map((cue, i) => `${i + 1}\n${formatSrtTime(cue.startSeconds)} --> ${formatSrtTime(cue.endSeconds)}\n${cue.text}\n`)
        .join('\n');
}
