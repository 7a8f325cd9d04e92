/**
 * Per-character timing returned by the TTS provider.
 */
export interface CharacterAlignment {
    characters: string[];
    characterStartTimesSeconds: number[];
    characterEndTimesSeconds: number[];
}

/**
 * TimedClip is a media file plus its authoritative duration.
 * Durations are never rescaled once produced.
 */
export interface TimedClip {
    path: string;
    durationSeconds: number;
}

export interface AudioClip extends TimedClip {
    alignment?: CharacterAlignment;
}

export type VisualClip = TimedClip;

/**
 * Sidecar written next to each synthesized clip.
 */
export interface AudioSidecar {
    durationSeconds: number;
    fingerprint: string;
    alignment?: CharacterAlignment;
}

/**
 * The finished audio and visual of one shot, ready for assembly.
 */
export interface ShotClipPair {
    shotIndex: number;
    audio: AudioClip;
    visual: VisualClip;
}

/**
 * How a video source shorter than its shot is extended:
 * 'freeze' holds the last frame, 'loop' restarts from the first frame.
 */
export type VideoExtendPolicy = 'freeze' | 'loop';
