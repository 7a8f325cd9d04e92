/**
 * Easing curves available for Ken Burns motion.
 */
export type EasingName =
    | 'linear'
    | 'ease_in_quad'
    | 'ease_out_quad'
    | 'ease_in_out_quad'
    | 'ease_in_cubic'
    | 'ease_out_cubic'
    | 'ease_in_out_cubic';

export const EASING_NAMES: readonly EasingName[] = [
    'linear',
    'ease_in_quad',
    'ease_out_quad',
    'ease_in_out_quad',
    'ease_in_cubic',
    'ease_out_cubic',
    'ease_in_out_cubic',
];

/**
 * Crop rectangle in normalized image space ([0,1] x [0,1], origin top-left).
 */
export interface CropRect {
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface KenBurnsParams {
    start: CropRect;
    end: CropRect;
    easing: EasingName;
}

/**
 * Voice delivery settings. Passed opaquely to the TTS provider.
 */
export interface VoiceSettings {
    stability: number;
    similarityBoost: number;
    style: number;
    speed: number;
    useSpeakerBoost: boolean;
    /** Optional seed for repeatable synthesis */
    seed?: number;
}

export type VisualKind = 'ai_image' | 'stock_asset' | 'ai_video';

/**
 * Visual source of a shot. `prompt` describes what to produce;
 * `assetPath` is set once a file has been attached.
 */
export interface VisualAsset {
    kind: VisualKind;
    prompt?: string;
    assetPath?: string;
}

/**
 * Shot is one timeline segment: one narration line, one visual, one effect set.
 */
export interface Shot {
    /** Zero-based, unique within the blueprint; defines timeline order */
    index: number;
    narration: string;
    visual: VisualAsset;
    voiceSettings: VoiceSettings;
    kenBurns: KenBurnsParams;
    /** Overrides the narration as caption text. Empty string disables captions. */
    caption?: string;
}

export type BlueprintStatus = 'draft' | 'finalized';

/**
 * Blueprint is the full plan for one (project, version) video.
 */
export interface Blueprint {
    projectName: string;
    version: string;
    title: string;
    description: string;
    scriptFormula: string;
    status: BlueprintStatus;
    /** Overrides the configured TTS voice */
    voiceId?: string;
    /** Overrides the configured TTS model */
    ttsModelId?: string;
    ctaText?: string;
    shots: Shot[];
    createdAt: string;
    updatedAt: string;
}

export const DEFAULT_VOICE_SETTINGS: VoiceSettings = {
    stability: 0.75,
    similarityBoost: 0.75,
    style: 0,
    speed: 1.0,
    useSpeakerBoost: true,
};

/** Full frame, no motion. */
export const FULL_FRAME: CropRect = { x: 0, y: 0, width: 1, height: 1 };

export const DEFAULT_KEN_BURNS: KenBurnsParams = {
    start: FULL_FRAME,
    end: { x: 0.05, y: 0.05, width: 0.9, height: 0.9 },
    easing: 'linear',
};

/**
 * The caption text that will be burned into a shot.
 */
export function getCaptionText(shot: Shot): string {
    return shot.caption !== undefined ? shot.caption.trim() : shot.narration.trim();
}

export function isCaptionOverridden(shot: Shot): boolean {
    return shot.caption !== undefined && shot.caption.trim() !== shot.narration.trim();
}

/**
 * A shot can enter effect rendering only once its visual points at a file.
 */
export function hasResolvedAsset(shot: Shot): boolean {
    return typeof shot.visual.assetPath === 'string' && shot.visual.assetPath.trim().length > 0;
}

const VIDEO_EXTENSIONS = new Set(['.mp4', '.mov', '.webm', '.mkv', '.m4v', '.avi']);

/**
 * Whether the attached asset is a moving clip rather than a still.
 */
export function isVideoAsset(visual: VisualAsset): boolean {
    if (visual.kind === 'ai_video') {
        return true;
    }
    const assetPath = visual.assetPath?.toLowerCase() ?? '';
    const dot = assetPath.lastIndexOf('.');
    return dot >= 0 && VIDEO_EXTENSIONS.has(assetPath.substring(dot));
}

/**
 * Returns the shots in timeline order.
 */
export function orderedShots(blueprint: Blueprint): Shot[] {
    return [...blueprint.shots].sort((a, b) => a.index - b.index);
}
