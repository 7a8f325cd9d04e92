import { KenBurnsParams } from '../entities/Blueprint';
import { CaptionCue } from '../services/CaptionTimeline';
import { VideoExtendPolicy } from '../entities/TimedClip';

export interface CanvasSpec {
    width: number;
    height: number;
    fps: number;
}

export interface CaptionStyle {
    font: string;
    fontSize: number;
    /** Directory of shared font files */
    fontsDir?: string;
}

/**
 * Everything needed to turn one visual asset into a clip of exactly `durationSeconds`.
 */
export interface EffectRenderRequest {
    assetPath: string;
    mediaType: 'image' | 'video';
    /** Source dimensions, used for the centered 9:16 crop */
    sourceWidth: number;
    sourceHeight: number;
    /** Natural length of a video source */
    sourceDurationSeconds?: number;
    durationSeconds: number;
    kenBurns: KenBurnsParams;
    captions: CaptionCue[];
    captionStyle: CaptionStyle;
    canvas: CanvasSpec;
    extendPolicy: VideoExtendPolicy;
    outputPath: string;
}

/**
 * IEffectRenderer - Port for per-shot visual rendering.
 * Implementations: FFmpegEffectRenderer
 */
export interface IEffectRenderer {
    /**
     * Writes the rendered clip to `request.outputPath`. Rejects on encoder failure.
     */
    render(request: EffectRenderRequest): Promise<void>;
}
