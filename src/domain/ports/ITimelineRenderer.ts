import { ShotClipPair } from '../entities/TimedClip';
import { TimelinePlan } from '../services/TimelinePlanner';
import { CanvasSpec } from './IEffectRenderer';

export interface TimelineRenderRequest {
    /** Clips in timeline order, one per plan entry */
    clips: ShotClipPair[];
    plan: TimelinePlan;
    canvas: CanvasSpec;
    outputPath: string;
}

/**
 * ITimelineRenderer - Port for the final audio/video mux.
 * Implementations: FFmpegTimelineRenderer
 */
export interface ITimelineRenderer {
    render(request: TimelineRenderRequest): Promise<void>;
}
