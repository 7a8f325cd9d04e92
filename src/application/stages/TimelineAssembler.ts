import { PipelineContext } from '../../domain/entities/StageRecord';
import { ShotClipPair } from '../../domain/entities/TimedClip';
import { AssemblyError } from '../../domain/errors/PipelineErrors';
import { CanvasSpec } from '../../domain/ports/IEffectRenderer';
import { ITimelineRenderer } from '../../domain/ports/ITimelineRenderer';
import { TimelinePlan, TimelinePlanError, planTimeline } from '../../domain/services/TimelinePlanner';
import { produceAtomically } from '../../infrastructure/storage/AtomicFile';
import { ProjectLayout } from '../ProjectLayout';

export interface TransitionSettings {
    /** 0 means hard cuts */
    crossfadeSeconds: number;
}

export interface AssemblyResult {
    path: string;
    durationSeconds: number;
    plan: TimelinePlan;
}

/** Audio and visual of a shot must agree to the microsecond */
const DURATION_EPSILON = 1e-6;

/**
 * Joins every shot's audio and visual into <p>_<v>_final.mp4.
 * A failed export leaves any previous final file in place.
 */
export class TimelineAssembler {
    constructor(
        private readonly renderer: ITimelineRenderer,
        private readonly layout: ProjectLayout,
        private readonly canvas: CanvasSpec
    ) { }

    plan(ctx: PipelineContext, clips: ShotClipPair[], transition: TransitionSettings): TimelinePlan {
        if (clips.length === 0) {
            throw new AssemblyError(ctx, 'No shots to assemble');
        }
        for (const clip of clips) {
            if (Math.abs(clip.audio.durationSeconds - clip.visual.durationSeconds) > DURATION_EPSILON) {
                throw new AssemblyError(
                    { ...ctx, shotIndex: clip.shotIndex },
                    `Audio lasts ${clip.audio.durationSeconds}s but visual lasts ${clip.visual.durationSeconds}s`
                );
            }
        }

        try {
            return planTimeline(
                clips.map((clip) => ({ shotIndex: clip.shotIndex, durationSeconds: clip.audio.durationSeconds })),
                transition.crossfadeSeconds
            );
        } catch (error) {
            if (error instanceof TimelinePlanError) {
                throw new AssemblyError({ ...ctx, shotIndex: error.shotIndex }, 'Cannot lay out the timeline', error);
            }
            throw error;
        }
    }

    async assemble(ctx: PipelineContext, clips: ShotClipPair[], transition: TransitionSettings): Promise<AssemblyResult> {
        const plan = this.plan(ctx, clips, transition);
        const ordered = [...clips].sort((a, b) => a.shotIndex - b.shotIndex);
        const outputPath = this.layout.finalVideoPath(ctx);

        console.log(`[Assembler] ${ctx.project}/${ctx.version}: ${ordered.length} shots, crossfade ${plan.crossfadeSeconds}s, ${plan.totalDurationSeconds}s total`);
        try {
            await produceAtomically(outputPath, (tempPath) =>
                this.renderer.render({ clips: ordered, plan, canvas: this.canvas, outputPath: tempPath })
            );
        } catch (error) {
            throw new AssemblyError(ctx, 'Export failed', error);
        }

        return { path: outputPath, durationSeconds: plan.totalDurationSeconds, plan };
    }
}
