import {
    Shot,
    getCaptionText,
    hasResolvedAsset,
    isCaptionOverridden,
    isVideoAsset,
} from '../../domain/entities/Blueprint';
import { PipelineContext } from '../../domain/entities/StageRecord';
import { AudioClip, VideoExtendPolicy, VisualClip } from '../../domain/entities/TimedClip';
import { FailureScope, RenderError } from '../../domain/errors/PipelineErrors';
import { CanvasSpec, IEffectRenderer } from '../../domain/ports/IEffectRenderer';
import { IMediaProbe, MediaInfo } from '../../domain/ports/IMediaProbe';
import { buildCaptionCues } from '../../domain/services/CaptionTimeline';
import { hashFile, visualFingerprint } from '../../domain/services/Fingerprint';
import { validateCropRect } from '../../domain/services/KenBurns';
import { fileExists, produceAtomically } from '../../infrastructure/storage/AtomicFile';
import { ProjectLayout } from '../ProjectLayout';

export interface EffectStageOptions {
    canvas: CanvasSpec;
    extendPolicy: VideoExtendPolicy;
    captionFont: string;
    captionFontSize: number;
}

/**
 * A shot's asset, located on disk and hashed.
 */
export interface ResolvedAsset {
    path: string;
    hash: string;
}

/**
 * Renders each shot's visual to exactly the length of its narration:
 * Ken Burns motion over stills, trimmed or extended video, burned-in captions.
 */
export class EffectRenderingStage {
    constructor(
        private readonly renderer: IEffectRenderer,
        private readonly probe: IMediaProbe,
        private readonly layout: ProjectLayout,
        private readonly options: EffectStageOptions
    ) { }

    async resolveAsset(ctx: PipelineContext, shot: Shot): Promise<ResolvedAsset> {
        const scope: FailureScope = { ...ctx, shotIndex: shot.index };
        const assetPath = shot.visual.assetPath;
        if (!hasResolvedAsset(shot) || assetPath === undefined) {
            throw new RenderError(scope, 'Visual asset is not attached');
        }
        const resolved = this.layout.resolveAssetPath(ctx, assetPath);
        if (!(await fileExists(resolved))) {
            throw new RenderError(scope, `Asset file not found: ${resolved}`);
        }
        try {
            return { path: resolved, hash: await hashFile(resolved) };
        } catch (error) {
            throw new RenderError(scope, `Cannot read asset ${resolved}`, error);
        }
    }

    fingerprint(shot: Shot, audioFingerprint: string, audio: AudioClip, asset: ResolvedAsset): string {
        return visualFingerprint({
            shot,
            audioFingerprint,
            audioDurationSeconds: audio.durationSeconds,
            assetHash: asset.hash,
            canvas: this.options.canvas,
            extendPolicy: this.options.extendPolicy,
            captionStyle: { font: this.options.captionFont, fontSize: this.options.captionFontSize },
        });
    }

    async run(ctx: PipelineContext, shot: Shot, audio: AudioClip, asset?: ResolvedAsset): Promise<VisualClip> {
        const scope: FailureScope = { ...ctx, shotIndex: shot.index };
        const durationSeconds = audio.durationSeconds;
        if (!(durationSeconds > 0)) {
            throw new RenderError(scope, `Audio duration must be positive, got ${durationSeconds}`);
        }

        for (const edge of ['start', 'end'] as const) {
            const problems = validateCropRect(shot.kenBurns[edge]);
            if (problems.length > 0) {
                throw new RenderError(scope, `Invalid Ken Burns ${edge} rectangle: ${problems.join(', ')}`);
            }
        }

        const source = asset ?? await this.resolveAsset(ctx, shot);
        const info = await this.probeSource(scope, source.path);
        const { width: sourceWidth, height: sourceHeight } = info;
        if (!info.hasVideo || !sourceWidth || !sourceHeight) {
            throw new RenderError(scope, `Asset has no picture: ${source.path}`);
        }
        const mediaType = isVideoAsset(shot.visual) ? 'video' : 'image';

        const captions = buildCaptionCues({
            captionText: getCaptionText(shot),
            overridden: isCaptionOverridden(shot),
            alignment: audio.alignment,
            durationSeconds,
        });

        const outputPath = this.layout.shotVideoPath(ctx, shot.index);
        await produceAtomically(outputPath, async (tempPath) => {
            try {
                await this.renderer.render({
                    assetPath: source.path,
                    mediaType,
                    sourceWidth,
                    sourceHeight,
                    sourceDurationSeconds: mediaType === 'video' ? info.durationSeconds : undefined,
                    durationSeconds,
                    kenBurns: shot.kenBurns,
                    captions,
                    captionStyle: {
                        font: this.options.captionFont,
                        fontSize: this.options.captionFontSize,
                        fontsDir: this.layout.fontsDir(),
                    },
                    canvas: this.options.canvas,
                    extendPolicy: this.options.extendPolicy,
                    outputPath: tempPath,
                });
            } catch (error) {
                throw new RenderError(scope, 'Encoder failed', error);
            }
            await this.verifyDuration(scope, tempPath, durationSeconds);
        });

        console.log(`[Effects] ${ctx.project}/${ctx.version} shot ${shot.index}: ${mediaType}, ${durationSeconds.toFixed(3)}s, ${captions.length} caption(s)`);
        return { path: outputPath, durationSeconds };
    }

    private async probeSource(scope: FailureScope, filePath: string): Promise<MediaInfo> {
        try {
            return await this.probe.probe(filePath);
        } catch (error) {
            throw new RenderError(scope, `Cannot read asset ${filePath}`, error);
        }
    }

    /**
     * The encoder rounds up to whole frames; anything beyond that means the
     * clip does not match its narration.
     */
    private async verifyDuration(scope: FailureScope, filePath: string, expected: number): Promise<void> {
        let rendered: number;
        try {
            rendered = (await this.probe.probe(filePath)).durationSeconds;
        } catch (error) {
            throw new RenderError(scope, 'Cannot read the rendered clip', error);
        }
        const tolerance = 1.5 / this.options.canvas.fps;
        if (Math.abs(rendered - expected) > tolerance) {
            throw new RenderError(scope, `Rendered clip lasts ${rendered}s, narration lasts ${expected}s`);
        }
    }
}
