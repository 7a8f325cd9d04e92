import { Config } from '../../config';
import { IEffectRenderer } from '../../domain/ports/IEffectRenderer';
import { IMediaProbe } from '../../domain/ports/IMediaProbe';
import { ITTSClient, TTSRequest, TTSResult } from '../../domain/ports/ITTSClient';
import { ITimelineRenderer } from '../../domain/ports/ITimelineRenderer';
import { FFprobeMediaProbe } from '../../infrastructure/media/FFprobeMediaProbe';
import { ElevenLabsTTSClient } from '../../infrastructure/tts/ElevenLabsTTSClient';
import { KeyRotatingTTSClient } from '../../infrastructure/tts/KeyRotatingTTSClient';
import { FFmpegEffectRenderer } from '../../infrastructure/video/FFmpegEffectRenderer';
import { FFmpegTimelineRenderer } from '../../infrastructure/video/FFmpegTimelineRenderer';
import { BlueprintStore } from '../BlueprintStore';
import { PipelineOrchestrator } from '../PipelineOrchestrator';
import { ProjectLayout } from '../ProjectLayout';
import { StageStateTracker } from '../StageStateTracker';
import { AudioSynthesisStage } from '../stages/AudioSynthesisStage';
import { EffectRenderingStage } from '../stages/EffectRenderingStage';
import { TimelineAssembler } from '../stages/TimelineAssembler';

/**
 * Adapters behind the pipeline's ports. Anything omitted gets the
 * production implementation.
 */
export interface PipelineAdapters {
    ttsClient?: ITTSClient;
    mediaProbe?: IMediaProbe;
    effectRenderer?: IEffectRenderer;
    timelineRenderer?: ITimelineRenderer;
    now?: () => Date;
}

/**
 * Builds the provider client on first use, so commands that never synthesize
 * run without TTS credentials.
 */
class DeferredTTSClient implements ITTSClient {
    private client?: ITTSClient;

    constructor(private readonly create: () => ITTSClient) { }

    async synthesize(request: TTSRequest): Promise<TTSResult> {
        if (!this.client) {
            this.client = this.create();
        }
        return this.client.synthesize(request);
    }
}

function createTtsClient(config: Config): ITTSClient {
    return new DeferredTTSClient(() => new KeyRotatingTTSClient(
        config.elevenLabsApiKeys,
        (apiKey) => new ElevenLabsTTSClient(apiKey, config.elevenLabsBaseUrl)
    ));
}

/**
 * Wires the orchestrator and its stages for one projects root.
 */
export function createPipelineOrchestrator(config: Config, adapters: PipelineAdapters = {}): PipelineOrchestrator {
    const layout = new ProjectLayout(config.projectsRootDir, config.assetsRootDir);
    const probe = adapters.mediaProbe ?? new FFprobeMediaProbe();
    const canvas = { width: config.outputWidth, height: config.outputHeight, fps: config.outputFps };

    const audioStage = new AudioSynthesisStage(
        adapters.ttsClient ?? createTtsClient(config),
        probe,
        layout,
        { defaultVoiceId: config.elevenLabsVoiceId, defaultModelId: config.elevenLabsModelId }
    );
    const effectStage = new EffectRenderingStage(
        adapters.effectRenderer ?? new FFmpegEffectRenderer(),
        probe,
        layout,
        {
            canvas,
            extendPolicy: config.videoExtendPolicy,
            captionFont: config.captionFont,
            captionFontSize: config.captionFontSize,
        }
    );
    const assembler = new TimelineAssembler(adapters.timelineRenderer ?? new FFmpegTimelineRenderer(), layout, canvas);

    return new PipelineOrchestrator({
        store: new BlueprintStore(layout, adapters.now),
        tracker: new StageStateTracker(layout, adapters.now),
        audioStage,
        effectStage,
        assembler,
        workerConcurrency: config.workerConcurrency,
        transition: { crossfadeSeconds: config.crossfadeSeconds },
    });
}
