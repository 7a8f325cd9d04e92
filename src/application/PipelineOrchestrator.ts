import { Blueprint, BlueprintStatus, Shot, orderedShots } from '../domain/entities/Blueprint';
import {
    AssemblyRecord,
    PipelineContext,
    ShotState,
    StageName,
    StageRecord,
    isRecordStale,
} from '../domain/entities/StageRecord';
import { AudioClip, ShotClipPair } from '../domain/entities/TimedClip';
import { AssemblyError, PipelineError, RenderError } from '../domain/errors/PipelineErrors';
import { assemblyFingerprint } from '../domain/services/Fingerprint';
import { KeyedMutex } from '../domain/services/KeyedMutex';
import { fileExists } from '../infrastructure/storage/AtomicFile';
import { BlueprintStore, SaveOptions } from './BlueprintStore';
import { StageStateTracker } from './StageStateTracker';
import { runPool, TaskOutcome } from './pipelines/WorkerPool';
import { AudioSynthesisStage } from './stages/AudioSynthesisStage';
import { EffectRenderingStage } from './stages/EffectRenderingStage';
import { TimelineAssembler, TransitionSettings } from './stages/TimelineAssembler';

export interface OrchestratorDependencies {
    store: BlueprintStore;
    tracker: StageStateTracker;
    audioStage: AudioSynthesisStage;
    effectStage: EffectRenderingStage;
    assembler: TimelineAssembler;
    workerConcurrency: number;
    transition: TransitionSettings;
}

export interface RunOptions {
    /** Checked before each shot starts */
    signal?: AbortSignal;
    /** Restrict a stage to these shots */
    shotIndices?: number[];
}

export interface ShotFailure {
    project: string;
    version: string;
    shotIndex?: number;
    stage: string;
    errorType: string;
    cause: string;
}

export interface StageSummary {
    stage: StageName;
    computed: number[];
    skipped: number[];
    failed: number[];
    cancelled: number[];
}

export interface AssemblySummary {
    status: 'assembled' | 'skipped' | 'blocked';
    path?: string;
    durationSeconds?: number;
}

export interface RunReport {
    project: string;
    version: string;
    stages: StageSummary[];
    assembly?: AssemblySummary;
    failures: ShotFailure[];
    cancelled: boolean;
}

export interface ShotStatus {
    index: number;
    state: ShotState;
    audio: StageRecord;
    visual: StageRecord;
}

export interface VersionStatus {
    project: string;
    version: string;
    blueprintStatus: BlueprintStatus;
    shots: ShotStatus[];
    assembly: AssemblyRecord;
    readyToAssemble: boolean;
}

type ShotWork = 'computed' | 'skipped';

/**
 * Everything known about one shot's progress against the current blueprint.
 */
interface ShotInspection {
    shot: Shot;
    audioFingerprint: string;
    audio: StageRecord;
    audioFresh: boolean;
    visualFingerprint?: string;
    visual: StageRecord;
    visualFresh: boolean;
}

function toFailure(ctx: PipelineContext, shotIndex: number | undefined, stage: string, error: unknown): ShotFailure {
    if (error instanceof PipelineError) {
        return {
            project: ctx.project,
            version: ctx.version,
            shotIndex: error.scope.shotIndex ?? shotIndex,
            stage: error.scope.stage ?? stage,
            errorType: error.name,
            cause: error.message,
        };
    }
    return {
        project: ctx.project,
        version: ctx.version,
        shotIndex,
        stage,
        errorType: error instanceof Error ? error.name : 'Error',
        cause: error instanceof Error ? error.message : String(error),
    };
}

async function artifactPresent(record: StageRecord | AssemblyRecord): Promise<boolean> {
    return record.artifactPath !== undefined && fileExists(record.artifactPath);
}

/**
 * Drives a (project, version) through audio synthesis, effect rendering and
 * assembly. Every command is idempotent: fresh records are skipped, changed
 * inputs mark records stale before they are recomputed.
 */
export class PipelineOrchestrator {
    private readonly assemblyLocks = new KeyedMutex();

    constructor(private readonly deps: OrchestratorDependencies) { }

    createDraft(ctx: PipelineContext, blueprint: unknown, options: SaveOptions = {}): Promise<Blueprint> {
        return this.deps.store.save(ctx, blueprint, options);
    }

    getBlueprint(ctx: PipelineContext): Promise<Blueprint> {
        return this.deps.store.load(ctx);
    }

    finalize(ctx: PipelineContext): Promise<Blueprint> {
        return this.deps.store.finalize(ctx);
    }

    attachAsset(ctx: PipelineContext, shotIndex: number, assetPath: string): Promise<Blueprint> {
        return this.deps.store.attachAsset(ctx, shotIndex, assetPath);
    }

    async synthesizeAudio(ctx: PipelineContext, options: RunOptions = {}): Promise<RunReport> {
        const blueprint = await this.deps.store.load(ctx);
        const shots = this.selectShots(blueprint, options);
        console.log(`[Pipeline] Audio for ${ctx.project}/${ctx.version}: ${shots.length} shot(s)`);

        const outcomes = await runPool(
            shots,
            (shot) => this.audioForShot(ctx, blueprint, shot),
            { concurrency: this.deps.workerConcurrency, signal: options.signal }
        );
        return this.report(ctx, [this.summarize(ctx, 'audio', shots, outcomes)]);
    }

    async renderEffects(ctx: PipelineContext, options: RunOptions = {}): Promise<RunReport> {
        const blueprint = await this.deps.store.load(ctx);
        const shots = this.selectShots(blueprint, options);
        console.log(`[Pipeline] Effects for ${ctx.project}/${ctx.version}: ${shots.length} shot(s)`);

        const outcomes = await runPool(
            shots,
            (shot) => this.visualForShot(ctx, blueprint, shot),
            { concurrency: this.deps.workerConcurrency, signal: options.signal }
        );
        return this.report(ctx, [this.summarize(ctx, 'visual', shots, outcomes)]);
    }

    /**
     * Muxes the final video. Blocked until every shot is visual_done;
     * any failure here is an AssemblyError and ends the run.
     */
    async assemble(ctx: PipelineContext): Promise<RunReport> {
        const blueprint = await this.deps.store.load(ctx);
        const assembly = await this.assembleBlueprint(ctx, blueprint);
        return { ...this.report(ctx, []), assembly };
    }

    /**
     * Audio, then effects for the shots whose audio is ready, then assembly
     * when nothing failed or was cancelled.
     */
    async runAll(ctx: PipelineContext, options: RunOptions = {}): Promise<RunReport> {
        const audio = await this.synthesizeAudio(ctx, options);
        const audioSummary = audio.stages[0];
        const blocked = new Set([...audioSummary.failed, ...audioSummary.cancelled]);

        const blueprint = await this.deps.store.load(ctx);
        const effectShots = this.selectShots(blueprint, options)
            .map((shot) => shot.index)
            .filter((index) => !blocked.has(index));
        const effects = effectShots.length > 0
            ? await this.renderEffects(ctx, { ...options, shotIndices: effectShots })
            : this.report(ctx, [{ stage: 'visual', computed: [], skipped: [], failed: [], cancelled: [] }]);

        const report: RunReport = {
            project: ctx.project,
            version: ctx.version,
            stages: [...audio.stages, ...effects.stages],
            failures: [...audio.failures, ...effects.failures],
            cancelled: audio.cancelled || effects.cancelled,
        };
        if (report.failures.length > 0 || report.cancelled || options.shotIndices) {
            console.warn(`[Pipeline] ${ctx.project}/${ctx.version}: assembly blocked (${report.failures.length} failure(s), cancelled=${report.cancelled})`);
            return { ...report, assembly: { status: 'blocked' } };
        }

        const assembly = await this.assembleBlueprint(ctx, await this.deps.store.load(ctx));
        return { ...report, assembly };
    }

    async status(ctx: PipelineContext): Promise<VersionStatus> {
        const blueprint = await this.deps.store.load(ctx);
        const inspections = await Promise.all(orderedShots(blueprint).map((shot) => this.inspect(ctx, blueprint, shot)));
        const assembly = await this.deps.tracker.getAssembly(ctx);
        const readyToAssemble = inspections.every((inspection) => inspection.visualFresh);
        const assembled = readyToAssemble && await this.isAssemblyFresh(assembly, inspections);

        return {
            project: ctx.project,
            version: ctx.version,
            blueprintStatus: blueprint.status,
            shots: inspections.map((inspection) => ({
                index: inspection.shot.index,
                state: this.shotState(inspection, assembled),
                audio: inspection.audio,
                visual: inspection.visual,
            })),
            assembly,
            readyToAssemble,
        };
    }

    private shotState(inspection: ShotInspection, assembled: boolean): ShotState {
        if (!inspection.audioFresh) return 'no_audio';
        if (!inspection.visualFresh) {
            return inspection.visual.status === 'pending' ? 'audio_done' : 'no_visual';
        }
        return assembled ? 'assembled' : 'visual_done';
    }

    private selectShots(blueprint: Blueprint, options: RunOptions): Shot[] {
        const shots = orderedShots(blueprint);
        if (!options.shotIndices) {
            return shots;
        }
        const wanted = new Set(options.shotIndices);
        return shots.filter((shot) => wanted.has(shot.index));
    }

    private audioForShot(ctx: PipelineContext, blueprint: Blueprint, shot: Shot): Promise<ShotWork> {
        const { tracker, audioStage } = this.deps;
        return tracker.withRecordLock(ctx, shot.index, 'audio', async () => {
            const fingerprint = audioStage.fingerprint(shot, blueprint);
            const record = await tracker.get(ctx, shot.index, 'audio');
            if (!isRecordStale(record, fingerprint) && await artifactPresent(record)) {
                return 'skipped';
            }
            if (record.status === 'done') {
                await tracker.markStale(ctx, shot.index, 'audio');
            }

            try {
                const clip = await audioStage.run(ctx, shot, blueprint);
                await tracker.markDone(ctx, shot.index, 'audio', {
                    artifactPath: clip.path,
                    fingerprint,
                    durationSeconds: clip.durationSeconds,
                });
                return 'computed';
            } catch (error) {
                await tracker.markFailed(ctx, shot.index, 'audio', error);
                throw error;
            }
        });
    }

    private visualForShot(ctx: PipelineContext, blueprint: Blueprint, shot: Shot): Promise<ShotWork> {
        const { tracker, audioStage, effectStage } = this.deps;
        return tracker.withRecordLock(ctx, shot.index, 'visual', async () => {
            try {
                const audio = await this.freshAudio(ctx, blueprint, shot);
                const asset = await effectStage.resolveAsset(ctx, shot);
                const fingerprint = effectStage.fingerprint(shot, audioStage.fingerprint(shot, blueprint), audio, asset);

                const record = await tracker.get(ctx, shot.index, 'visual');
                if (!isRecordStale(record, fingerprint) && await artifactPresent(record)) {
                    return 'skipped';
                }
                if (record.status === 'done') {
                    await tracker.markStale(ctx, shot.index, 'visual');
                }

                const clip = await effectStage.run(ctx, shot, audio, asset);
                await tracker.markDone(ctx, shot.index, 'visual', {
                    artifactPath: clip.path,
                    fingerprint,
                    durationSeconds: clip.durationSeconds,
                });
                return 'computed';
            } catch (error) {
                await tracker.markFailed(ctx, shot.index, 'visual', error);
                throw error;
            }
        });
    }

    /**
     * The shot's audio clip, provided its record matches the current narration.
     * The recorded duration is authoritative.
     */
    private async freshAudio(ctx: PipelineContext, blueprint: Blueprint, shot: Shot): Promise<AudioClip> {
        const { tracker, audioStage } = this.deps;
        const record = await tracker.get(ctx, shot.index, 'audio');
        const clip = await audioStage.loadClip(ctx, shot.index);
        if (
            isRecordStale(record, audioStage.fingerprint(shot, blueprint))
            || record.durationSeconds === undefined
            || !clip
            || !(await artifactPresent(record))
        ) {
            throw new RenderError({ ...ctx, shotIndex: shot.index }, 'Narration audio is not ready; synthesize audio first');
        }
        return { ...clip, durationSeconds: record.durationSeconds };
    }

    private async inspect(ctx: PipelineContext, blueprint: Blueprint, shot: Shot): Promise<ShotInspection> {
        const { tracker, audioStage, effectStage } = this.deps;
        const audioFingerprint = audioStage.fingerprint(shot, blueprint);
        const audio = await tracker.get(ctx, shot.index, 'audio');
        const visual = await tracker.get(ctx, shot.index, 'visual');
        const audioFresh = !isRecordStale(audio, audioFingerprint) && await artifactPresent(audio);

        const inspection: ShotInspection = { shot, audioFingerprint, audio, audioFresh, visual, visualFresh: false };
        if (!audioFresh) {
            return inspection;
        }

        let visualFingerprint: string;
        try {
            const clip = await this.freshAudio(ctx, blueprint, shot);
            const asset = await effectStage.resolveAsset(ctx, shot);
            visualFingerprint = effectStage.fingerprint(shot, audioFingerprint, clip, asset);
        } catch (error) {
            if (error instanceof RenderError) {
                // Asset missing or audio unreadable: the visual cannot be current
                return inspection;
            }
            throw error;
        }
        return {
            ...inspection,
            visualFingerprint,
            visualFresh: !isRecordStale(visual, visualFingerprint) && await artifactPresent(visual),
        };
    }

    private async isAssemblyFresh(assembly: AssemblyRecord, inspections: ShotInspection[]): Promise<boolean> {
        const fingerprints = inspections.map((inspection) => inspection.visualFingerprint ?? '');
        return assembly.status === 'done'
            && assembly.fingerprint === assemblyFingerprint(fingerprints, this.deps.transition.crossfadeSeconds)
            && await artifactPresent(assembly);
    }

    private assembleBlueprint(ctx: PipelineContext, blueprint: Blueprint): Promise<AssemblySummary> {
        const { tracker, assembler, transition } = this.deps;

        return this.assemblyLocks.runExclusive(`${ctx.project}/${ctx.version}`, async () => {
            const inspections = await Promise.all(orderedShots(blueprint).map((shot) => this.inspect(ctx, blueprint, shot)));
            const notReady = inspections.filter((inspection) => !inspection.visualFresh).map((inspection) => inspection.shot.index);
            if (notReady.length > 0) {
                const error = new AssemblyError(ctx, `Shots not ready for assembly: ${notReady.join(', ')}`);
                await tracker.markAssemblyFailed(ctx, error);
                throw error;
            }

            const assembly = await tracker.getAssembly(ctx);
            if (await this.isAssemblyFresh(assembly, inspections)) {
                console.log(`[Pipeline] ${ctx.project}/${ctx.version}: final video is current, skipping assembly`);
                return { status: 'skipped', path: assembly.artifactPath, durationSeconds: assembly.durationSeconds };
            }

            const clips: ShotClipPair[] = inspections.map((inspection) => ({
                shotIndex: inspection.shot.index,
                audio: { path: inspection.audio.artifactPath ?? '', durationSeconds: inspection.audio.durationSeconds ?? 0 },
                visual: { path: inspection.visual.artifactPath ?? '', durationSeconds: inspection.visual.durationSeconds ?? 0 },
            }));
            const fingerprint = assemblyFingerprint(
                inspections.map((inspection) => inspection.visualFingerprint ?? ''),
                transition.crossfadeSeconds
            );

            try {
                const result = await assembler.assemble(ctx, clips, transition);
                await tracker.markAssembled(ctx, {
                    artifactPath: result.path,
                    fingerprint,
                    durationSeconds: result.durationSeconds,
                });
                return { status: 'assembled', path: result.path, durationSeconds: result.durationSeconds };
            } catch (error) {
                await tracker.markAssemblyFailed(ctx, error);
                throw error;
            }
        });
    }

    private summarize(ctx: PipelineContext, stage: StageName, shots: Shot[], outcomes: TaskOutcome<ShotWork>[]): StageSummary & { failures: ShotFailure[] } {
        const summary: StageSummary & { failures: ShotFailure[] } = {
            stage, computed: [], skipped: [], failed: [], cancelled: [], failures: [],
        };
        outcomes.forEach((outcome, i) => {
            const index = shots[i].index;
            if (outcome.status === 'cancelled') {
                summary.cancelled.push(index);
            } else if (outcome.status === 'rejected') {
                summary.failed.push(index);
                const failure = toFailure(ctx, index, stage, outcome.error);
                summary.failures.push(failure);
                console.error(`[Pipeline] ${failure.errorType}: ${failure.cause}`);
            } else if (outcome.value === 'computed') {
                summary.computed.push(index);
            } else {
                summary.skipped.push(index);
            }
        });
        return summary;
    }

    private report(ctx: PipelineContext, summaries: Array<StageSummary & { failures?: ShotFailure[] }>): RunReport {
        return {
            project: ctx.project,
            version: ctx.version,
            stages: summaries.map(({ stage, computed, skipped, failed, cancelled }) => ({ stage, computed, skipped, failed, cancelled })),
            failures: summaries.flatMap((summary) => summary.failures ?? []),
            cancelled: summaries.some((summary) => summary.cancelled.length > 0),
        };
    }
}
