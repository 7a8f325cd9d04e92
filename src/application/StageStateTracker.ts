import {
    AssemblyRecord,
    PipelineContext,
    StageName,
    StageRecord,
    createPendingRecord,
    isRecordStale,
    recordKey,
} from '../domain/entities/StageRecord';
import { KeyedMutex } from '../domain/services/KeyedMutex';
import { readJsonIfExists, writeJsonAtomic } from '../infrastructure/storage/AtomicFile';
import { ProjectLayout } from './ProjectLayout';

export interface CompletedArtifact {
    artifactPath: string;
    fingerprint: string;
    durationSeconds: number;
}

interface VersionState {
    records: Map<string, StageRecord>;
    assembly?: AssemblyRecord;
}

interface StateFile {
    records: StageRecord[];
    assembly?: AssemblyRecord;
}

const STAGES: readonly StageName[] = ['audio', 'visual'];
const STAGE_STATUSES = ['pending', 'done', 'stale', 'failed'];
const ASSEMBLY_STATUSES = ['pending', 'done', 'failed'];

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optional(value: unknown, type: 'string' | 'number'): boolean {
    return value === undefined || typeof value === type;
}

function isStageRecord(value: unknown): value is StageRecord {
    return isObject(value)
        && typeof value.project === 'string'
        && typeof value.version === 'string'
        && typeof value.shotIndex === 'number'
        && STAGES.some((stage) => stage === value.stage)
        && STAGE_STATUSES.includes(String(value.status))
        && optional(value.artifactPath, 'string')
        && optional(value.fingerprint, 'string')
        && optional(value.durationSeconds, 'number')
        && optional(value.error, 'string')
        && typeof value.updatedAt === 'string';
}

function isAssemblyRecord(value: unknown): value is AssemblyRecord {
    return isObject(value)
        && ASSEMBLY_STATUSES.includes(String(value.status))
        && optional(value.artifactPath, 'string')
        && optional(value.fingerprint, 'string')
        && optional(value.durationSeconds, 'number')
        && optional(value.error, 'string')
        && typeof value.updatedAt === 'string';
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Persisted per-shot stage records for every (project, version).
 *
 * State is loaded lazily from projects/<p>/state/<v>.json and rewritten
 * atomically on every change. Writes for one version go through a single
 * queue; `withRecordLock` serializes workers on the same (shot, stage).
 */
export class StageStateTracker {
    private readonly versions = new Map<string, Promise<VersionState>>();
    private readonly persistQueue = new KeyedMutex();
    private readonly recordLocks = new KeyedMutex();

    constructor(
        private readonly layout: ProjectLayout,
        private readonly now: () => Date = () => new Date()
    ) { }

    async get(ctx: PipelineContext, shotIndex: number, stage: StageName): Promise<StageRecord> {
        const state = await this.load(ctx);
        const record = state.records.get(recordKey(ctx, shotIndex, stage));
        return record ? { ...record } : createPendingRecord(ctx, shotIndex, stage);
    }

    async isStale(ctx: PipelineContext, shotIndex: number, stage: StageName, currentFingerprint: string): Promise<boolean> {
        return isRecordStale(await this.get(ctx, shotIndex, stage), currentFingerprint);
    }

    async listRecords(ctx: PipelineContext): Promise<StageRecord[]> {
        const state = await this.load(ctx);
        return [...state.records.values()]
            .map((record) => ({ ...record }))
            .sort((a, b) => a.shotIndex - b.shotIndex || a.stage.localeCompare(b.stage));
    }

    /**
     * Records a finished artifact. Callers must have moved the artifact into
     * place before calling this.
     */
    async markDone(ctx: PipelineContext, shotIndex: number, stage: StageName, artifact: CompletedArtifact): Promise<StageRecord> {
        return this.putRecord(ctx, {
            project: ctx.project,
            version: ctx.version,
            shotIndex,
            stage,
            status: 'done',
            artifactPath: artifact.artifactPath,
            fingerprint: artifact.fingerprint,
            durationSeconds: artifact.durationSeconds,
            updatedAt: this.now().toISOString(),
        });
    }

    async markFailed(ctx: PipelineContext, shotIndex: number, stage: StageName, error: unknown): Promise<StageRecord> {
        const previous = await this.get(ctx, shotIndex, stage);
        return this.putRecord(ctx, {
            ...previous,
            status: 'failed',
            error: errorMessage(error),
            updatedAt: this.now().toISOString(),
        });
    }

    /**
     * Keeps the old artifact details for diagnosis but drops the 'done' status.
     */
    async markStale(ctx: PipelineContext, shotIndex: number, stage: StageName): Promise<StageRecord> {
        const previous = await this.get(ctx, shotIndex, stage);
        return this.putRecord(ctx, {
            ...previous,
            status: 'stale',
            error: undefined,
            updatedAt: this.now().toISOString(),
        });
    }

    withRecordLock<T>(ctx: PipelineContext, shotIndex: number, stage: StageName, fn: () => Promise<T>): Promise<T> {
        return this.recordLocks.runExclusive(recordKey(ctx, shotIndex, stage), fn);
    }

    async getAssembly(ctx: PipelineContext): Promise<AssemblyRecord> {
        const state = await this.load(ctx);
        return state.assembly ? { ...state.assembly } : { status: 'pending', updatedAt: this.now().toISOString() };
    }

    async markAssembled(ctx: PipelineContext, artifact: CompletedArtifact): Promise<AssemblyRecord> {
        return this.putAssembly(ctx, {
            status: 'done',
            artifactPath: artifact.artifactPath,
            fingerprint: artifact.fingerprint,
            durationSeconds: artifact.durationSeconds,
            updatedAt: this.now().toISOString(),
        });
    }

    /**
     * The previous successful output stays on disk, so its details are kept.
     */
    async markAssemblyFailed(ctx: PipelineContext, error: unknown): Promise<AssemblyRecord> {
        const previous = await this.getAssembly(ctx);
        return this.putAssembly(ctx, {
            ...previous,
            status: 'failed',
            error: errorMessage(error),
            updatedAt: this.now().toISOString(),
        });
    }

    private async putRecord(ctx: PipelineContext, record: StageRecord): Promise<StageRecord> {
        await this.mutate(ctx, (state) => {
            state.records.set(recordKey(ctx, record.shotIndex, record.stage), record);
        });
        return { ...record };
    }

    private async putAssembly(ctx: PipelineContext, record: AssemblyRecord): Promise<AssemblyRecord> {
        await this.mutate(ctx, (state) => {
            state.assembly = record;
        });
        return { ...record };
    }

    private async mutate(ctx: PipelineContext, change: (state: VersionState) => void): Promise<void> {
        const statePath = this.layout.statePath(ctx);
        await this.persistQueue.runExclusive(statePath, async () => {
            const state = await this.load(ctx);
            change(state);
            const file: StateFile = {
                records: [...state.records.values()].sort((a, b) => a.shotIndex - b.shotIndex || a.stage.localeCompare(b.stage)),
                assembly: state.assembly,
            };
            await writeJsonAtomic(statePath, file);
        });
    }

    private load(ctx: PipelineContext): Promise<VersionState> {
        const statePath = this.layout.statePath(ctx);
        let pending = this.versions.get(statePath);
        if (!pending) {
            pending = this.readState(statePath).catch((error: unknown) => {
                // A failed read is not cached
                this.versions.delete(statePath);
                throw error;
            });
            this.versions.set(statePath, pending);
        }
        return pending;
    }

    private async readState(statePath: string): Promise<VersionState> {
        const parsed = await readJsonIfExists(statePath);
        const state: VersionState = { records: new Map() };
        if (parsed === undefined) {
            return state;
        }
        if (!isObject(parsed) || !Array.isArray(parsed.records)) {
            throw new Error(`State file ${statePath} is malformed`);
        }
        for (const entry of parsed.records) {
            if (!isStageRecord(entry)) {
                console.warn(`[Tracker] Ignoring malformed record in ${statePath}`);
                continue;
            }
            state.records.set(recordKey({ project: entry.project, version: entry.version }, entry.shotIndex, entry.stage), entry);
        }
        if (isAssemblyRecord(parsed.assembly)) {
            state.assembly = parsed.assembly;
        }
        console.log(`[Tracker] Loaded ${state.records.size} records from ${statePath}`);
        return state;
    }
}
