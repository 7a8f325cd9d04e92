/**
 * Pipeline stages tracked per shot.
 */
export type StageName = 'audio' | 'visual';

export type StageStatus = 'pending' | 'done' | 'stale' | 'failed';

/**
 * PipelineContext identifies the (project, version) a stage call operates on.
 * Passed explicitly to every stage; there is no ambient "current project".
 */
export interface PipelineContext {
    readonly project: string;
    readonly version: string;
}

/**
 * StageRecord is the persisted outcome of one (shot, stage) computation.
 */
export interface StageRecord {
    project: string;
    version: string;
    shotIndex: number;
    stage: StageName;
    status: StageStatus;
    /** Path of the artifact produced by the stage */
    artifactPath?: string;
    /** Hash of the inputs that produced the artifact */
    fingerprint?: string;
    /** Authoritative clip duration in seconds */
    durationSeconds?: number;
    /** Last failure message, set when status is 'failed' */
    error?: string;
    updatedAt: string;
}

export type AssemblyStatus = 'pending' | 'done' | 'failed';

/**
 * Version-level record of the final mux.
 */
export interface AssemblyRecord {
    status: AssemblyStatus;
    artifactPath?: string;
    fingerprint?: string;
    durationSeconds?: number;
    error?: string;
    updatedAt: string;
}

/**
 * Position of a shot in the per-shot state machine.
 */
export type ShotState = 'no_audio' | 'audio_done' | 'no_visual' | 'visual_done' | 'assembled';

export function createPendingRecord(ctx: PipelineContext, shotIndex: number, stage: StageName): StageRecord {
    return {
        project: ctx.project,
        version: ctx.version,
        shotIndex,
        stage,
        status: 'pending',
        updatedAt: new Date().toISOString(),
    };
}

/**
 * A record is stale unless it is done AND was produced from the same inputs.
 */
export function isRecordStale(record: StageRecord, currentFingerprint: string): boolean {
    return record.status !== 'done' || record.fingerprint !== currentFingerprint;
}

export function recordKey(ctx: PipelineContext, shotIndex: number, stage: StageName): string {
    return `${ctx.project}/${ctx.version}/${shotIndex}/${stage}`;
}

export function describeContext(ctx: PipelineContext, shotIndex?: number, stage?: string): string {
    const parts = [`project=${ctx.project}`, `version=${ctx.version}`];
    if (shotIndex !== undefined) {
        parts.push(`shot=${shotIndex}`);
    }
    if (stage) {
        parts.push(`stage=${stage}`);
    }
    return parts.join(' ');
}
