import { PipelineContext, describeContext } from '../entities/StageRecord';

/**
 * Where a pipeline failure happened.
 */
export interface FailureScope {
    project: string;
    version: string;
    shotIndex?: number;
    stage?: string;
}

function toMessage(cause: unknown): string {
    if (cause instanceof Error) {
        return cause.message;
    }
    return String(cause);
}

/**
 * Base class for every failure the pipeline reports.
 * The message always names the (project, version, shot, stage) tuple.
 */
export class PipelineError extends Error {
    readonly scope: FailureScope;
    readonly cause?: unknown;

    constructor(scope: FailureScope, message: string, cause?: unknown) {
        const ctx: PipelineContext = { project: scope.project, version: scope.version };
        const suffix = cause !== undefined ? `: ${toMessage(cause)}` : '';
        super(`[${describeContext(ctx, scope.shotIndex, scope.stage)}] ${message}${suffix}`);
        this.name = 'PipelineError';
        this.scope = scope;
        this.cause = cause;
    }
}

/**
 * One problem found while validating a blueprint.
 */
export interface ValidationIssue {
    /** JSON-pointer-like location, e.g. "/shots/2/narration" */
    path: string;
    message: string;
}

/**
 * Bad blueprint. Never retried; the caller must fix and resubmit.
 */
export class ValidationError extends PipelineError {
    readonly issues: ValidationIssue[];

    constructor(scope: FailureScope, issues: ValidationIssue[]) {
        const summary = issues.map((issue) => `${issue.path || '/'} ${issue.message}`).join('; ');
        super({ ...scope, stage: scope.stage ?? 'blueprint' }, `Blueprint is invalid (${summary})`);
        this.name = 'ValidationError';
        this.issues = issues;
    }
}

export class BlueprintNotFoundError extends PipelineError {
    constructor(scope: FailureScope) {
        super({ ...scope, stage: 'blueprint' }, 'Blueprint not found');
        this.name = 'BlueprintNotFoundError';
    }
}

/**
 * Provider failure that survived credential rotation, or unusable input text.
 */
export class SynthesisError extends PipelineError {
    constructor(scope: FailureScope, message: string, cause?: unknown) {
        super({ ...scope, stage: scope.stage ?? 'audio' }, message, cause);
        this.name = 'SynthesisError';
    }
}

/**
 * Asset or parameter defect. Not retried.
 */
export class RenderError extends PipelineError {
    constructor(scope: FailureScope, message: string, cause?: unknown) {
        super({ ...scope, stage: scope.stage ?? 'visual' }, message, cause);
        this.name = 'RenderError';
    }
}

/**
 * Cross-shot consistency or export failure. Fatal for the run.
 */
export class AssemblyError extends PipelineError {
    constructor(scope: FailureScope, message: string, cause?: unknown) {
        super({ ...scope, stage: scope.stage ?? 'assembly' }, message, cause);
        this.name = 'AssemblyError';
    }
}
