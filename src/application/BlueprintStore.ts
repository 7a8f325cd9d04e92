import { Blueprint, orderedShots } from '../domain/entities/Blueprint';
import { PipelineContext } from '../domain/entities/StageRecord';
import {
    BlueprintNotFoundError,
    ValidationError,
    ValidationIssue,
} from '../domain/errors/PipelineErrors';
import {
    applyBlueprintDefaults,
    isValidBlueprint,
    validateBlueprint,
} from '../domain/services/BlueprintValidator';
import { KeyedMutex } from '../domain/services/KeyedMutex';
import { fileExists, readJsonIfExists, writeJsonAtomic } from '../infrastructure/storage/AtomicFile';
import { ProjectLayout } from './ProjectLayout';

export interface SaveOptions {
    /** Allow a shot-count change over a finalized blueprint by starting a new draft */
    newDraft?: boolean;
}

/**
 * File-backed blueprint persistence, one JSON document per (project, version).
 * Every write is validated first and lands atomically.
 */
export class BlueprintStore {
    private readonly writes = new KeyedMutex();

    constructor(
        private readonly layout: ProjectLayout,
        private readonly now: () => Date = () => new Date()
    ) { }

    validate(candidate: unknown, ctx?: PipelineContext): ValidationIssue[] {
        return validateBlueprint(candidate, ctx);
    }

    async exists(ctx: PipelineContext): Promise<boolean> {
        return fileExists(this.layout.blueprintPath(ctx));
    }

    async load(ctx: PipelineContext): Promise<Blueprint> {
        const stored = await readJsonIfExists(this.layout.blueprintPath(ctx));
        if (stored === undefined) {
            throw new BlueprintNotFoundError(ctx);
        }
        if (!isValidBlueprint(stored, ctx)) {
            throw new ValidationError(ctx, this.validate(stored, ctx));
        }
        return stored;
    }

    /**
     * Validates and stores a blueprint. Missing draft fields are defaulted and
     * project/version are taken from the context when the document omits them.
     */
    async save(ctx: PipelineContext, input: unknown, options: SaveOptions = {}): Promise<Blueprint> {
        const target = this.layout.blueprintPath(ctx);

        return this.writes.runExclusive(target, async () => {
            const existing = await this.loadIfExists(ctx);

            const withContext = isPlainObject(input)
                ? { projectName: ctx.project, version: ctx.version, ...input }
                : input;
            const candidate = applyBlueprintDefaults(withContext, this.now());

            if (!isValidBlueprint(candidate, ctx)) {
                throw new ValidationError(ctx, this.validate(candidate, ctx));
            }

            if (existing?.status === 'finalized' && existing.shots.length !== candidate.shots.length && !options.newDraft) {
                throw new ValidationError(ctx, [{
                    path: '/shots',
                    message: `finalized blueprint has ${existing.shots.length} shots; save as a new draft to change the shot count`,
                }]);
            }

            // Only newDraft takes a finalized blueprint back to draft
            const keepsFinalized = existing?.status === 'finalized' && !options.newDraft;
            const blueprint: Blueprint = {
                ...candidate,
                status: options.newDraft ? 'draft' : keepsFinalized ? 'finalized' : candidate.status,
                createdAt: existing && !options.newDraft ? existing.createdAt : candidate.createdAt,
                shots: orderedShots(candidate),
            };

            await this.layout.ensureProjectDirs(ctx);
            await writeJsonAtomic(target, blueprint);
            console.log(`[Blueprint] Saved ${ctx.project}/${ctx.version} (${blueprint.status}, ${blueprint.shots.length} shots)`);
            return blueprint;
        });
    }

    /**
     * Marks a stored blueprint finalized. Fails if it no longer validates.
     */
    async finalize(ctx: PipelineContext): Promise<Blueprint> {
        return this.update(ctx, (blueprint) => ({ ...blueprint, status: 'finalized' }));
    }

    /**
     * Points a shot's visual at a file: absolute, or relative to the project's
     * assets/ folder. The file must exist. Shot count and order are unchanged,
     * so this is allowed on finalized blueprints.
     */
    async attachAsset(ctx: PipelineContext, shotIndex: number, assetPath: string): Promise<Blueprint> {
        const trimmed = assetPath.trim();
        if (!trimmed) {
            throw new ValidationError({ ...ctx, shotIndex }, [{ path: '/visual/assetPath', message: 'must not be empty' }]);
        }
        const resolved = this.layout.resolveAssetPath(ctx, trimmed);
        if (!(await fileExists(resolved))) {
            throw new ValidationError({ ...ctx, shotIndex }, [{
                path: '/visual/assetPath',
                message: `file does not exist: ${resolved}`,
            }]);
        }

        return this.update(ctx, (blueprint) => {
            if (!blueprint.shots.some((shot) => shot.index === shotIndex)) {
                throw new ValidationError({ ...ctx, shotIndex }, [{ path: '/shots', message: `has no shot ${shotIndex}` }]);
            }
            return {
                ...blueprint,
                shots: blueprint.shots.map((shot) =>
                    shot.index === shotIndex
                        ? { ...shot, visual: { ...shot.visual, assetPath: trimmed } }
                        : shot
                ),
            };
        });
    }

    private async update(ctx: PipelineContext, change: (blueprint: Blueprint) => Blueprint): Promise<Blueprint> {
        const target = this.layout.blueprintPath(ctx);

        return this.writes.runExclusive(target, async () => {
            const current = await this.load(ctx);
            const next: Blueprint = { ...change(current), updatedAt: this.now().toISOString() };
            const issues = this.validate(next, ctx);
            if (issues.length > 0) {
                throw new ValidationError(ctx, issues);
            }
            await writeJsonAtomic(target, next);
            console.log(`[Blueprint] Updated ${ctx.project}/${ctx.version} (${next.status})`);
            return next;
        });
    }

    private async loadIfExists(ctx: PipelineContext): Promise<Blueprint | undefined> {
        try {
            return await this.load(ctx);
        } catch (error) {
            if (error instanceof BlueprintNotFoundError) {
                return undefined;
            }
            throw error;
        }
    }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
