import fs from 'fs';
import path from 'path';
import { PipelineContext } from '../domain/entities/StageRecord';
import { ValidationError, ValidationIssue } from '../domain/errors/PipelineErrors';

export const PROJECT_SUBDIRS = ['assets', 'audio', 'blueprints', 'output', 'state'] as const;
export type ProjectSubdir = typeof PROJECT_SUBDIRS[number];

// Same patterns as the blueprint schema; they also keep names inside the root
const PROJECT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9 _.-]*$/;
const VERSION_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export function contextIssues(ctx: PipelineContext): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    if (!PROJECT_NAME_PATTERN.test(ctx.project)) {
        issues.push({ path: '/projectName', message: `"${ctx.project}" is not a valid project name` });
    }
    if (!VERSION_PATTERN.test(ctx.version)) {
        issues.push({ path: '/version', message: `"${ctx.version}" is not a valid version` });
    }
    return issues;
}

export function assertValidContext(ctx: PipelineContext): void {
    const issues = contextIssues(ctx);
    if (issues.length > 0) {
        throw new ValidationError({ project: ctx.project, version: ctx.version }, issues);
    }
}

/**
 * Where every artifact of a (project, version) lives on disk.
 *
 *   <root>/<project>/blueprints/<version>.json
 *   <root>/<project>/state/<version>.json
 *   <root>/<project>/audio/<project>_<version>_shot_<i>.mp3 (+ .json sidecar)
 *   <root>/<project>/output/<project>_<version>_shot_<i>.mp4
 *   <root>/<project>/output/<project>_<version>_final.mp4
 */
export class ProjectLayout {
    constructor(
        private readonly projectsRootDir: string,
        private readonly assetsRootDir: string = './assets'
    ) { }

    projectDir(ctx: PipelineContext): string {
        assertValidContext(ctx);
        return path.resolve(this.projectsRootDir, ctx.project);
    }

    subdir(ctx: PipelineContext, name: ProjectSubdir): string {
        return path.join(this.projectDir(ctx), name);
    }

    blueprintPath(ctx: PipelineContext): string {
        return path.join(this.subdir(ctx, 'blueprints'), `${ctx.version}.json`);
    }

    statePath(ctx: PipelineContext): string {
        return path.join(this.subdir(ctx, 'state'), `${ctx.version}.json`);
    }

    private shotStem(ctx: PipelineContext, shotIndex: number): string {
        return `${ctx.project}_${ctx.version}_shot_${shotIndex}`;
    }

    audioPath(ctx: PipelineContext, shotIndex: number): string {
        return path.join(this.subdir(ctx, 'audio'), `${this.shotStem(ctx, shotIndex)}.mp3`);
    }

    audioSidecarPath(ctx: PipelineContext, shotIndex: number): string {
        return path.join(this.subdir(ctx, 'audio'), `${this.shotStem(ctx, shotIndex)}.json`);
    }

    shotVideoPath(ctx: PipelineContext, shotIndex: number): string {
        return path.join(this.subdir(ctx, 'output'), `${this.shotStem(ctx, shotIndex)}.mp4`);
    }

    finalVideoPath(ctx: PipelineContext): string {
        return path.join(this.subdir(ctx, 'output'), `${ctx.project}_${ctx.version}_final.mp4`);
    }

    /**
     * Resolves a shot asset: absolute paths as given, anything else
     * relative to the project's assets/ folder.
     */
    resolveAssetPath(ctx: PipelineContext, assetPath: string): string {
        return path.isAbsolute(assetPath)
            ? assetPath
            : path.resolve(this.subdir(ctx, 'assets'), assetPath);
    }

    /** Shared, read-only font directory for caption burn-in */
    fontsDir(): string {
        return path.resolve(this.assetsRootDir, 'fonts');
    }

    async ensureProjectDirs(ctx: PipelineContext): Promise<void> {
        await Promise.all(
            PROJECT_SUBDIRS.map((name) => fs.promises.mkdir(this.subdir(ctx, name), { recursive: true }))
        );
    }
}
