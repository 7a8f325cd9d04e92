import { Router, Request, Response } from 'express';
import { PipelineOrchestrator, RunOptions } from '../../application/PipelineOrchestrator';
import { PipelineContext } from '../../domain/entities/StageRecord';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

function contextOf(req: Request): PipelineContext {
    return { project: req.params.project, version: req.params.version };
}

function shotIndexOf(req: Request): number {
    const raw = req.params.index;
    if (!/^\d+$/.test(raw)) {
        throw new BadRequestError(`Shot index must be a non-negative integer, got: ${raw}`);
    }
    return Number(raw);
}

/**
 * Aborts the run when the client goes away before the response is sent.
 * Shots already started finish; the rest are reported as cancelled.
 */
function runOptionsFor(res: Response): RunOptions {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableFinished) {
            controller.abort();
        }
    });
    return { signal: controller.signal };
}

/**
 * Creates blueprint and pipeline routes with dependency injection.
 */
export function createProjectRoutes(orchestrator: PipelineOrchestrator): Router {
    const router = Router();
    const base = '/projects/:project/versions/:version';

    /**
     * GET /projects/:project/versions/:version/blueprint
     */
    router.get(
        `${base}/blueprint`,
        asyncHandler(async (req: Request, res: Response) => {
            res.json(await orchestrator.getBlueprint(contextOf(req)));
        })
    );

    /**
     * POST /projects/:project/versions/:version/blueprint[?newDraft=true]
     *
     * Creates or replaces the blueprint draft. Changing the shot count of a
     * finalized blueprint requires newDraft=true.
     */
    router.post(
        `${base}/blueprint`,
        asyncHandler(async (req: Request, res: Response) => {
            const newDraft = req.query.newDraft === 'true';
            const blueprint = await orchestrator.createDraft(contextOf(req), req.body, { newDraft });
            res.status(201).json(blueprint);
        })
    );

    router.post(
        `${base}/blueprint/finalize`,
        asyncHandler(async (req: Request, res: Response) => {
            res.json(await orchestrator.finalize(contextOf(req)));
        })
    );

    /**
     * PUT /projects/:project/versions/:version/shots/:index/asset
     *
     * Body: { "assetPath": "hook.png" }, relative to the project's assets/ folder
     */
    router.put(
        `${base}/shots/:index/asset`,
        asyncHandler(async (req: Request, res: Response) => {
            const shotIndex = shotIndexOf(req);
            const assetPath: unknown = req.body?.assetPath;
            if (typeof assetPath !== 'string' || !assetPath.trim()) {
                throw new BadRequestError('assetPath is required');
            }
            res.json(await orchestrator.attachAsset(contextOf(req), shotIndex, assetPath));
        })
    );

    router.post(
        `${base}/audio`,
        asyncHandler(async (req: Request, res: Response) => {
            res.json(await orchestrator.synthesizeAudio(contextOf(req), runOptionsFor(res)));
        })
    );

    router.post(
        `${base}/effects`,
        asyncHandler(async (req: Request, res: Response) => {
            res.json(await orchestrator.renderEffects(contextOf(req), runOptionsFor(res)));
        })
    );

    router.post(
        `${base}/assemble`,
        asyncHandler(async (req: Request, res: Response) => {
            res.json(await orchestrator.assemble(contextOf(req)));
        })
    );

    /**
     * POST /projects/:project/versions/:version/run
     *
     * Audio, effects and assembly in one go. Per-shot failures are listed in
     * the report; an assembly failure is returned as an error.
     */
    router.post(
        `${base}/run`,
        asyncHandler(async (req: Request, res: Response) => {
            res.json(await orchestrator.runAll(contextOf(req), runOptionsFor(res)));
        })
    );

    router.get(
        `${base}/status`,
        asyncHandler(async (req: Request, res: Response) => {
            res.json(await orchestrator.status(contextOf(req)));
        })
    );

    return router;
}
