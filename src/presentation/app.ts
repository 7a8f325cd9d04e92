import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { PipelineOrchestrator } from '../application/PipelineOrchestrator';
import { createPipelineOrchestrator, PipelineAdapters } from '../application/pipelines/PipelineFactory';
import { createProjectRoutes } from './routes/projectRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

/**
 * Creates and configures the Express application.
 * Adapters replace the production TTS, probe and renderers (tests use fakes).
 */
export function createApp(config: Config, adapters: PipelineAdapters = {}): Application {
    const app = express();
    const orchestrator: PipelineOrchestrator = createPipelineOrchestrator(config, adapters);

    // Middleware
    app.use(cors());
    app.use(express.json({ limit: '2mb' }));
    app.use(express.urlencoded({ extended: true }));

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
        });
    });

    // Routes
    app.use(createProjectRoutes(orchestrator));

    app.use((req: Request, res: Response, next: NextFunction) => {
        next(new NotFoundError(`No route for ${req.method} ${req.path}`));
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}
