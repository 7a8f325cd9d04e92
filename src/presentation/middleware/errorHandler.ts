import { Request, Response, NextFunction } from 'express';
import {
    AssemblyError,
    BlueprintNotFoundError,
    PipelineError,
    RenderError,
    SynthesisError,
    ValidationError,
} from '../../domain/errors/PipelineErrors';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
        details?: unknown;
    };
}

/**
 * HTTP status for a pipeline failure.
 */
export function statusForPipelineError(err: PipelineError): number {
    if (err instanceof ValidationError) return 400;
    if (err instanceof BlueprintNotFoundError) return 404;
    if (err instanceof SynthesisError || err instanceof RenderError || err instanceof AssemblyError) return 422;
    return 500;
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    if (err instanceof NotFoundError || err instanceof BlueprintNotFoundError) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (err instanceof PipelineError) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.name,
                details: err instanceof ValidationError ? { scope: err.scope, issues: err.issues } : { scope: err.scope },
            },
        };
        res.status(statusForPipelineError(err)).json(response);
        return;
    }

    if (err instanceof AppError) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.name,
            },
        };
        res.status(err.statusCode).json(response);
        return;
    }

    // express.json() rejects malformed bodies with a 400 SyntaxError
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
        res.status(400).json({ error: { message: 'Malformed JSON body', code: 'BadRequestError' } });
        return;
    }

    // Generic server error
    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : err.message,
            code: 'INTERNAL_ERROR',
        },
    };
    res.status(500).json(response);
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
