import { Request, Response, NextFunction } from 'express';
import {
    CompositionServiceError,
    JobAccessError,
    ResolutionError,
    SpecError,
} from '../../domain/errors/CompositionErrors';

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
 * Unauthorized error (401).
 */
export class UnauthorizedError extends AppError {
    constructor(message: string = 'Unauthorized') {
        super(401, message);
        this.name = 'UnauthorizedError';
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

const ACCESS_STATUS: Record<JobAccessError['kind'], number> = {
    JobNotFound: 404,
    Forbidden: 403,
    InvalidStateForCancel: 409,
    NotReady: 409,
    ArtifactNotFound: 404,
};

/**
 * HTTP status for a domain error.
 */
export function statusForDomainError(err: CompositionServiceError): number {
    if (err instanceof SpecError) {
        return 400;
    }
    if (err instanceof ResolutionError) {
        return err.kind === 'UnreachableSource' ? 502 : 400;
    }
    if (err instanceof JobAccessError) {
        return ACCESS_STATUS[err.kind];
    }
    if (err.category === 'concurrency') {
        return 409;
    }
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
    if (err instanceof CompositionServiceError) {
        const status = statusForDomainError(err);
        if (status >= 500) {
            console.error(`[ERROR] ${err.name}(${err.kind}): ${err.message}`);
        } else {
            console.warn(`[WARN] ${err.name}(${err.kind}): ${err.message} (${req.method} ${req.path})`);
        }

        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.kind,
            },
        };
        if (err instanceof SpecError && err.details !== undefined) {
            response.error.details = err.details;
        }
        if (err instanceof ResolutionError && err.source !== undefined) {
            response.error.details = { source: err.source };
        }
        res.status(status).json(response);
        return;
    }

    if (err instanceof NotFoundError || err instanceof UnauthorizedError) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
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

    // Malformed JSON bodies rejected by express.json()
    if (err instanceof SyntaxError && 'body' in err) {
        const response: ErrorResponse = {
            error: {
                message: 'Request body is not valid JSON',
                code: 'MalformedSpec',
            },
        };
        res.status(400).json(response);
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
