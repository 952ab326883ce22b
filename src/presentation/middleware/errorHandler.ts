import { Request, Response, NextFunction } from 'express';
import { StoryGenError } from '../../domain/errors';

/** HTTP status for each StoryGenError code; anything unlisted is a 500 */
const STATUS_BY_CODE: Readonly<Record<string, number>> = {
    INVALID_REQUEST: 400,
    RESULT_NOT_FOUND: 404,
    RECORD_NOT_FOUND: 404,
    GENERATION_ERROR: 502,
};

interface ErrorResponse {
    error: {
        message: string;
        code: string;
    };
}

export function statusForError(error: Error): number {
    if (error instanceof StoryGenError) {
        return STATUS_BY_CODE[error.code] ?? 500;
    }
    return 500;
}

/**
 * Global error handler middleware. Domain errors keep their message and code;
 * anything else is reported as INTERNAL_ERROR.
 */
export function errorHandler(
    error: Error,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    const status = statusForError(error);

    if (status < 500) {
        console.warn(`[WARN] ${error.name}: ${error.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${error.name}: ${error.message}`);
        if (error.stack) {
            console.error(error.stack);
        }
    }

    if (error instanceof StoryGenError) {
        const response: ErrorResponse = {
            error: {
                message: error.message,
                code: error.code,
            },
        };
        res.status(status).json(response);
        return;
    }

    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : error.message,
            code: 'INTERNAL_ERROR',
        },
    };
    res.status(status).json(response);
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
