import { Request, Response, NextFunction } from 'express';
import {
    errorHandler,
    asyncHandler,
    statusForError,
} from '../../../../src/presentation/middleware/errorHandler';
import {
    ConfigurationError,
    GenerationError,
    InvalidRequestError,
    RecordNotFoundError,
    ResultNotFoundError,
    ResultWriteError,
} from '../../../../src/domain/errors';

describe('Error Handling Middleware', () => {
    describe('statusForError', () => {
        test('should map domain error codes to HTTP statuses', () => {
            expect(statusForError(new InvalidRequestError('Invalid index: x'))).toBe(400);
            expect(statusForError(new ResultNotFoundError('missing.json'))).toBe(404);
            expect(statusForError(new RecordNotFoundError('batch.json', 3))).toBe(404);
            expect(statusForError(new GenerationError('No response from Gemini API.'))).toBe(502);
        });

        test('should treat other errors as internal', () => {
            expect(statusForError(new ConfigurationError('GEMINI_API_KEY is required'))).toBe(500);
            expect(statusForError(new ResultWriteError('/tmp/out.json', new Error('EACCES')))).toBe(500);
            expect(statusForError(new Error('disk exploded'))).toBe(500);
        });
    });

    describe('errorHandler', () => {
        let req: Partial<Request>;
        let res: Partial<Response>;
        let next: NextFunction;
        const originalNodeEnv = process.env.NODE_ENV;

        beforeEach(() => {
            req = {
                method: 'GET',
                path: '/results/missing.json'
            };
            res = {
                status: jest.fn().mockReturnThis(),
                json: jest.fn()
            };
            next = jest.fn();
            jest.spyOn(console, 'error').mockImplementation(() => { });
            jest.spyOn(console, 'warn').mockImplementation(() => { });
        });

        afterEach(() => {
            process.env.NODE_ENV = originalNodeEnv;
            jest.restoreAllMocks();
        });

        test('should answer a bad index with 400 and its domain code', () => {
            errorHandler(new InvalidRequestError('Invalid index: x'), req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(400);
            expect(res.json).toHaveBeenCalledWith({
                error: {
                    message: 'Invalid index: x',
                    code: 'INVALID_REQUEST'
                }
            });
        });

        test('should answer a missing results file with 404 and log a warning', () => {
            errorHandler(new ResultNotFoundError('missing.json'), req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(404);
            expect(res.json).toHaveBeenCalledWith({
                error: {
                    message: 'Results file not found: missing.json',
                    code: 'RESULT_NOT_FOUND'
                }
            });
            expect(console.warn).toHaveBeenCalledWith(
                '[WARN] ResultNotFoundError: Results file not found: missing.json (GET /results/missing.json)'
            );
            expect(console.error).not.toHaveBeenCalled();
        });

        test('should answer a missing record with 404', () => {
            errorHandler(new RecordNotFoundError('batch.json', 2), req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(404);
            expect(res.json).toHaveBeenCalledWith({
                error: {
                    message: 'No video at index 2 in batch.json',
                    code: 'RECORD_NOT_FOUND'
                }
            });
        });

        test('should keep the domain code of server-side domain errors', () => {
            errorHandler(new ConfigurationError('GEMINI_API_KEY is required'), req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(500);
            expect(res.json).toHaveBeenCalledWith({
                error: { message: 'GEMINI_API_KEY is required', code: 'CONFIGURATION_ERROR' }
            });
            expect(console.error).toHaveBeenCalled();
        });

        test('should hide internal messages in production', () => {
            process.env.NODE_ENV = 'production';

            errorHandler(new Error('disk exploded'), req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(500);
            expect(res.json).toHaveBeenCalledWith({
                error: { message: 'Internal server error', code: 'INTERNAL_ERROR' }
            });
        });

        test('should expose internal messages outside production', () => {
            process.env.NODE_ENV = 'test';

            errorHandler(new Error('disk exploded'), req as Request, res as Response, next);

            expect(res.json).toHaveBeenCalledWith({
                error: { message: 'disk exploded', code: 'INTERNAL_ERROR' }
            });
        });
    });

    describe('asyncHandler', () => {
        test('should forward rejected promises to next', async () => {
            const failure = new Error('async failure');
            const next = jest.fn();
            const handler = asyncHandler(async () => {
                throw failure;
            });

            await handler({} as Request, {} as Response, next);

            expect(next).toHaveBeenCalledWith(failure);
        });
    });
});
