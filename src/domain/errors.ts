/**
 * Base class for errors raised while generating, storing or reading stories.
 */
export class StoryGenError extends Error {
    constructor(
        public readonly code: string,
        message: string,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'StoryGenError';
    }
}

/**
 * A required setting (such as the Gemini API key) is missing or invalid.
 * Fatal: aborts the whole run.
 */
export class ConfigurationError extends StoryGenError {
    constructor(message: string) {
        super('CONFIGURATION_ERROR', message);
        this.name = 'ConfigurationError';
    }
}

/**
 * The model returned nothing usable for one prompt, or a reply that does not match StoryOutput.
 * Recovered per record by the batch driver.
 */
export class GenerationError extends StoryGenError {
    constructor(message: string, cause?: unknown) {
        super('GENERATION_ERROR', message, cause);
        this.name = 'GenerationError';
    }
}

/**
 * The results file could not be written.
 */
export class ResultWriteError extends StoryGenError {
    constructor(
        public readonly destination: string,
        cause?: unknown
    ) {
        super('RESULT_WRITE_ERROR', `Failed to write results to ${destination}: ${describeError(cause)}`, cause);
        this.name = 'ResultWriteError';
    }
}

/**
 * A requested results file does not exist or is not a results file.
 */
export class ResultNotFoundError extends StoryGenError {
    constructor(fileName: string) {
        super('RESULT_NOT_FOUND', `Results file not found: ${fileName}`);
        this.name = 'ResultNotFoundError';
    }
}

/**
 * A results file exists but has no video at the requested position.
 */
export class RecordNotFoundError extends StoryGenError {
    constructor(fileName: string, index: number) {
        super('RECORD_NOT_FOUND', `No video at index ${index} in ${fileName}`);
        this.name = 'RecordNotFoundError';
    }
}

/**
 * A caller passed a value that cannot address a result (e.g. a non-numeric index).
 */
export class InvalidRequestError extends StoryGenError {
    constructor(message: string) {
        super('INVALID_REQUEST', message);
        this.name = 'InvalidRequestError';
    }
}

/**
 * Human-readable description of any thrown value.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
