import Ajv, { JSONSchemaType } from 'ajv';
import { Story, StoryOutput } from '../../domain/entities/Story';
import { GenerationError, describeError } from '../../domain/errors';

export const STORY_SCHEMA: JSONSchemaType<Story> = {
    type: 'object',
    properties: {
        title: { type: 'string' },
        message: { type: 'string' },
    },
    required: ['title', 'message'],
};

/**
 * JSON Schema of StoryOutput. Sent to Gemini as the required response shape
 * and used to validate whatever comes back.
 */
export const STORY_OUTPUT_SCHEMA: JSONSchemaType<StoryOutput> = {
    type: 'object',
    properties: {
        stories: {
            type: 'array',
            items: STORY_SCHEMA,
        },
    },
    required: ['stories'],
};

const ajv = new Ajv({ allErrors: true });
const validateStoryOutput = ajv.compile(STORY_OUTPUT_SCHEMA);

/**
 * Parses a model reply into StoryOutput. Malformed JSON and schema mismatches both
 * raise GenerationError; nothing is partially accepted.
 */
export function parseStoryOutput(text: string): StoryOutput {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new GenerationError(`Response is not valid JSON: ${describeError(error)}`, error);
    }

    if (!validateStoryOutput(parsed)) {
        throw new GenerationError(
            `Response does not match StoryOutput: ${ajv.errorsText(validateStoryOutput.errors)}`
        );
    }

    // Copy only the known fields so extra keys from the model never reach the results file
    return {
        stories: parsed.stories.map((story) => ({ title: story.title, message: story.message })),
    };
}
