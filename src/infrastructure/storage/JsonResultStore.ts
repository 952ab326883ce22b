import path from 'path';
import fs from 'fs/promises';
import Ajv, { JSONSchemaType } from 'ajv';
import { ResultCollection } from '../../domain/entities/VideoRecord';
import { IResultStore } from '../../domain/ports/IResultStore';
import { ResultNotFoundError, ResultWriteError } from '../../domain/errors';
import { STORY_SCHEMA } from '../llm/StoryOutputSchema';

const RESULT_COLLECTION_SCHEMA: JSONSchemaType<ResultCollection> = {
    type: 'array',
    items: {
        type: 'object',
        properties: {
            video_id: { type: 'string' },
            stories: { type: 'array', items: STORY_SCHEMA },
            title: { type: 'string', nullable: true },
            channel: { type: 'string', nullable: true },
            parent_category: { type: 'string', nullable: true },
            fine_category: { type: 'string', nullable: true },
        },
        required: ['video_id', 'stories'],
    },
};

const ajv = new Ajv({ allErrors: true });
const validateResultCollection = ajv.compile(RESULT_COLLECTION_SCHEMA);

/**
 * Stores result collections as indented UTF-8 JSON files.
 * `list` and `load` only look inside the configured results directory.
 */
export class JsonResultStore implements IResultStore {
    private readonly resultsDir: string;

    constructor(resultsDir: string) {
        this.resultsDir = path.resolve(resultsDir);
    }

    /**
     * Default destination for a CSV input: `<resultsDir>/<csv basename>.json`.
     */
    defaultDestinationFor(csvPath: string): string {
        const baseName = path.basename(csvPath, path.extname(csvPath));
        return path.join(this.resultsDir, `${baseName}.json`);
    }

    async save(results: ResultCollection, destination: string): Promise<void> {
        console.log(`[ResultStore] Saving ${results.length} results to ${destination}...`);

        try {
            await fs.mkdir(path.dirname(destination), { recursive: true });
            // JSON.stringify keeps non-ASCII characters as-is
            await fs.writeFile(destination, JSON.stringify(results, null, 2), 'utf-8');
        } catch (error) {
            throw new ResultWriteError(destination, error);
        }

        console.log(`[ResultStore] Results saved to ${destination}`);
    }

    async list(): Promise<string[]> {
        let entries: string[];
        try {
            entries = await fs.readdir(this.resultsDir);
        } catch (error) {
            if (isMissingFileError(error)) {
                return [];
            }
            throw error;
        }

        return entries
            .filter((name) => name.endsWith('.json'))
            .sort()
            .reverse();
    }

    async load(fileName: string): Promise<ResultCollection> {
        const filePath = this.resolveResultFile(fileName);

        let content: string;
        try {
            content = await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            if (isMissingFileError(error)) {
                throw new ResultNotFoundError(fileName);
            }
            throw error;
        }

        const parsed: unknown = JSON.parse(content);
        if (!validateResultCollection(parsed)) {
            throw new Error(
                `Results file ${fileName} is malformed: ${ajv.errorsText(validateResultCollection.errors)}`
            );
        }
        return parsed;
    }

    private resolveResultFile(fileName: string): string {
        if (!fileName.endsWith('.json') || path.basename(fileName) !== fileName) {
            throw new ResultNotFoundError(fileName);
        }
        return path.join(this.resultsDir, fileName);
    }
}

function isMissingFileError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
