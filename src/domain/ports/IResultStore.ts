import { ResultCollection } from '../entities/VideoRecord';

/**
 * Port for persisting generated results as JSON files.
 */
export interface IResultStore {
    /**
     * Writes the collection to destination, replacing any existing file.
     * Missing parent directories are created.
     */
    save(results: ResultCollection, destination: string): Promise<void>;

    /**
     * Lists result file names, newest name first.
     */
    list(): Promise<string[]>;

    /**
     * Reads one result file by name.
     */
    load(fileName: string): Promise<ResultCollection>;
}
