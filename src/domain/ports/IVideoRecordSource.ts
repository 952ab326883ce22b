import { VideoRecord } from '../entities/VideoRecord';

/**
 * Port for reading the videos to process.
 */
export interface IVideoRecordSource {
    load(path: string): Promise<VideoRecord[]>;
}
