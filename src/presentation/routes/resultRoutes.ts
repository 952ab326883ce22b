import { Router, Request, Response } from 'express';
import { IResultStore } from '../../domain/ports/IResultStore';
import { ResultRecord, buildVideoUrl } from '../../domain/entities/VideoRecord';
import { InvalidRequestError, RecordNotFoundError } from '../../domain/errors';
import { asyncHandler } from '../middleware/errorHandler';

/**
 * Label shown when picking a video, e.g. `1. Cat Video (abc123)`.
 */
export function formatVideoLabel(record: ResultRecord, index: number): string {
    return `${index + 1}. ${record.title ?? record.video_id} (${record.video_id})`;
}

/**
 * Creates read-only routes over saved result files.
 */
export function createResultRoutes(store: IResultStore, videoBaseUrl: string): Router {
    const router = Router();

    /**
     * GET /results
     *
     * Lists result files, newest name first.
     */
    router.get(
        '/results',
        asyncHandler(async (req: Request, res: Response) => {
            const files = await store.list();
            res.json({ files });
        })
    );

    /**
     * GET /results/:file
     *
     * Lists the videos in one result file.
     */
    router.get(
        '/results/:file',
        asyncHandler(async (req: Request, res: Response) => {
            const { file } = req.params;
            const records = await store.load(file);

            res.json({
                file,
                count: records.length,
                videos: records.map((record, index) => ({
                    index,
                    label: formatVideoLabel(record, index),
                    videoId: record.video_id,
                })),
            });
        })
    );

    /**
     * GET /results/:file/:index
     *
     * Returns one stored record with the URL to play its video.
     */
    router.get(
        '/results/:file/:index',
        asyncHandler(async (req: Request, res: Response) => {
            const { file, index } = req.params;
            if (!/^\d+$/.test(index)) {
                throw new InvalidRequestError(`Invalid index: ${index}`);
            }

            const records = await store.load(file);
            const position = Number(index);
            const record = records[position];
            if (!record) {
                throw new RecordNotFoundError(file, position);
            }

            res.json({
                ...record,
                playbackUrl: buildVideoUrl(videoBaseUrl, record.video_id),
            });
        })
    );

    return router;
}
