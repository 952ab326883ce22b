/**
 * Story Batch Driver
 *
 * Generates stories for a list of videos one at a time, pausing between requests
 * to stay under the model's rate limit. A failing video is recorded with an error
 * story and never stops the batch.
 */

import { createVideoPrompt } from '../domain/entities/Prompt';
import { Story, createErrorStory } from '../domain/entities/Story';
import { ResultRecord, VideoRecord, buildVideoUrl, createResultRecord } from '../domain/entities/VideoRecord';
import { IStoryGenerator } from '../domain/ports/IStoryGenerator';
import { describeError } from '../domain/errors';
import { buildStoryInstruction } from './StoryPrompts';

/** Final state of a video; a failed video is never retried */
export type RecordStatus = 'succeeded' | 'failed';

export interface RecordOutcome {
    index: number;
    videoId: string;
    status: RecordStatus;
    error?: string;
    durationMs: number;
}

export interface StoryBatchOptions {
    /** Playback URL prefix the video id is appended to */
    videoBaseUrl: string;
    /** Pause between successive requests (default: 2000) */
    intervalMs?: number;
    /** Instruction text sent with every video (default: buildStoryInstruction()) */
    instruction?: string;
    /** Wait implementation, replaceable in tests */
    sleep?: (ms: number) => Promise<void>;
    /** Called after each video finishes */
    onProgress?: (completed: number, total: number, outcome: RecordOutcome) => void;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class StoryBatchDriver {
    private readonly videoBaseUrl: string;
    private readonly intervalMs: number;
    private readonly instruction: string;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly onProgress?: StoryBatchOptions['onProgress'];

    constructor(
        private readonly generator: IStoryGenerator,
        options: StoryBatchOptions
    ) {
        this.videoBaseUrl = options.videoBaseUrl;
        this.intervalMs = options.intervalMs ?? 2000;
        this.instruction = options.instruction ?? buildStoryInstruction();
        this.sleep = options.sleep ?? defaultSleep;
        this.onProgress = options.onProgress;
    }

    /**
     * Processes every record in input order and returns one result per record, in the same order.
     */
    async run(records: VideoRecord[]): Promise<ResultRecord[]> {
        const total = records.length;
        const results: ResultRecord[] = [];
        let failureCount = 0;

        console.log(`[StoryBatch] Generating stories for ${total} videos (one by one, ${this.intervalMs}ms apart)`);

        for (const [index, video] of records.entries()) {
            console.log(`[StoryBatch] [${index + 1}/${total}] Processing video: ${video.videoId}`);
            console.log(`  Title: ${video.title ?? ''}`);

            const outcome = await this.processOne(video, index);
            results.push(createResultRecord(video, outcome.stories));

            if (outcome.status === 'failed') {
                failureCount++;
            }
            this.onProgress?.(index + 1, total, {
                index,
                videoId: video.videoId,
                status: outcome.status,
                error: outcome.error,
                durationMs: outcome.durationMs,
            });

            // No pause after the last video
            if (index < total - 1) {
                console.log(`  Waiting ${this.intervalMs}ms before next request...`);
                await this.sleep(this.intervalMs);
            }
        }

        console.log(`[StoryBatch] Complete: ${total - failureCount} succeeded, ${failureCount} failed`);
        return results;
    }

    private async processOne(
        video: VideoRecord,
        index: number
    ): Promise<{ status: RecordStatus; stories: Story[]; error?: string; durationMs: number }> {
        const startedAt = Date.now();
        const prompt = createVideoPrompt(buildVideoUrl(this.videoBaseUrl, video.videoId), this.instruction);

        try {
            const output = await this.generator.generate(prompt);
            return { status: 'succeeded', stories: output.stories, durationMs: Date.now() - startedAt };
        } catch (error) {
            const description = `ERROR: ${describeError(error)}`;
            console.error(`  Error [${index + 1}] ${video.videoId}: ${describeError(error)}`);
            return {
                status: 'failed',
                stories: [createErrorStory(description)],
                error: description,
                durationMs: Date.now() - startedAt,
            };
        }
    }
}
