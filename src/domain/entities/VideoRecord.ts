import { Story } from './Story';

/**
 * One input row identifying a video, with optional metadata.
 */
export interface VideoRecord {
    videoId: string;
    title?: string;
    channel?: string;
    parentCategory?: string;
    fineCategory?: string;
}

/**
 * One entry of the results file. Keys match the JSON artifact the viewer reads.
 * Optional keys are present only when the source value was non-empty.
 */
export interface ResultRecord {
    video_id: string;
    stories: Story[];
    title?: string;
    channel?: string;
    parent_category?: string;
    fine_category?: string;
}

export type ResultCollection = ResultRecord[];

/**
 * Builds the result entry for a video. Key order is video_id, stories, then metadata.
 */
export function createResultRecord(video: VideoRecord, stories: Story[]): ResultRecord {
    const record: ResultRecord = {
        video_id: video.videoId,
        stories: stories.map((story) => ({ title: story.title, message: story.message })),
    };

    if (video.title) {
        record.title = video.title;
    }
    if (video.channel) {
        record.channel = video.channel;
    }
    if (video.parentCategory) {
        record.parent_category = video.parentCategory;
    }
    if (video.fineCategory) {
        record.fine_category = video.fineCategory;
    }

    return record;
}

/**
 * Playback URL for a video, e.g. `https://www.youtube.com/watch?v=<id>`.
 */
export function buildVideoUrl(videoBaseUrl: string, videoId: string): string {
    return `${videoBaseUrl}${videoId}`;
}
