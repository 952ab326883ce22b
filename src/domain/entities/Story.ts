/**
 * A single story idea for a video.
 */
export interface Story {
    /** Short, concise title */
    title: string;
    /** The message or lesson, 1-2 sentences */
    message: string;
}

/**
 * Structured reply every successful generation call must conform to.
 * An empty list is a valid reply.
 */
export interface StoryOutput {
    stories: Story[];
}

/** Title of the synthetic story recorded for a video whose generation failed */
export const ERROR_STORY_TITLE = 'Error';

export function createErrorStory(description: string): Story {
    return { title: ERROR_STORY_TITLE, message: description };
}
