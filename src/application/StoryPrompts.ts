export const DEFAULT_STORY_LANGUAGE = 'Japanese';

/**
 * Instruction sent alongside every video.
 */
export function buildStoryInstruction(language: string = DEFAULT_STORY_LANGUAGE): string {
    return `
Watch this video and think of meaningful messages or lessons that could be told as a story by editing this video.
Base your answer only on the visual information in the video. Ignore the audio.

For example:
- Key points the viewer should take away
- Lessons or insights that can be learned from the video
- The essential message of the video

Give about 3-5 of them, each as a pair of a title (short and concise) and a detailed message (about 1-2 sentences).
Answer in ${language}.
`;
}
