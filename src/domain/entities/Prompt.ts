/**
 * A reference to video content the model should watch.
 */
export interface MediaReferenceSegment {
    kind: 'media';
    /** Resolvable URL of the video */
    videoUrl: string;
}

/**
 * Literal instruction text.
 */
export interface TextInstructionSegment {
    kind: 'text';
    text: string;
}

export type PromptSegment = MediaReferenceSegment | TextInstructionSegment;

/**
 * One logical request to the generation backend. Segment order is preserved on the wire:
 * media context comes before the instruction that refers to it.
 */
export type PromptModel = readonly PromptSegment[];

export function mediaSegment(videoUrl: string): MediaReferenceSegment {
    return { kind: 'media', videoUrl };
}

export function textSegment(text: string): TextInstructionSegment {
    return { kind: 'text', text };
}

/**
 * Builds the prompt for a single video: the video first, then the instruction.
 */
export function createVideoPrompt(videoUrl: string, instruction: string): PromptModel {
    return [mediaSegment(videoUrl), textSegment(instruction)];
}
