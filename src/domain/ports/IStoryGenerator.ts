import { PromptModel } from '../entities/Prompt';
import { StoryOutput } from '../entities/Story';

/**
 * Port for generating stories from a prompt using a multimodal model.
 */
export interface IStoryGenerator {
    /**
     * Sends one prompt to the model and returns its validated reply.
     * A single attempt per call; never retries.
     * @throws GenerationError when the reply is missing or does not match StoryOutput
     */
    generate(prompt: PromptModel): Promise<StoryOutput>;

    /**
     * Runs generate for every prompt concurrently.
     * Results are index-aligned with the input; the first failure rejects the whole batch.
     */
    batchGenerate(prompts: PromptModel[]): Promise<StoryOutput[]>;
}
