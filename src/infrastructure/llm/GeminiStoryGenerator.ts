import axios from 'axios';
import { PromptModel } from '../../domain/entities/Prompt';
import { StoryOutput } from '../../domain/entities/Story';
import { IStoryGenerator } from '../../domain/ports/IStoryGenerator';
import { ConfigurationError, GenerationError, describeError } from '../../domain/errors';
import {
    GeminiErrorResponse,
    GeminiGenerateContentRequest,
    GeminiGenerateContentResponse,
    extractResponseText,
    toGeminiContent,
} from './GeminiSchema';
import { STORY_OUTPUT_SCHEMA, parseStoryOutput } from './StoryOutputSchema';

/**
 * Story generator backed by the Gemini `generateContent` REST API.
 * The video is passed by URL as a file part, so Gemini fetches it itself.
 */
export class GeminiStoryGenerator implements IStoryGenerator {
    private readonly apiKey: string;
    private readonly model: string;
    private readonly baseUrl: string;

    constructor(
        apiKey: string,
        model: string = 'gemini-2.5-flash',
        baseUrl: string = 'https://generativelanguage.googleapis.com'
    ) {
        if (!apiKey) {
            throw new ConfigurationError(
                "API key for Gemini is not set. Please set the 'GEMINI_API_KEY' environment variable."
            );
        }

        this.apiKey = apiKey;
        this.model = model;
        this.baseUrl = baseUrl.replace(/\/+$/, '');
    }

    async generate(prompt: PromptModel): Promise<StoryOutput> {
        const request = this.buildRequest(prompt);

        let data: GeminiGenerateContentResponse | null | undefined;
        try {
            const response = await axios.post<GeminiGenerateContentResponse>(
                `${this.baseUrl}/v1beta/models/${this.model}:generateContent`,
                request,
                {
                    headers: {
                        'x-goog-api-key': this.apiKey,
                        'Content-Type': 'application/json',
                    },
                }
            );
            data = response.data;
        } catch (error) {
            throw new GenerationError(`Gemini API error: ${this.describeApiError(error)}`, error);
        }

        const text = extractResponseText(data);
        if (text === undefined) {
            throw new GenerationError(describeEmptyResponse(data));
        }

        return parseStoryOutput(text);
    }

    async batchGenerate(prompts: PromptModel[]): Promise<StoryOutput[]> {
        return Promise.all(prompts.map((prompt) => this.generate(prompt)));
    }

    /**
     * Builds the request body: the prompt's parts in order, with the reply constrained to StoryOutput.
     */
    buildRequest(prompt: PromptModel): GeminiGenerateContentRequest {
        return {
            contents: [toGeminiContent(prompt)],
            generationConfig: {
                responseMimeType: 'application/json',
                responseJsonSchema: STORY_OUTPUT_SCHEMA,
            },
        };
    }

    private describeApiError(error: unknown): string {
        if (axios.isAxiosError<GeminiErrorResponse>(error)) {
            return error.response?.data?.error?.message || error.message;
        }
        return describeError(error);
    }
}

function describeEmptyResponse(data: GeminiGenerateContentResponse | null | undefined): string {
    const blockReason = data?.promptFeedback?.blockReason;
    if (blockReason) {
        return `No response from Gemini API (blocked: ${blockReason}).`;
    }
    const finishReason = data?.candidates?.[0]?.finishReason;
    if (finishReason) {
        return `No response from Gemini API (finish reason: ${finishReason}).`;
    }
    return 'No response from Gemini API.';
}
