import { PromptModel, PromptSegment } from '../../domain/entities/Prompt';

/**
 * Wire types for the Gemini `generateContent` REST endpoint (v1beta).
 * Only the fields this project sends or reads are modelled.
 */

export interface GeminiTextPart {
    text: string;
}

export interface GeminiFileDataPart {
    fileData: {
        fileUri: string;
    };
}

export type GeminiPart = GeminiTextPart | GeminiFileDataPart;

export interface GeminiContent {
    role: 'user' | 'model';
    parts: GeminiPart[];
}

export interface GeminiGenerationConfig {
    responseMimeType: 'application/json';
    responseJsonSchema: object;
}

export interface GeminiGenerateContentRequest {
    contents: GeminiContent[];
    generationConfig: GeminiGenerationConfig;
}

export interface GeminiGenerateContentResponse {
    candidates?: Array<{
        content?: {
            parts?: Array<{ text?: string }>;
        };
        finishReason?: string;
    }>;
    promptFeedback?: {
        blockReason?: string;
    };
}

export interface GeminiErrorResponse {
    error?: {
        code?: number;
        message?: string;
        status?: string;
    };
}

/**
 * Maps one prompt segment to its Gemini part: video references become file parts,
 * instructions become text parts.
 */
export function toGeminiPart(segment: PromptSegment): GeminiPart {
    switch (segment.kind) {
        case 'media':
            return { fileData: { fileUri: segment.videoUrl } };
        case 'text':
            return { text: segment.text };
    }
}

export function toGeminiContent(prompt: PromptModel): GeminiContent {
    return {
        role: 'user',
        parts: prompt.map(toGeminiPart),
    };
}

/**
 * Joins the text parts of the first candidate. Returns undefined when there is no text at all.
 */
export function extractResponseText(response: GeminiGenerateContentResponse | null | undefined): string | undefined {
    const parts = response?.candidates?.[0]?.content?.parts;
    if (!parts) {
        return undefined;
    }

    const text = parts
        .map((part) => part.text ?? '')
        .join('');

    return text.trim().length > 0 ? text : undefined;
}
