import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Viewer server
    port: number;
    environment: string;

    // Gemini
    geminiApiKey: string;
    geminiModel: string;
    geminiBaseUrl: string;

    // Batch generation
    requestIntervalSeconds: number; // Pause between successive Gemini calls
    storyLanguage: string;

    // Results
    videoBaseUrl: string; // Playback URL prefix, video id is appended
    resultsDir: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

/**
 * Loads configuration from environment variables.
 * Missing credentials are reported by validateConfig, not here, so the viewer can run without them.
 */
export function loadConfig(): Config {
    return {
        // Viewer server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // Gemini
        geminiApiKey: getEnvVar('GEMINI_API_KEY', ''),
        geminiModel: getEnvVar('GEMINI_MODEL', 'gemini-2.5-flash'),
        geminiBaseUrl: getEnvVar('GEMINI_BASE_URL', 'https://generativelanguage.googleapis.com'),

        // Batch generation
        requestIntervalSeconds: getEnvVarNumber('REQUEST_INTERVAL_SECONDS', 2),
        storyLanguage: getEnvVar('STORY_LANGUAGE', 'Japanese'),

        // Results
        videoBaseUrl: getEnvVar('VIDEO_BASE_URL', 'https://www.youtube.com/watch?v='),
        resultsDir: getEnvVar('RESULTS_DIR', 'results'),
    };
}

/**
 * Validates that the settings story generation depends on are usable.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.geminiApiKey) {
        errors.push('GEMINI_API_KEY is required for story generation');
    }
    if (config.requestIntervalSeconds < 0) {
        errors.push('REQUEST_INTERVAL_SECONDS must not be negative');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
