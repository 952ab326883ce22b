import { loadConfig, validateConfig, getConfig, resetConfig } from '../../src/config/index';

describe('ConfigLoader', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = { ...originalEnv };
        delete process.env.GEMINI_API_KEY;
        delete process.env.GEMINI_MODEL;
        delete process.env.GEMINI_BASE_URL;
        delete process.env.REQUEST_INTERVAL_SECONDS;
        delete process.env.VIDEO_BASE_URL;
        delete process.env.RESULTS_DIR;
        delete process.env.STORY_LANGUAGE;
        delete process.env.PORT;
        resetConfig();
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    it('should apply defaults when optional variables are unset', () => {
        process.env.GEMINI_API_KEY = 'test-key';

        const config = loadConfig();

        expect(config.geminiApiKey).toBe('test-key');
        expect(config.geminiModel).toBe('gemini-2.5-flash');
        expect(config.geminiBaseUrl).toBe('https://generativelanguage.googleapis.com');
        expect(config.requestIntervalSeconds).toBe(2);
        expect(config.videoBaseUrl).toBe('https://www.youtube.com/watch?v=');
        expect(config.resultsDir).toBe('results');
        expect(config.storyLanguage).toBe('Japanese');
        expect(config.port).toBe(3000);
    });

    it('should strip double quotes from environment variables', () => {
        process.env.GEMINI_API_KEY = '"test-key-with-quotes"';

        const config = loadConfig();
        expect(config.geminiApiKey).toBe('test-key-with-quotes');
    });

    it('should strip single quotes from environment variables', () => {
        process.env.GEMINI_API_KEY = "'test-key-with-single-quotes'";

        const config = loadConfig();
        expect(config.geminiApiKey).toBe('test-key-with-single-quotes');
    });

    it('should trim whitespace from environment variables', () => {
        process.env.GEMINI_API_KEY = '  test-key-with-spaces  ';

        const config = loadConfig();
        expect(config.geminiApiKey).toBe('test-key-with-spaces');
    });

    it('should handle numeric variables with quotes', () => {
        process.env.REQUEST_INTERVAL_SECONDS = '"0.5"';
        process.env.PORT = '"4000"';

        const config = loadConfig();
        expect(config.requestIntervalSeconds).toBe(0.5);
        expect(config.port).toBe(4000);
    });

    it('should reject non-numeric values for numeric variables', () => {
        process.env.REQUEST_INTERVAL_SECONDS = 'soon';

        expect(() => loadConfig()).toThrow('Environment variable REQUEST_INTERVAL_SECONDS must be a number, got: soon');
    });

    describe('validateConfig', () => {
        it('should report a missing Gemini API key', () => {
            const errors = validateConfig(loadConfig());
            expect(errors).toEqual(['GEMINI_API_KEY is required for story generation']);
        });

        it('should report a negative request interval', () => {
            process.env.GEMINI_API_KEY = 'test-key';
            process.env.REQUEST_INTERVAL_SECONDS = '-1';

            const errors = validateConfig(loadConfig());
            expect(errors).toEqual(['REQUEST_INTERVAL_SECONDS must not be negative']);
        });

        it('should accept a complete configuration', () => {
            process.env.GEMINI_API_KEY = 'test-key';
            expect(validateConfig(loadConfig())).toEqual([]);
        });
    });

    describe('getConfig', () => {
        it('should cache the loaded configuration until reset', () => {
            process.env.STORY_LANGUAGE = 'English';
            const first = getConfig();

            process.env.STORY_LANGUAGE = 'French';
            expect(getConfig()).toBe(first);
            expect(getConfig().storyLanguage).toBe('English');

            resetConfig();
            expect(getConfig().storyLanguage).toBe('French');
        });
    });
});
