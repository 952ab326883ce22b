#!/usr/bin/env node
import path from 'path';
import { Config, getConfig, validateConfig } from './config';
import { StoryBatchDriver } from './application/StoryBatchDriver';
import { buildStoryInstruction } from './application/StoryPrompts';
import { ResultCollection } from './domain/entities/VideoRecord';
import { IResultStore } from './domain/ports/IResultStore';
import { IStoryGenerator } from './domain/ports/IStoryGenerator';
import { IVideoRecordSource } from './domain/ports/IVideoRecordSource';
import { ConfigurationError } from './domain/errors';
import { CsvVideoRecordLoader } from './infrastructure/csv/CsvVideoRecordLoader';
import { GeminiStoryGenerator } from './infrastructure/llm/GeminiStoryGenerator';
import { JsonResultStore } from './infrastructure/storage/JsonResultStore';

export interface GenerateStoriesDependencies {
    source: IVideoRecordSource;
    generator: IStoryGenerator;
    store: IResultStore;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Loads videos from a CSV file, generates stories for each and writes them to one JSON file.
 * Results are only written once every video has been processed.
 */
export async function generateStories(
    config: Config,
    csvPath: string,
    outputPath: string,
    deps: GenerateStoriesDependencies
): Promise<ResultCollection> {
    console.log(`Loading video data from ${csvPath}...`);
    const videos = await deps.source.load(csvPath);
    console.log(`Loaded ${videos.length} videos`);

    const driver = new StoryBatchDriver(deps.generator, {
        videoBaseUrl: config.videoBaseUrl,
        intervalMs: config.requestIntervalSeconds * 1000,
        instruction: buildStoryInstruction(config.storyLanguage),
        sleep: deps.sleep,
    });
    const results = await driver.run(videos);

    await deps.store.save(results, outputPath);
    return results;
}

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    if (args.length < 1) {
        console.log('Usage: video-story-generate <csvPath> [outputPath]');
        process.exit(1);
    }

    const config = getConfig();
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        throw new ConfigurationError(`Configuration validation failed: ${configErrors.join('; ')}`);
    }

    const csvPath = args[0];
    const store = new JsonResultStore(config.resultsDir);
    const outputPath = args[1] ? path.resolve(args[1]) : store.defaultDestinationFor(csvPath);

    await generateStories(config, csvPath, outputPath, {
        source: new CsvVideoRecordLoader(),
        generator: new GeminiStoryGenerator(config.geminiApiKey, config.geminiModel, config.geminiBaseUrl),
        store,
    });

    console.log(`Done! Results saved to ${outputPath}`);
}

if (require.main === module) {
    main().catch((error) => {
        console.error('💥 Story generation failed:', error instanceof Error ? error.message : error);
        process.exit(1);
    });
}
