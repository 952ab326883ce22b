import { createApp } from './presentation/app';
import { getConfig } from './config';

async function main(): Promise<void> {
    console.log('📹 Video Story Viewer - starting...');

    try {
        console.log('📋 Loading configuration...');
        const config = getConfig();

        const app = createApp(config);

        app.listen(config.port, () => {
            console.log(`✅ Viewer running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Results directory: ${config.resultsDir}`);
        });
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
