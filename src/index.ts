import { createApp, createDependencies } from './presentation/app';
import { getConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('🎬 Video Composition Service - starting...');

    try {
        // 1. Load and validate configuration
        console.log('📋 Loading configuration...');
        const config = getConfig();

        console.log('🔍 Validating configuration...');
        const configErrors = validateConfig(config);

        if (configErrors.length > 0) {
            console.error('❌ Configuration validation failed:');
            configErrors.forEach((error) => console.error(`  - ${error}`));
            process.exit(1);
        }

        // 2. Wire dependencies and restore state
        console.log('🚀 Initializing application components...');
        const services = createDependencies(config);
        await services.apiKeyRegistry.initializeFromConfig();
        await services.recovery.recover();

        // 3. Start workers and the stalled-job sweep
        services.workerPool.start();
        const sweep = setInterval(() => {
            services.recovery
                .requeueStalled(config.stalledJobTimeoutMs)
                .catch((error) => console.error('[Recovery] Stalled job sweep failed:', error));
        }, Math.max(1000, Math.floor(config.stalledJobTimeoutMs / 2)));

        // 4. Serve the API
        const app = createApp(services);
        const server = app.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Workers: ${config.workerConcurrency}`);
        });

        let shuttingDown = false;
        const shutdown = async (signal: string): Promise<void> => {
            if (shuttingDown) {
                return;
            }
            shuttingDown = true;
            console.log(`🛑 ${signal} received, shutting down...`);
            clearInterval(sweep);
            server.close();
            // Closing the queue wakes workers blocked in dequeue
            const stopping = services.workerPool.stop();
            await services.close();
            await stopping;
            process.exit(0);
        };

        process.on('SIGINT', () => {
            shutdown('SIGINT').catch((error) => {
                console.error('Shutdown failed:', error);
                process.exit(1);
            });
        });
        process.on('SIGTERM', () => {
            shutdown('SIGTERM').catch((error) => {
                console.error('Shutdown failed:', error);
                process.exit(1);
            });
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
