import { createApp, createBot } from './presentation/app';
import { loadConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('🎓 Exam Seat Alert Bot - starting...');

    try {
        // 1. Load and validate configuration
        console.log('📋 Loading configuration...');
        const config = loadConfig();

        console.log('🔍 Validating configuration...');
        const configErrors = validateConfig(config);

        if (configErrors.length > 0) {
            console.error('❌ Configuration validation failed:');
            configErrors.forEach((error) => console.error(`  - ${error}`));
            process.exit(1);
        }

        // 2. Build the bot and start listening for updates
        console.log('🚀 Initializing bot components...');
        const bot = createBot(config);
        if (!bot.startPolling()) {
            console.log('   Telegram multi-user mode: DISABLED (broadcast only)');
        }

        // 3. Admin HTTP surface
        const app = createApp(bot, config);
        const server = app.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Language: ${config.language}`);
        });

        const shutdown = (signal: string) => {
            console.log(`🛑 ${signal} received, shutting down`);
            bot.stopPolling();
            server.close(() => process.exit(0));
        };
        process.on('SIGINT', () => shutdown('SIGINT'));
        process.on('SIGTERM', () => shutdown('SIGTERM'));
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
