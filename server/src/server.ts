import type { Redis as RedisClient } from 'ioredis';
import { createApp } from './app.js';
import { getConfig } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';
import { closeRedisClient, getRedisClient } from './lib/redis/redis-client.js';
import { createAppServices } from './services/recommendations/index.js';

async function main(): Promise<void> {
    const config = getConfig();

    if (!config.googleApiKey) {
        logger.warn('GOOGLE_API_KEY is not set. Place searches will return nothing and feeds will use demo places.');
    }

    let redis: RedisClient | null = null;
    if (config.storeMode === 'redis') {
        redis = await getRedisClient({ url: config.redisUrl });
    }

    const app = createApp(createAppServices(config, redis));
    const server = app.listen(config.port, () => {
        logger.info(`Server listening on http://localhost:${config.port}`);
    });

    function shutdown(signal: NodeJS.Signals) {
        logger.info(`Received ${signal}. Shutting down gracefully...`);
        server.close(() => {
            closeRedisClient()
                .catch((error: unknown) => {
                    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Redis close failed');
                })
                .finally(() => {
                    logger.info('Server closed');
                    process.exit(0);
                });
        });
    }

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
    logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Server failed to start');
    process.exit(1);
});
