import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LLM_PROVIDER: z.string().default('openai'),
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_MODEL: z.string().min(1).optional(),
    GOOGLE_API_KEY: z.string().min(1).optional(),
    OPENWEATHER_API_KEY: z.string().min(1).optional(),
    STORE_MODE: z.enum(['memory', 'redis']).default('memory'),
    REDIS_URL: z.string().default('redis://localhost:6379')
});

export interface AppConfig {
    port: number;
    env: 'development' | 'production' | 'test';
    llmProvider: string;
    openaiApiKey?: string;
    openaiModel?: string;
    googleApiKey?: string;
    openWeatherApiKey?: string;
    storeMode: 'memory' | 'redis';
    redisUrl: string;
}

/**
 * Reads and validates process.env.
 * Empty strings are treated as unset so a blank line in .env does not count as a key.
 */
export function getConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    const cleaned = Object.fromEntries(
        Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
    );
    const env = envSchema.parse(cleaned);

    return {
        port: env.PORT,
        env: env.NODE_ENV,
        llmProvider: env.LLM_PROVIDER.toLowerCase(),
        openaiApiKey: env.OPENAI_API_KEY,
        openaiModel: env.OPENAI_MODEL,
        googleApiKey: env.GOOGLE_API_KEY,
        openWeatherApiKey: env.OPENWEATHER_API_KEY,
        storeMode: env.STORE_MODE,
        redisUrl: env.REDIS_URL
    };
}
