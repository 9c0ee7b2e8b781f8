import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
loadEnv();

const booleanString = z.enum(['true', 'false']).transform(val => val === 'true');

// Define the schema for environment variables
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    LOG_TO_FILE: booleanString.default('true'),
    LOG_DIR: z.string().min(1).default('./logs'),

    DATA_DIR: z.string().min(1).default('./data'),

    // Gamma Market Discovery
    GAMMA_BASE_URL: z.string().url().default('https://gamma-api.polymarket.com'),
    GAMMA_EVENTS_LIMIT: z.coerce.number().int().positive().finite().default(80),
    GAMMA_TIMEOUT_MS: z.coerce.number().int().positive().finite().default(20000),
    GAMMA_RETRIES: z.coerce.number().int().positive().finite().default(3),
    GAMMA_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().finite().default(5000),
    MARKET_SLUG_PREFIX: z.string().min(1).default('btc-updown-5m'),
    DISCOVERY_RETRY_MS: z.coerce.number().int().positive().finite().default(30000),

    // CLOB market channel
    CLOB_WS_URL: z.string().url().default('wss://ws-subscriptions-clob.polymarket.com/ws/market'),
    FEED_PING_INTERVAL_MS: z.coerce.number().int().positive().finite().default(10000),
    FEED_RECONNECT_DELAY_MS: z.coerce.number().int().positive().finite().default(5000),
    FEED_OPEN_TIMEOUT_MS: z.coerce.number().int().positive().finite().default(45000),

    // Batched storage
    STORAGE_FLUSH_INTERVAL_MS: z.coerce.number().int().positive().finite().default(5000),
    STORAGE_FLUSH_MAX_ROWS: z.coerce.number().int().positive().finite().default(200),
    STORAGE_POLL_INTERVAL_MS: z.coerce.number().int().positive().finite().default(100),
    STORAGE_QUEUE_CAPACITY: z.coerce.number().int().positive().finite().default(100000),

    // Arbitrage alerts
    DISCORD_WEBHOOK_URL: z.string().trim().default(''),
    ARB_BUY_THRESHOLD: z.coerce.number().positive().finite().default(0.99),
    ARB_SELL_THRESHOLD: z.coerce.number().positive().finite().default(1.01),
    ARB_ALERT_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().finite().default(30000),
    ARB_SIGNAL_QUEUE_CAPACITY: z.coerce.number().int().positive().finite().default(1000),
});

// Parse and validate environment variables
function validateEnv() {
    try {
        return envSchema.parse(process.env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            console.error('❌ Invalid environment variables:');
            error.errors.forEach(err => {
                console.error(`  - ${err.path.join('.')}: ${err.message}`);
            });
            process.exit(1);
        }
        throw error;
    }
}

// Export validated environment configuration
export const env = validateEnv();

export type Env = z.infer<typeof envSchema>;
