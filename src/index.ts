import { env } from './config/env.js';
import { logger } from './infra/logger.js';
import { GammaClient } from './data/polymarket/gamma_client.js';
import { PolymarketFeed } from './data/polymarket/market_feed.js';
import { OrderbookWriter } from './storage/orderbook_writer.js';
import { MarketMetaStore } from './storage/market_meta.js';
import { ArbitrageDetector } from './strategy/arbitrage_detector.js';
import { DiscordWebhookSink } from './alerts/discord_webhook.js';
import { MarketScheduler } from './scheduler/market_scheduler.js';
import { Supervisor } from './supervisor.js';

const shutdown = new AbortController();

/**
 * Main application entry point
 */
async function main() {
    logger.info('app.boot', {
        message: 'Application starting...',
        environment: env.NODE_ENV,
    });

    console.log('\n✅ Boot OK');
    console.log(`⏰ Timestamp: ${new Date().toISOString()}`);
    console.log(`🌍 Environment: ${env.NODE_ENV}`);
    console.log(`📝 Log Level: ${env.LOG_LEVEL}`);
    console.log(`💾 Log to File: ${env.LOG_TO_FILE ? 'Enabled' : 'Disabled'}`);
    console.log(`\n🔹 Recorder Configuration:`);
    console.log(`  🎲 Slug Prefix: ${env.MARKET_SLUG_PREFIX}`);
    console.log(`  📂 Data Dir: ${env.DATA_DIR}`);
    console.log(`  ⏱️  Flush: every ${env.STORAGE_FLUSH_INTERVAL_MS}ms or ${env.STORAGE_FLUSH_MAX_ROWS} rows`);
    console.log(`\n🎯 Arbitrage Watcher:`);
    console.log(`  📉 Buy Threshold: sum_ask < ${env.ARB_BUY_THRESHOLD}`);
    console.log(`  📈 Sell Threshold: sum_bid > ${env.ARB_SELL_THRESHOLD}`);
    console.log(`  🔔 Alerts: ${env.DISCORD_WEBHOOK_URL ? 'Discord' : 'Disabled'}`);
    console.log(`  ⏱️  Cooldown: ${env.ARB_ALERT_MIN_INTERVAL_MS}ms\n`);

    const writer = new OrderbookWriter({
        dataDir: env.DATA_DIR,
        flushIntervalMs: env.STORAGE_FLUSH_INTERVAL_MS,
        flushMaxRows: env.STORAGE_FLUSH_MAX_ROWS,
        pollIntervalMs: env.STORAGE_POLL_INTERVAL_MS,
        queueCapacity: env.STORAGE_QUEUE_CAPACITY,
    });

    const detector = new ArbitrageDetector({
        sink: env.DISCORD_WEBHOOK_URL ? new DiscordWebhookSink(env.DISCORD_WEBHOOK_URL) : null,
        buyThreshold: env.ARB_BUY_THRESHOLD,
        sellThreshold: env.ARB_SELL_THRESHOLD,
        minIntervalMs: env.ARB_ALERT_MIN_INTERVAL_MS,
        queueCapacity: env.ARB_SIGNAL_QUEUE_CAPACITY,
    });

    const scheduler = new MarketScheduler(
        {
            discovery: new GammaClient({
                baseUrl: env.GAMMA_BASE_URL,
                slugPrefix: env.MARKET_SLUG_PREFIX,
                limit: env.GAMMA_EVENTS_LIMIT,
                timeoutMs: env.GAMMA_TIMEOUT_MS,
                retries: env.GAMMA_RETRIES,
                retryDelayMs: env.GAMMA_RETRY_DELAY_MS,
            }),
            feed: new PolymarketFeed({
                url: env.CLOB_WS_URL,
                pingIntervalMs: env.FEED_PING_INTERVAL_MS,
                reconnectDelayMs: env.FEED_RECONNECT_DELAY_MS,
                openTimeoutMs: env.FEED_OPEN_TIMEOUT_MS,
            }),
            writer,
            detector,
            metaStore: new MarketMetaStore(env.DATA_DIR),
        },
        { retryDelayMs: env.DISCOVERY_RETRY_MS }
    );

    const supervisor = new Supervisor({ scheduler, detector, writer });

    logger.info('app.ready', {
        message: 'Application initialized successfully',
        features: {
            config: 'loaded',
            logger: 'initialized',
            writer: 'created',
            detector: 'created',
            scheduler: 'created',
        },
    });

    await supervisor.run(shutdown.signal);
    logger.info('app.stopped', { message: 'Shutdown complete' });
}

/**
 * Graceful shutdown handler; a second signal forces exit
 */
function gracefulShutdown(signal: string) {
    if (shutdown.signal.aborted) {
        logger.warn('app.force_exit', { message: `Received ${signal} again, exiting now` });
        process.exit(1);
    }

    logger.info('app.shutdown', {
        message: `Received ${signal}, shutting down gracefully...`,
    });
    shutdown.abort();
}

// Register shutdown handlers
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));

// Start the application
main().catch((error) => {
    logger.error('app.fatal', {
        message: 'Fatal error during application startup',
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
});
