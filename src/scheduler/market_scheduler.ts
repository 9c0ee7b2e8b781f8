import { logger, describeError } from '../infra/logger.js';
import { sleep } from '../infra/sleep.js';
import type { ArbitrageDetector } from '../strategy/arbitrage_detector.js';
import type { MarketMetaStore } from '../storage/market_meta.js';
import type { RecordSink } from '../storage/records.js';
import type {
    DiscoveryResult,
    FeedHandlers,
    MarketDiscovery,
    MarketFeed,
    MarketWindow,
} from '../data/polymarket/types.js';

export interface MarketSchedulerDeps {
    discovery: MarketDiscovery;
    feed: MarketFeed;
    writer: RecordSink;
    detector: Pick<ArbitrageDetector, 'setMarket' | 'updateBook'>;
    metaStore: Pick<MarketMetaStore, 'save'>;
}

export interface MarketSchedulerOptions {
    /** Wait after a failed or empty discovery */
    retryDelayMs?: number;
    /** Lower bound on the time a window stays active */
    minActiveMs?: number;
    now?: () => number;
}

export const UNKNOWN_SLUG = 'unknown';

/**
 * Drives the window lifecycle: discover the current window, persist its
 * metadata, point the detector at it, stream its feed until the window ends,
 * tear the feed down and start over. Runs until `signal` aborts.
 */
export class MarketScheduler {
    private readonly retryDelayMs: number;
    private readonly minActiveMs: number;
    private readonly now: () => number;
    private activeSlug: string | null = null;

    constructor(private readonly deps: MarketSchedulerDeps, options: MarketSchedulerOptions = {}) {
        this.retryDelayMs = options.retryDelayMs ?? 30000;
        this.minActiveMs = options.minActiveMs ?? 1000;
        this.now = options.now ?? Date.now;
    }

    getCurrentSlug(): string {
        return this.activeSlug ?? UNKNOWN_SLUG;
    }

    async run(signal: AbortSignal): Promise<void> {
        logger.info('scheduler.started', { retryDelayMs: this.retryDelayMs });

        while (!signal.aborted) {
            const result = await this.discover(signal);
            if (!result) {
                await sleep(this.retryDelayMs, signal);
                continue;
            }
            if (!result.current) {
                logger.warn('scheduler.no_current_window', { retryInMs: this.retryDelayMs });
                await sleep(this.retryDelayMs, signal);
                continue;
            }

            const window = result.current;
            try {
                await this.deps.metaStore.save(window);
            } catch (error) {
                logger.error('scheduler.meta_save_failed', {
                    slug: window.slug,
                    error: describeError(error),
                    retryInMs: this.retryDelayMs,
                });
                await sleep(this.retryDelayMs, signal);
                continue;
            }
            if (signal.aborted) {
                break;
            }

            await this.runWindow(window, result.next, signal);
        }

        logger.info('scheduler.stopped', {});
    }

    private async discover(signal: AbortSignal): Promise<DiscoveryResult | null> {
        try {
            return await this.deps.discovery.discoverCurrentAndNext(signal);
        } catch (error) {
            if (signal.aborted) {
                return null;
            }
            logger.warn('scheduler.discovery_failed', {
                error: describeError(error),
                retryInMs: this.retryDelayMs,
            });
            return null;
        }
    }

    /**
     * ACTIVE → TEARDOWN for one window. The feed is always stopped and awaited
     * before this returns, also when the outer signal aborts mid-window.
     */
    private async runWindow(window: MarketWindow, next: MarketWindow | null, signal: AbortSignal): Promise<void> {
        this.activeSlug = window.slug;
        this.deps.detector.setMarket(window);

        const feedController = new AbortController();
        const feedTask = this.deps.feed
            .run(window.instrumentIds, this.handlersFor(window), feedController.signal)
            .catch(error => {
                logger.error('scheduler.feed_failed', { slug: window.slug, error: describeError(error) });
            });

        const activeMs = Math.max(this.minActiveMs, window.endTimeMs - this.now());
        logger.info('scheduler.window_active', {
            slug: window.slug,
            endTime: window.endTime.toISOString(),
            activeMs,
            next: next ? next.slug : null,
        });

        await sleep(activeMs, signal);

        feedController.abort();
        await feedTask;
        this.activeSlug = null;
        logger.info('scheduler.window_closed', { slug: window.slug });
    }

    /**
     * Every record is tagged with the window the feed was started for
     */
    private handlersFor(window: MarketWindow): FeedHandlers {
        const { writer, detector } = this.deps;
        const windowSlug = window.slug;

        return {
            onBook: event => {
                writer.enqueueSnapshot({
                    windowSlug,
                    eventTimeMs: event.timestampMs,
                    instrumentId: event.assetId,
                    marketId: event.market,
                    bids: event.bids,
                    asks: event.asks,
                });
                detector.updateBook(windowSlug, event.timestampMs, event.assetId, event.bids, event.asks);
            },
            onPriceChange: event => {
                for (const change of event.changes) {
                    writer.enqueueTick({
                        windowSlug,
                        eventTimeMs: event.timestampMs,
                        instrumentId: change.assetId,
                        marketId: event.market,
                        price: change.price,
                        size: change.size,
                        side: change.side,
                        bestBid: change.bestBid,
                        bestAsk: change.bestAsk,
                    });
                }
            },
            onTrade: event => {
                writer.enqueueTrade({
                    windowSlug,
                    eventTimeMs: event.timestampMs,
                    instrumentId: event.assetId,
                    marketId: event.market,
                    price: event.price,
                    side: event.side,
                    size: event.size,
                });
            },
        };
    }
}
