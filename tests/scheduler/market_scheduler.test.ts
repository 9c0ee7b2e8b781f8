import { describe, expect, it, vi } from 'vitest';
import { MarketScheduler, type MarketSchedulerDeps } from '../../src/scheduler/market_scheduler.js';
import type {
    DiscoveryResult,
    FeedHandlers,
    MarketDiscovery,
    MarketFeed,
    MarketWindow,
    OrderbookLevel,
} from '../../src/data/polymarket/types.js';
import type { SnapshotRecord, TickRecord, TradeRecord } from '../../src/storage/records.js';

function windowFor(slug: string, endTimeMs: number): MarketWindow {
    return {
        slug,
        conditionId: '0xcond',
        endTime: new Date(endTimeMs),
        endTimeMs,
        instrumentIds: [`${slug}-up`, `${slug}-down`],
        outcomeLabels: ['Up', 'Down'],
    };
}

type DiscoveryStep = DiscoveryResult | Error;

class ScriptedDiscovery implements MarketDiscovery {
    calls = 0;

    constructor(private readonly steps: DiscoveryStep[]) {}

    async discoverCurrentAndNext(): Promise<DiscoveryResult> {
        this.calls++;
        const step = this.steps.shift() ?? { current: null, next: null };
        if (step instanceof Error) {
            throw step;
        }
        return step;
    }
}

interface FeedRun {
    assetIds: readonly string[];
    handlers: FeedHandlers;
    signal: AbortSignal;
}

class FakeFeed implements MarketFeed {
    readonly runs: FeedRun[] = [];

    constructor(private readonly log: string[]) {}

    run(assetIds: readonly string[], handlers: FeedHandlers, signal: AbortSignal): Promise<void> {
        this.runs.push({ assetIds, handlers, signal });
        this.log.push(`feed:start:${assetIds[0]}`);
        return new Promise(resolve => {
            signal.addEventListener('abort', () => {
                this.log.push(`feed:stop:${assetIds[0]}`);
                resolve();
            }, { once: true });
        });
    }
}

interface Harness {
    log: string[];
    feed: FakeFeed;
    snapshots: SnapshotRecord[];
    ticks: TickRecord[];
    trades: TradeRecord[];
    books: Array<[string, number, string, readonly OrderbookLevel[], readonly OrderbookLevel[]]>;
    deps: MarketSchedulerDeps;
}

function harness(discovery: MarketDiscovery, failSaves = 0): Harness {
    const log: string[] = [];
    const feed = new FakeFeed(log);
    const snapshots: SnapshotRecord[] = [];
    const ticks: TickRecord[] = [];
    const trades: TradeRecord[] = [];
    const books: Harness['books'] = [];
    let savesToFail = failSaves;

    return {
        log,
        feed,
        snapshots,
        ticks,
        trades,
        books,
        deps: {
            discovery,
            feed,
            writer: {
                enqueueSnapshot: record => { snapshots.push(record); },
                enqueueTick: record => { ticks.push(record); },
                enqueueTrade: record => { trades.push(record); },
            },
            detector: {
                setMarket: window => { log.push(`detector:${window.slug}`); },
                updateBook: (slug, eventTimeMs, instrumentId, bids, asks) => {
                    books.push([slug, eventTimeMs, instrumentId, bids, asks]);
                    return null;
                },
            },
            metaStore: {
                save: async window => {
                    if (savesToFail > 0) {
                        savesToFail--;
                        throw new Error('disk full');
                    }
                    log.push(`meta:${window.slug}`);
                    return `/tmp/meta_${window.slug}.json`;
                },
            },
        },
    };
}

describe('MarketScheduler', () => {
    it('persists, points the detector, streams and tears down each window in turn', async () => {
        const discovery = new ScriptedDiscovery([
            { current: windowFor('w1', 0), next: windowFor('w2', 300000) },
            { current: windowFor('w2', 0), next: null },
        ]);
        const h = harness(discovery);
        const scheduler = new MarketScheduler(h.deps, { retryDelayMs: 10, minActiveMs: 20, now: () => 0 });
        const controller = new AbortController();

        const running = scheduler.run(controller.signal);
        await vi.waitFor(() => expect(h.log).toContain('feed:stop:w2-up'));
        controller.abort();
        await running;

        expect(h.log).toEqual([
            'meta:w1',
            'detector:w1',
            'feed:start:w1-up',
            'feed:stop:w1-up',
            'meta:w2',
            'detector:w2',
            'feed:start:w2-up',
            'feed:stop:w2-up',
        ]);
        expect(h.feed.runs.map(run => run.assetIds)).toEqual([
            ['w1-up', 'w1-down'],
            ['w2-up', 'w2-down'],
        ]);
    });

    it('tags every record with the active window', async () => {
        const discovery = new ScriptedDiscovery([{ current: windowFor('w1', 60000), next: null }]);
        const h = harness(discovery);
        const scheduler = new MarketScheduler(h.deps, { now: () => 0 });
        const controller = new AbortController();

        expect(scheduler.getCurrentSlug()).toBe('unknown');
        const running = scheduler.run(controller.signal);
        await vi.waitFor(() => expect(h.feed.runs).toHaveLength(1));
        expect(scheduler.getCurrentSlug()).toBe('w1');

        const { handlers } = h.feed.runs[0];
        const bids = [{ price: '0.40', size: '10' }];
        const asks = [{ price: '0.45', size: '5' }];
        await handlers.onBook?.({ kind: 'book', assetId: 'w1-up', market: '0xcond', timestampMs: 11, bids, asks });
        await handlers.onPriceChange?.({
            kind: 'price_change',
            market: '0xcond',
            timestampMs: 12,
            changes: [
                { assetId: 'w1-up', price: '0.41', size: '3', side: 'BUY', bestBid: '0.41', bestAsk: '0.45' },
                { assetId: 'w1-down', price: '0.58', size: '0', side: 'SELL', bestBid: '0.55', bestAsk: '0.58' },
            ],
        });
        await handlers.onTrade?.({
            kind: 'trade',
            assetId: 'w1-down',
            market: '0xcond',
            timestampMs: 13,
            price: '0.56',
            side: 'BUY',
            size: '2',
        });

        expect(h.snapshots).toEqual([
            { windowSlug: 'w1', eventTimeMs: 11, instrumentId: 'w1-up', marketId: '0xcond', bids, asks },
        ]);
        expect(h.books).toEqual([['w1', 11, 'w1-up', bids, asks]]);
        expect(h.ticks).toEqual([
            {
                windowSlug: 'w1', eventTimeMs: 12, instrumentId: 'w1-up', marketId: '0xcond',
                price: '0.41', size: '3', side: 'BUY', bestBid: '0.41', bestAsk: '0.45',
            },
            {
                windowSlug: 'w1', eventTimeMs: 12, instrumentId: 'w1-down', marketId: '0xcond',
                price: '0.58', size: '0', side: 'SELL', bestBid: '0.55', bestAsk: '0.58',
            },
        ]);
        expect(h.trades).toEqual([
            { windowSlug: 'w1', eventTimeMs: 13, instrumentId: 'w1-down', marketId: '0xcond', price: '0.56', side: 'BUY', size: '2' },
        ]);

        controller.abort();
        await running;

        expect(h.feed.runs[0].signal.aborted).toBe(true);
        expect(h.log).toContain('feed:stop:w1-up');
        expect(scheduler.getCurrentSlug()).toBe('unknown');
    });

    it('retries after discovery failures, empty results and metadata failures', async () => {
        const discovery = new ScriptedDiscovery([
            new Error('gamma down'),
            { current: null, next: null },
            { current: windowFor('w1', 60000), next: null },
            { current: windowFor('w1', 60000), next: null },
        ]);
        const h = harness(discovery, 1);
        const scheduler = new MarketScheduler(h.deps, { retryDelayMs: 10, now: () => 0 });
        const controller = new AbortController();

        const running = scheduler.run(controller.signal);
        await vi.waitFor(() => expect(h.feed.runs).toHaveLength(1));
        controller.abort();
        await running;

        expect(discovery.calls).toBe(4);
        expect(h.log).toEqual(['meta:w1', 'detector:w1', 'feed:start:w1-up', 'feed:stop:w1-up']);
    });

    it('stops promptly while waiting to retry', async () => {
        const discovery = new ScriptedDiscovery([new Error('gamma down')]);
        const h = harness(discovery);
        const scheduler = new MarketScheduler(h.deps, { retryDelayMs: 60000 });
        const controller = new AbortController();

        const running = scheduler.run(controller.signal);
        await vi.waitFor(() => expect(discovery.calls).toBe(1));
        controller.abort();
        await running;

        expect(h.feed.runs).toHaveLength(0);
    });

    it('hands its signal to discovery so a hanging lookup ends on stop', async () => {
        const signals: AbortSignal[] = [];
        const discovery: MarketDiscovery = {
            discoverCurrentAndNext: signal => new Promise((_resolve, reject) => {
                if (signal) {
                    signals.push(signal);
                    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
                }
            }),
        };
        const h = harness(discovery);
        const scheduler = new MarketScheduler(h.deps, { retryDelayMs: 60000 });
        const controller = new AbortController();

        const running = scheduler.run(controller.signal);
        await vi.waitFor(() => expect(signals).toHaveLength(1));
        controller.abort();
        await running;

        expect(signals[0]).toBe(controller.signal);
        expect(h.feed.runs).toHaveLength(0);
    });
});
