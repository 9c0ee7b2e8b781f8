import { BoundedQueue } from '../infra/bounded_queue.js';
import { logger, describeError } from '../infra/logger.js';
import { bestBidAsk, type TopOfBook } from '../data/polymarket/orderbook_metrics.js';
import type { MarketWindow, OrderbookLevel } from '../data/polymarket/types.js';
import type { AlertSink, ArbitrageDirection, ArbitrageSignal, DiscardReason, OutcomeQuote } from './types.js';

export interface ArbitrageDetectorOptions {
    sink?: AlertSink | null;
    buyThreshold?: number;
    sellThreshold?: number;
    minIntervalMs?: number;
    queueCapacity?: number;
    /** Bounded wait of the sender loop on an empty queue */
    pollTimeoutMs?: number;
    now?: () => number;
}

export interface DetectorStats {
    evaluations: number;
    signals: number;
    sent: number;
    discarded: Record<DiscardReason, number>;
}

/**
 * Real-time two-sided arbitrage detector for the active window.
 *
 * `updateBook` runs inside the feed callback and does no I/O: it refreshes the
 * top of book of one outcome and, once both outcomes have been seen since
 * `setMarket`, checks `sumAsk < buyThreshold` and `sumBid > sellThreshold`.
 * Violations go to a bounded queue; a background sender posts them to the sink,
 * at most once per `(slug, direction)` every `minIntervalMs`.
 */
export class ArbitrageDetector {
    private readonly sink: AlertSink | null;
    private readonly buyThreshold: number;
    private readonly sellThreshold: number;
    private readonly minIntervalMs: number;
    private readonly pollTimeoutMs: number;
    private readonly now: () => number;

    private currentSlug: string | null = null;
    private readonly bookState = new Map<string, TopOfBook>();
    private assetToOutcome = new Map<string, string>();

    private readonly signalQueue: BoundedQueue<ArbitrageSignal>;
    private readonly lastSent = new Map<string, number>();
    private controller: AbortController | null = null;
    private sender: Promise<void> | null = null;

    private evaluations = 0;
    private signals = 0;
    private sent = 0;
    private readonly discarded: Record<DiscardReason, number> = {
        no_sink: 0,
        queue_full: 0,
        rate_limited: 0,
        post_failed: 0,
    };

    constructor(options: ArbitrageDetectorOptions = {}) {
        this.sink = options.sink ?? null;
        this.buyThreshold = options.buyThreshold ?? 0.99;
        this.sellThreshold = options.sellThreshold ?? 1.01;
        this.minIntervalMs = options.minIntervalMs ?? 30000;
        this.pollTimeoutMs = options.pollTimeoutMs ?? 1000;
        this.now = options.now ?? Date.now;
        this.signalQueue = new BoundedQueue<ArbitrageSignal>(options.queueCapacity ?? 1000, 'reject');

        logger.info('arb.detector.init', {
            buyThreshold: this.buyThreshold,
            sellThreshold: this.sellThreshold,
            minIntervalMs: this.minIntervalMs,
            alerts: this.sink ? 'enabled' : 'disabled',
        });
    }

    /**
     * Reset book state and rebuild the instrument → outcome map for a new window
     */
    setMarket(window: MarketWindow): void {
        this.currentSlug = window.slug;
        this.bookState.clear();
        this.assetToOutcome = new Map([
            [window.instrumentIds[0], window.outcomeLabels[0]],
            [window.instrumentIds[1], window.outcomeLabels[1]],
        ]);
    }

    /**
     * Hot path. Returns the signal when the update produced one (whether or not it was queued).
     */
    updateBook(
        slug: string,
        eventTimeMs: number,
        instrumentId: string,
        bids: readonly OrderbookLevel[],
        asks: readonly OrderbookLevel[]
    ): ArbitrageSignal | null {
        if (!instrumentId || slug !== this.currentSlug || !this.assetToOutcome.has(instrumentId)) {
            return null;
        }

        this.bookState.set(instrumentId, bestBidAsk(bids, asks));
        if (this.bookState.size !== 2) {
            return null;
        }

        this.evaluations++;
        let sumAsk = 0;
        let sumBid = 0;
        const quotes: OutcomeQuote[] = [];
        for (const [assetId, top] of this.bookState) {
            sumAsk += top.bestAsk;
            sumBid += top.bestBid;
            quotes.push({
                outcome: this.assetToOutcome.get(assetId) ?? assetId,
                instrumentId: assetId,
                bestBid: top.bestBid,
                bestAsk: top.bestAsk,
            });
        }

        const buyOpportunity = sumAsk < this.buyThreshold;
        const sellOpportunity = sumBid > this.sellThreshold;
        if (!buyOpportunity && !sellOpportunity) {
            return null;
        }

        const signal: ArbitrageSignal = {
            windowSlug: slug,
            eventTimeMs,
            sumAsk,
            sumBid,
            buyOpportunity,
            sellOpportunity,
            quotes,
        };
        this.signals++;

        if (!this.sink) {
            this.discarded.no_sink++;
            logger.debug('arb.signal', { ...signalSummary(signal), delivered: false });
            return signal;
        }

        if (!this.signalQueue.push(signal)) {
            this.discarded.queue_full++;
        }
        return signal;
    }

    start(): void {
        if (this.sender) {
            return;
        }
        this.controller = new AbortController();
        this.sender = this.senderLoop(this.controller.signal);
        logger.info('arb.sender.started', { alerts: this.sink ? 'enabled' : 'disabled' });
    }

    /**
     * Cancels the sender; signals still queued are dropped (they are advisory)
     */
    async stop(): Promise<void> {
        if (this.controller) {
            this.controller.abort();
        }
        if (this.sender) {
            await this.sender;
        }
        this.controller = null;
        this.sender = null;
        logger.info('arb.sender.stopped', { ...this.getStats(), pending: this.signalQueue.size });
    }

    getStats(): DetectorStats {
        return {
            evaluations: this.evaluations,
            signals: this.signals,
            sent: this.sent,
            discarded: { ...this.discarded },
        };
    }

    private async senderLoop(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            const next = await this.signalQueue.take(this.pollTimeoutMs, signal);
            if (!next) {
                continue;
            }
            await this.deliver(next);
        }
    }

    /**
     * Each flagged direction is gated and posted independently
     */
    private async deliver(signal: ArbitrageSignal): Promise<void> {
        const sink = this.sink;
        if (!sink) {
            return;
        }

        const directions: ArbitrageDirection[] = [];
        if (signal.buyOpportunity) {
            directions.push('buy');
        }
        if (signal.sellOpportunity) {
            directions.push('sell');
        }

        for (const direction of directions) {
            const key = `${signal.windowSlug}:${direction}`;
            const last = this.lastSent.get(key);
            if (last !== undefined && this.now() - last < this.minIntervalMs) {
                this.discarded.rate_limited++;
                continue;
            }
            try {
                await sink.post(signal, direction);
                this.lastSent.set(key, this.now());
                this.sent++;
                logger.warn('arb.signal', { ...signalSummary(signal), direction, delivered: true });
            } catch (error) {
                this.discarded.post_failed++;
                logger.error('arb.alert.failed', {
                    slug: signal.windowSlug,
                    direction,
                    error: describeError(error),
                });
            }
        }
    }
}

function signalSummary(signal: ArbitrageSignal): Record<string, unknown> {
    return {
        slug: signal.windowSlug,
        eventTimeMs: signal.eventTimeMs,
        sumAsk: signal.sumAsk.toFixed(4),
        sumBid: signal.sumBid.toFixed(4),
        buy: signal.buyOpportunity,
        sell: signal.sellOpportunity,
    };
}
