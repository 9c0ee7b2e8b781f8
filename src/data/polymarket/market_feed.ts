import WebSocket from 'ws';
import { logger, describeError } from '../../infra/logger.js';
import { sleep } from '../../infra/sleep.js';
import { parseFrame } from './feed_messages.js';
import type { FeedEvent, FeedHandlers, MarketFeed } from './types.js';

export const CLOB_MARKET_WS_URL = 'wss://ws-subscriptions-clob.polymarket.com/ws/market';

export interface PolymarketFeedOptions {
    url?: string;
    pingIntervalMs?: number;
    reconnectDelayMs?: number;
    openTimeoutMs?: number;
}

/**
 * Connection counters since construction
 */
export interface FeedStats {
    connects: number;
    reconnects: number;
    frames: number;
    events: number;
    droppedFrames: number;
    handlerErrors: number;
}

const DEFAULTS: Required<PolymarketFeedOptions> = {
    url: CLOB_MARKET_WS_URL,
    pingIntervalMs: 10000,
    reconnectDelayMs: 5000,
    openTimeoutMs: 45000,
};

/**
 * Polymarket CLOB market-channel client.
 *
 * One `run` call keeps one logical subscription alive for a fixed asset set:
 * connect, subscribe, PING every `pingIntervalMs`, and on any disconnect wait
 * `reconnectDelayMs` (fixed) and start over, until the signal aborts.
 */
export class PolymarketFeed implements MarketFeed {
    private readonly options: Required<PolymarketFeedOptions>;
    private readonly stats: FeedStats = {
        connects: 0,
        reconnects: 0,
        frames: 0,
        events: 0,
        droppedFrames: 0,
        handlerErrors: 0,
    };

    constructor(options: PolymarketFeedOptions = {}) {
        this.options = { ...DEFAULTS, ...options };
    }

    getStats(): FeedStats {
        return { ...this.stats };
    }

    /**
     * Resolves once `signal` aborts and the socket is closed
     */
    async run(assetIds: readonly string[], handlers: FeedHandlers, signal: AbortSignal): Promise<void> {
        if (assetIds.length === 0) {
            logger.warn('poly.feed.no_assets', { url: this.options.url });
            return;
        }

        let attempt = 0;
        while (!signal.aborted) {
            if (attempt > 0) {
                this.stats.reconnects++;
            }
            attempt++;

            try {
                await this.session(assetIds, handlers, signal);
            } catch (error) {
                logger.warn('poly.feed.connection_error', {
                    error: describeError(error),
                    attempt,
                    reconnectInMs: this.options.reconnectDelayMs,
                });
            }

            if (signal.aborted) {
                break;
            }

            logger.info('poly.feed.reconnecting', {
                attempt: attempt + 1,
                delayMs: this.options.reconnectDelayMs,
            });
            await sleep(this.options.reconnectDelayMs, signal);
        }

        logger.info('poly.feed.stopped', { assets: assetIds.length });
    }

    /**
     * One connection lifetime. Resolves on close, rejects on socket error.
     */
    private session(assetIds: readonly string[], handlers: FeedHandlers, signal: AbortSignal): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const ws = new WebSocket(this.options.url, { handshakeTimeout: this.options.openTimeoutMs });
            let pingTimer: NodeJS.Timeout | null = null;
            let settled = false;
            let failure: Error | null = null;

            const stopPing = () => {
                if (pingTimer) {
                    clearInterval(pingTimer);
                    pingTimer = null;
                }
            };

            const onAbort = () => {
                stopPing();
                if (ws.readyState === WebSocket.CONNECTING) {
                    ws.terminate();
                } else {
                    ws.close();
                }
            };

            const settle = () => {
                if (settled) {
                    return;
                }
                settled = true;
                stopPing();
                signal.removeEventListener('abort', onAbort);
                if (failure && !signal.aborted) {
                    reject(failure);
                } else {
                    resolve();
                }
            };

            signal.addEventListener('abort', onAbort, { once: true });

            ws.on('open', () => {
                this.stats.connects++;
                ws.send(JSON.stringify({ assets_ids: assetIds, type: 'market' }));
                logger.info('poly.feed.subscribed', {
                    assets: assetIds.length,
                    url: this.options.url,
                });

                pingTimer = setInterval(() => {
                    ws.send('PING', error => {
                        if (error) {
                            failure = error;
                            logger.warn('poly.feed.ping_failed', { error: describeError(error) });
                            ws.terminate();
                        }
                    });
                }, this.options.pingIntervalMs);
            });

            ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
                this.handleFrame(data, isBinary, handlers);
            });

            ws.on('error', error => {
                failure = error;
            });

            ws.on('close', (code: number) => {
                const log = signal.aborted ? logger.info : logger.warn;
                log('poly.feed.closed', { code, stopping: signal.aborted });
                settle();
            });

            if (signal.aborted) {
                onAbort();
            }
        });
    }

    private handleFrame(data: WebSocket.RawData, isBinary: boolean, handlers: FeedHandlers): void {
        this.stats.frames++;
        const text = rawDataToString(data, isBinary).trim();
        if (text === 'PONG' || text === 'pong') {
            return;
        }
        const events = parseFrame(text);
        if (events.length === 0) {
            this.stats.droppedFrames++;
            return;
        }
        for (const event of events) {
            this.stats.events++;
            this.dispatch(event, handlers);
        }
    }

    /**
     * Fire-and-forget: a throwing or rejecting handler is logged and isolated
     */
    private dispatch(event: FeedEvent, handlers: FeedHandlers): void {
        try {
            let result: void | Promise<void> = undefined;
            switch (event.kind) {
                case 'book':
                    result = handlers.onBook?.(event);
                    break;
                case 'price_change':
                    result = handlers.onPriceChange?.(event);
                    break;
                case 'trade':
                    result = handlers.onTrade?.(event);
                    break;
            }
            if (result instanceof Promise) {
                result.catch(error => this.reportHandlerError(event, error));
            }
        } catch (error) {
            this.reportHandlerError(event, error);
        }
    }

    private reportHandlerError(event: FeedEvent, error: unknown): void {
        this.stats.handlerErrors++;
        logger.error('poly.feed.handler_error', {
            kind: event.kind,
            error: describeError(error),
        });
    }
}

function rawDataToString(data: WebSocket.RawData, isBinary: boolean): string {
    if (isBinary) {
        return '';
    }
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf-8');
    }
    if (data instanceof ArrayBuffer) {
        return Buffer.from(data).toString('utf-8');
    }
    return data.toString('utf-8');
}
