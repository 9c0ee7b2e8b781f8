/**
 * Polymarket orderbook level
 */
export interface OrderbookLevel {
    price: string;      // Price as decimal string from the venue
    size: string;       // Quantity as decimal string from the venue
}

/**
 * One time-boxed binary market instance (e.g. a single 5-minute BTC Up/Down window)
 */
export interface MarketWindow {
    readonly slug: string;
    readonly conditionId: string;
    readonly endTime: Date;
    readonly endTimeMs: number;
    /** CLOB token ids, order-correspondent with `outcomeLabels` */
    readonly instrumentIds: readonly [string, string];
    readonly outcomeLabels: readonly [string, string];
}

/**
 * Current and upcoming windows, as returned by discovery
 */
export interface DiscoveryResult {
    current: MarketWindow | null;
    next: MarketWindow | null;
}

export interface MarketDiscovery {
    discoverCurrentAndNext(signal?: AbortSignal): Promise<DiscoveryResult>;
}

/**
 * Full book for one asset (`book` event)
 */
export interface BookEvent {
    kind: 'book';
    assetId: string;
    market: string;
    timestampMs: number;
    hash?: string;
    bids: OrderbookLevel[];
    asks: OrderbookLevel[];
}

/**
 * Single level change inside a `price_change` event
 */
export interface PriceChange {
    assetId: string;
    price: string;
    size: string;
    side: string;
    bestBid: string;
    bestAsk: string;
    hash?: string;
}

export interface PriceChangeEvent {
    kind: 'price_change';
    market: string;
    timestampMs: number;
    changes: PriceChange[];
}

/**
 * Last trade print (`last_trade_price` event)
 */
export interface TradeEvent {
    kind: 'trade';
    assetId: string;
    market: string;
    timestampMs: number;
    price: string;
    side: string;
    size: string;
    feeRateBps?: string;
}

export type FeedEvent = BookEvent | PriceChangeEvent | TradeEvent;

/**
 * Callbacks invoked by the feed for each normalized event
 */
export interface FeedHandlers {
    onBook?: (event: BookEvent) => void | Promise<void>;
    onPriceChange?: (event: PriceChangeEvent) => void | Promise<void>;
    onTrade?: (event: TradeEvent) => void | Promise<void>;
}

export interface MarketFeed {
    run(assetIds: readonly string[], handlers: FeedHandlers, signal: AbortSignal): Promise<void>;
}
