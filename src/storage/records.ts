import type { OrderbookLevel } from '../data/polymarket/types.js';

/**
 * Fields shared by every persisted row
 */
interface RecordBase {
    windowSlug: string;
    eventTimeMs: number;
    instrumentId: string;
    marketId: string;
}

export interface SnapshotRecord extends RecordBase {
    bids: OrderbookLevel[];
    asks: OrderbookLevel[];
}

export interface TickRecord extends RecordBase {
    price: string;
    size: string;
    side: string;
    bestBid: string;
    bestAsk: string;
}

export interface TradeRecord extends RecordBase {
    price: string;
    side: string;
    size: string;
}

export type RecordKind = 'snapshot' | 'tick' | 'trade';

export interface RecordByKind {
    snapshot: SnapshotRecord;
    tick: TickRecord;
    trade: TradeRecord;
}

export const RECORD_KINDS: readonly RecordKind[] = ['snapshot', 'tick', 'trade'];

/**
 * Directory of each kind, relative to the data root
 */
export const RECORD_DIRS: Record<RecordKind, readonly string[]> = {
    snapshot: ['orderbook', 'snapshots'],
    tick: ['orderbook', 'ticks'],
    trade: ['trades'],
};

/**
 * Non-blocking producer surface used by the feed handlers
 */
export interface RecordSink {
    enqueueSnapshot(record: SnapshotRecord): void;
    enqueueTick(record: TickRecord): void;
    enqueueTrade(record: TradeRecord): void;
}
