import { z } from 'zod';
import type { BookEvent, FeedEvent, OrderbookLevel, PriceChange, PriceChangeEvent, TradeEvent } from './types.js';

/**
 * Venue decimals arrive as strings, occasionally as numbers
 */
const decimal = z.union([z.string(), z.number()]).transform(val => String(val).trim());

const optionalDecimal = decimal.optional().catch(undefined);

const levelObject = z.object({ price: decimal, size: decimal.default('0') });
const levelTuple = z.tuple([decimal, decimal]).rest(z.unknown());

const rawEnvelope = z.object({
    event_type: z.string().optional(),
    eventType: z.string().optional(),
}).passthrough();

const rawBook = z.object({
    asset_id: z.string().min(1),
    market: z.string().default(''),
    timestamp: optionalDecimal,
    hash: z.string().optional().catch(undefined),
    bids: z.array(z.unknown()).optional().catch(undefined),
    buys: z.array(z.unknown()).optional().catch(undefined),
    asks: z.array(z.unknown()).optional().catch(undefined),
    sells: z.array(z.unknown()).optional().catch(undefined),
});

const rawPriceChange = z.object({
    market: z.string().default(''),
    timestamp: optionalDecimal,
    price_changes: z.array(z.unknown()).optional().catch(undefined),
    priceChanges: z.array(z.unknown()).optional().catch(undefined),
});

const rawChangeEntry = z.object({
    asset_id: z.string().min(1),
    price: decimal,
    size: decimal.default(''),
    side: z.string().default(''),
    best_bid: decimal.default(''),
    best_ask: decimal.default(''),
    hash: z.string().optional().catch(undefined),
});

const rawTrade = z.object({
    asset_id: z.string().min(1),
    market: z.string().default(''),
    timestamp: optionalDecimal,
    price: decimal,
    side: z.string().default(''),
    size: decimal.default(''),
    fee_rate_bps: optionalDecimal,
});

/**
 * Parse one level; both `{price, size}` and `[price, size]` shapes are accepted
 */
export function parseLevel(raw: unknown): OrderbookLevel | null {
    const asObject = levelObject.safeParse(raw);
    if (asObject.success) {
        return asObject.data;
    }
    const asTuple = levelTuple.safeParse(raw);
    if (asTuple.success) {
        return { price: asTuple.data[0], size: asTuple.data[1] };
    }
    return null;
}

function parseLevels(raw: unknown[] | undefined): OrderbookLevel[] {
    const out: OrderbookLevel[] = [];
    for (const entry of raw ?? []) {
        const level = parseLevel(entry);
        if (level) {
            out.push(level);
        }
    }
    return out;
}

// `bids`/`asks` win unless empty, then the `buys`/`sells` aliases
function pickAliased(primary: unknown[] | undefined, alias: unknown[] | undefined): unknown[] {
    if (primary && primary.length > 0) {
        return primary;
    }
    return alias ?? [];
}

function parseTimestamp(raw: string | undefined, receivedAtMs: number): number {
    if (raw === undefined || raw === '') {
        return receivedAtMs;
    }
    const value = Number(raw);
    return Number.isFinite(value) && value > 0 ? Math.trunc(value) : receivedAtMs;
}

/**
 * Event type of a raw message, lowercased; '' when absent
 */
export function eventTypeOf(message: unknown): string {
    const envelope = rawEnvelope.safeParse(message);
    if (!envelope.success) {
        return '';
    }
    return (envelope.data.event_type || envelope.data.eventType || '').toLowerCase();
}

export function normalizeBook(message: unknown, receivedAtMs: number): BookEvent | null {
    const parsed = rawBook.safeParse(message);
    if (!parsed.success) {
        return null;
    }
    const raw = parsed.data;
    return {
        kind: 'book',
        assetId: raw.asset_id,
        market: raw.market,
        timestampMs: parseTimestamp(raw.timestamp, receivedAtMs),
        hash: raw.hash,
        bids: parseLevels(pickAliased(raw.bids, raw.buys)),
        asks: parseLevels(pickAliased(raw.asks, raw.sells)),
    };
}

export function normalizePriceChange(message: unknown, receivedAtMs: number): PriceChangeEvent | null {
    const parsed = rawPriceChange.safeParse(message);
    if (!parsed.success) {
        return null;
    }
    const raw = parsed.data;

    const changes: PriceChange[] = [];
    for (const entry of pickAliased(raw.price_changes, raw.priceChanges)) {
        const change = rawChangeEntry.safeParse(entry);
        if (!change.success) {
            continue;
        }
        changes.push({
            assetId: change.data.asset_id,
            price: change.data.price,
            size: change.data.size,
            side: change.data.side,
            bestBid: change.data.best_bid,
            bestAsk: change.data.best_ask,
            hash: change.data.hash,
        });
    }

    return {
        kind: 'price_change',
        market: raw.market,
        timestampMs: parseTimestamp(raw.timestamp, receivedAtMs),
        changes,
    };
}

export function normalizeTrade(message: unknown, receivedAtMs: number): TradeEvent | null {
    const parsed = rawTrade.safeParse(message);
    if (!parsed.success) {
        return null;
    }
    const raw = parsed.data;
    return {
        kind: 'trade',
        assetId: raw.asset_id,
        market: raw.market,
        timestampMs: parseTimestamp(raw.timestamp, receivedAtMs),
        price: raw.price,
        side: raw.side,
        size: raw.size,
        feeRateBps: raw.fee_rate_bps,
    };
}

/**
 * Classify and normalize one decoded message. Unknown or malformed messages yield null.
 */
export function normalizeMessage(message: unknown, receivedAtMs: number): FeedEvent | null {
    const eventType = eventTypeOf(message);
    if (eventType === 'book') {
        return normalizeBook(message, receivedAtMs);
    }
    if (eventType.includes('price_change')) {
        return normalizePriceChange(message, receivedAtMs);
    }
    if (eventType.includes('last_trade')) {
        return normalizeTrade(message, receivedAtMs);
    }
    return null;
}

/**
 * Decode one text frame. `PONG` replies, non-JSON text and unrecognized
 * messages produce no events; a JSON array yields one event per recognized element.
 */
export function parseFrame(text: string, receivedAtMs: number = Date.now()): FeedEvent[] {
    const trimmed = text.trim();
    if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
        return [];
    }

    let decoded: unknown;
    try {
        decoded = JSON.parse(trimmed);
    } catch {
        return [];
    }

    const messages = Array.isArray(decoded) ? decoded : [decoded];
    const events: FeedEvent[] = [];
    for (const message of messages) {
        const event = normalizeMessage(message, receivedAtMs);
        if (event) {
            events.push(event);
        }
    }
    return events;
}
