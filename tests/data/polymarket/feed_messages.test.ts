import { describe, expect, it } from 'vitest';
import { eventTypeOf, parseFrame, parseLevel } from '../../../src/data/polymarket/feed_messages.js';

const RECEIVED_AT = 1_700_000_000_000;

describe('parseLevel', () => {
    it('accepts object and tuple levels', () => {
        expect(parseLevel({ price: '0.45', size: '100' })).toEqual({ price: '0.45', size: '100' });
        expect(parseLevel(['0.46', '25'])).toEqual({ price: '0.46', size: '25' });
        expect(parseLevel({ price: 0.5, size: 3 })).toEqual({ price: '0.5', size: '3' });
    });

    it('drops levels without a price', () => {
        expect(parseLevel({ size: '10' })).toBeNull();
        expect(parseLevel(['0.4'])).toBeNull();
        expect(parseLevel(null)).toBeNull();
    });
});

describe('eventTypeOf', () => {
    it('reads either spelling and lowercases', () => {
        expect(eventTypeOf({ event_type: 'BOOK' })).toBe('book');
        expect(eventTypeOf({ eventType: 'Price_Change' })).toBe('price_change');
        expect(eventTypeOf({})).toBe('');
        expect(eventTypeOf('book')).toBe('');
    });
});

describe('parseFrame', () => {
    it('ignores keep-alive replies and non-JSON text', () => {
        expect(parseFrame('PONG', RECEIVED_AT)).toEqual([]);
        expect(parseFrame('pong', RECEIVED_AT)).toEqual([]);
        expect(parseFrame('hello', RECEIVED_AT)).toEqual([]);
        expect(parseFrame('{not json', RECEIVED_AT)).toEqual([]);
    });

    it('normalizes a book with aliased sides', () => {
        const frame = JSON.stringify({
            event_type: 'book',
            asset_id: 'tok-up',
            market: '0xcond',
            timestamp: '1700000000123',
            hash: 'h1',
            buys: [{ price: '0.40', size: '10' }, ['0.42', '5']],
            sells: [{ price: '0.55', size: '7' }],
        });

        expect(parseFrame(frame, RECEIVED_AT)).toEqual([
            {
                kind: 'book',
                assetId: 'tok-up',
                market: '0xcond',
                timestampMs: 1700000000123,
                hash: 'h1',
                bids: [{ price: '0.40', size: '10' }, { price: '0.42', size: '5' }],
                asks: [{ price: '0.55', size: '7' }],
            },
        ]);
    });

    it('prefers bids/asks over the aliases when present', () => {
        const [event] = parseFrame(JSON.stringify({
            event_type: 'book',
            asset_id: 'tok-up',
            bids: [{ price: '0.30', size: '1' }],
            buys: [{ price: '0.99', size: '1' }],
            asks: [],
            sells: [{ price: '0.70', size: '2' }],
        }), RECEIVED_AT);

        expect(event).toMatchObject({
            kind: 'book',
            bids: [{ price: '0.30', size: '1' }],
            asks: [{ price: '0.70', size: '2' }],
        });
    });

    it('falls back to the receive time for a missing or invalid timestamp', () => {
        const events = parseFrame(JSON.stringify([
            { event_type: 'book', asset_id: 'a', bids: [], asks: [] },
            { event_type: 'book', asset_id: 'b', timestamp: 'soon', bids: [], asks: [] },
        ]), RECEIVED_AT);

        expect(events.map(event => event.timestampMs)).toEqual([RECEIVED_AT, RECEIVED_AT]);
    });

    it('drops a book without an asset id', () => {
        expect(parseFrame(JSON.stringify({ event_type: 'book', bids: [], asks: [] }), RECEIVED_AT)).toEqual([]);
    });

    it('normalizes price changes, skipping incomplete entries', () => {
        const frame = JSON.stringify({
            event_type: 'price_change',
            market: '0xcond',
            timestamp: 1700000000500,
            priceChanges: [
                { asset_id: 'tok-up', price: '0.41', size: '12', side: 'BUY', best_bid: '0.41', best_ask: '0.44' },
                { asset_id: 'tok-down', price: '0.57' },
                { price: '0.50' },
            ],
        });

        expect(parseFrame(frame, RECEIVED_AT)).toEqual([
            {
                kind: 'price_change',
                market: '0xcond',
                timestampMs: 1700000000500,
                changes: [
                    { assetId: 'tok-up', price: '0.41', size: '12', side: 'BUY', bestBid: '0.41', bestAsk: '0.44', hash: undefined },
                    { assetId: 'tok-down', price: '0.57', size: '', side: '', bestBid: '', bestAsk: '', hash: undefined },
                ],
            },
        ]);
    });

    it('normalizes last trade prices', () => {
        const frame = JSON.stringify({
            event_type: 'last_trade_price',
            asset_id: 'tok-down',
            market: '0xcond',
            timestamp: '1700000000900',
            price: '0.58',
            side: 'SELL',
            size: '40',
            fee_rate_bps: '0',
        });

        expect(parseFrame(frame, RECEIVED_AT)).toEqual([
            {
                kind: 'trade',
                assetId: 'tok-down',
                market: '0xcond',
                timestampMs: 1700000000900,
                price: '0.58',
                side: 'SELL',
                size: '40',
                feeRateBps: '0',
            },
        ]);
    });

    it('keeps recognized elements of an array frame', () => {
        const events = parseFrame(JSON.stringify([
            { event_type: 'tick_size_change', asset_id: 'a' },
            { event_type: 'book', asset_id: 'a', bids: [], asks: [] },
            { event_type: 'last_trade_price', asset_id: 'a', price: '0.5' },
        ]), RECEIVED_AT);

        expect(events.map(event => event.kind)).toEqual(['book', 'trade']);
    });
});
