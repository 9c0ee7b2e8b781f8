import type { OrderbookLevel } from './types.js';

/** No resting bid */
export const EMPTY_BID = 0;
/** No resting ask: a binary outcome never trades above 1 */
export const EMPTY_ASK = 1;

/**
 * Top of book for one outcome
 */
export interface TopOfBook {
    bestBid: number;
    bestAsk: number;
}

/**
 * Best bid = highest bid price, best ask = lowest ask price.
 * Levels arrive in venue order (not necessarily sorted), so every level is scanned.
 * Unparseable prices are skipped; empty sides fall back to 0 / 1.
 */
export function bestBidAsk(bids: readonly OrderbookLevel[], asks: readonly OrderbookLevel[]): TopOfBook {
    let bestBid = EMPTY_BID;
    let hasBid = false;
    for (const level of bids) {
        const price = parseFloat(level.price);
        if (isNaN(price)) {
            continue;
        }
        if (!hasBid || price > bestBid) {
            bestBid = price;
            hasBid = true;
        }
    }

    let bestAsk = EMPTY_ASK;
    let hasAsk = false;
    for (const level of asks) {
        const price = parseFloat(level.price);
        if (isNaN(price)) {
            continue;
        }
        if (!hasAsk || price < bestAsk) {
            bestAsk = price;
            hasAsk = true;
        }
    }

    return { bestBid, bestAsk };
}

/**
 * Mid price; 0 when both sides are empty-valued
 */
export function midPrice(top: TopOfBook): number {
    const total = top.bestBid + top.bestAsk;
    return total > 0 ? total / 2 : 0;
}

/**
 * Ask minus bid, floored at 0 for crossed books
 */
export function spread(top: TopOfBook): number {
    return top.bestAsk > top.bestBid ? top.bestAsk - top.bestBid : 0;
}
