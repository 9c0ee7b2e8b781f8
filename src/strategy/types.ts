/**
 * `buy`: both asks sum below the buy threshold (buy both outcomes for < 1).
 * `sell`: both bids sum above the sell threshold (sell both outcomes for > 1).
 */
export type ArbitrageDirection = 'buy' | 'sell';

/**
 * Top of book of one outcome at signal time
 */
export interface OutcomeQuote {
    outcome: string;
    instrumentId: string;
    bestBid: number;
    bestAsk: number;
}

/**
 * Two-sided invariant violation detected on a book update
 */
export interface ArbitrageSignal {
    windowSlug: string;
    eventTimeMs: number;
    sumAsk: number;
    sumBid: number;
    buyOpportunity: boolean;
    sellOpportunity: boolean;
    quotes: OutcomeQuote[];
}

/**
 * Why a signal (or one direction of it) was not delivered
 */
export type DiscardReason =
    | 'no_sink'
    | 'queue_full'
    | 'rate_limited'
    | 'post_failed';

export interface AlertSink {
    post(signal: ArbitrageSignal, direction: ArbitrageDirection): Promise<void>;
}
