import { z } from 'zod';
import { logger, describeError } from '../../infra/logger.js';
import { sleep } from '../../infra/sleep.js';
import { gammaEventSchema, gammaMarketSchema, type GammaEvent } from './gamma_types.js';
import type { DiscoveryResult, MarketDiscovery, MarketWindow } from './types.js';

const GAMMA_BASE_URL = 'https://gamma-api.polymarket.com';

const DEFAULT_OUTCOMES: readonly [string, string] = ['Up', 'Down'];

/**
 * Network-level failure (connect error, timeout) that outlived the retry budget
 */
export class GammaTransportError extends Error {
    constructor(message: string, readonly attempts: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GammaTransportError';
    }
}

/**
 * Non-2xx response from Gamma
 */
export class GammaHttpError extends Error {
    constructor(readonly status: number, statusText: string) {
        super(`Gamma API error: ${status} ${statusText}`);
        this.name = 'GammaHttpError';
    }
}

export interface GammaClientOptions {
    baseUrl?: string;
    /** Only events whose slug starts with this prefix are windows */
    slugPrefix?: string;
    limit?: number;
    timeoutMs?: number;
    retries?: number;
    retryDelayMs?: number;
    fetchFn?: typeof fetch;
    now?: () => number;
}

/**
 * Gamma API client for discovering the rolling series of short Up/Down windows
 * via the events endpoint (ordered by end date, not yet ended).
 */
export class GammaClient implements MarketDiscovery {
    private readonly baseUrl: string;
    private readonly slugPrefix: string;
    private readonly limit: number;
    private readonly timeoutMs: number;
    private readonly retries: number;
    private readonly retryDelayMs: number;
    private readonly fetchFn: typeof fetch;
    private readonly now: () => number;

    constructor(options: GammaClientOptions = {}) {
        this.baseUrl = (options.baseUrl ?? GAMMA_BASE_URL).replace(/\/+$/, '');
        this.slugPrefix = options.slugPrefix ?? 'btc-updown-5m';
        this.limit = options.limit ?? 80;
        this.timeoutMs = options.timeoutMs ?? 20000;
        this.retries = Math.max(1, options.retries ?? 3);
        this.retryDelayMs = options.retryDelayMs ?? 5000;
        this.fetchFn = options.fetchFn ?? fetch;
        this.now = options.now ?? Date.now;
    }

    /**
     * Current = nearest matching window that has not ended yet; next = the one after it.
     * Retries transport failures; HTTP status errors are thrown immediately.
     * Aborting `signal` cancels the request in flight and the retry wait.
     */
    async discoverCurrentAndNext(signal?: AbortSignal): Promise<DiscoveryResult> {
        let lastError: unknown = null;

        for (let attempt = 1; attempt <= this.retries; attempt++) {
            try {
                const windows = await this.fetchUpcomingWindows(signal);
                return {
                    current: windows[0] ?? null,
                    next: windows[1] ?? null,
                };
            } catch (error) {
                if (signal?.aborted || !isTransportError(error)) {
                    throw error;
                }
                lastError = error;
                if (attempt < this.retries) {
                    logger.warn('gamma.discovery.retry', {
                        attempt,
                        error: describeError(error),
                        retryInMs: this.retryDelayMs,
                    });
                    await sleep(this.retryDelayMs, signal);
                    if (signal?.aborted) {
                        throw new GammaTransportError('Gamma discovery aborted', attempt, { cause: signal.reason });
                    }
                }
            }
        }

        logger.error('gamma.discovery.failed', {
            attempts: this.retries,
            error: describeError(lastError),
        });
        throw new GammaTransportError(
            `Gamma API unreachable after ${this.retries} attempts: ${describeError(lastError)}`,
            this.retries,
            { cause: lastError }
        );
    }

    /**
     * Matching windows with an end date in the future, soonest first
     */
    async fetchUpcomingWindows(signal?: AbortSignal): Promise<MarketWindow[]> {
        const params = new URLSearchParams({
            closed: 'false',
            limit: String(this.limit),
            order: 'endDate',
            ascending: 'true',
            end_date_min: new Date(this.now()).toISOString(),
        });
        const url = `${this.baseUrl}/events?${params.toString()}`;

        logger.debug('gamma.events.request', { url });

        const timeout = AbortSignal.timeout(this.timeoutMs);
        const response = await this.fetchFn(url, { signal: signal ? AbortSignal.any([signal, timeout]) : timeout });
        if (!response.ok) {
            throw new GammaHttpError(response.status, response.statusText);
        }

        const body: unknown = await response.json();
        const events = z.array(z.unknown()).safeParse(body);
        if (!events.success) {
            logger.warn('gamma.events.unexpected_body', { type: typeof body });
            return [];
        }

        const windows: MarketWindow[] = [];
        for (const raw of events.data) {
            const event = gammaEventSchema.safeParse(raw);
            if (!event.success) {
                continue;
            }
            const window = this.eventToWindow(event.data);
            if (window) {
                windows.push(window);
            }
        }

        windows.sort((a, b) => a.endTimeMs - b.endTimeMs);

        logger.debug('gamma.events.complete', {
            events: events.data.length,
            windows: windows.length,
        });

        return windows;
    }

    /**
     * Map a Gamma event onto a window; null when it is not a usable window of the series
     */
    eventToWindow(event: GammaEvent): MarketWindow | null {
        if (!event.slug.startsWith(this.slugPrefix)) {
            return null;
        }

        const firstMarket = event.markets?.[0];
        if (firstMarket === undefined) {
            logger.warn('gamma.event.no_markets', { slug: event.slug });
            return null;
        }

        const market = gammaMarketSchema.safeParse(firstMarket);
        if (!market.success) {
            logger.warn('gamma.market.parse_error', {
                slug: event.slug,
                error: market.error.issues.map(issue => issue.message).join('; '),
            });
            return null;
        }

        const tokenIds = market.data.clobTokenIds;
        if (tokenIds.length < 2) {
            logger.warn('gamma.market.invalid_token_ids', {
                slug: event.slug,
                tokenIds,
            });
            return null;
        }

        const endTime = parseEndDate([market.data.endDate, market.data.end_date_iso, market.data.endDateIso]);
        if (!endTime) {
            logger.warn('gamma.market.invalid_end_date', {
                slug: event.slug,
                endDate: market.data.endDate ?? null,
            });
            return null;
        }

        const labels = market.data.outcomes.length >= 2 ? market.data.outcomes : market.data.shortOutcomes;
        const outcomeLabels: readonly [string, string] = labels.length >= 2
            ? [labels[0], labels[1]]
            : DEFAULT_OUTCOMES;

        return {
            slug: event.slug,
            conditionId: (market.data.conditionId ?? '').trim(),
            endTime,
            endTimeMs: endTime.getTime(),
            instrumentIds: [tokenIds[0], tokenIds[1]],
            outcomeLabels,
        };
    }
}

/**
 * First candidate that parses as an ISO date-time; naive times are read as UTC
 */
export function parseEndDate(candidates: Array<string | undefined>): Date | null {
    for (const candidate of candidates) {
        if (!candidate || !candidate.includes('T')) {
            continue;
        }
        const hasZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(candidate);
        const date = new Date(hasZone ? candidate : `${candidate}Z`);
        if (!isNaN(date.getTime())) {
            return date;
        }
    }
    return null;
}

// fetch rejects with TypeError on network failure and TimeoutError/AbortError on timeout
function isTransportError(error: unknown): boolean {
    if (error instanceof GammaHttpError) {
        return false;
    }
    if (error instanceof TypeError) {
        return true;
    }
    return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}
