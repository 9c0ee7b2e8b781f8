import { readFile, readdir } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { bestBidAsk, midPrice, spread } from '../data/polymarket/orderbook_metrics.js';
import { MarketMetaStore, isNotFound, type MarketMeta } from '../storage/market_meta.js';
import { RECORD_DIRS, type SnapshotRecord } from '../storage/records.js';

const levelSchema = z.object({
    price: z.string(),
    size: z.string(),
});

const snapshotRecordSchema = z.object({
    windowSlug: z.string(),
    eventTimeMs: z.number(),
    instrumentId: z.string(),
    marketId: z.string(),
    bids: z.array(levelSchema),
    asks: z.array(levelSchema),
});

export interface AnalysisThresholds {
    buyThreshold: number;
    sellThreshold: number;
}

/**
 * Derived top-of-book figures of one outcome at one timestamp
 */
export interface OutcomeView {
    outcome: string;
    bestBid: number;
    bestAsk: number;
    mid: number;
    spread: number;
}

/**
 * One aligned timestamp of a window: both outcomes observed at the same event time
 */
export interface AnalysisRow {
    slug: string;
    eventTimeMs: number;
    outcomes: [OutcomeView, OutcomeView];
    sumBid: number;
    sumAsk: number;
    buyOpportunity: boolean;
    sellOpportunity: boolean;
}

export interface Range {
    min: number;
    mean: number;
    max: number;
}

export interface AnalysisSummary {
    slugs: string[];
    points: number;
    buyCount: number;
    sellCount: number;
    sumAsk: Range | null;
    sumBid: Range | null;
}

export interface LoadOptions {
    /** Only the first N part files (by name) */
    maxFiles?: number;
}

/**
 * Thresholds `1 - t` (buy) and `1 + t` (sell)
 */
export function thresholdsFromMargin(margin: number): AnalysisThresholds {
    return { buyThreshold: 1 - margin, sellThreshold: 1 + margin };
}

/**
 * Every snapshot row stored for a slug, in part-file order. Rows with an empty
 * side or that do not parse are left out.
 */
export async function loadSnapshotRows(dataDir: string, slug: string, options: LoadOptions = {}): Promise<SnapshotRecord[]> {
    const dir = join(dataDir, ...RECORD_DIRS.snapshot, slug);
    let names: string[];
    try {
        names = await readdir(dir);
    } catch (error) {
        if (isNotFound(error)) {
            return [];
        }
        throw error;
    }

    let files = names.filter(name => name.endsWith('.jsonl')).sort();
    if (options.maxFiles !== undefined) {
        files = files.slice(0, options.maxFiles);
    }

    const rows: SnapshotRecord[] = [];
    for (const file of files) {
        const text = await readFile(join(dir, file), 'utf-8');
        for (const line of text.split('\n')) {
            const record = parseSnapshotLine(line);
            if (record && record.bids.length > 0 && record.asks.length > 0) {
                rows.push(record);
            }
        }
    }
    return rows;
}

function parseSnapshotLine(line: string): SnapshotRecord | null {
    const trimmed = line.trim();
    if (!trimmed) {
        return null;
    }
    let raw: unknown;
    try {
        raw = JSON.parse(trimmed);
    } catch {
        return null;
    }
    const parsed = snapshotRecordSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
}

/**
 * Aligns the two instruments of a window by event time. Timestamps without
 * exactly one row for each instrument are skipped.
 */
export function analyzeSnapshots(
    meta: MarketMeta,
    rows: readonly SnapshotRecord[],
    thresholds: AnalysisThresholds
): AnalysisRow[] {
    const [firstId, secondId] = meta.instrumentIds;
    const byTime = new Map<number, SnapshotRecord[]>();
    for (const row of rows) {
        const group = byTime.get(row.eventTimeMs);
        if (group) {
            group.push(row);
        } else {
            byTime.set(row.eventTimeMs, [row]);
        }
    }

    const result: AnalysisRow[] = [];
    for (const [eventTimeMs, group] of byTime) {
        if (group.length !== 2) {
            continue;
        }
        const first = group.find(row => row.instrumentId === firstId);
        const second = group.find(row => row.instrumentId === secondId);
        if (!first || !second) {
            continue;
        }

        const a = outcomeView(meta.outcomeLabels[0], first);
        const b = outcomeView(meta.outcomeLabels[1], second);
        const sumAsk = a.bestAsk + b.bestAsk;
        const sumBid = a.bestBid + b.bestBid;
        result.push({
            slug: meta.slug,
            eventTimeMs,
            outcomes: [a, b],
            sumBid,
            sumAsk,
            buyOpportunity: sumAsk < thresholds.buyThreshold,
            sellOpportunity: sumBid > thresholds.sellThreshold,
        });
    }

    return result.sort((x, y) => x.eventTimeMs - y.eventTimeMs);
}

function outcomeView(outcome: string, row: SnapshotRecord): OutcomeView {
    const top = bestBidAsk(row.bids, row.asks);
    return {
        outcome,
        bestBid: top.bestBid,
        bestAsk: top.bestAsk,
        mid: midPrice(top),
        spread: spread(top),
    };
}

/**
 * Loads metadata and snapshots of one window and analyzes them
 */
export async function runArbitrageAnalysis(
    dataDir: string,
    slug: string,
    thresholds: AnalysisThresholds,
    options: LoadOptions = {}
): Promise<AnalysisRow[]> {
    const meta = await new MarketMetaStore(dataDir).load(slug);
    const rows = await loadSnapshotRows(dataDir, slug, options);
    return analyzeSnapshots(meta, rows, thresholds);
}

export function summarize(rows: readonly AnalysisRow[]): AnalysisSummary {
    const slugs = [...new Set(rows.map(row => row.slug))];
    return {
        slugs,
        points: rows.length,
        buyCount: rows.filter(row => row.buyOpportunity).length,
        sellCount: rows.filter(row => row.sellOpportunity).length,
        sumAsk: range(rows.map(row => row.sumAsk)),
        sumBid: range(rows.map(row => row.sumBid)),
    };
}

function range(values: readonly number[]): Range | null {
    if (values.length === 0) {
        return null;
    }
    let min = Infinity;
    let max = -Infinity;
    let total = 0;
    for (const value of values) {
        min = Math.min(min, value);
        max = Math.max(max, value);
        total += value;
    }
    return { min, mean: total / values.length, max };
}

export const CSV_HEADER = [
    'slug',
    'event_time_ms',
    'outcome_1',
    'best_bid_1',
    'best_ask_1',
    'mid_1',
    'spread_1',
    'outcome_2',
    'best_bid_2',
    'best_ask_2',
    'mid_2',
    'spread_2',
    'sum_bid',
    'sum_ask',
    'buy_both',
    'sell_both',
].join(',');

const num = (value: number) => value.toFixed(6);

export function toCsv(rows: readonly AnalysisRow[]): string {
    const lines = [CSV_HEADER];
    for (const row of rows) {
        const cells: Array<string | number | boolean> = [row.slug, row.eventTimeMs];
        for (const view of row.outcomes) {
            cells.push(view.outcome, num(view.bestBid), num(view.bestAsk), num(view.mid), num(view.spread));
        }
        cells.push(num(row.sumBid), num(row.sumAsk), row.buyOpportunity, row.sellOpportunity);
        lines.push(cells.map(cell => csvCell(String(cell))).join(','));
    }
    return lines.join('\n') + '\n';
}

function csvCell(value: string): string {
    return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}
