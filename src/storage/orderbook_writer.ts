import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { BoundedQueue } from '../infra/bounded_queue.js';
import { logger, describeError } from '../infra/logger.js';
import { sleep } from '../infra/sleep.js';
import {
    RECORD_DIRS,
    RECORD_KINDS,
    type RecordByKind,
    type RecordKind,
    type RecordSink,
    type SnapshotRecord,
    type TickRecord,
    type TradeRecord,
} from './records.js';

export interface OrderbookWriterOptions {
    dataDir: string;
    flushIntervalMs?: number;
    flushMaxRows?: number;
    pollIntervalMs?: number;
    queueCapacity?: number;
    now?: () => number;
}

export interface WriterStats {
    enqueued: number;
    droppedRows: number;
    queuedRows: number;
    bufferedRows: number;
    writtenRows: number;
    filesWritten: number;
    flushFailures: number;
}

type Buffers = { [K in RecordKind]: Map<string, RecordByKind[K][]> };
type Queues = { [K in RecordKind]: BoundedQueue<RecordByKind[K]> };

const bufferKey = (kind: RecordKind, slug: string) => `${kind}/${slug}`;

/**
 * Decouples the feed's hot path from disk: `enqueue*` only appends to a bounded
 * in-memory queue; a single background loop moves rows into per-kind, per-window
 * buffers and flushes each non-empty buffer to a new JSONL part file when the
 * flush interval has elapsed or a kind's buffered row count reaches `flushMaxRows`.
 *
 * Thresholds are per kind and leave out buffers whose last write failed, so a
 * stuck (kind, window) pair neither starves the other kinds nor retries on
 * every poll; failed buffers are retried on the flush interval and at stop,
 * and hold at most `queueCapacity` rows (oldest dropped first).
 */
export class OrderbookWriter implements RecordSink {
    private readonly dataDir: string;
    private readonly flushIntervalMs: number;
    private readonly flushMaxRows: number;
    private readonly pollIntervalMs: number;
    private readonly queueCapacity: number;
    private readonly now: () => number;

    private readonly queues: Queues;
    private readonly failing = new Set<string>();
    private readonly buffers: Buffers = {
        snapshot: new Map(),
        tick: new Map(),
        trade: new Map(),
    };

    private controller: AbortController | null = null;
    private loop: Promise<void> | null = null;
    private lastFlushAt = 0;
    private fileSeq = 0;
    private enqueued = 0;
    private writtenRows = 0;
    private filesWritten = 0;
    private flushFailures = 0;
    private droppedBuffered = 0;

    constructor(options: OrderbookWriterOptions) {
        this.dataDir = options.dataDir;
        this.flushIntervalMs = options.flushIntervalMs ?? 5000;
        this.flushMaxRows = options.flushMaxRows ?? 200;
        this.pollIntervalMs = options.pollIntervalMs ?? 100;
        this.now = options.now ?? Date.now;

        this.queueCapacity = options.queueCapacity ?? 100000;
        this.queues = {
            snapshot: new BoundedQueue<SnapshotRecord>(this.queueCapacity, 'drop-oldest'),
            tick: new BoundedQueue<TickRecord>(this.queueCapacity, 'drop-oldest'),
            trade: new BoundedQueue<TradeRecord>(this.queueCapacity, 'drop-oldest'),
        };
    }

    enqueueSnapshot(record: SnapshotRecord): void {
        this.enqueued++;
        this.queues.snapshot.push(record);
    }

    enqueueTick(record: TickRecord): void {
        this.enqueued++;
        this.queues.tick.push(record);
    }

    enqueueTrade(record: TradeRecord): void {
        this.enqueued++;
        this.queues.trade.push(record);
    }

    start(): void {
        if (this.loop) {
            logger.warn('writer.already_running', { dataDir: this.dataDir });
            return;
        }
        this.controller = new AbortController();
        this.lastFlushAt = this.now();
        this.loop = this.runLoop(this.controller.signal);

        logger.info('writer.started', {
            dataDir: this.dataDir,
            flushIntervalMs: this.flushIntervalMs,
            flushMaxRows: this.flushMaxRows,
        });
    }

    /**
     * Stops the loop, drains every queue and performs one final flush.
     * Large buffers still go out in `flushMaxRows`-sized parts.
     */
    async stop(): Promise<void> {
        if (this.controller) {
            this.controller.abort();
        }
        if (this.loop) {
            await this.loop;
        }
        this.controller = null;
        this.loop = null;

        for (const kind of RECORD_KINDS) {
            this.drainKind(kind, Infinity);
        }
        await this.flush('shutdown');

        const stats = this.getStats();
        const log = stats.droppedRows > 0 || stats.bufferedRows > 0 || stats.queuedRows > 0 ? logger.warn : logger.info;
        log('writer.stopped', stats);
    }

    getStats(): WriterStats {
        let queuedRows = 0;
        let droppedRows = this.droppedBuffered;
        for (const kind of RECORD_KINDS) {
            queuedRows += this.queues[kind].size;
            droppedRows += this.queues[kind].dropped;
        }
        return {
            enqueued: this.enqueued,
            droppedRows,
            queuedRows,
            bufferedRows: this.bufferedRows(),
            writtenRows: this.writtenRows,
            filesWritten: this.filesWritten,
            flushFailures: this.flushFailures,
        };
    }

    private async runLoop(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            try {
                await this.cycle();
            } catch (error) {
                logger.error('writer.cycle_error', { error: describeError(error) });
            }
            await sleep(this.pollIntervalMs, signal);
        }
    }

    /**
     * Drain → maybe flush. When the row threshold triggered the flush and rows
     * are still queued, go again without waiting so a burst splits at the threshold.
     */
    private async cycle(): Promise<void> {
        for (;;) {
            let thresholdHit = false;
            for (const kind of RECORD_KINDS) {
                this.drainKind(kind, this.flushMaxRows - this.flushableRows(kind));
                if (this.flushableRows(kind) >= this.flushMaxRows) {
                    thresholdHit = true;
                }
            }
            const intervalHit = this.now() - this.lastFlushAt >= this.flushIntervalMs;
            if (!thresholdHit && !intervalHit) {
                return;
            }
            const written = await this.flush(thresholdHit ? 'max_rows' : 'interval');
            if (!thresholdHit || written === 0 || this.queuedRows() === 0) {
                return;
            }
        }
    }

    private drainKind<K extends RecordKind>(kind: K, limit: number): void {
        if (limit <= 0) {
            return;
        }
        const queue: BoundedQueue<RecordByKind[K]> = this.queues[kind];
        const buffer: Map<string, RecordByKind[K][]> = this.buffers[kind];
        for (const row of queue.drain(limit)) {
            const bucket = buffer.get(row.windowSlug);
            if (bucket) {
                bucket.push(row);
            } else {
                buffer.set(row.windowSlug, [row]);
            }
        }
        for (const [slug, rows] of buffer) {
            const excess = rows.length - this.queueCapacity;
            if (excess > 0 && this.failing.has(bufferKey(kind, slug))) {
                rows.splice(0, excess);
                this.droppedBuffered += excess;
            }
        }
    }

    /**
     * Flushes every non-empty buffer; returns the number of rows written
     */
    private async flush(reason: 'interval' | 'max_rows' | 'shutdown'): Promise<number> {
        this.lastFlushAt = this.now();
        const before = this.writtenRows;
        for (const kind of RECORD_KINDS) {
            await this.flushKind(kind);
        }
        const rows = this.writtenRows - before;
        if (rows > 0) {
            logger.debug('writer.flush', { reason, rows });
        }
        return rows;
    }

    private async flushKind<K extends RecordKind>(kind: K): Promise<void> {
        const buffer: Map<string, RecordByKind[K][]> = this.buffers[kind];
        for (const [slug, rows] of buffer) {
            if (rows.length === 0) {
                buffer.delete(slug);
                continue;
            }
            const key = bufferKey(kind, slug);
            while (rows.length > 0) {
                const count = Math.min(rows.length, this.flushMaxRows);
                try {
                    const path = await this.writePart(kind, slug, rows.slice(0, count));
                    // Rows can only be appended by this loop, so the first `count` are exactly what was written
                    rows.splice(0, count);
                    this.failing.delete(key);
                    this.writtenRows += count;
                    this.filesWritten++;
                    logger.debug('writer.part_written', { kind, slug, rows: count, path });
                } catch (error) {
                    this.failing.add(key);
                    this.flushFailures++;
                    logger.error('writer.flush_failed', {
                        kind,
                        slug,
                        rows: rows.length,
                        error: describeError(error),
                    });
                    break;
                }
            }
            if (rows.length === 0) {
                buffer.delete(slug);
            }
        }
    }

    /**
     * New immutable part file; `wx` refuses to overwrite an existing file
     */
    private async writePart(kind: RecordKind, slug: string, rows: readonly object[]): Promise<string> {
        const dir = join(this.dataDir, ...RECORD_DIRS[kind], slug);
        await mkdir(dir, { recursive: true });
        this.fileSeq++;
        const name = `part_${this.now()}_${String(this.fileSeq).padStart(6, '0')}.jsonl`;
        const path = join(dir, name);
        const body = rows.map(row => JSON.stringify(row)).join('\n') + '\n';
        await writeFile(path, body, { encoding: 'utf-8', flag: 'wx' });
        return path;
    }

    /**
     * Buffered rows of `kind` outside buffers whose last write failed
     */
    private flushableRows(kind: RecordKind): number {
        let total = 0;
        for (const [slug, rows] of this.buffers[kind]) {
            if (!this.failing.has(bufferKey(kind, slug))) {
                total += rows.length;
            }
        }
        return total;
    }

    private bufferedRows(): number {
        let total = 0;
        for (const kind of RECORD_KINDS) {
            for (const rows of this.buffers[kind].values()) {
                total += rows.length;
            }
        }
        return total;
    }

    private queuedRows(): number {
        let total = 0;
        for (const kind of RECORD_KINDS) {
            total += this.queues[kind].size;
        }
        return total;
    }
}
