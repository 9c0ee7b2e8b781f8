import { logger } from './infra/logger.js';
import type { MarketScheduler } from './scheduler/market_scheduler.js';
import type { ArbitrageDetector } from './strategy/arbitrage_detector.js';
import type { OrderbookWriter } from './storage/orderbook_writer.js';

export interface SupervisedTasks {
    scheduler: Pick<MarketScheduler, 'run'>;
    detector: Pick<ArbitrageDetector, 'start' | 'stop'>;
    writer: Pick<OrderbookWriter, 'start' | 'stop'>;
}

/**
 * Owns the background tasks. Shutdown order: scheduler (which stops its feed),
 * then the detector's sender, then the writer's drain and final flush.
 */
export class Supervisor {
    constructor(private readonly tasks: SupervisedTasks) {}

    async run(signal: AbortSignal): Promise<void> {
        const { scheduler, detector, writer } = this.tasks;

        writer.start();
        detector.start();
        logger.info('supervisor.started', {});

        try {
            await scheduler.run(signal);
        } finally {
            await detector.stop();
            await writer.stop();
            logger.info('supervisor.stopped', {});
        }
    }
}
