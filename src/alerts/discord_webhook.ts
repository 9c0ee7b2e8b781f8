import type { AlertSink, ArbitrageDirection, ArbitrageSignal } from '../strategy/types.js';

/**
 * Webhook answered with a non-2xx status
 */
export class AlertDeliveryError extends Error {
    constructor(readonly status: number, statusText: string) {
        super(`Alert webhook responded ${status} ${statusText}`);
        this.name = 'AlertDeliveryError';
    }
}

interface EmbedField {
    name: string;
    value: string;
    inline: boolean;
}

export interface DiscordWebhookBody {
    embeds: Array<{
        title: string;
        description: string;
        color: number;
        fields: EmbedField[];
        timestamp: string;
    }>;
}

export interface DiscordWebhookSinkOptions {
    timeoutMs?: number;
    fetchFn?: typeof fetch;
}

const DIRECTION_LABELS: Record<ArbitrageDirection, string> = {
    buy: 'Buy both',
    sell: 'Sell both',
};

const DIRECTION_COLORS: Record<ArbitrageDirection, number> = {
    buy: 0x00ff00,
    sell: 0xffa500,
};

/**
 * HH:MM:SS (UTC) of an epoch-ms timestamp
 */
export function formatUtcTime(tsMs: number): string {
    const date = new Date(tsMs);
    if (isNaN(date.getTime())) {
        return String(tsMs);
    }
    return date.toISOString().slice(11, 19);
}

export function buildDiscordBody(signal: ArbitrageSignal, direction: ArbitrageDirection): DiscordWebhookBody {
    const fields: EmbedField[] = [
        { name: 'Type', value: DIRECTION_LABELS[direction], inline: true },
        { name: 'Market', value: signal.windowSlug, inline: true },
        { name: 'Time (UTC)', value: formatUtcTime(signal.eventTimeMs), inline: true },
        {
            name: 'Book',
            value: `sum_ask=${signal.sumAsk.toFixed(4)} sum_bid=${signal.sumBid.toFixed(4)}`,
            inline: false,
        },
    ];

    for (const quote of signal.quotes) {
        fields.push({
            name: quote.outcome,
            value: `bid=${quote.bestBid.toFixed(4)} ask=${quote.bestAsk.toFixed(4)}`,
            inline: true,
        });
    }

    return {
        embeds: [
            {
                title: 'Polymarket arbitrage signal',
                description: direction === 'buy'
                    ? 'Best asks of both outcomes sum below the buy threshold.'
                    : 'Best bids of both outcomes sum above the sell threshold.',
                color: DIRECTION_COLORS[direction],
                fields,
                timestamp: new Date(signal.eventTimeMs).toISOString(),
            },
        ],
    };
}

/**
 * Posts arbitrage signals as Discord embeds
 */
export class DiscordWebhookSink implements AlertSink {
    private readonly timeoutMs: number;
    private readonly fetchFn: typeof fetch;

    constructor(private readonly webhookUrl: string, options: DiscordWebhookSinkOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? 10000;
        this.fetchFn = options.fetchFn ?? fetch;
    }

    async post(signal: ArbitrageSignal, direction: ArbitrageDirection): Promise<void> {
        const response = await this.fetchFn(this.webhookUrl, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(buildDiscordBody(signal, direction)),
            signal: AbortSignal.timeout(this.timeoutMs),
        });
        if (!response.ok) {
            throw new AlertDeliveryError(response.status, response.statusText);
        }
    }
}
