import { describe, expect, it } from 'vitest';
import {
    AlertDeliveryError,
    DiscordWebhookSink,
    buildDiscordBody,
    formatUtcTime,
} from '../../src/alerts/discord_webhook.js';
import type { ArbitrageSignal } from '../../src/strategy/types.js';

const SIGNAL: ArbitrageSignal = {
    windowSlug: 'btc-updown-5m-1700000300',
    eventTimeMs: 1700000123456,
    sumAsk: 0.95,
    sumBid: 0.88,
    buyOpportunity: true,
    sellOpportunity: false,
    quotes: [
        { outcome: 'Up', instrumentId: 'tok-up', bestBid: 0.38, bestAsk: 0.4 },
        { outcome: 'Down', instrumentId: 'tok-down', bestBid: 0.5, bestAsk: 0.55 },
    ],
};

describe('formatUtcTime', () => {
    it('renders HH:MM:SS in UTC', () => {
        expect(formatUtcTime(1700000123456)).toBe('22:15:23');
    });
});

describe('buildDiscordBody', () => {
    it('describes the signal in one embed', () => {
        const [embed] = buildDiscordBody(SIGNAL, 'buy').embeds;

        expect(embed.title).toBe('Polymarket arbitrage signal');
        expect(embed.timestamp).toBe('2023-11-14T22:15:23.456Z');
        expect(embed.fields).toEqual([
            { name: 'Type', value: 'Buy both', inline: true },
            { name: 'Market', value: 'btc-updown-5m-1700000300', inline: true },
            { name: 'Time (UTC)', value: '22:15:23', inline: true },
            { name: 'Book', value: 'sum_ask=0.9500 sum_bid=0.8800', inline: false },
            { name: 'Up', value: 'bid=0.3800 ask=0.4000', inline: true },
            { name: 'Down', value: 'bid=0.5000 ask=0.5500', inline: true },
        ]);
    });

    it('labels the sell direction', () => {
        const [embed] = buildDiscordBody(SIGNAL, 'sell').embeds;
        expect(embed.fields[0]).toEqual({ name: 'Type', value: 'Sell both', inline: true });
    });
});

describe('DiscordWebhookSink', () => {
    it('posts the embed as JSON', async () => {
        const requests: Array<{ url: string; init: RequestInit | undefined }> = [];
        const fetchFn: typeof fetch = async (input, init) => {
            requests.push({ url: String(input), init });
            return new Response(null, { status: 204 });
        };
        const sink = new DiscordWebhookSink('https://discord.test/webhook', { fetchFn });

        await sink.post(SIGNAL, 'buy');

        expect(requests).toHaveLength(1);
        expect(requests[0].url).toBe('https://discord.test/webhook');
        expect(requests[0].init?.method).toBe('POST');
        expect(requests[0].init?.headers).toEqual({ 'Content-Type': 'application/json' });
        expect(JSON.parse(String(requests[0].init?.body))).toEqual(buildDiscordBody(SIGNAL, 'buy'));
    });

    it('throws on a non-2xx response', async () => {
        const fetchFn: typeof fetch = async () => new Response('rate limited', { status: 429, statusText: 'Too Many Requests' });
        const sink = new DiscordWebhookSink('https://discord.test/webhook', { fetchFn });

        const error = await sink.post(SIGNAL, 'sell').catch((e: unknown) => e);
        expect(error).toBeInstanceOf(AlertDeliveryError);
        expect(error).toMatchObject({ status: 429, message: 'Alert webhook responded 429 Too Many Requests' });
    });
});
