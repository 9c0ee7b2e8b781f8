import { z } from 'zod';

/**
 * Array-valued Gamma fields arrive either as arrays or as JSON-encoded strings
 * (`"[\"Up\", \"Down\"]"`); some older payloads use comma-separated strings.
 */
export const gammaArrayField = z.unknown().transform(parseArrayField);

/**
 * Gamma API market data (only the fields this project reads)
 */
export const gammaMarketSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String).optional(),
    slug: z.string().optional(),
    question: z.string().optional(),
    conditionId: z.string().optional().catch(undefined),
    outcomes: gammaArrayField,
    shortOutcomes: gammaArrayField,
    clobTokenIds: gammaArrayField,
    endDate: z.string().optional().catch(undefined),
    end_date_iso: z.string().optional().catch(undefined),
    endDateIso: z.string().optional().catch(undefined),
    active: z.boolean().optional().catch(undefined),
    closed: z.boolean().optional().catch(undefined),
    enableOrderBook: z.boolean().optional().catch(undefined),
});

/**
 * Gamma API event data
 */
export const gammaEventSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String).optional(),
    slug: z.string().default(''),
    title: z.string().optional(),
    active: z.boolean().optional().catch(undefined),
    closed: z.boolean().optional().catch(undefined),
    markets: z.array(z.unknown()).optional().catch(undefined),
});

export type GammaMarket = z.infer<typeof gammaMarketSchema>;
export type GammaEvent = z.infer<typeof gammaEventSchema>;

/**
 * Parse array field (handles string JSON, comma-separated string or array)
 */
export function parseArrayField(field: unknown): string[] {
    if (!field) {
        return [];
    }

    // Already an array
    if (Array.isArray(field)) {
        return field.map(item => String(item).trim()).filter(item => item.length > 0);
    }

    if (typeof field === 'string') {
        const trimmed = field.trim();
        const parsed = trimmed.startsWith('[') ? tryParseJson(trimmed) : undefined;
        if (Array.isArray(parsed)) {
            return parsed.map(item => String(item).trim()).filter(item => item.length > 0);
        }
        return trimmed.split(',').map(item => item.trim()).filter(item => item.length > 0);
    }

    return [];
}

function tryParseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}
