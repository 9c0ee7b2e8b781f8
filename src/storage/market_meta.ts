import { mkdir, readFile, readdir, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { logger } from '../infra/logger.js';
import type { MarketWindow } from '../data/polymarket/types.js';

/**
 * On-disk metadata document, one per window slug
 */
export const marketMetaSchema = z.object({
    slug: z.string().min(1),
    conditionId: z.string(),
    endTimeUtcIso: z.string(),
    endTimeMs: z.number().int(),
    instrumentIds: z.tuple([z.string(), z.string()]),
    outcomeLabels: z.tuple([z.string(), z.string()]),
});

export type MarketMeta = z.infer<typeof marketMetaSchema>;

const META_PREFIX = 'meta_';
const META_SUFFIX = '.json';

export function toMarketMeta(window: MarketWindow): MarketMeta {
    return {
        slug: window.slug,
        conditionId: window.conditionId,
        endTimeUtcIso: window.endTime.toISOString(),
        endTimeMs: window.endTimeMs,
        instrumentIds: [window.instrumentIds[0], window.instrumentIds[1]],
        outcomeLabels: [window.outcomeLabels[0], window.outcomeLabels[1]],
    };
}

/**
 * Window metadata under `<dataDir>/markets/meta_<slug>.json`
 */
export class MarketMetaStore {
    private readonly dir: string;

    constructor(dataDir: string) {
        this.dir = join(dataDir, 'markets');
    }

    pathFor(slug: string): string {
        return join(this.dir, `${META_PREFIX}${slug}${META_SUFFIX}`);
    }

    /**
     * Overwrites any previous document for the slug. Written to a temp file and
     * renamed so readers only ever see a complete document.
     */
    async save(window: MarketWindow): Promise<string> {
        await mkdir(this.dir, { recursive: true });
        const path = this.pathFor(window.slug);
        const tmpPath = `${path}.${process.pid}.tmp`;
        await writeFile(tmpPath, JSON.stringify(toMarketMeta(window), null, 2) + '\n', 'utf-8');
        await rename(tmpPath, path);
        logger.info('meta.saved', { slug: window.slug, path });
        return path;
    }

    async load(slug: string): Promise<MarketMeta> {
        const text = await readFile(this.pathFor(slug), 'utf-8');
        return marketMetaSchema.parse(JSON.parse(text));
    }

    /**
     * Stored slugs, sorted; optionally only those starting with `prefix`
     */
    async listSlugs(prefix: string = ''): Promise<string[]> {
        let names: string[];
        try {
            names = await readdir(this.dir);
        } catch (error) {
            if (isNotFound(error)) {
                return [];
            }
            throw error;
        }
        return names
            .filter(name => name.startsWith(META_PREFIX) && name.endsWith(META_SUFFIX))
            .map(name => name.slice(META_PREFIX.length, -META_SUFFIX.length))
            .filter(slug => slug.startsWith(prefix))
            .sort();
    }
}

export function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
