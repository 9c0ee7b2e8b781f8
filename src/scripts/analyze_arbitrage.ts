import { config as loadEnv } from 'dotenv';
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import {
    runArbitrageAnalysis,
    summarize,
    thresholdsFromMargin,
    toCsv,
    type AnalysisRow,
    type Range,
} from '../analysis/arbitrage_analysis.js';
import { MarketMetaStore } from '../storage/market_meta.js';

// Load environment variables
loadEnv();

const analyzeEnvSchema = z.object({
    DATA_DIR: z.string().min(1).default('./data'),
    MARKET_SLUG_PREFIX: z.string().min(1).default('btc-updown-5m'),
    ANALYZE_SLUG: z.string().trim().optional(),
    ANALYZE_THRESHOLD: z.coerce.number().nonnegative().finite().default(0.01),
    ANALYZE_OUTPUT: z.string().trim().optional(),
    ANALYZE_SUMMARY_ONLY: z.enum(['true', 'false']).default('false').transform(val => val === 'true'),
    ANALYZE_MAX_FILES: z.coerce.number().int().positive().optional(),
});

const analyzeEnv = analyzeEnvSchema.parse(process.env);
const thresholds = thresholdsFromMargin(analyzeEnv.ANALYZE_THRESHOLD);

function formatRange(label: string, range: Range | null): string {
    if (!range) {
        return `${label}  n/a`;
    }
    return `${label}  Min=${range.min.toFixed(4)}  Mean=${range.mean.toFixed(4)}  Max=${range.max.toFixed(4)}`;
}

function displayRow(row: AnalysisRow, index: number): void {
    const [a, b] = row.outcomes;
    const flags = [row.buyOpportunity ? 'BUY' : '', row.sellOpportunity ? 'SELL' : ''].filter(Boolean).join('+') || '-';
    console.log(
        `${String(index + 1).padStart(3)}. ${new Date(row.eventTimeMs).toISOString()} ${row.slug} ` +
        `${a.outcome} ${a.bestBid.toFixed(3)}/${a.bestAsk.toFixed(3)} | ` +
        `${b.outcome} ${b.bestBid.toFixed(3)}/${b.bestAsk.toFixed(3)} | ` +
        `sum_ask=${row.sumAsk.toFixed(4)} sum_bid=${row.sumBid.toFixed(4)} ${flags}`
    );
}

async function main(): Promise<number> {
    console.log('📊 Up/Down Arbitrage Analysis');
    console.log(`Data dir: ${analyzeEnv.DATA_DIR}`);
    console.log(`Buy: sum_ask < ${thresholds.buyThreshold.toFixed(3)} | Sell: sum_bid > ${thresholds.sellThreshold.toFixed(3)}\n`);

    const metaStore = new MarketMetaStore(analyzeEnv.DATA_DIR);
    const slugs = analyzeEnv.ANALYZE_SLUG
        ? [analyzeEnv.ANALYZE_SLUG]
        : await metaStore.listSlugs(analyzeEnv.MARKET_SLUG_PREFIX);

    if (slugs.length === 0) {
        console.error(`❌ No stored windows with prefix ${analyzeEnv.MARKET_SLUG_PREFIX}`);
        return 1;
    }

    const rows: AnalysisRow[] = [];
    for (const slug of slugs) {
        try {
            rows.push(...await runArbitrageAnalysis(analyzeEnv.DATA_DIR, slug, thresholds, {
                maxFiles: analyzeEnv.ANALYZE_MAX_FILES,
            }));
        } catch (error) {
            console.error(`⚠️  Skip ${slug}: ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    if (rows.length === 0) {
        console.error('❌ No snapshot data could be analyzed.');
        return 1;
    }
    rows.sort((x, y) => x.eventTimeMs - y.eventTimeMs);

    const summary = summarize(rows);
    console.log('='.repeat(80));
    console.log(`Windows: ${summary.slugs.join(', ')}`);
    console.log(`Aligned points: ${summary.points}`);
    console.log(`Buy-both opportunities: ${summary.buyCount}`);
    console.log(`Sell-both opportunities: ${summary.sellCount}`);
    console.log(formatRange('sum_ask', summary.sumAsk));
    console.log(formatRange('sum_bid', summary.sumBid));

    if (!analyzeEnv.ANALYZE_SUMMARY_ONLY) {
        console.log('\n--- First 20 points ---');
        rows.slice(0, 20).forEach(displayRow);
    }

    if (analyzeEnv.ANALYZE_OUTPUT) {
        await mkdir(dirname(analyzeEnv.ANALYZE_OUTPUT), { recursive: true });
        await writeFile(analyzeEnv.ANALYZE_OUTPUT, toCsv(rows), 'utf-8');
        console.log(`\n✅ Written: ${analyzeEnv.ANALYZE_OUTPUT}`);
    }
    return 0;
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch(error => {
        console.error('❌ Error:', error instanceof Error ? error.message : String(error));
        process.exit(1);
    });
