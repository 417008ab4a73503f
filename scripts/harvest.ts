#!/usr/bin/env node
/**
 * Rankings Harvest Tool
 *
 * Fills gaps in the master rankings file: every (date, format, category)
 * table published after the latest stored date, up to the last publication
 * day, is fetched and merged. Idempotent (re-running fetches nothing if complete).
 *
 * Usage:
 *   npx ts-node scripts/harvest.ts
 *   npx ts-node scripts/harvest.ts --dry-run
 *   npx ts-node scripts/harvest.ts --formats odi --categories batting,bowling
 *   npx ts-node scripts/harvest.ts --output data/rankings.csv --cutoff 2024-01-09
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { loadHarvestConfig, validateHarvestConfig, logHarvestConfig } from '../config';
import { configureLogger, createLogger } from '../core/logger';
import { formatIsoDate } from '../core/dates';
import { RankingsClient } from '../fetchers/rankings-page';
import { CsvMasterStore } from '../store/master-file';
import { describeHarvestEvent, HarvestEvent, HarvestReport, runHarvest } from '../engine/harvest';
import { PairPlan } from '../engine/gap-planner';
import { HELP_TEXT, parseArgs } from './cli-args';

const log = createLogger('HarvestCli');

// =============================================================================
// DISPLAY
// =============================================================================

function printFetchPlan(pairs: PairPlan[], cutoff: Date, dryRun: boolean): void {
    console.log(dryRun ? '\n   DRY RUN: Fetch Plan' : '\n   Fetch Plan');
    console.log('   ' + '='.repeat(50) + '\n');
    console.log(`   Cutoff: ${formatIsoDate(cutoff)}\n`);

    for (const pair of pairs) {
        const label = `${pair.format}/${pair.category}:`.padEnd(14);
        const stored = pair.watermark ? `stored through ${formatIsoDate(pair.watermark)}` : 'no stored data';
        const missing = pair.firstMissing
            ? `${pair.units} date(s) from ${formatIsoDate(pair.firstMissing)}`
            : 'complete';
        console.log(`   ${label}${stored}, ${missing}`);
    }
    console.log('');
}

function printSummary(report: HarvestReport): void {
    const { ok, empty, failed, failures } = report.summary;
    if (ok + empty + failed === 0) return;

    console.log(`   Units: ${ok} with rows, ${empty} empty, ${failed} failed`);
    if (failures.length > 0) {
        console.log(`\n   Failed units (re-planned on the next run):`);
        for (const f of failures) {
            console.log(`     - ${f.unit}: ${f.reason}`);
        }
        if (failed > failures.length) {
            console.log(`     ... and ${failed - failures.length} more`);
        }
    }
}

// =============================================================================
// MAIN
// =============================================================================

async function main(): Promise<void> {
    const parsed = parseArgs(process.argv.slice(2));
    if (parsed.kind === 'help') {
        console.log(HELP_TEXT);
        return;
    }
    if (parsed.kind === 'error') {
        console.error(`Error: ${parsed.message}\n`);
        console.log(HELP_TEXT);
        process.exitCode = 1;
        return;
    }
    const args = parsed.args;

    const config = loadHarvestConfig();
    if (args.output) config.outputFile = args.output;
    if (args.concurrency) config.concurrency = args.concurrency;
    validateHarvestConfig(config);
    configureLogger({ level: config.logLevel, format: config.logFormat });
    logHarvestConfig(config, log);

    const store = new CsvMasterStore(config.outputFile);
    const fetcher = new RankingsClient({
        baseUrl: config.baseUrl,
        userAgent: config.userAgent,
        requestTimeoutMs: config.requestTimeoutMs,
        maxRetries: config.maxRetries,
        retryDelayMs: config.retryDelayMs,
        maxRowsPerPage: config.maxRowsPerPage,
    });

    const onEvent = (event: HarvestEvent): void => {
        if (event.type === 'planned' && (args.dryRun || event.jobs > 0)) {
            printFetchPlan(event.pairs, event.cutoff, args.dryRun);
        }
        if (event.type === 'planned' && args.dryRun && event.jobs > 0) {
            console.log(`Would scrape ${event.jobs} jobs.`);
            return;
        }
        console.log(describeHarvestEvent(event));
    };

    const report = await runHarvest(
        {
            formats: args.formats,
            categories: args.categories,
            historyStart: config.historyStart,
            cutoff: {
                timeZone: config.timeZone,
                publicationWeekday: config.publicationWeekday,
                strict: config.strictCutoff,
            },
            cutoffDate: args.cutoff,
            concurrency: config.concurrency,
            dryRun: args.dryRun,
        },
        { store, fetcher },
        onEvent,
    );

    printSummary(report);
    log.info('run.done', { status: report.status, jobs: report.jobs, newRows: report.newRows, totalRows: report.totalRows });
}

main().catch((err: unknown) => {
    console.error('Fatal error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
