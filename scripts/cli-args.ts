/**
 * Command-line options for the harvest tool.
 */

import { CATEGORIES, Category, FORMATS, Format, isCategory, isFormat } from '../core/types';
import { parseCalendarDate } from '../core/dates';

export interface CliArgs {
    output?: string;
    formats: Format[];
    categories: Category[];
    concurrency?: number;
    cutoff?: Date;
    dryRun: boolean;
}

export type ParsedCli =
    | { kind: 'run'; args: CliArgs }
    | { kind: 'help' }
    | { kind: 'error'; message: string };

export const HELP_TEXT = `
Rankings Harvester - Fetch missing ranking tables and merge them into the master file

Usage:
  npx ts-node scripts/harvest.ts [options]

Options:
  --output <file>            Master file (default: HARVEST_OUTPUT_FILE or ICC_Rankings.csv.gz)
                             A .gz suffix writes gzip-compressed CSV
  --formats <list>           Comma-separated formats (default: ${FORMATS.join(',')})
  --categories <list>        Comma-separated categories (default: ${CATEGORIES.join(',')})
  --concurrency <N>          Worker pool size (default: HARVEST_CONCURRENCY or CPU count)
  --cutoff <YYYY-MM-DD>      Plan through this date instead of the last publication day
  --dry-run                  Show what would be fetched without fetching
  --help                     Show this help

Examples:
  # Dry run: see which dates are missing
  npx ts-node scripts/harvest.ts --dry-run

  # Only Test batting, plain CSV output
  npx ts-node scripts/harvest.ts --formats test --categories batting --output data/test-batting.csv
`;

function parseList<T extends string>(
    raw: string | undefined,
    flag: string,
    valid: readonly T[],
    guard: (value: string) => value is T,
): T[] | string {
    if (!raw) return `${flag} requires a value`;
    const result: T[] = [];
    for (const item of raw.split(',')) {
        const trimmed = item.trim().toLowerCase();
        if (!guard(trimmed)) {
            return `Unknown value for ${flag}: ${trimmed}. Valid: ${valid.join(', ')}`;
        }
        if (!result.includes(trimmed)) result.push(trimmed);
    }
    return result;
}

export function parseArgs(argv: string[]): ParsedCli {
    if (argv.includes('--help') || argv.includes('-h')) {
        return { kind: 'help' };
    }

    const args: CliArgs = {
        formats: [...FORMATS],
        categories: [...CATEGORIES],
        dryRun: false,
    };

    for (let i = 0; i < argv.length; i++) {
        switch (argv[i]) {
            case '--output': {
                const value = argv[++i];
                if (!value) return { kind: 'error', message: '--output requires a file path' };
                args.output = value;
                break;
            }
            case '--formats': {
                const formats = parseList(argv[++i], '--formats', FORMATS, isFormat);
                if (typeof formats === 'string') return { kind: 'error', message: formats };
                args.formats = formats;
                break;
            }
            case '--categories': {
                const categories = parseList(argv[++i], '--categories', CATEGORIES, isCategory);
                if (typeof categories === 'string') return { kind: 'error', message: categories };
                args.categories = categories;
                break;
            }
            case '--concurrency': {
                const value = parseInt(argv[++i] ?? '', 10);
                if (!Number.isInteger(value) || value < 1) {
                    return { kind: 'error', message: '--concurrency must be a positive integer' };
                }
                args.concurrency = value;
                break;
            }
            case '--cutoff': {
                const cutoff = parseCalendarDate(argv[++i] ?? '');
                if (!cutoff) return { kind: 'error', message: '--cutoff must be a YYYY-MM-DD date' };
                args.cutoff = cutoff;
                break;
            }
            case '--dry-run':
                args.dryRun = true;
                break;
            default:
                return { kind: 'error', message: `Unknown option: ${argv[i]}` };
        }
    }

    return { kind: 'run', args };
}
