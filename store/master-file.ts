/**
 * Master Dataset File
 *
 * CSV with columns Date, Format, Category, Rank, Player, Rating. A path
 * ending in .gz is gzip-compressed; the CSV content is the same either way.
 * Dates are written as YYYY/MM/DD.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import Papa from 'papaparse';
import { z } from 'zod';
import { CATEGORIES, FORMATS, RankingRecord } from '../core/types';
import { formatSlashDate, parseCalendarDate } from '../core/dates';
import { createLogger } from '../core/logger';

// =============================================================================
// TYPES
// =============================================================================

export const MASTER_COLUMNS = ['Date', 'Format', 'Category', 'Rank', 'Player', 'Rating'] as const;

// " ODI " and "Batting" name the same pair as "odi" and "batting"
const normalized = (value: unknown): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

const MasterRowSchema = z.object({
  Date: z.string().default(''),
  Format: z.preprocess(normalized, z.enum(FORMATS)),
  Category: z.preprocess(normalized, z.enum(CATEGORIES)),
  Rank: z.string().default(''),
  Player: z.string().default(''),
  Rating: z.string().default(''),
});

/** Raw cells, in MASTER_COLUMNS order, of a row naming no known format or category */
export type UnrecognizedRow = readonly string[];

export interface LoadedMaster {
  records: RankingRecord[];
  existed: boolean;
  invalidDates: number;               // rows kept with a null date
  unrecognized: UnrecognizedRow[];    // never planned or merged, written back as-is
}

export interface MasterStore {
  readonly location: string;
  load(): LoadedMaster;
  save(records: readonly RankingRecord[], unrecognized?: readonly UnrecognizedRow[]): void;
}

// =============================================================================
// CSV CODEC
// =============================================================================

export function parseMasterCsv(text: string): Omit<LoadedMaster, 'existed'> {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
    transformHeader: header => header.trim(),
  });

  const records: RankingRecord[] = [];
  let invalidDates = 0;
  const unrecognized: UnrecognizedRow[] = [];

  for (const raw of parsed.data) {
    const row = MasterRowSchema.safeParse(raw);
    if (!row.success) {
      unrecognized.push(MASTER_COLUMNS.map(column => raw[column] ?? ''));
      continue;
    }

    const date = parseCalendarDate(row.data.Date);
    if (!date) invalidDates++;

    records.push({
      date,
      format: row.data.Format,
      category: row.data.Category,
      rank: row.data.Rank,
      player: row.data.Player,
      rating: row.data.Rating,
    });
  }

  return { records, invalidDates, unrecognized };
}

export function serializeMasterCsv(
  records: readonly RankingRecord[],
  unrecognized: readonly UnrecognizedRow[] = [],
): string {
  const csv = Papa.unparse(
    {
      fields: [...MASTER_COLUMNS],
      data: records.map(r => [
        r.date ? formatSlashDate(r.date) : '',
        r.format,
        r.category,
        r.rank,
        r.player,
        r.rating,
      ]).concat(unrecognized.map(row => [...row])),
    },
    { newline: '\n' },
  );
  return csv + '\n';
}

// =============================================================================
// FILE STORE
// =============================================================================

export class CsvMasterStore implements MasterStore {
  readonly location: string;
  private readonly compressed: boolean;
  private log = createLogger('MasterFile');

  constructor(filePath: string) {
    this.location = filePath;
    this.compressed = filePath.endsWith('.gz');
  }

  /**
   * Missing file → empty dataset. Corrupt compressed data throws.
   */
  load(): LoadedMaster {
    if (!fs.existsSync(this.location)) {
      this.log.debug('load.missing', { file: this.location });
      return { records: [], existed: false, invalidDates: 0, unrecognized: [] };
    }

    const raw = fs.readFileSync(this.location);
    const text = (this.compressed ? zlib.gunzipSync(raw) : raw).toString('utf-8');
    const loaded = parseMasterCsv(text);

    if (loaded.invalidDates > 0) {
      this.log.warn('load.invalid_dates', { file: this.location, rows: loaded.invalidDates });
    }
    if (loaded.unrecognized.length > 0) {
      this.log.warn('load.unrecognized_rows', { file: this.location, rows: loaded.unrecognized.length });
    }
    this.log.debug('load.done', { file: this.location, rows: loaded.records.length });

    return { ...loaded, existed: true };
  }

  /**
   * Writes to a sibling temp file, then renames over the target.
   * Unrecognized rows follow the sorted records unchanged.
   */
  save(records: readonly RankingRecord[], unrecognized: readonly UnrecognizedRow[] = []): void {
    const dir = path.dirname(this.location);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const csv = serializeMasterCsv(records, unrecognized);
    const payload = this.compressed ? zlib.gzipSync(csv) : Buffer.from(csv, 'utf-8');
    const tmpFile = `${this.location}.tmp-${process.pid}`;

    fs.writeFileSync(tmpFile, payload);
    try {
      fs.renameSync(tmpFile, this.location);
    } catch (err) {
      fs.rmSync(tmpFile, { force: true });
      throw err;
    }
    this.log.debug('save.done', { file: this.location, rows: records.length, unrecognized: unrecognized.length, bytes: payload.length });
  }
}
