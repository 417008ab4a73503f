/**
 * Tests for the merge engine: dedup by identity, idempotence and canonical order.
 */

import { describe, it, expect } from 'vitest';
import { compareRanks, dedupeRecords, merge, recordKey } from '../engine/merge';
import { utcDate } from '../core/dates';
import { RankingRecord } from '../core/types';

function rec(partial: Partial<RankingRecord> & { rank: string }): RankingRecord {
  return {
    date: utcDate(1971, 1, 5),
    format: 'odi',
    category: 'batting',
    player: `Player ${partial.rank}`,
    rating: '800',
    ...partial,
  };
}

function keys(records: RankingRecord[]): string[] {
  return records.map(r => `${r.format}/${r.category}/${r.date ? r.date.toISOString().slice(0, 10) : 'null'}/${r.rank}`);
}

describe('recordKey', () => {
  it('differs when any field of the tuple differs', () => {
    const base = rec({ rank: '1' });
    expect(recordKey(base)).toBe(recordKey({ ...base }));
    expect(recordKey(base)).not.toBe(recordKey({ ...base, rating: '801' }));
    expect(recordKey(base)).not.toBe(recordKey({ ...base, date: utcDate(1971, 1, 6) }));
    expect(recordKey(base)).not.toBe(recordKey({ ...base, date: null }));
  });

  it('treats two null dates as equal', () => {
    expect(recordKey(rec({ rank: '1', date: null }))).toBe(recordKey(rec({ rank: '1', date: null })));
  });
});

describe('dedupeRecords', () => {
  it('keeps the first of each identity', () => {
    const first = rec({ rank: '1' });
    const copy = { ...first };
    const result = dedupeRecords([first, rec({ rank: '2' }), copy]);
    expect(result).toHaveLength(2);
    expect(result[0]).toBe(first);
  });
});

describe('compareRanks', () => {
  it('orders integer ranks numerically', () => {
    expect(['10', '2', '1'].sort(compareRanks)).toEqual(['1', '2', '10']);
  });

  it('falls back to text order for non-integer ranks', () => {
    expect(['=3', '2', '10'].sort(compareRanks)).toEqual(['2', '10', '=3']);
  });

  it('orders tied ranks by their number, then by the suffix', () => {
    expect(['10', '5=', '5', '1a', '2'].sort(compareRanks)).toEqual(['1a', '2', '5', '5=', '10']);
  });

  it('gives the same order whatever the input order', () => {
    const ranks = ['2', '10', '1a', '5=', 'x', '1'];
    const expected = ['1', '1a', '2', '5=', '10', 'x'];
    const orders = [
      ranks,
      [...ranks].reverse(),
      ['10', '1a', '2', 'x', '1', '5='],
      ['1a', 'x', '5=', '1', '10', '2'],
    ];

    for (const order of orders) {
      expect(keys(merge([], order.map(rank => rec({ rank })))).map(k => k.split('/')[3])).toEqual(expected);
      expect([...order].sort(compareRanks)).toEqual(expected);
    }
  });
});

describe('merge', () => {
  const master = [
    rec({ rank: '1', date: utcDate(1971, 1, 4) }),
    rec({ rank: '2', date: utcDate(1971, 1, 4) }),
  ];
  const fresh = [
    rec({ rank: '2', date: utcDate(1971, 1, 5) }),
    rec({ rank: '1', date: utcDate(1971, 1, 5) }),
  ];

  it('appends new rows in canonical order', () => {
    expect(keys(merge(master, fresh))).toEqual([
      'odi/batting/1971-01-04/1',
      'odi/batting/1971-01-04/2',
      'odi/batting/1971-01-05/1',
      'odi/batting/1971-01-05/2',
    ]);
  });

  it('is idempotent for the same batch', () => {
    const once = merge(master, fresh);
    const twice = merge(once, fresh);
    expect(twice).toEqual(once);
  });

  it('never grows when re-fetching dates already stored', () => {
    const refetched = master.map(r => ({ ...r }));
    expect(merge(master, refetched)).toHaveLength(master.length);
  });

  it('sorts by format, category, date then rank', () => {
    const result = merge([], [
      rec({ rank: '1', format: 'test', category: 'batting' }),
      rec({ rank: '10', format: 'odi', category: 'bowling' }),
      rec({ rank: '2', format: 'odi', category: 'bowling' }),
      rec({ rank: '1', format: 'odi', category: 'batting', date: utcDate(1971, 1, 6) }),
      rec({ rank: '1', format: 'odi', category: 'batting', date: null }),
      rec({ rank: '3', format: 'odi', category: 'batting' }),
    ]);

    expect(keys(result)).toEqual([
      'odi/batting/1971-01-05/3',
      'odi/batting/1971-01-06/1',
      'odi/batting/null/1',
      'odi/bowling/1971-01-05/2',
      'odi/bowling/1971-01-05/10',
      'test/batting/1971-01-05/1',
    ]);
  });

  it('breaks ties on equal rank by player, then rating', () => {
    const a = rec({ rank: '3', player: 'Bravo Birch', rating: '700' });
    const b = rec({ rank: '3', player: 'Alpha Ames', rating: '700' });
    const c = rec({ rank: '3', player: 'Alpha Ames', rating: '650' });

    const forward = merge([a, b], [c]);
    const backward = merge([c], [b, a]);

    expect(forward).toEqual([c, b, a]);
    expect(backward).toEqual(forward);
  });

  it('does not modify its inputs', () => {
    const masterCopy = [...master];
    const freshCopy = [...fresh];
    merge(master, fresh);
    expect(master).toEqual(masterCopy);
    expect(fresh).toEqual(freshCopy);
  });
});
