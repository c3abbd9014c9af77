import { describe, it, expect } from 'vitest';
import { InvalidEntryError } from '../errors.js';
import { addEntry, closePeriod, createPeriod, isActive, parseHours, totalHours } from '../period.js';
import type { Period } from '../types.js';

function counter(prefix: string): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

const now = new Date(2026, 0, 15, 9, 30);

function openPeriod(): Period {
  return createPeriod('2026-01-01', () => 'p-1');
}

describe('createPeriod / closePeriod', () => {
  it('starts active with no entries', () => {
    const period = openPeriod();
    expect(period).toEqual({ id: 'p-1', startDate: '2026-01-01', endDate: null, entries: [] });
    expect(isActive(period)).toBe(true);
    expect(totalHours(period)).toBe(0);
  });

  it('rejects a malformed start date', () => {
    expect(() => createPeriod('2026-02-30')).toThrow(InvalidEntryError);
    expect(() => createPeriod('yesterday')).toThrow('Invalid period start date: yesterday');
  });

  it('closes an active period without touching the original', () => {
    const period = openPeriod();
    const closed = closePeriod(period, '2026-01-15');
    expect(closed.endDate).toBe('2026-01-15');
    expect(isActive(closed)).toBe(false);
    expect(period.endDate).toBeNull();
  });

  it('refuses to close a period twice', () => {
    const closed = closePeriod(openPeriod(), '2026-01-15');
    expect(() => closePeriod(closed, '2026-01-20')).toThrow('Period p-1 is already closed');
  });
});

describe('addEntry', () => {
  it('appends with a fresh id and logging timestamp', () => {
    const { period, entry } = addEntry(openPeriod(), { date: '2026-01-14', hours: 5, note: 'Brunch' }, {
      newId: () => 'e-1',
      now,
    });

    expect(entry).toEqual({
      id: 'e-1',
      date: '2026-01-14',
      hours: 5,
      note: 'Brunch',
      createdAt: now.toISOString(),
    });
    expect(period.entries).toEqual([entry]);
  });

  it('defaults the date to today and the note to empty', () => {
    const { entry } = addEntry(openPeriod(), { hours: 2 }, { newId: () => 'e-1', now });
    expect(entry.date).toBe('2026-01-15');
    expect(entry.note).toBe('');
  });

  it('keeps insertion order for back-dated entries', () => {
    const newId = counter('e');
    let period = openPeriod();
    period = addEntry(period, { date: '2026-01-10', hours: 4 }, { newId, now }).period;
    period = addEntry(period, { date: '2026-01-03', hours: 6 }, { newId, now }).period;

    expect(period.entries.map((e) => e.date)).toEqual(['2026-01-10', '2026-01-03']);
    expect(totalHours(period)).toBe(10);
  });

  it('does not mutate the period it was given', () => {
    const original = openPeriod();
    addEntry(original, { hours: 3 }, { now });
    expect(original.entries).toHaveLength(0);
  });

  it.each([0, -2, Number.NaN, Infinity])('rejects %s hours', (hours) => {
    expect(() => addEntry(openPeriod(), { hours }, { now })).toThrow('Hours must be a positive number.');
  });

  it('rejects entries on a closed period', () => {
    const closed = closePeriod(openPeriod(), '2026-01-15');
    expect(() => addEntry(closed, { hours: 1 }, { now })).toThrow(InvalidEntryError);
    expect(() => addEntry(closed, { hours: 1 }, { now })).toThrow('Cannot add an entry to closed period p-1');
  });

  it('rejects a malformed entry date', () => {
    expect(() => addEntry(openPeriod(), { hours: 1, date: '15/01/2026' }, { now })).toThrow(
      'Invalid entry date: 15/01/2026',
    );
  });
});

describe('totalHours', () => {
  it('sums every entry', () => {
    const newId = counter('e');
    const hours = [1.5, 2, 0.25, 8];
    let period = openPeriod();
    for (const h of hours) {
      period = addEntry(period, { hours: h }, { newId, now }).period;
    }
    expect(totalHours(period)).toBe(11.75);
  });
});

describe('parseHours', () => {
  it('accepts positive numbers', () => {
    expect(parseHours('2.5')).toBe(2.5);
    expect(parseHours(' 3 ')).toBe(3);
  });

  it.each(['', '   ', '0', '-1', 'abc', '4h'])('returns null for %j', (raw) => {
    expect(parseHours(raw)).toBeNull();
  });
});
