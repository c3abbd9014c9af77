import { describe, it, expect } from 'vitest';
import { DEFAULT_RATE_CONFIG, type Period, type RateConfig } from '../../domain/types.js';
import { CSV_HEADER, EXPORT_TITLE, csvField, exportRateLine, formatExport } from '../exportFormatter.js';

const withTips: RateConfig = { baseRate: 7, includeTips: true, avgTipRate: 23.15 };
const generatedAt = new Date('2026-01-20T12:00:00.000Z');

const periods: Period[] = [
  {
    id: 'p1',
    startDate: '2026-01-01',
    endDate: '2026-01-15',
    entries: [
      { id: 'e1', date: '2026-01-03', hours: 5, note: 'Lunch shift', createdAt: '2026-01-03T20:00:00.000Z' },
      { id: 'e2', date: '2026-01-02', hours: 3, note: 'Close, then inventory', createdAt: '2026-01-04T18:00:00.000Z' },
    ],
  },
  {
    id: 'p2',
    startDate: '2026-01-15',
    endDate: null,
    entries: [
      { id: 'e3', date: '2026-01-16', hours: 4, note: 'He said "busy"', createdAt: '2026-01-16T22:00:00.000Z' },
    ],
  },
];

describe('formatExport', () => {
  it('renders header, entry rows and period totals', () => {
    expect(formatExport(periods, withTips, generatedAt).split('\n')).toEqual([
      EXPORT_TITLE,
      'Generated: 2026-01-20T12:00:00.000Z',
      'Rate: $30.15/hr (Base: $7.00, Tips: $23.15)',
      '='.repeat(50),
      CSV_HEADER,
      '2026-01-01,2026-01-02,3,"Close, then inventory",2026-01-04T18:00:00.000Z',
      '2026-01-01,2026-01-03,5,Lunch shift,2026-01-03T20:00:00.000Z',
      '2026-01-15,2026-01-16,4,"He said ""busy""",2026-01-16T22:00:00.000Z',
      '',
      'Period 2026-01-01 to 2026-01-15: 8.0h, $241.20',
      'Period 2026-01-15 to active: 4.0h, $120.60',
    ]);
  });

  it('renders only the header for an empty ledger', () => {
    expect(formatExport([], DEFAULT_RATE_CONFIG, generatedAt)).toBe(
      [
        'Hours Ledger Data Export',
        'Generated: 2026-01-20T12:00:00.000Z',
        'Rate: $7.00/hr (Base: $7.00, Tips excluded)',
        '='.repeat(50),
        'Period,Date,Hours,Note,Logged_At',
      ].join('\n'),
    );
  });

  it('does not reorder the periods it was given', () => {
    const reversed = [...periods].reverse();
    formatExport(reversed, withTips, generatedAt);
    expect(reversed.map((p) => p.id)).toEqual(['p2', 'p1']);
  });
});

describe('exportRateLine', () => {
  it('notes excluded tips', () => {
    expect(exportRateLine({ ...withTips, includeTips: false })).toBe('Rate: $7.00/hr (Base: $7.00, Tips excluded)');
  });
});

describe('csvField', () => {
  it('leaves plain text alone', () => {
    expect(csvField('Lunch shift')).toBe('Lunch shift');
    expect(csvField('')).toBe('');
  });

  it('quotes separators and line breaks', () => {
    expect(csvField('a,b')).toBe('"a,b"');
    expect(csvField('line\nbreak')).toBe('"line\nbreak"');
  });
});
