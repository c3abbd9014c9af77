/**
 * Period and entry operations.
 * Every function returns new frozen values; inputs are never mutated, so a
 * reader holding an older Period keeps seeing a consistent value.
 */
import { InvalidEntryError } from './errors.js';
import { isIsoDate, today } from './format.js';
import { generateId, type IdGenerator } from './ids.js';
import type { Entry, EntryInput, IsoDate, Period } from './types.js';

export interface EntryContext {
  newId?: IdGenerator;
  now?: Date;
}

export function isActive(period: Period): boolean {
  return period.endDate === null;
}

export function totalHours(period: Period): number {
  return period.entries.reduce((sum, e) => sum + e.hours, 0);
}

export function createPeriod(startDate: IsoDate, newId: IdGenerator = generateId): Period {
  if (!isIsoDate(startDate)) {
    throw new InvalidEntryError(`Invalid period start date: ${startDate}`);
  }
  return Object.freeze({ id: newId(), startDate, endDate: null, entries: Object.freeze([]) });
}

export function closePeriod(period: Period, endDate: IsoDate): Period {
  if (!isActive(period)) {
    throw new InvalidEntryError(`Period ${period.id} is already closed`);
  }
  return Object.freeze({ ...period, endDate });
}

/** Reject anything that is not a positive, finite number of hours */
export function validateEntryInput(input: EntryInput): void {
  if (typeof input.hours !== 'number' || !Number.isFinite(input.hours) || input.hours <= 0) {
    throw new InvalidEntryError('Hours must be a positive number.');
  }
  if (input.date !== undefined && !isIsoDate(input.date)) {
    throw new InvalidEntryError(`Invalid entry date: ${input.date}`);
  }
}

/**
 * Append an entry to an active period. The sequence keeps logging order even when
 * the entry is back-dated.
 */
export function addEntry(
  period: Period,
  input: EntryInput,
  { newId = generateId, now = new Date() }: EntryContext = {},
): { period: Period; entry: Entry } {
  validateEntryInput(input);
  if (!isActive(period)) {
    throw new InvalidEntryError(`Cannot add an entry to closed period ${period.id}`);
  }

  const entry: Entry = Object.freeze({
    id: newId(),
    date: input.date ?? today(now),
    hours: input.hours,
    note: input.note ?? '',
    createdAt: now.toISOString(),
  });

  return {
    period: Object.freeze({ ...period, entries: Object.freeze([...period.entries, entry]) }),
    entry,
  };
}

/** Parse free-form hours input; null unless it is a positive number */
export function parseHours(raw: string): number | null {
  const trimmed = raw.trim();
  if (trimmed === '') return null;
  const value = Number(trimmed);
  return Number.isFinite(value) && value > 0 ? value : null;
}
