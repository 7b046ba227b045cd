import { DateTime } from 'luxon';
import { describe, expect, it } from 'vitest';
import { ValidationError } from '@/library/errors';
import { computeStats, nextStreak, normalizeIsoDate, normalizeRecordId, parseIsoDate, toHabit } from '@/utils/organizerUtils';

const TODAY = DateTime.fromISO('2026-03-10T23:30:00');

describe('nextStreak', () => {
  it('continues after a completion yesterday', () => {
    expect(nextStreak('2026-03-09', 4, TODAY)).toBe(5);
  });

  it('restarts after a gap, a first completion or an unreadable date', () => {
    expect(nextStreak('2026-03-08', 4, TODAY)).toBe(1);
    expect(nextStreak(null, 4, TODAY)).toBe(1);
    expect(nextStreak('yesterday', 4, TODAY)).toBe(1);
  });

  it('continues across a month boundary', () => {
    expect(nextStreak('2026-02-28', 2, DateTime.fromISO('2026-03-01'))).toBe(3);
  });
});

describe('parseIsoDate', () => {
  it('accepts calendar dates only', () => {
    expect(parseIsoDate(' 2026-03-10 ')?.toISODate()).toBe('2026-03-10');
    expect(parseIsoDate('2026-02-30')).toBeNull();
    expect(parseIsoDate('2026-3-10')).toBeNull();
    expect(parseIsoDate('2026-03-10T10:00')).toBeNull();
  });
});

describe('normalizeIsoDate', () => {
  it('names the field it validates', () => {
    let field = '';
    try {
      normalizeIsoDate('soon', 'when');
    } catch (error) {
      if (error instanceof ValidationError) field = error.field;
    }
    expect(field).toBe('when');
    expect(() => normalizeIsoDate(' soon ')).toThrow('Expected a date as YYYY-MM-DD, got "soon"');
  });
});

describe('normalizeRecordId', () => {
  it('accepts UUIDs and trims them', () => {
    expect(normalizeRecordId(' 3b241101-e2bb-4255-8caf-4136c566a962 ')).toBe('3b241101-e2bb-4255-8caf-4136c566a962');
  });

  it('rejects anything else', () => {
    expect(() => normalizeRecordId('no-such-habit')).toThrow('Expected a record id, got "no-such-habit"');
    expect(() => normalizeRecordId('')).toThrow(ValidationError);
  });
});

describe('toHabit', () => {
  it('coerces loosely typed rows', () => {
    expect(toHabit({ id: 'h1', name: 'Read', streak: '3', total_done: null, created_at: '2026-01-01T00:00:00.000Z' })).toEqual({
      id: 'h1',
      name: 'Read',
      streak: 3,
      totalDone: 0,
      lastDoneDate: null,
      createdAt: '2026-01-01T00:00:00.000Z',
    });
  });
});

describe('computeStats', () => {
  it('sums completions and finds the best streak', () => {
    const habits = [
      toHabit({ id: 'h1', streak: 2, total_done: 5 }),
      toHabit({ id: 'h2', streak: 7, total_done: 9 }),
    ];

    expect(computeStats(habits, [])).toEqual({ totalHabits: 2, totalDone: 14, bestStreak: 7, totalReminders: 0 });
  });

  it('is all zeros when empty', () => {
    expect(computeStats([], [])).toEqual({ totalHabits: 0, totalDone: 0, bestStreak: 0, totalReminders: 0 });
  });
});
