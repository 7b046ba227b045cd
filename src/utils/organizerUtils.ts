import { DateTime } from 'luxon';
import { validate as isUuid } from 'uuid';
import type { Row } from '@/library/data/ScopedDataAccess';
import { ValidationError } from '@/library/errors';
import type { Habit, OrganizerStats, Reminder } from '@/types/organizer';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function asString(value: unknown): string {
  return typeof value === 'string' ? value : value === null || value === undefined ? '' : String(value);
}

function asCount(value: unknown): number {
  const parsed = typeof value === 'number' ? value : Number(value ?? 0);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : 0;
}

export function parseIsoDate(value: string): DateTime | null {
  const trimmed = value.trim();
  if (!ISO_DATE.test(trimmed)) return null;

  const date = DateTime.fromISO(trimmed);
  return date.isValid ? date : null;
}

export function normalizeIsoDate(value: string, field = 'dueDate'): string {
  const date = parseIsoDate(value);
  if (!date) {
    throw new ValidationError(field, `Expected a date as YYYY-MM-DD, got "${value.trim()}"`);
  }
  return toIsoDate(date);
}

/** Record ids are UUIDs; anything else would be rejected by the uuid column. */
export function normalizeRecordId(value: string, field = 'id'): string {
  const trimmed = value.trim();
  if (!isUuid(trimmed)) {
    throw new ValidationError(field, `Expected a record id, got "${trimmed}"`);
  }
  return trimmed;
}

export function toIsoDate(date: DateTime): string {
  return date.toFormat('yyyy-MM-dd');
}

/**
 * Streak after completing a habit on `today`: continues only when the previous
 * completion was the day before, otherwise starts again at one.
 */
export function nextStreak(lastDoneDate: string | null, streak: number, today: DateTime): number {
  if (!lastDoneDate) return 1;

  const last = parseIsoDate(lastDoneDate);
  if (!last) return 1;

  const yesterday = today.startOf('day').minus({ days: 1 });
  return last.hasSame(yesterday, 'day') ? streak + 1 : 1;
}

export function toHabit(row: Row): Habit {
  return {
    id: asString(row.id),
    name: asString(row.name),
    streak: asCount(row.streak),
    totalDone: asCount(row.total_done),
    lastDoneDate: row.last_done_date === null || row.last_done_date === undefined ? null : asString(row.last_done_date),
    createdAt: asString(row.created_at),
  };
}

export function toReminder(row: Row): Reminder {
  return {
    id: asString(row.id),
    title: asString(row.title),
    dueDate: asString(row.due_date),
    createdAt: asString(row.created_at),
  };
}

export function computeStats(habits: Habit[], reminders: Reminder[]): OrganizerStats {
  return {
    totalHabits: habits.length,
    totalDone: habits.reduce((sum, habit) => sum + habit.totalDone, 0),
    bestStreak: habits.reduce((best, habit) => Math.max(best, habit.streak), 0),
    totalReminders: reminders.length,
  };
}
