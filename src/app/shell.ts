import { DateTime } from 'luxon';
import { MESSAGES } from '@/config/constants';
import { isOrganizerError } from '@/library/errors';
import type { RootStore } from '@/stores/RootStore';
import type { Habit, OrganizerStats, Reminder } from '@/types/organizer';
import { toIsoDate } from '@/utils/organizerUtils';

export interface ShellReply {
  ok: boolean;
  message: string;
}

export const HELP_TEXT = [
  'Commands:',
  '  signup <email> <password>',
  '  signin <email> <password>',
  '  signout',
  '  whoami',
  '  habits',
  '  habit add <name>',
  '  habit done <id>',
  '  habit rm <id>',
  '  reminders',
  '  reminder add [YYYY-MM-DD] <title>',
  '  reminder rm <id>',
  '  stats',
  '  help',
].join('\n');

const ISO_DATE_ARG = /^\d{4}-\d{2}-\d{2}$/;

export function formatHabits(habits: Habit[]): string {
  if (habits.length === 0) return MESSAGES.HABIT.EMPTY;
  return habits
    .map(habit => `${habit.id}  ${habit.name}  (streak: ${habit.streak} | done: ${habit.totalDone})`)
    .join('\n');
}

export function formatReminders(reminders: Reminder[]): string {
  if (reminders.length === 0) return MESSAGES.REMINDER.EMPTY;
  return reminders.map(reminder => `${reminder.id}  ${reminder.dueDate}  ${reminder.title}`).join('\n');
}

export function formatStats(stats: OrganizerStats): string {
  return [
    `Total habits: ${stats.totalHabits}`,
    `Total completed: ${stats.totalDone}`,
    `Best streak: ${stats.bestStreak}`,
    `Total reminders: ${stats.totalReminders}`,
  ].join('\n');
}

function errorText(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim() || MESSAGES.GENERIC_FAILURE;
  }
  return MESSAGES.GENERIC_FAILURE;
}

const ok = (message: string): ShellReply => ({ ok: true, message });
const fail = (message: string): ShellReply => ({ ok: false, message });

async function dispatch(store: RootStore, words: string[], today: DateTime): Promise<ShellReply> {
  const [command = '', sub = '', ...rest] = words;

  switch (command) {
    case '':
      return ok('');
    case 'help':
      return ok(HELP_TEXT);
    case 'signup': {
      const result = await store.register(sub, rest[0] ?? '');
      return ok(result.status === 'active' ? MESSAGES.AUTH.SIGNED_UP_ACTIVE : MESSAGES.AUTH.SIGNED_UP_PENDING);
    }
    case 'signin': {
      const session = await store.login(sub, rest[0] ?? '');
      return ok(MESSAGES.AUTH.SIGNED_IN(session.email));
    }
    case 'signout':
      await store.logout();
      return ok(MESSAGES.AUTH.SIGNED_OUT);
    case 'whoami':
      return store.session ? ok(store.session.email) : fail(MESSAGES.AUTH.SIGN_IN_FIRST);
  }

  if (!store.isAuthenticated) {
    return fail(MESSAGES.AUTH.SIGN_IN_FIRST);
  }

  switch (`${command} ${sub}`.trim()) {
    case 'habits':
      await store.refreshAll();
      return ok(formatHabits(store.habits));
    case 'habit add':
      await store.addHabit(rest.join(' '));
      return ok(MESSAGES.HABIT.ADDED);
    case 'habit done': {
      const result = await store.completeHabit(rest[0] ?? '', today);
      return result === 'completed' ? ok(MESSAGES.HABIT.COMPLETED) : fail(MESSAGES.HABIT.ALREADY_DONE);
    }
    case 'habit rm':
      await store.deleteHabit(rest[0] ?? '');
      return ok(MESSAGES.HABIT.DELETED);
    case 'reminders':
      await store.refreshAll();
      return ok(formatReminders(store.reminders));
    case 'reminder add': {
      const [first = '', ...titleWords] = rest;
      const hasDate = ISO_DATE_ARG.test(first);
      const dueDate = hasDate ? first : toIsoDate(today);
      const title = (hasDate ? titleWords : rest).join(' ');
      await store.addReminder(title, dueDate);
      return ok(MESSAGES.REMINDER.ADDED);
    }
    case 'reminder rm':
      await store.deleteReminder(rest[0] ?? '');
      return ok(MESSAGES.REMINDER.DELETED);
    case 'stats':
      await store.refreshAll();
      return ok(formatStats(store.stats));
    default:
      return fail(`Unknown command "${words.join(' ')}". Type "help".`);
  }
}

/**
 * Runs one line of input against the store. Every failure comes back as a
 * reply; programming errors that are not organizer errors are rethrown.
 */
export async function runCommand(store: RootStore, line: string, today: DateTime = DateTime.local()): Promise<ShellReply> {
  const words = line.trim().split(/\s+/).filter(Boolean);

  try {
    return await dispatch(store, words, today);
  } catch (error) {
    if (isOrganizerError(error)) {
      return fail(errorText(error));
    }
    throw error;
  }
}
