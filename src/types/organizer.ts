export interface Habit {
  id: string;
  name: string;
  streak: number;
  totalDone: number;
  /** ISO date (yyyy-mm-dd) of the last completion. */
  lastDoneDate: string | null;
  createdAt: string;
}

export interface Reminder {
  id: string;
  title: string;
  /** ISO date (yyyy-mm-dd). */
  dueDate: string;
  createdAt: string;
}

export interface OrganizerStats {
  totalHabits: number;
  totalDone: number;
  bestStreak: number;
  totalReminders: number;
}

export type CompletionResult = 'completed' | 'already-done';
