import { DateTime } from 'luxon';
import { v4 as uuidv4 } from 'uuid';
import { COLUMNS, TABLES } from '@/config/constants';
import type { SessionContext } from '@/library/auth/types';
import type { ScopedDataAccess } from '@/library/data/ScopedDataAccess';
import { DataError, ValidationError } from '@/library/errors';
import type { CompletionResult, Habit } from '@/types/organizer';
import { nextStreak, normalizeRecordId, toHabit, toIsoDate } from '@/utils/organizerUtils';
import { createLogger } from '@/utils/logger';

const logger = createLogger('HabitService');

export class HabitService {
  constructor(
    private readonly data: ScopedDataAccess,
    private readonly context: SessionContext
  ) {}

  async listHabits(): Promise<Habit[]> {
    const rows = await this.data.read(this.context, TABLES.HABITS, {}, {
      columns: COLUMNS.HABITS,
      orderBy: [{ column: 'created_at', ascending: false }],
    });
    return rows.map(toHabit);
  }

  async addHabit(name: string): Promise<Habit> {
    const cleanName = name.trim();
    if (!cleanName) {
      throw new ValidationError('name', 'Habit name cannot be empty');
    }

    const [row] = await this.data.create(
      this.context,
      TABLES.HABITS,
      { id: uuidv4(), name: cleanName },
      { columns: COLUMNS.HABITS }
    );

    if (!row) {
      throw new DataError('NOT_FOUND', 'Created habit was not returned');
    }
    return toHabit(row);
  }

  async completeHabit(id: string, today: DateTime = DateTime.local()): Promise<CompletionResult> {
    const habitId = normalizeRecordId(id);
    const [row] = await this.data.read(this.context, TABLES.HABITS, { id: habitId }, {
      columns: COLUMNS.HABITS,
      limit: 1,
    });

    if (!row) {
      throw new DataError('NOT_FOUND', `Habit ${habitId} not found`);
    }

    const habit = toHabit(row);
    const todayIso = toIsoDate(today);

    if (habit.lastDoneDate === todayIso) {
      return 'already-done';
    }

    try {
      // Conditional on the completion date just read, so two concurrent
      // completions cannot both count.
      await this.data.update(
        this.context,
        TABLES.HABITS,
        { id: habitId, last_done_date: habit.lastDoneDate },
        {
          streak: nextStreak(habit.lastDoneDate, habit.streak, today),
          total_done: habit.totalDone + 1,
          last_done_date: todayIso,
        },
        { columns: 'id' }
      );
    } catch (error) {
      if (error instanceof DataError && error.code === 'NOT_FOUND') {
        logger.info('Habit changed while completing', habitId);
        return 'already-done';
      }
      throw error;
    }

    return 'completed';
  }

  async deleteHabit(habitId: string): Promise<void> {
    await this.data.delete(this.context, TABLES.HABITS, { id: normalizeRecordId(habitId) }, { columns: 'id' });
  }
}
