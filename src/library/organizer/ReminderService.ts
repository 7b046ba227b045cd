import { v4 as uuidv4 } from 'uuid';
import { COLUMNS, TABLES } from '@/config/constants';
import type { SessionContext } from '@/library/auth/types';
import type { ScopedDataAccess } from '@/library/data/ScopedDataAccess';
import { DataError, ValidationError } from '@/library/errors';
import type { Reminder } from '@/types/organizer';
import { normalizeIsoDate, normalizeRecordId, toReminder } from '@/utils/organizerUtils';

export class ReminderService {
  constructor(
    private readonly data: ScopedDataAccess,
    private readonly context: SessionContext
  ) {}

  async listReminders(): Promise<Reminder[]> {
    const rows = await this.data.read(this.context, TABLES.REMINDERS, {}, {
      columns: COLUMNS.REMINDERS,
      orderBy: [
        { column: 'due_date', ascending: true },
        { column: 'created_at', ascending: true },
      ],
    });
    return rows.map(toReminder);
  }

  async addReminder(title: string, dueDate: string): Promise<Reminder> {
    const cleanTitle = title.trim();
    if (!cleanTitle) {
      throw new ValidationError('title', 'Reminder title cannot be empty');
    }

    const [row] = await this.data.create(
      this.context,
      TABLES.REMINDERS,
      { id: uuidv4(), title: cleanTitle, due_date: normalizeIsoDate(dueDate) },
      { columns: COLUMNS.REMINDERS }
    );

    if (!row) {
      throw new DataError('NOT_FOUND', 'Created reminder was not returned');
    }
    return toReminder(row);
  }

  async deleteReminder(reminderId: string): Promise<void> {
    await this.data.delete(this.context, TABLES.REMINDERS, { id: normalizeRecordId(reminderId) }, { columns: 'id' });
  }
}
