import { makeAutoObservable, reaction, runInAction } from 'mobx';
import type { DateTime } from 'luxon';
import type { Configuration } from '@/config/loadConfig';
import type { AuthProvider, Session, SignUpResult } from '@/library/auth/types';
import { SupabaseAuthProvider } from '@/library/auth/providers/supabase';
import { ScopedDataAccess } from '@/library/data/ScopedDataAccess';
import { HabitService } from '@/library/organizer/HabitService';
import { ReminderService } from '@/library/organizer/ReminderService';
import { connect, type ConnectOptions } from '@/library/supabase/client';
import { isOrganizerError } from '@/library/errors';
import { AuthStore } from '@/stores/AuthStore';
import type { CompletionResult, Habit, Reminder } from '@/types/organizer';
import { computeStats } from '@/utils/organizerUtils';
import { createLogger } from '@/utils/logger';

const logger = createLogger('RootStore');

export interface RootStoreOptions extends ConnectOptions {
  /** Overrides the Supabase auth provider. */
  authProvider?: AuthProvider;
}

export class RootStore {
  readonly auth: AuthStore;
  readonly habitService: HabitService;
  readonly reminderService: ReminderService;

  habits: Habit[] = [];
  reminders: Reminder[] = [];

  private readonly disposeSessionReaction: () => void;

  constructor(config: Configuration, options: RootStoreOptions = {}) {
    const client = connect(config, { fetch: options.fetch });
    const data = new ScopedDataAccess(client);

    this.auth = new AuthStore(options.authProvider ?? new SupabaseAuthProvider(client));
    this.habitService = new HabitService(data, this.auth);
    this.reminderService = new ReminderService(data, this.auth);

    makeAutoObservable<RootStore, 'disposeSessionReaction'>(this, {
      auth: false,
      habitService: false,
      reminderService: false,
      disposeSessionReaction: false,
    });

    this.disposeSessionReaction = reaction(
      () => this.auth.session?.userId ?? null,
      userId => {
        if (!userId) this.clearLists();
      }
    );
  }

  get session(): Session | null {
    return this.auth.session;
  }

  get isAuthenticated() {
    return this.auth.isAuthenticated;
  }

  get stats() {
    return computeStats(this.habits, this.reminders);
  }

  clearLists() {
    this.habits = [];
    this.reminders = [];
  }

  async register(email: string, password: string): Promise<SignUpResult> {
    return this.auth.signUp(email, password);
  }

  async login(email: string, password: string): Promise<Session> {
    const session = await this.auth.signIn(email, password);
    await this.refreshAfter('sign-in');
    return session;
  }

  async logout() {
    await this.auth.signOut();
  }

  async refreshAll() {
    const { userId } = this.auth.requireSession();
    const [habits, reminders] = await Promise.all([
      this.habitService.listHabits(),
      this.reminderService.listReminders(),
    ]);

    runInAction(() => {
      // Drop results that arrive after the user signed out or switched.
      if (this.auth.session?.userId !== userId) return;
      this.habits = habits;
      this.reminders = reminders;
    });
  }

  /**
   * Reloads the lists once an operation has gone through. A failed reload
   * keeps the previous lists so the operation itself still reports success.
   */
  private async refreshAfter(operation: string) {
    try {
      await this.refreshAll();
    } catch (error) {
      if (!isOrganizerError(error)) throw error;
      logger.warn(`Reload after ${operation} failed:`, error.message);
    }
  }

  async addHabit(name: string): Promise<Habit> {
    const habit = await this.habitService.addHabit(name);
    await this.refreshAfter('adding a habit');
    return habit;
  }

  async completeHabit(habitId: string, today?: DateTime): Promise<CompletionResult> {
    const result = await this.habitService.completeHabit(habitId, today);
    await this.refreshAfter('completing a habit');
    return result;
  }

  async deleteHabit(habitId: string) {
    await this.habitService.deleteHabit(habitId);
    await this.refreshAfter('deleting a habit');
  }

  async addReminder(title: string, dueDate: string): Promise<Reminder> {
    const reminder = await this.reminderService.addReminder(title, dueDate);
    await this.refreshAfter('adding a reminder');
    return reminder;
  }

  async deleteReminder(reminderId: string) {
    await this.reminderService.deleteReminder(reminderId);
    await this.refreshAfter('deleting a reminder');
  }

  dispose() {
    this.disposeSessionReaction();
  }
}
