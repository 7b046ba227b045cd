import { makeAutoObservable, observable } from 'mobx';
import { Mutex } from 'async-mutex';
import { AUTH_ERRORS } from '@/config/constants';
import type { AuthProvider, Session, SessionContext, SignUpResult } from '@/library/auth/types';
import { AuthError, ValidationError } from '@/library/errors';
import { createLogger } from '@/utils/logger';

const logger = createLogger('AuthStore');

function normalizeCredentials(email: string, password: string) {
  const trimmed = email.trim();

  if (!trimmed) {
    throw new ValidationError('email', 'Email is required');
  }
  if (!password) {
    throw new ValidationError('password', 'Password is required');
  }

  return { email: trimmed, password };
}

/**
 * Owns the single current-session slot. Sign-up, sign-in and sign-out are
 * serialized; sign-out empties the slot before its first await.
 */
export class AuthStore implements SessionContext {
  session: Session | null = null;

  private readonly lock = new Mutex();

  constructor(private readonly provider: AuthProvider) {
    makeAutoObservable<AuthStore, 'lock' | 'provider'>(this, {
      session: observable.ref,
      lock: false,
      provider: false,
    });
  }

  get isAuthenticated() {
    return this.session !== null;
  }

  setSession(session: Session | null) {
    this.session = session;
  }

  requireSession(): Session {
    if (!this.session) {
      throw new AuthError('NOT_AUTHENTICATED', AUTH_ERRORS.NOT_AUTHENTICATED);
    }
    return this.session;
  }

  async signUp(email: string, password: string): Promise<SignUpResult> {
    const credentials = normalizeCredentials(email, password);
    return this.lock.runExclusive(() => this.provider.signUp(credentials));
  }

  async signIn(email: string, password: string): Promise<Session> {
    const credentials = normalizeCredentials(email, password);

    return this.lock.runExclusive(async () => {
      const session = await this.provider.signIn(credentials);
      this.setSession(session);
      return session;
    });
  }

  async signOut(): Promise<void> {
    this.setSession(null);

    await this.lock.runExclusive(async () => {
      // A sign-in queued before this call may have filled the slot again.
      this.setSession(null);

      try {
        await this.provider.signOut();
      } catch (error) {
        logger.error('Error during sign out:', error);
      }
    });
  }
}
