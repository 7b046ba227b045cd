import { isAuthRetryableFetchError, type AuthError as SupabaseAuthError, type User } from '@supabase/supabase-js';
import { AUTH_ERRORS } from '@/config/constants';
import type { AuthProvider, Credentials, Session, SignUpResult } from '@/library/auth/types';
import { AuthError, type AuthErrorCode } from '@/library/errors';
import type { ClientHandle } from '@/library/supabase/client';
import { createLogger } from '@/utils/logger';

const logger = createLogger('SupabaseAuthProvider');

const CODE_MAP: Record<string, AuthErrorCode> = {
  weak_password: 'WEAK_CREDENTIAL',
  user_already_exists: 'ALREADY_REGISTERED',
  email_exists: 'ALREADY_REGISTERED',
  invalid_credentials: 'INVALID_CREDENTIALS',
  email_not_confirmed: 'EMAIL_NOT_CONFIRMED',
};

// Older GoTrue releases answer without error codes.
const MESSAGE_MAP: Array<[RegExp, AuthErrorCode]> = [
  [/password should be/i, 'WEAK_CREDENTIAL'],
  [/already registered/i, 'ALREADY_REGISTERED'],
  [/invalid login credentials/i, 'INVALID_CREDENTIALS'],
  [/email not confirmed/i, 'EMAIL_NOT_CONFIRMED'],
];

export function toAuthErrorCode(error: SupabaseAuthError): AuthErrorCode {
  if (isAuthRetryableFetchError(error)) return 'UNAVAILABLE';

  if (error.code && CODE_MAP[error.code]) {
    return CODE_MAP[error.code];
  }

  const byMessage = MESSAGE_MAP.find(([pattern]) => pattern.test(error.message));
  if (byMessage) return byMessage[1];

  if (error.status !== undefined && error.status >= 500) return 'UNAVAILABLE';

  return 'REJECTED';
}

export function mapAuthError(error: SupabaseAuthError): AuthError {
  const code = toAuthErrorCode(error);
  return new AuthError(code, AUTH_ERRORS[code], { cause: error });
}

function toSession(user: User, accessToken: string, fallbackEmail: string): Session {
  return {
    userId: user.id,
    email: user.email ?? fallbackEmail,
    accessToken,
    issuedAt: new Date(),
  };
}

export class SupabaseAuthProvider implements AuthProvider {
  constructor(private readonly client: ClientHandle) {}

  async signUp({ email, password }: Credentials): Promise<SignUpResult> {
    const { data, error } = await this.client.auth.signUp({ email, password });

    if (error) {
      logger.warn('Sign up failed:', error.message);
      throw mapAuthError(error);
    }

    if (!data.user) {
      throw new AuthError('REJECTED', AUTH_ERRORS.REJECTED);
    }

    // With confirmations on, GoTrue hides existing accounts behind a user without identities.
    if (!data.session && data.user.identities?.length === 0) {
      throw new AuthError('ALREADY_REGISTERED', AUTH_ERRORS.ALREADY_REGISTERED);
    }

    logger.debug('Signed up', data.user.id, data.session ? '(active)' : '(pending confirmation)');

    return {
      status: data.session ? 'active' : 'pending',
      userId: data.user.id,
      email: data.user.email ?? email,
    };
  }

  async signIn({ email, password }: Credentials): Promise<Session> {
    const { data, error } = await this.client.auth.signInWithPassword({ email, password });

    if (error) {
      logger.warn('Sign in failed:', error.message);
      throw mapAuthError(error);
    }

    if (!data.session || !data.user) {
      throw new AuthError('REJECTED', AUTH_ERRORS.REJECTED);
    }

    logger.debug('Signed in', data.user.id);
    return toSession(data.user, data.session.access_token, email);
  }

  async signOut(): Promise<void> {
    const { error } = await this.client.auth.signOut();

    if (error) {
      throw mapAuthError(error);
    }
  }
}
