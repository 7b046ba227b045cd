export interface Session {
  userId: string;
  email: string;
  accessToken: string;
  issuedAt: Date;
}

export interface Credentials {
  email: string;
  password: string;
}

export interface SignUpResult {
  /** `pending` when the backend holds the account until the email is confirmed. */
  status: 'active' | 'pending';
  userId: string;
  email: string;
}

export interface AuthProvider {
  signUp(credentials: Credentials): Promise<SignUpResult>;
  signIn(credentials: Credentials): Promise<Session>;
  signOut(): Promise<void>;
}

/**
 * Handed to every scoped data call so the caller's identity is explicit.
 */
export interface SessionContext {
  requireSession(): Session;
}
