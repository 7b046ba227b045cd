import { createClient, SupabaseClient } from '@supabase/supabase-js';
import type { Configuration } from '@/config/loadConfig';
import type { Session } from '@/library/auth/types';

export type SupabaseAuthClient = SupabaseClient['auth'];

export interface ConnectOptions {
  /** Replaces the global fetch for every auth and data request. */
  fetch?: typeof fetch;
}

export interface ClientHandle {
  readonly config: Configuration;
  /** GoTrue API of the shared client. */
  readonly auth: SupabaseAuthClient;
  /** Client whose requests all carry the session's access token. */
  forSession(session: Session): SupabaseClient;
}

// Sessions live in memory only, so nothing may be persisted, refreshed in the
// background or read back from a redirect URL.
const AUTH_OPTIONS = {
  persistSession: false,
  autoRefreshToken: false,
  detectSessionInUrl: false,
} as const;

class SupabaseClientHandle implements ClientHandle {
  private base: SupabaseClient | null = null;
  private scoped: { token: string; client: SupabaseClient } | null = null;

  constructor(
    readonly config: Configuration,
    private readonly options: ConnectOptions
  ) {}

  get auth(): SupabaseAuthClient {
    if (!this.base) {
      this.base = createClient(this.config.serviceUrl, this.config.publicApiKey, {
        auth: AUTH_OPTIONS,
        global: this.options.fetch ? { fetch: this.options.fetch } : {},
      });
    }
    return this.base.auth;
  }

  forSession(session: Session): SupabaseClient {
    if (this.scoped?.token === session.accessToken) {
      return this.scoped.client;
    }

    const client = createClient(this.config.serviceUrl, this.config.publicApiKey, {
      auth: AUTH_OPTIONS,
      global: {
        headers: { Authorization: `Bearer ${session.accessToken}` },
        ...(this.options.fetch ? { fetch: this.options.fetch } : {}),
      },
    });

    this.scoped = { token: session.accessToken, client };
    return client;
  }
}

/**
 * Binds a handle to the configured project. Nothing is sent until the first
 * auth or data request, so an unreachable endpoint only fails on use.
 */
export function connect(config: Configuration, options: ConnectOptions = {}): ClientHandle {
  return new SupabaseClientHandle(config, options);
}
