import type { Configuration } from '@/config/loadConfig';
import { SupabaseAuthProvider } from '@/library/auth/providers/supabase';
import { connect, type ClientHandle } from '@/library/supabase/client';
import { AuthStore } from '@/stores/AuthStore';
import { FakeSupabase, TEST_ANON_KEY, TEST_URL, type FakeSupabaseOptions } from '@/testing/fakeSupabase';

export const testConfig: Configuration = Object.freeze({
  serviceUrl: TEST_URL,
  publicApiKey: TEST_ANON_KEY,
});

export interface TestBackend {
  fake: FakeSupabase;
  client: ClientHandle;
}

export function createBackend(options: FakeSupabaseOptions = {}): TestBackend {
  const fake = new FakeSupabase(options);
  return { fake, client: connect(testConfig, { fetch: fake.fetch }) };
}

/** Registers the account and returns a store signed in as it. */
export async function signedInStore(backend: TestBackend, email: string, password = 'test-secret'): Promise<AuthStore> {
  const store = new AuthStore(new SupabaseAuthProvider(backend.client));
  await store.signUp(email, password);
  await store.signIn(email, password);
  return store;
}
