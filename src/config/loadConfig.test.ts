import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isPlaceholder, load, loadLogLevelSetting } from '@/config/loadConfig';
import { ConfigError } from '@/library/errors';
import { TEST_ANON_KEY, TEST_URL } from '@/testing/fakeSupabase';

function loadError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('load', () => {
  it('returns the trimmed endpoint and key', () => {
    const config = load({
      env: { SUPABASE_URL: `  ${TEST_URL} `, SUPABASE_ANON_KEY: TEST_ANON_KEY },
      envFile: false,
    });

    expect(config).toEqual({ serviceUrl: TEST_URL, publicApiKey: TEST_ANON_KEY });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('treats an empty URL as missing', () => {
    const error = loadError(() => load({ env: { SUPABASE_URL: '', SUPABASE_ANON_KEY: TEST_ANON_KEY }, envFile: false }));

    expect(error.code).toBe('MISSING_SECRET');
    expect(error.keys).toEqual(['SUPABASE_URL']);
    expect(error.message).toBe('Missing environment variables: SUPABASE_URL.');
  });

  it('lists every missing key', () => {
    const error = loadError(() => load({ env: {}, envFile: false }));

    expect(error.keys).toEqual(['SUPABASE_URL', 'SUPABASE_ANON_KEY']);
    expect(error.message).toBe('Missing environment variables: SUPABASE_URL and SUPABASE_ANON_KEY.');
  });

  it('rejects the example values from the setup instructions', () => {
    const error = loadError(() =>
      load({
        env: { SUPABASE_URL: 'https://your-project.supabase.co', SUPABASE_ANON_KEY: 'your-anon-key' },
        envFile: false,
      })
    );

    expect(error.code).toBe('MISSING_SECRET');
    expect(error.keys).toEqual(['SUPABASE_URL', 'SUPABASE_ANON_KEY']);
  });

  it('rejects URLs that are not http(s)', () => {
    const error = loadError(() =>
      load({ env: { SUPABASE_URL: 'ftp://example.com', SUPABASE_ANON_KEY: TEST_ANON_KEY }, envFile: false })
    );

    expect(error.code).toBe('INVALID_SECRET');
    expect(error.keys).toEqual(['SUPABASE_URL']);
  });

  it('rejects publishable keys', () => {
    const error = loadError(() =>
      load({ env: { SUPABASE_URL: TEST_URL, SUPABASE_ANON_KEY: 'sb_publishable_test' }, envFile: false })
    );

    expect(error.code).toBe('INVALID_SECRET');
    expect(error.keys).toEqual(['SUPABASE_ANON_KEY']);
    expect(error.message).toContain('legacy anon key');
  });

  it('rejects keys that are not JWT-shaped', () => {
    const error = loadError(() =>
      load({ env: { SUPABASE_URL: TEST_URL, SUPABASE_ANON_KEY: 'test-secret' }, envFile: false })
    );

    expect(error.code).toBe('INVALID_SECRET');
    expect(error.message).toBe('SUPABASE_ANON_KEY is not a JWT-style anon key.');
  });

  describe('with a dotenv file', () => {
    let dir: string;
    let envFile: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'organizer-config-'));
      envFile = join(dir, '.env');
      writeFileSync(
        envFile,
        [`SUPABASE_URL=https://from-file.supabase.co`, `SUPABASE_ANON_KEY=${TEST_ANON_KEY}`, 'LOG_LEVEL=info'].join('\n')
      );
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('reads values from the file', () => {
      expect(load({ env: {}, envFile })).toEqual({
        serviceUrl: 'https://from-file.supabase.co',
        publicApiKey: TEST_ANON_KEY,
      });
    });

    it('prefers non-blank environment variables', () => {
      expect(load({ env: { SUPABASE_URL: TEST_URL }, envFile }).serviceUrl).toBe(TEST_URL);
    });

    it('falls back to the file when the variable is blank', () => {
      expect(load({ env: { SUPABASE_URL: '   ' }, envFile }).serviceUrl).toBe('https://from-file.supabase.co');
    });

    it('ignores a file that does not exist', () => {
      const error = loadError(() => load({ env: {}, envFile: join(dir, 'missing.env') }));
      expect(error.code).toBe('MISSING_SECRET');
    });

    it('resolves LOG_LEVEL with the same precedence', () => {
      expect(loadLogLevelSetting({ env: {}, envFile })).toBe('info');
      expect(loadLogLevelSetting({ env: { LOG_LEVEL: ' debug ' }, envFile })).toBe('debug');
      expect(loadLogLevelSetting({ env: {}, envFile: false })).toBeUndefined();
    });
  });
});

describe('isPlaceholder', () => {
  it.each([
    ['your-anon-key', true],
    ['<anon key>', true],
    ['https://tu-proyecto.supabase.co', true],
    [TEST_URL, false],
    [TEST_ANON_KEY, false],
  ])('%s -> %s', (value, expected) => {
    expect(isPlaceholder(value)).toBe(expected);
  });
});
