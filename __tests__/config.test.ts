import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { CONFIG, loadConfig, looksLikeApiHost, readEnvFile, redactKey } from '../lib/config';
import { MissingCredentialsError } from '../lib/errors';

const env = {
  AKAMAI_HOST: 'https://akab-test.luna.akamaiapis.net/',
  AKAMAI_CLIENT_TOKEN: 'test-client-token',
  AKAMAI_CLIENT_SECRET: 'test-secret',
  AKAMAI_ACCESS_TOKEN: 'test-access-token',
};

describe('loadConfig', () => {
  test('builds a frozen config with default timeouts', () => {
    const result = loadConfig(env);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      host: 'akab-test.luna.akamaiapis.net',
      clientToken: 'test-client-token',
      clientSecret: 'test-secret',
      accessToken: 'test-access-token',
      accountSwitchKey: undefined,
      timeouts: { connectMs: CONFIG.CONNECT_TIMEOUT_MS, readMs: CONFIG.READ_TIMEOUT_MS },
    });
    expect(Object.isFrozen(result.value)).toBe(true);
  });

  test('reports every missing or empty credential', () => {
    const result = loadConfig({ AKAMAI_HOST: 'akab-test.luna.akamaiapis.net', AKAMAI_CLIENT_TOKEN: '  ' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(MissingCredentialsError);
    expect(result.error.missing).toEqual(['AKAMAI_CLIENT_TOKEN', 'AKAMAI_CLIENT_SECRET', 'AKAMAI_ACCESS_TOKEN']);
  });

  test('the command-line switch key wins over the environment', () => {
    const fromEnv = loadConfig({ ...env, AKAMAI_ACCOUNT_SWITCH_KEY: 'env-key' });
    const fromFlag = loadConfig({ ...env, AKAMAI_ACCOUNT_SWITCH_KEY: 'env-key' }, { accountSwitchKey: 'flag-key' });
    expect(fromEnv.ok && fromEnv.value.accountSwitchKey).toBe('env-key');
    expect(fromFlag.ok && fromFlag.value.accountSwitchKey).toBe('flag-key');
  });

  test('timeouts can be tuned, invalid values fall back', () => {
    const result = loadConfig({ ...env, AKAMAI_CONNECT_TIMEOUT_MS: '2500', AKAMAI_READ_TIMEOUT_MS: 'soon' });
    expect(result.ok && result.value.timeouts).toEqual({ connectMs: 2500, readMs: CONFIG.READ_TIMEOUT_MS });
  });
});

test('readEnvFile parses without touching process.env', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cdn-env-'));
  const file = path.join(dir, 'akamai.env');
  await fs.writeFile(file, '# credentials\nAKAMAI_HOST=akab-file.luna.akamaiapis.net\nAKAMAI_CLIENT_SECRET="test-secret"\n');
  try {
    expect(readEnvFile(file)).toEqual({ AKAMAI_HOST: 'akab-file.luna.akamaiapis.net', AKAMAI_CLIENT_SECRET: 'test-secret' });
    expect(process.env.AKAMAI_HOST).toBeUndefined();
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('host shape and key redaction', () => {
  expect(looksLikeApiHost('akab-abc.luna.akamaiapis.net')).toBe(true);
  expect(looksLikeApiHost('api.example.com')).toBe(false);
  expect(redactKey('B-C-1ABCDEF:1-2345')).toBe('B-C-1ABC...');
});
