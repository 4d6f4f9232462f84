import { describe, test, expect } from 'vitest';
import { loadConfig } from '../src/config';
import { ConfigError } from '../src/errors';

describe('loadConfig', () => {
  test('applies defaults for the memory backend', () => {
    expect(loadConfig({ STORAGE_BACKEND: 'memory' })).toEqual({
      nodeEnv: 'development',
      port: 3001,
      storage: { backend: 'memory' },
      apiKey: undefined,
      seedData: false,
    });
  });

  test('reads postgres settings', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      DATABASE_URL: 'postgresql://localhost:5432/shoes',
      API_KEY: 'test-secret',
      SEED_DATA: 'true',
    });

    expect(config).toEqual({
      nodeEnv: 'production',
      port: 8080,
      storage: { backend: 'postgres', databaseUrl: 'postgresql://localhost:5432/shoes' },
      apiKey: 'test-secret',
      seedData: true,
    });
  });

  test('treats a blank API key as unset', () => {
    expect(loadConfig({ STORAGE_BACKEND: 'memory', API_KEY: '  ' }).apiKey).toBeUndefined();
  });

  test('requires DATABASE_URL for postgres', () => {
    try {
      loadConfig({});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.problems).toEqual(['DATABASE_URL is required when STORAGE_BACKEND=postgres']);
      }
    }
  });

  test('rejects unknown backends', () => {
    expect(() => loadConfig({ STORAGE_BACKEND: 'sqlite' })).toThrow(ConfigError);
  });
});
