import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';
import { ConfigurationError } from './errors/AppError';
import { LogLevel } from './utils/logger';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      port: 8000,
      mongoUri: null,
      scanTimeoutMs: 10_000,
      scanRateLimitSeconds: 600,
      progressRetentionMs: 3_600_000,
      mail: null,
      logLevel: LogLevel.INFO,
    });
    expect(config.corsOrigins).toContain('http://localhost:3000');
    expect(config.phishingModelPath).toBe(
      path.resolve(process.cwd(), 'server/data/phishing-model.json')
    );
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9090',
      MONGODB_URI: 'mongodb://localhost:27017/test',
      CORS_ORIGINS: 'https://a.example, https://b.example',
      SCAN_RATE_LIMIT_SECONDS: '0',
      EMAIL_USER: 'scanner@example.com',
      EMAIL_PASS: 'test-secret',
      LOG_LEVEL: 'debug',
    });
    expect(config.port).toBe(9090);
    expect(config.mongoUri).toBe('mongodb://localhost:27017/test');
    expect(config.corsOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.scanRateLimitSeconds).toBe(0);
    expect(config.mail).toEqual({ service: 'Gmail', user: 'scanner@example.com', pass: 'test-secret' });
    expect(config.logLevel).toBe(LogLevel.DEBUG);
  });

  it('should fail fast on invalid numbers', () => {
    expect(() => loadConfig({ SCAN_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ PORT: '-1' })).toThrow('PORT must be a non-negative integer, got "-1"');
  });
});
