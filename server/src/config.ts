import path from 'path';
import { ConfigurationError } from './errors/AppError';
import { LogLevel, parseLogLevel } from './utils/logger';

export interface MailConfig {
  service: string;
  user: string;
  pass: string;
}

export interface AppConfig {
  port: number;
  mongoUri: string | null;
  corsOrigins: string[];
  scanTimeoutMs: number;
  scanRateLimitSeconds: number;
  progressRetentionMs: number;
  phishingModelPath: string;
  breachDataPath: string;
  passwordLexiconPath: string;
  mail: MailConfig | null;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const DEFAULT_CORS_ORIGINS = [
  'http://localhost:3000',
  'http://127.0.0.1:3000',
  'http://localhost:5000',
];

const readInt = (env: Env, name: string, fallback: number): number => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
};

const readList = (env: Env, name: string, fallback: string[]): string[] => {
  const raw = env[name];
  if (!raw) return fallback;
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const dataDir = path.resolve(process.cwd(), 'server/data');

  const mailUser = env.EMAIL_USER;
  const mailPass = env.EMAIL_PASS;

  return {
    port: readInt(env, 'PORT', 8000),
    mongoUri: env.MONGODB_URI || null,
    corsOrigins: readList(env, 'CORS_ORIGINS', DEFAULT_CORS_ORIGINS),
    scanTimeoutMs: readInt(env, 'SCAN_TIMEOUT_MS', 10_000),
    scanRateLimitSeconds: readInt(env, 'SCAN_RATE_LIMIT_SECONDS', 600),
    progressRetentionMs: readInt(env, 'PROGRESS_RETENTION_MS', 60 * 60 * 1000),
    phishingModelPath: env.PHISHING_MODEL_PATH || path.join(dataDir, 'phishing-model.json'),
    breachDataPath: env.BREACH_DATA_PATH || path.join(dataDir, 'breaches.json'),
    passwordLexiconPath:
      env.PASSWORD_LEXICON_PATH || path.join(dataDir, 'password-lexicon.json'),
    mail:
      mailUser && mailPass
        ? { service: env.EMAIL_SERVICE || 'Gmail', user: mailUser, pass: mailPass }
        : null,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
};
