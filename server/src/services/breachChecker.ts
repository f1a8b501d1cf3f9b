import crypto from 'crypto';
import fs from 'fs';
import { ConfigurationError, InvalidInputError } from '../errors/AppError';
import { breachRiskLevel } from '../domain/riskEngine';
import type { Severity } from '../types/common';
import type { BreachDetail, EmailCheckResult } from '../types/checks';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'BREACH' });

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const CACHE_SIZE = 1000;
const SENSITIVE_DATA = ['credit', 'social security', 'ssn', 'bank', 'financial'];

export interface BreachRecord extends BreachDetail {
  severity: Severity;
}

export interface BreachDataset {
  breaches: BreachRecord[];
  /** SHA-1 of the normalised address → breach names. */
  accounts: Record<string, string[]>;
}

const SEVERITIES: readonly string[] = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'];

const isSeverity = (value: unknown): value is Severity =>
  typeof value === 'string' && SEVERITIES.includes(value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

export const normalizeEmail = (email: string) => email.trim().toLowerCase();

export const hashEmail = (email: string) =>
  crypto.createHash('sha1').update(normalizeEmail(email), 'utf8').digest('hex');

const parseBreach = (value: unknown): BreachRecord => {
  if (
    !isRecord(value) ||
    typeof value.name !== 'string' ||
    typeof value.date !== 'string' ||
    typeof value.accounts !== 'number' ||
    !isSeverity(value.severity) ||
    !isStringArray(value.data_classes)
  ) {
    throw new ConfigurationError('Breach dataset contains a malformed breach entry');
  }
  return {
    name: value.name,
    date: value.date,
    accounts: value.accounts,
    severity: value.severity,
    data_classes: value.data_classes,
  };
};

export const parseBreachDataset = (raw: unknown): BreachDataset => {
  if (!isRecord(raw) || !Array.isArray(raw.breaches) || !isRecord(raw.accounts)) {
    throw new ConfigurationError('Breach dataset must contain "breaches" and "accounts"');
  }
  const accounts: Record<string, string[]> = {};
  for (const [hash, names] of Object.entries(raw.accounts)) {
    if (!isStringArray(names)) {
      throw new ConfigurationError(`Breach dataset entry ${hash} is not a list of names`);
    }
    accounts[hash] = names;
  }
  return { breaches: raw.breaches.map(parseBreach), accounts };
};

const buildRecommendations = (breaches: BreachRecord[]): string[] => {
  if (breaches.length === 0) {
    return [
      'Your email appears safe in our database',
      'Continue using unique passwords for different services',
      'Enable two-factor authentication where available',
    ];
  }

  const recommendations = [
    'Change passwords immediately for all affected accounts',
    'Enable two-factor authentication (2FA) on all services',
    'Check for reused passwords across different accounts',
    'Be extra cautious of phishing emails targeting these services',
  ];

  const exposesSensitiveData = breaches.some((breach) =>
    breach.data_classes.some((dataClass) =>
      SENSITIVE_DATA.some((keyword) => dataClass.toLowerCase().includes(keyword))
    )
  );
  if (exposesSensitiveData) {
    recommendations.push(
      'Monitor credit reports for suspicious activity',
      'Consider placing a fraud alert with credit bureaus',
      'Review financial accounts for unauthorised transactions'
    );
  }

  if (breaches.length >= 3) {
    recommendations.push(
      'Use a password manager to generate unique passwords',
      'Consider using privacy-focused email aliases'
    );
  }

  return recommendations;
};

/**
 * Offline breach lookup. Addresses are only ever compared by their SHA-1,
 * and the last {@link CACHE_SIZE} results are kept in memory.
 */
export class BreachChecker {
  private readonly breachesByName: Map<string, BreachRecord>;
  private readonly accounts: Record<string, string[]>;
  private readonly cache = new Map<string, EmailCheckResult>();

  constructor(dataset: BreachDataset) {
    this.breachesByName = new Map(dataset.breaches.map((breach) => [breach.name, breach]));
    this.accounts = dataset.accounts;
  }

  static fromFile(datasetPath: string): BreachChecker {
    if (!fs.existsSync(datasetPath)) {
      logger.warn(`Breach dataset not found at ${datasetPath}; every lookup will report no breaches`);
      return new BreachChecker({ breaches: [], accounts: {} });
    }
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(datasetPath, 'utf8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Cannot read breach dataset ${datasetPath}: ${reason}`);
    }
    const dataset = parseBreachDataset(raw);
    logger.info(
      `Loaded ${dataset.breaches.length} breaches covering ${Object.keys(dataset.accounts).length} accounts`
    );
    return new BreachChecker(dataset);
  }

  check(email: string): EmailCheckResult {
    if (typeof email !== 'string' || !EMAIL_PATTERN.test(email.trim())) {
      throw new InvalidInputError('A valid email address is required');
    }

    const hash = hashEmail(email);
    const cached = this.cache.get(hash);
    if (cached) {
      return { ...cached, email };
    }

    const breaches = (this.accounts[hash] ?? [])
      .map((name) => this.breachesByName.get(name))
      .filter((breach): breach is BreachRecord => breach !== undefined)
      .sort((a, b) => a.date.localeCompare(b.date));

    const count = breaches.length;
    const result: EmailCheckResult = {
      email,
      breached: count > 0,
      pwned_count: count,
      risk_level: breachRiskLevel(count),
      message:
        count > 0
          ? `Email found in ${count} known data breach${count === 1 ? '' : 'es'}`
          : 'Email not found in known data breaches',
      breaches: breaches.map(({ name, date, accounts, data_classes }) => ({
        name,
        date,
        accounts,
        data_classes,
      })),
      recommendations: buildRecommendations(breaches),
    };

    this.remember(hash, result);
    return result;
  }

  private remember(hash: string, result: EmailCheckResult) {
    if (this.cache.size >= CACHE_SIZE) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(hash, result);
  }
}
