import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config';
import { ConfigurationError, InvalidInputError } from '../errors/AppError';
import { BreachChecker, hashEmail, normalizeEmail, parseBreachDataset } from './breachChecker';

const checker = BreachChecker.fromFile(loadConfig({}).breachDataPath);

describe('BreachChecker', () => {
  it('should hash the normalised address', () => {
    expect(normalizeEmail('  Breached@Example.COM ')).toBe('breached@example.com');
    expect(hashEmail('Breached@Example.com')).toBe('f89dabcdf03b3e0ad3c4c7227d48fa0a4c6623ea');
  });

  it('should report an address that is not in the dataset', () => {
    const result = checker.check('nobody@example.com');
    expect(result).toMatchObject({
      email: 'nobody@example.com',
      breached: false,
      pwned_count: 0,
      risk_level: 'LOW',
      message: 'Email not found in known data breaches',
      breaches: [],
    });
    expect(result.recommendations[0]).toBe('Your email appears safe in our database');
  });

  it('should report a single breach as medium risk', () => {
    const result = checker.check('breached@example.com');
    expect(result.pwned_count).toBe(1);
    expect(result.risk_level).toBe('MEDIUM');
    expect(result.message).toBe('Email found in 1 known data breach');
    expect(result.breaches).toEqual([
      {
        name: 'PixelForum',
        date: '2019-03-14',
        accounts: 2400000,
        data_classes: ['Email addresses', 'Usernames', 'Passwords'],
      },
    ]);
    expect(result.recommendations).toHaveLength(4);
  });

  it('should list breaches oldest first', () => {
    const result = checker.check('victim@example.net');
    expect(result.risk_level).toBe('HIGH');
    expect(result.breaches.map((breach) => breach.name)).toEqual(['PixelForum', 'ShopNest']);
  });

  it('should add financial advice when card data leaked', () => {
    const result = checker.check('Multi.Breach@Example.org');
    expect(result.email).toBe('Multi.Breach@Example.org');
    expect(result.pwned_count).toBe(4);
    expect(result.risk_level).toBe('CRITICAL');
    expect(result.message).toBe('Email found in 4 known data breaches');
    expect(result.recommendations).toHaveLength(9);
    expect(result.recommendations).toContain('Monitor credit reports for suspicious activity');
    expect(result.recommendations).toContain('Use a password manager to generate unique passwords');
  });

  it('should answer repeated lookups from the cache with the caller-supplied address', () => {
    const first = checker.check('victim@example.net');
    const second = checker.check('VICTIM@example.net');
    expect(second.email).toBe('VICTIM@example.net');
    expect(second.breaches).toEqual(first.breaches);
  });

  it('should reject invalid addresses', () => {
    expect(() => checker.check('not-an-email')).toThrow(InvalidInputError);
    expect(() => checker.check('a@b')).toThrow('A valid email address is required');
  });

  it('should fall back to an empty dataset when the file is missing', () => {
    const empty = BreachChecker.fromFile('/nonexistent/breaches.json');
    expect(empty.check('breached@example.com').breached).toBe(false);
  });

  it('should reject malformed datasets', () => {
    expect(() => parseBreachDataset({ breaches: [] })).toThrow(ConfigurationError);
    expect(() =>
      parseBreachDataset({ breaches: [{ name: 'X', date: '2020-01-01' }], accounts: {} })
    ).toThrow('Breach dataset contains a malformed breach entry');
  });
});
