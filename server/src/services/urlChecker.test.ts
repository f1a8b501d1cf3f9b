import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config';
import { InvalidInputError } from '../errors/AppError';
import { PhishingClassifier } from '../ml/phishingClassifier';
import { UrlChecker } from './urlChecker';

const checker = new UrlChecker(PhishingClassifier.fromFile(loadConfig({}).phishingModelPath));

describe('UrlChecker', () => {
  it('should report an impersonating URL as phishing', () => {
    const result = checker.check('http://paypal-verify-security-check.com');

    expect(result.is_phishing).toBe(true);
    expect(result.risk_level).toBe('CRITICAL');
    expect(result.message).toBe('High phishing probability (99.7%), confidence 99.3%');
    expect(result.model_info).toEqual({ name: 'lexical-url-logistic-regression', version: '2.1.0' });
    expect(result.recommendations).toEqual([
      'This URL shows multiple phishing indicators. Do not click it or enter credentials',
      'Missing HTTPS encryption. Legitimate login pages use HTTPS',
      'Domain imitates a known brand. Type the official address yourself',
      'Multiple hyphens in the domain suggest brand impersonation',
      'Verify the URL matches the official website',
      'Check for spelling errors in the domain name',
    ]);
  });

  it('should report a trusted URL as legitimate', () => {
    const result = checker.check('https://www.google.com');

    expect(result.url).toBe('https://www.google.com');
    expect(result.is_phishing).toBe(false);
    expect(result.risk_level).toBe('LOW');
    expect(result.phishing_score).toBeLessThan(0.4);
    expect(result.message).toBe('Appears legitimate (phishing probability: 0.8%, confidence: 98.3%)');
    expect(result.recommendations).toHaveLength(3);
    expect(result.feature_analysis.map((item) => item.feature)).toEqual([
      'trusted_domain',
      'has_https',
      'url_length',
      'num_dots',
    ]);
  });

  it('should reject malformed URLs', () => {
    expect(() => checker.check('mailto://someone')).toThrow(InvalidInputError);
  });
});
