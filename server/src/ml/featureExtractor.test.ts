import { describe, expect, it } from 'vitest';
import { InvalidInputError } from '../errors/AppError';
import {
  FEATURE_NAMES,
  type Lexicons,
  extractUrlFeatures,
  featuresToArray,
  parseTargetUrl,
} from './featureExtractor';

const lexicons: Lexicons = {
  brandTokens: ['paypal', 'microsoft', 'google'],
  suspiciousKeywords: ['verify', 'security', 'secure', 'login', 'check', 'account'],
  urlShorteners: ['bit.ly', 'tinyurl.com'],
  trustedDomains: ['google.com', 'microsoft.com', 'paypal.com'],
};

describe('featureExtractor', () => {
  describe('parseTargetUrl', () => {
    it('should add a scheme to bare hosts', () => {
      const { normalized, parsed } = parseTargetUrl('  example.com ');
      expect(normalized).toBe('http://example.com');
      expect(parsed.hostname).toBe('example.com');
    });

    it('should reject non-http schemes', () => {
      expect(() => parseTargetUrl('ftp://example.com')).toThrow(InvalidInputError);
      expect(() => parseTargetUrl('javascript://example.com')).toThrow(
        'URL must use HTTP or HTTPS protocol'
      );
    });

    it('should reject empty and unparsable input', () => {
      expect(() => parseTargetUrl('')).toThrow('URL must not be empty');
      expect(() => parseTargetUrl('http://')).toThrow(InvalidInputError);
    });
  });

  describe('extractUrlFeatures', () => {
    it('should return one value per feature in model order', () => {
      const { features } = extractUrlFeatures('https://www.google.com', lexicons);
      expect(Object.keys(features)).toEqual([...FEATURE_NAMES]);
      expect(featuresToArray(features)).toHaveLength(FEATURE_NAMES.length);
    });

    it('should describe a trusted https site', () => {
      const { features, hostname } = extractUrlFeatures('https://www.google.com', lexicons);
      expect(hostname).toBe('www.google.com');
      expect(features).toMatchObject({
        url_length: 22,
        num_dots: 2,
        num_hyphens: 0,
        has_https: 1,
        subdomain_count: 0,
        path_length: 0,
        brand_token: 0,
        suspicious_token: 0,
        trusted_domain: 1,
      });
    });

    it('should flag brand impersonation and lure words', () => {
      const { features } = extractUrlFeatures('http://paypal-verify-security-check.com', lexicons);
      expect(features).toMatchObject({
        url_length: 39,
        num_dots: 1,
        num_hyphens: 3,
        has_https: 0,
        brand_token: 1,
        suspicious_token: 3,
        trusted_domain: 0,
      });
    });

    it('should detect raw IP hosts and count their digits', () => {
      const { features } = extractUrlFeatures('http://192.168.10.5/login', lexicons);
      expect(features.is_ip_host).toBe(1);
      expect(features.subdomain_count).toBe(0);
      expect(features.num_digits).toBe(9);
      expect(features.url_length).toBe(25);
      expect(features.digit_ratio).toBeCloseTo(9 / 25);
      expect(features.path_length).toBe(6);
      expect(features.suspicious_token).toBe(1);
    });

    it('should detect shorteners and @ symbols', () => {
      expect(extractUrlFeatures('bit.ly/abc', lexicons).features.url_shortener).toBe(1);
      expect(extractUrlFeatures('http://user@evil.example', lexicons).features.has_at).toBe(1);
    });

    it('should count subdomains of a trusted domain without marking a brand', () => {
      const { features } = extractUrlFeatures('https://login.microsoft.com', lexicons);
      expect(features.subdomain_count).toBe(1);
      expect(features.trusted_domain).toBe(1);
      expect(features.brand_token).toBe(0);
    });

    it('should be deterministic', () => {
      const url = 'http://secure-account.example.net/path?q=1';
      expect(extractUrlFeatures(url, lexicons)).toEqual(extractUrlFeatures(url, lexicons));
    });
  });
});
