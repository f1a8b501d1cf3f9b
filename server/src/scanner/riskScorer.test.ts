import { describe, expect, it } from 'vitest';
import { GOOD_TLS, IDEAL_HEADERS } from '../test/fixtures';
import { evaluateDns } from './dnsCheck';
import { evaluateHeaders } from './headersCheck';
import { formatRecommendation, summarizeRisk } from './riskScorer';
import { evaluatePlainHttp, evaluateTls } from './tlsCheck';
import { degradedCheck } from './websiteScanner';

const noRecords = {
  domain: 'bad.example.com',
  spf: null,
  dmarc: null,
  dkim: [],
  dnssec: false,
  caa: [],
  mx: [],
};
const hardenedRecords = {
  domain: 'secure.example.com',
  spf: 'v=spf1 mx -all',
  dmarc: 'v=DMARC1; p=reject',
  dkim: ['default'],
  dnssec: true,
  caa: [{ critical: 0, issue: 'ca.example.net' }],
  mx: ['mail.secure.example.com'],
};

describe('riskScorer', () => {
  it('should format a recommendation with severity and dimension tags', () => {
    expect(
      formatRecommendation({
        dimension: 'dns',
        severity: 'LOW',
        issue: 'No CAA record',
        recommendation: 'Add a CAA record',
      })
    ).toBe('[LOW] [DNS] No CAA record: Add a CAA record');
  });

  it('should weight the three dimensions into one risk score', () => {
    const summary = summarizeRisk({
      http: evaluateHeaders({}),
      ssl: evaluatePlainHttp(),
      dns: evaluateDns(noRecords),
    });

    expect(summary.riskScore).toBe(74);
    expect(summary.overallGrade).toBe('F');
    expect(summary.riskLevel).toBe('HIGH');
    expect(summary.grades).toEqual({ http: 'F', ssl: 'F', dns: 'D' });
    expect(summary.counts).toEqual({ CRITICAL: 3, HIGH: 3, MEDIUM: 6, LOW: 2 });
  });

  it('should produce one recommendation per counted issue, most severe first', () => {
    const summary = summarizeRisk({
      http: evaluateHeaders({}),
      ssl: evaluatePlainHttp(),
      dns: evaluateDns(noRecords),
    });
    const total = Object.values(summary.counts).reduce((sum, count) => sum + count, 0);

    expect(summary.recommendations).toHaveLength(total);
    expect(summary.recommendations.slice(0, 3)).toEqual([
      '[CRITICAL] [HTTP] Strict-Transport-Security header missing: Set Strict-Transport-Security: max-age=31536000; includeSubDomains; preload',
      "[CRITICAL] [HTTP] Content-Security-Policy header missing: Set Content-Security-Policy: default-src 'self'; script-src 'self'; object-src 'none'",
      '[CRITICAL] [SSL] Website does not use HTTPS: Enable HTTPS with a certificate from a trusted CA',
    ]);
    expect(summary.recommendations[3]).toBe(
      '[HIGH] [HTTP] X-Frame-Options header missing: Set X-Frame-Options: DENY or SAMEORIGIN'
    );
    expect(summary.recommendations.at(-1)).toBe(
      '[LOW] [DNS] No CAA record: Add a CAA record naming the certificate authorities allowed to issue for the domain'
    );
  });

  it('should give a hardened site the best score', () => {
    const summary = summarizeRisk({
      http: evaluateHeaders(IDEAL_HEADERS),
      ssl: evaluateTls(GOOD_TLS, new Date('2026-01-01T00:00:00Z')),
      dns: evaluateDns(hardenedRecords),
    });
    expect(summary.riskScore).toBe(0);
    expect(summary.overallGrade).toBe('A');
    expect(summary.riskLevel).toBe('MINIMAL');
    expect(summary.recommendations).toEqual([]);
    expect(summary.degraded).toEqual([]);
  });

  it('should count a degraded check at its worst', () => {
    const summary = summarizeRisk({
      http: evaluateHeaders(IDEAL_HEADERS),
      ssl: evaluateTls(GOOD_TLS, new Date('2026-01-01T00:00:00Z')),
      dns: degradedCheck('dns', 'query ETIMEOUT'),
    });
    expect(summary.riskScore).toBe(20);
    expect(summary.riskLevel).toBe('LOW');
    expect(summary.overallGrade).toBe('B');
    expect(summary.grades.dns).toBe('F');
    expect(summary.degraded).toEqual(['dns']);
    expect(summary.recommendations).toEqual([
      '[HIGH] [DNS] DNS security check could not be completed (query ETIMEOUT): Make sure the site answers this check and scan again',
    ]);
  });
});
