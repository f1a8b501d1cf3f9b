import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors/AppError';
import { BLANK_OWASP, checkReport } from '../test/fixtures';
import type { ScanResult } from '../types/scan';
import { InMemoryScanHistoryStore, toScanResult } from './scanResultService';

const result = (scanId: string, overrides: Partial<ScanResult> = {}): ScanResult => ({
  scan_id: scanId,
  url: 'https://example.com',
  scanned_at: '2026-01-01T00:00:00.000Z',
  scan_duration_ms: 120,
  overall_grade: 'B',
  risk_score: 20,
  risk_level: 'LOW',
  http_grade: 'A',
  ssl_grade: 'A',
  dns_grade: 'F',
  critical_issues_count: 0,
  high_issues_count: 1,
  medium_issues_count: 0,
  low_issues_count: 0,
  recommendations: ['[HIGH] [DNS] DNS security check could not be completed (timeout): Retry'],
  findings: [
    { dimension: 'dns', severity: 'HIGH', issue: 'DNS security check could not be completed (timeout)', recommendation: 'Retry' },
  ],
  degraded_checks: ['dns'],
  http_scan: checkReport({ details: { headers: {} } }),
  ssl_scan: checkReport({ details: { https: true, protocol: 'TLSv1.3' } }),
  dns_scan: checkReport({ grade: 'F', score: 0, risk_points: 100, degraded: true, error: 'timeout' }),
  owasp: BLANK_OWASP,
  ...overrides,
});

describe('InMemoryScanHistoryStore', () => {
  it('should list the most recent scan first', async () => {
    const store = new InMemoryScanHistoryStore();
    await store.append(result('first'));
    await store.append(result('second'));
    await store.append(result('third'));

    expect((await store.list()).map((item) => item.scan_id)).toEqual(['third', 'second', 'first']);
    expect(await store.count()).toBe(3);
  });

  it('should order by start time, not by the order scans finished', async () => {
    const store = new InMemoryScanHistoryStore();
    await store.append(result('started-late', { scanned_at: '2026-01-01T00:00:05.000Z' }));
    await store.append(result('started-early', { scanned_at: '2026-01-01T00:00:00.000Z' }));
    await store.append(result('started-late-too', { scanned_at: '2026-01-01T00:00:05.000Z' }));

    expect((await store.list()).map((item) => item.scan_id)).toEqual([
      'started-late-too',
      'started-late',
      'started-early',
    ]);
  });

  it('should page with limit and skip', async () => {
    const store = new InMemoryScanHistoryStore();
    for (const id of ['a', 'b', 'c', 'd']) await store.append(result(id));

    expect((await store.list({ limit: 2 })).map((item) => item.scan_id)).toEqual(['d', 'c']);
    expect((await store.list({ limit: 2, skip: 1 })).map((item) => item.scan_id)).toEqual(['c', 'b']);
    expect((await store.list({ skip: 3 })).map((item) => item.scan_id)).toEqual(['a']);
  });

  it('should keep stored results immutable', async () => {
    const store = new InMemoryScanHistoryStore();
    const original = result('frozen');
    await store.append(original);
    original.recommendations.push('changed later');

    const stored = await store.get('frozen');
    expect(stored?.recommendations).toHaveLength(1);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(await store.get('missing')).toBeNull();
  });

  it('should keep the per-check details', async () => {
    const store = new InMemoryScanHistoryStore();
    await store.append(result('detailed'));

    const stored = await store.get('detailed');
    expect(stored?.ssl_scan.details).toEqual({ https: true, protocol: 'TLSv1.3' });
    expect(stored?.dns_scan).toMatchObject({ degraded: true, error: 'timeout' });
  });
});

describe('toScanResult', () => {
  const stored = {
    ...result('from-db'),
    scanned_at: new Date('2026-02-03T04:05:06.000Z'),
  };

  it('should map a stored document back to a scan result', () => {
    expect(toScanResult(stored)).toEqual(result('from-db', { scanned_at: '2026-02-03T04:05:06.000Z' }));
  });

  it('should reject documents with unknown enum values', () => {
    expect(() => toScanResult({ ...stored, overall_grade: 'Z' })).toThrow(ConfigurationError);
    expect(() => toScanResult({ ...stored, ssl_scan: { ...stored.ssl_scan, grade: 'Z' } })).toThrow(
      'Stored scan result has an invalid ssl_scan grade: "Z"'
    );
  });
});
