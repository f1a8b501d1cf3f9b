import { describe, expect, it } from 'vitest';
import type { ScanProgress } from '../types/scan';
import { InMemoryProgressStore } from './progressStore';

const snapshot = (overrides: Partial<ScanProgress> = {}): ScanProgress => ({
  scan_id: 'scan-a',
  url: 'https://example.com',
  status: 'RUNNING',
  phase: 'headers',
  completed_phases: [],
  progress_percentage: 10,
  current_step: 'Checking HTTP security headers',
  started_at: '2026-01-01T00:00:00.000Z',
  updated_at: '2026-01-01T00:00:00.000Z',
  time_elapsed: '00:00',
  is_complete: false,
  has_error: false,
  error_message: null,
  ...overrides,
});

describe('InMemoryProgressStore', () => {
  it('should return null for unknown scans', () => {
    expect(new InMemoryProgressStore(1000).get('missing')).toBeNull();
  });

  it('should replace running snapshots and freeze what it stores', () => {
    const store = new InMemoryProgressStore(1000);
    store.put(snapshot());
    store.put(snapshot({ phase: 'tls', completed_phases: ['headers'], progress_percentage: 40 }));

    const current = store.get('scan-a');
    expect(current?.progress_percentage).toBe(40);
    expect(Object.isFrozen(current)).toBe(true);
  });

  it('should keep a terminal snapshot final', () => {
    const store = new InMemoryProgressStore(1000);
    store.put(snapshot({ status: 'COMPLETED', progress_percentage: 100, is_complete: true }));

    expect(() => store.put(snapshot())).toThrow('Scan scan-a already finished; its progress is final');
    expect(store.get('scan-a')).toEqual(store.get('scan-a'));
    expect(store.get('scan-a')?.status).toBe('COMPLETED');
  });

  it('should purge terminal snapshots after the retention period only', () => {
    let now = 0;
    const store = new InMemoryProgressStore(1000, () => now);
    store.put(snapshot({ scan_id: 'done', status: 'FAILED', has_error: true, is_complete: true }));
    store.put(snapshot({ scan_id: 'running' }));

    now = 999;
    expect(store.has('done')).toBe(true);

    now = 1000;
    expect(store.purgeExpired()).toBe(1);
    expect(store.get('done')).toBeNull();
    expect(store.has('running')).toBe(true);
  });
});
