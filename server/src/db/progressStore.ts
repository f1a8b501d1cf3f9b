import type { ScanProgress } from '../types/scan';

export interface ProgressStore {
  get(scanId: string): ScanProgress | null;
  has(scanId: string): boolean;
  put(progress: ScanProgress): void;
  /** Drops an entry whatever its state; used to give back a reserved id. */
  remove(scanId: string): void;
  purgeExpired(): number;
}

const isTerminal = (progress: ScanProgress) =>
  progress.status === 'COMPLETED' || progress.status === 'FAILED';

/**
 * Transient progress entries, one per scan. Snapshots are frozen when
 * stored, and a terminal snapshot is never replaced; it is only dropped
 * once `retentionMs` has passed.
 */
export class InMemoryProgressStore implements ProgressStore {
  private readonly entries = new Map<string, { progress: ScanProgress; expiresAt: number | null }>();

  constructor(
    private readonly retentionMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(scanId: string): ScanProgress | null {
    this.purgeExpired();
    return this.entries.get(scanId)?.progress ?? null;
  }

  has(scanId: string): boolean {
    return this.get(scanId) !== null;
  }

  put(progress: ScanProgress): void {
    const current = this.entries.get(progress.scan_id);
    if (current && isTerminal(current.progress)) {
      throw new Error(`Scan ${progress.scan_id} already finished; its progress is final`);
    }
    this.entries.set(progress.scan_id, {
      progress: Object.freeze({ ...progress, completed_phases: [...progress.completed_phases] }),
      expiresAt: isTerminal(progress) ? this.now() + this.retentionMs : null,
    });
  }

  remove(scanId: string): void {
    this.entries.delete(scanId);
  }

  purgeExpired(): number {
    const now = this.now();
    let purged = 0;
    for (const [scanId, entry] of this.entries) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) {
        this.entries.delete(scanId);
        purged += 1;
      }
    }
    return purged;
  }
}
