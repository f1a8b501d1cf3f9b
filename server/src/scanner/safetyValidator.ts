import { InvalidInputError, NotAuthorizedError, RateLimitedError } from '../errors/AppError';
import { parseTargetUrl } from '../ml/featureExtractor';
import type { ScanRequest } from '../types/scan';

const BLOCKED_TLDS = ['.gov', '.mil', '.edu'];
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const PERMISSION_FLAGS = [
  'confirmed_permission',
  'owner_confirmation',
  'legal_responsibility',
] as const;

export interface ValidatedScanRequest extends ScanRequest {
  /** Normalised target, always with an http or https scheme. */
  target: URL;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Checks a raw request body before any scan state exists. Permission flags
 * are checked first so a request without them is always refused, whatever
 * else is wrong with it.
 */
export const validateScanRequest = (body: unknown): ValidatedScanRequest => {
  if (!isRecord(body)) {
    throw new InvalidInputError('Request body must be a JSON object');
  }

  for (const flag of PERMISSION_FLAGS) {
    if (body[flag] !== true) {
      throw new NotAuthorizedError(
        'Scan refused: you must confirm permission, ownership and legal responsibility'
      );
    }
  }

  const { url, scan_id, notify_email } = body;
  if (typeof url !== 'string') {
    throw new InvalidInputError('url is required');
  }
  const { normalized, parsed: target } = parseTargetUrl(url);

  const host = target.hostname.toLowerCase().replace(/\.$/, '');
  if (BLOCKED_TLDS.some((tld) => host.endsWith(tld))) {
    throw new NotAuthorizedError(`Scanning government, military or education domains is not allowed (${host})`);
  }

  if (scan_id !== undefined && (typeof scan_id !== 'string' || !UUID_PATTERN.test(scan_id))) {
    throw new InvalidInputError('scan_id must be a UUID');
  }
  if (
    notify_email !== undefined &&
    (typeof notify_email !== 'string' || !EMAIL_PATTERN.test(notify_email.trim()))
  ) {
    throw new InvalidInputError('notify_email must be a valid email address');
  }

  return {
    url: normalized,
    confirmed_permission: true,
    owner_confirmation: true,
    legal_responsibility: true,
    scan_id: typeof scan_id === 'string' ? scan_id.toLowerCase() : undefined,
    notify_email: typeof notify_email === 'string' ? notify_email.trim() : undefined,
    target,
  };
};

/** One scan per client per window; a window of 0 disables the limit. */
export class ScanRateLimiter {
  private readonly lastScan = new Map<string, number>();

  constructor(
    private readonly windowSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  check(clientId: string): void {
    if (this.windowSeconds <= 0) return;
    const now = this.now();
    this.prune(now);
    const last = this.lastScan.get(clientId);
    if (last === undefined) return;
    const elapsed = (now - last) / 1000;
    if (elapsed < this.windowSeconds) {
      throw new RateLimitedError(Math.ceil(this.windowSeconds - elapsed));
    }
  }

  record(clientId: string): void {
    if (this.windowSeconds <= 0) return;
    this.lastScan.set(clientId, this.now());
  }

  /**
   * Checks and records in one step. The returned function gives the slot
   * back, for a scan that is refused after it was counted.
   */
  acquire(clientId: string): () => void {
    this.check(clientId);
    const previous = this.lastScan.get(clientId);
    this.record(clientId);
    return () => {
      if (previous === undefined) this.lastScan.delete(clientId);
      else this.lastScan.set(clientId, previous);
    };
  }

  get size(): number {
    return this.lastScan.size;
  }

  private prune(now: number) {
    const windowMs = this.windowSeconds * 1000;
    for (const [clientId, last] of this.lastScan) {
      if (now - last >= windowMs) this.lastScan.delete(clientId);
    }
  }
}
