import { lookup } from 'dns/promises';
import { TargetUnreachableError, hasErrorCode } from '../errors/AppError';
import type { CheckResult, ScanDimension, ScanPhase } from '../types/scan';
import { createLogger, errorMessage } from '../utils/logger';
import { type DnsLookup, createDnsLookup, evaluateDns, lookupDnsRecords } from './dnsCheck';
import { type HeaderFetcher, evaluateHeaders, fetchHeaders } from './headersCheck';
import type { CheckSet } from './riskScorer';
import { type TlsInspector, evaluatePlainHttp, evaluateTls, inspectTls } from './tlsCheck';

const logger = createLogger({ component: 'SCANNER' });

export const PHASE_ORDER: readonly ScanPhase[] = ['headers', 'tls', 'dns'];

const PHASE_DIMENSION: Record<ScanPhase, ScanDimension> = {
  headers: 'http',
  tls: 'ssl',
  dns: 'dns',
};

const PHASE_LABEL: Record<ScanPhase, string> = {
  headers: 'HTTP security headers',
  tls: 'SSL/TLS',
  dns: 'DNS security',
};

// connection never established; a reset or an HTTP error means the host answered
const CONNECT_FAILURE_CODES = new Set(['ECONNREFUSED', 'EHOSTUNREACH', 'ENETUNREACH', 'ETIMEDOUT', 'ECONNABORTED']);

export const isConnectFailure = (err: unknown): boolean =>
  hasErrorCode(err) && CONNECT_FAILURE_CODES.has(err.code);

export type HostResolver = (hostname: string) => Promise<unknown>;

export interface WebsiteScannerDeps {
  fetchHeaders: HeaderFetcher;
  inspectTls: TlsInspector;
  dns: DnsLookup;
  resolveHost: HostResolver;
  timeoutMs: number;
  now: () => Date;
}

export const defaultScannerDeps = (timeoutMs: number): WebsiteScannerDeps => ({
  fetchHeaders,
  inspectTls,
  dns: createDnsLookup(timeoutMs),
  resolveHost: (hostname) => lookup(hostname),
  timeoutMs,
  now: () => new Date(),
});

export const withTimeout = async <T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(Object.assign(new Error(`${label} timed out after ${timeoutMs}ms`), { code: 'ETIMEDOUT' })),
      timeoutMs
    );
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

export const degradedCheck = (phase: ScanPhase, reason: string): CheckResult => {
  const dimension = PHASE_DIMENSION[phase];
  return {
    dimension,
    grade: 'F',
    score: 0,
    riskPoints: 100,
    findings: [
      {
        dimension,
        severity: 'HIGH',
        issue: `${PHASE_LABEL[phase]} check could not be completed (${reason})`,
        recommendation: 'Make sure the site answers this check and scan again',
      },
    ],
    degraded: true,
    error: reason,
    details: {},
  };
};

/** Runs the three passive checks against one target. */
export class WebsiteScanner {
  constructor(private readonly deps: WebsiteScannerDeps) {}

  /** Fails with TargetUnreachableError when the host does not resolve. */
  async resolveTarget(target: URL): Promise<void> {
    try {
      await withTimeout(this.deps.resolveHost(target.hostname), this.deps.timeoutMs, 'Host lookup');
    } catch (err) {
      throw new TargetUnreachableError(target.hostname, errorMessage(err));
    }
  }

  /**
   * Each check is caught on its own, so one failure never affects the
   * others. `onPhaseDone` fires in completion order; the returned set is
   * keyed by dimension and does not depend on it.
   *
   * Fails with TargetUnreachableError when no connection could be opened
   * at all: the header request and, for https targets, the TLS handshake.
   */
  async runChecks(target: URL, onPhaseDone?: (phase: ScanPhase) => void): Promise<CheckSet> {
    const failures = new Map<ScanPhase, unknown>();
    const [http, ssl, dns] = await Promise.all(
      PHASE_ORDER.map((phase) => this.runPhase(phase, target, failures, onPhaseDone))
    );

    const headersFailure = failures.get('headers');
    const tlsUnreachable = target.protocol !== 'https:' || isConnectFailure(failures.get('tls'));
    if (isConnectFailure(headersFailure) && tlsUnreachable) {
      throw new TargetUnreachableError(target.hostname, errorMessage(headersFailure));
    }
    return { http, ssl, dns };
  }

  private async runPhase(
    phase: ScanPhase,
    target: URL,
    failures: Map<ScanPhase, unknown>,
    onPhaseDone?: (phase: ScanPhase) => void
  ): Promise<CheckResult> {
    let result: CheckResult;
    try {
      result = await withTimeout(this.check(phase, target), this.deps.timeoutMs, PHASE_LABEL[phase]);
    } catch (err) {
      failures.set(phase, err);
      const reason = errorMessage(err);
      logger.warn(`${PHASE_LABEL[phase]} check degraded for ${target.hostname}: ${reason}`);
      result = degradedCheck(phase, reason);
    }
    onPhaseDone?.(phase);
    return result;
  }

  private async check(phase: ScanPhase, target: URL): Promise<CheckResult> {
    const { timeoutMs } = this.deps;
    switch (phase) {
      case 'headers':
        return evaluateHeaders(await this.deps.fetchHeaders(target.toString(), timeoutMs));
      case 'tls': {
        if (target.protocol !== 'https:') return evaluatePlainHttp();
        const port = target.port ? Number(target.port) : 443;
        const info = await this.deps.inspectTls(target.hostname, port, timeoutMs);
        return evaluateTls(info, this.deps.now());
      }
      case 'dns':
        return evaluateDns(await lookupDnsRecords(this.deps.dns, target.hostname));
    }
  }
}
