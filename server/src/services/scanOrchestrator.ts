import { randomUUID } from 'crypto';
import { differenceInMilliseconds, differenceInSeconds } from 'date-fns';
import type { ProgressStore } from '../db/progressStore';
import type { ScanHistoryStore } from '../db/scanResultService';
import { InvalidInputError } from '../errors/AppError';
import { assessOwasp } from '../scanner/owaspAssessor';
import { summarizeRisk, toCheckReport } from '../scanner/riskScorer';
import { type ScanRateLimiter, validateScanRequest } from '../scanner/safetyValidator';
import { PHASE_ORDER, type WebsiteScanner } from '../scanner/websiteScanner';
import type {
  HistoryQuery,
  ScanPhase,
  ScanProgress,
  ScanResult,
  ScanStatus,
  ScanWebsiteResponse,
} from '../types/scan';
import { createLogger, errorMessage } from '../utils/logger';
import type { ScanNotifier } from './notificationService';

const logger = createLogger({ component: 'ORCHESTRATOR' });

const PHASE_STEP: Record<ScanPhase, string> = {
  headers: 'Checking HTTP security headers',
  tls: 'Checking SSL/TLS configuration',
  dns: 'Checking DNS security records',
};

const RUNNING_BASE = 10;
const PER_PHASE = 30;
const RUNNING_CAP = 95;

export interface ScanOrchestratorDeps {
  scanner: WebsiteScanner;
  history: ScanHistoryStore;
  progress: ProgressStore;
  rateLimiter: ScanRateLimiter;
  notifier: ScanNotifier | null;
  now?: () => Date;
}

export const formatElapsed = (seconds: number): string => {
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  return `${String(minutes).padStart(2, '0')}:${String(rest).padStart(2, '0')}`;
};

export const toScanResponse = (result: ScanResult): ScanWebsiteResponse => ({
  scan_id: result.scan_id,
  url: result.url,
  scan_timestamp: result.scanned_at,
  scan_duration_ms: result.scan_duration_ms,
  overall_grade: result.overall_grade,
  risk_score: result.risk_score,
  risk_level: result.risk_level,
  http_grade: result.http_grade,
  ssl_grade: result.ssl_grade,
  dns_grade: result.dns_grade,
  critical_issues_count: result.critical_issues_count,
  high_issues_count: result.high_issues_count,
  medium_issues_count: result.medium_issues_count,
  low_issues_count: result.low_issues_count,
  recommendations: result.recommendations,
  degraded_checks: result.degraded_checks,
});

/** Progress writer owned by a single scan run. */
class ProgressTracker {
  private readonly completed: ScanPhase[] = [];

  constructor(
    private readonly store: ProgressStore,
    private readonly scanId: string,
    private readonly url: string,
    private readonly startedAt: Date,
    private readonly now: () => Date
  ) {}

  private publish(
    status: ScanStatus,
    percentage: number,
    step: string,
    phase: ScanPhase | null,
    error: string | null = null
  ) {
    const updatedAt = this.now();
    this.store.put({
      scan_id: this.scanId,
      url: this.url,
      status,
      phase,
      completed_phases: [...this.completed],
      progress_percentage: percentage,
      current_step: step,
      started_at: this.startedAt.toISOString(),
      updated_at: updatedAt.toISOString(),
      time_elapsed: formatElapsed(Math.max(0, differenceInSeconds(updatedAt, this.startedAt))),
      is_complete: status === 'COMPLETED' || status === 'FAILED',
      has_error: status === 'FAILED',
      error_message: error,
    });
  }

  pending() {
    this.publish('PENDING', 0, 'Queued', null);
  }

  running() {
    const phase = PHASE_ORDER.find((candidate) => !this.completed.includes(candidate)) ?? null;
    const percentage = Math.min(RUNNING_BASE + PER_PHASE * this.completed.length, RUNNING_CAP);
    this.publish('RUNNING', percentage, phase ? PHASE_STEP[phase] : 'Calculating risk score', phase);
  }

  phaseDone(phase: ScanPhase) {
    if (!this.completed.includes(phase)) this.completed.push(phase);
    this.running();
  }

  completedScan() {
    this.publish('COMPLETED', 100, 'Complete', null);
  }

  failed(message: string) {
    const phase = PHASE_ORDER.find((candidate) => !this.completed.includes(candidate)) ?? null;
    const percentage = Math.min(RUNNING_BASE + PER_PHASE * this.completed.length, RUNNING_CAP);
    this.publish('FAILED', percentage, 'Failed', phase, message);
  }
}

/**
 * Drives one website scan from request to stored result and keeps its
 * progress entry current. Refused requests leave no trace.
 */
export class ScanOrchestrator {
  private readonly now: () => Date;

  constructor(private readonly deps: ScanOrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async startScan(body: unknown, clientIp: string): Promise<ScanWebsiteResponse> {
    const request = validateScanRequest(body);
    const releaseSlot = this.deps.rateLimiter.acquire(clientIp);

    // the PENDING entry reserves the id before the first await
    const scanId = request.scan_id ?? randomUUID();
    if (this.deps.progress.has(scanId)) {
      releaseSlot();
      throw new InvalidInputError(`Scan id ${scanId} is already in use`);
    }
    const startedAt = this.now();
    const tracker = new ProgressTracker(this.deps.progress, scanId, request.url, startedAt, this.now);
    tracker.pending();

    try {
      if (await this.deps.history.get(scanId)) {
        throw new InvalidInputError(`Scan id ${scanId} is already in use`);
      }
    } catch (err) {
      this.deps.progress.remove(scanId);
      releaseSlot();
      throw err;
    }
    logger.info(`Scan ${scanId} started for ${request.target.hostname}`);

    let result: ScanResult;
    try {
      tracker.running();
      await this.deps.scanner.resolveTarget(request.target);
      const checks = await this.deps.scanner.runChecks(request.target, (phase) =>
        tracker.phaseDone(phase)
      );
      const summary = summarizeRisk(checks);
      const finishedAt = this.now();

      result = {
        scan_id: scanId,
        url: request.url,
        scanned_at: startedAt.toISOString(),
        scan_duration_ms: Math.max(0, differenceInMilliseconds(finishedAt, startedAt)),
        overall_grade: summary.overallGrade,
        risk_score: summary.riskScore,
        risk_level: summary.riskLevel,
        http_grade: summary.grades.http,
        ssl_grade: summary.grades.ssl,
        dns_grade: summary.grades.dns,
        critical_issues_count: summary.counts.CRITICAL,
        high_issues_count: summary.counts.HIGH,
        medium_issues_count: summary.counts.MEDIUM,
        low_issues_count: summary.counts.LOW,
        recommendations: summary.recommendations,
        findings: summary.findings,
        degraded_checks: summary.degraded,
        http_scan: toCheckReport(checks.http),
        ssl_scan: toCheckReport(checks.ssl),
        dns_scan: toCheckReport(checks.dns),
        owasp: assessOwasp(checks),
      };

      await this.deps.history.append(result);
    } catch (err) {
      const message = errorMessage(err);
      logger.error(`Scan ${scanId} failed: ${message}`);
      tracker.failed(message);
      throw err;
    }

    tracker.completedScan();
    logger.info(
      `Scan ${scanId} completed: grade ${result.overall_grade}, risk ${result.risk_score} (${result.risk_level})`
    );

    if (request.notify_email && this.deps.notifier) {
      try {
        await this.deps.notifier.notify(request.notify_email, result);
      } catch (err) {
        logger.warn(`Scan ${scanId} summary could not be mailed: ${errorMessage(err)}`);
      }
    }

    return toScanResponse(result);
  }

  getProgress(scanId: string): ScanProgress | null {
    return this.deps.progress.get(scanId);
  }

  listHistory(query: HistoryQuery = {}): Promise<ScanResult[]> {
    return this.deps.history.list(query);
  }

  getResult(scanId: string): Promise<ScanResult | null> {
    return this.deps.history.get(scanId);
  }
}
