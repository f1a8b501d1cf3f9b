import { ScanResultModel } from '../models/ScanResult';
import { ConfigurationError } from '../errors/AppError';
import { SEVERITY_ORDER } from '../types/common';
import type {
  CheckReport,
  Finding,
  HistoryQuery,
  OwaspAssessment,
  ScanDimension,
  ScanResult,
} from '../types/scan';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'DB' });

/**
 * Append-only record of completed scans. Reads list the latest start time
 * first; scans that started together list the last stored first.
 */
export interface ScanHistoryStore {
  append(result: ScanResult): Promise<void>;
  list(query?: HistoryQuery): Promise<ScanResult[]>;
  get(scanId: string): Promise<ScanResult | null>;
  count(): Promise<number>;
}

const page = <T>(items: T[], { limit, skip = 0 }: HistoryQuery): T[] =>
  items.slice(skip, limit === undefined ? undefined : skip + limit);

const copyReport = (report: CheckReport): CheckReport => ({
  ...report,
  details: structuredClone(report.details),
});

const freeze = (result: ScanResult): ScanResult =>
  Object.freeze({
    ...result,
    recommendations: [...result.recommendations],
    findings: result.findings.map((finding) => ({ ...finding })),
    degraded_checks: [...result.degraded_checks],
    http_scan: copyReport(result.http_scan),
    ssl_scan: copyReport(result.ssl_scan),
    dns_scan: copyReport(result.dns_scan),
    owasp: structuredClone(result.owasp),
  });

const newestFirst = (a: ScanResult, b: ScanResult) => Date.parse(b.scanned_at) - Date.parse(a.scanned_at);

export class InMemoryScanHistoryStore implements ScanHistoryStore {
  private readonly results: ScanResult[] = [];

  async append(result: ScanResult): Promise<void> {
    this.results.push(freeze(result));
  }

  async list(query: HistoryQuery = {}): Promise<ScanResult[]> {
    return page([...this.results].reverse().sort(newestFirst), query);
  }

  async get(scanId: string): Promise<ScanResult | null> {
    return this.results.find((result) => result.scan_id === scanId) ?? null;
  }

  async count(): Promise<number> {
    return this.results.length;
  }
}

/** Shape of a scan result as read back with `lean()`. */
interface StoredScanResult {
  scan_id: string;
  url: string;
  scanned_at: Date;
  scan_duration_ms: number;
  overall_grade: string;
  risk_score: number;
  risk_level: string;
  http_grade: string;
  ssl_grade: string;
  dns_grade: string;
  critical_issues_count: number;
  high_issues_count: number;
  medium_issues_count: number;
  low_issues_count: number;
  recommendations: string[];
  findings: { dimension: string; severity: string; issue: string; recommendation: string }[];
  degraded_checks: string[];
  http_scan: StoredCheckReport;
  ssl_scan: StoredCheckReport;
  dns_scan: StoredCheckReport;
  owasp: OwaspAssessment;
}

interface StoredCheckReport {
  grade: string;
  score: number;
  risk_points: number;
  degraded: boolean;
  error: string | null;
  details: Record<string, unknown>;
}

const oneOf = <T extends string>(values: readonly T[], value: string, field: string): T => {
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigurationError(`Stored scan result has an invalid ${field}: "${value}"`);
  }
  return match;
};

const GRADES = ['A', 'B', 'C', 'D', 'F'] as const;
const RISK_LEVELS = ['MINIMAL', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const;
const DIMENSIONS: readonly ScanDimension[] = ['http', 'ssl', 'dns'];

const toFinding = (stored: StoredScanResult['findings'][number]): Finding => ({
  dimension: oneOf(DIMENSIONS, stored.dimension, 'finding dimension'),
  severity: oneOf(SEVERITY_ORDER, stored.severity, 'finding severity'),
  issue: stored.issue,
  recommendation: stored.recommendation,
});

const toCheckReport = (stored: StoredCheckReport, field: string): CheckReport => ({
  grade: oneOf(GRADES, stored.grade, `${field} grade`),
  score: stored.score,
  risk_points: stored.risk_points,
  degraded: stored.degraded,
  error: stored.error ?? null,
  details: { ...stored.details },
});

export const toScanResult = (stored: StoredScanResult): ScanResult => ({
  scan_id: stored.scan_id,
  url: stored.url,
  scanned_at: stored.scanned_at.toISOString(),
  scan_duration_ms: stored.scan_duration_ms,
  overall_grade: oneOf(GRADES, stored.overall_grade, 'overall_grade'),
  risk_score: stored.risk_score,
  risk_level: oneOf(RISK_LEVELS, stored.risk_level, 'risk_level'),
  http_grade: oneOf(GRADES, stored.http_grade, 'http_grade'),
  ssl_grade: oneOf(GRADES, stored.ssl_grade, 'ssl_grade'),
  dns_grade: oneOf(GRADES, stored.dns_grade, 'dns_grade'),
  critical_issues_count: stored.critical_issues_count,
  high_issues_count: stored.high_issues_count,
  medium_issues_count: stored.medium_issues_count,
  low_issues_count: stored.low_issues_count,
  recommendations: [...stored.recommendations],
  findings: stored.findings.map(toFinding),
  degraded_checks: stored.degraded_checks.map((dimension) =>
    oneOf(DIMENSIONS, dimension, 'degraded check')
  ),
  http_scan: toCheckReport(stored.http_scan, 'http_scan'),
  ssl_scan: toCheckReport(stored.ssl_scan, 'ssl_scan'),
  dns_scan: toCheckReport(stored.dns_scan, 'dns_scan'),
  owasp: stored.owasp,
});

export class MongoScanHistoryStore implements ScanHistoryStore {
  async append(result: ScanResult): Promise<void> {
    try {
      await ScanResultModel.create({ ...result, scanned_at: new Date(result.scanned_at) });
      logger.debug(`Scan result ${result.scan_id} saved to database`);
    } catch (error) {
      logger.error(`Error saving scan result ${result.scan_id}: ${error}`);
      throw error;
    }
  }

  async list({ limit, skip = 0 }: HistoryQuery = {}): Promise<ScanResult[]> {
    let query = ScanResultModel.find().sort({ scanned_at: -1, _id: -1 }).skip(skip);
    if (limit !== undefined) query = query.limit(limit);
    const stored = await query.lean<StoredScanResult[]>();
    return stored.map(toScanResult);
  }

  async get(scanId: string): Promise<ScanResult | null> {
    const stored = await ScanResultModel.findOne({ scan_id: scanId }).lean<StoredScanResult | null>();
    return stored ? toScanResult(stored) : null;
  }

  async count(): Promise<number> {
    return ScanResultModel.countDocuments();
  }
}
