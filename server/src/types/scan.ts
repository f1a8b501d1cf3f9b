import type { Grade, RiskLevel, Severity } from './common';

export type ScanDimension = 'http' | 'ssl' | 'dns';

export type ScanPhase = 'headers' | 'tls' | 'dns';

export type ScanStatus = 'PENDING' | 'RUNNING' | 'COMPLETED' | 'FAILED';

export interface ScanRequest {
  url: string;
  confirmed_permission: boolean;
  owner_confirmation: boolean;
  legal_responsibility: boolean;
  scan_id?: string;
  notify_email?: string;
}

export interface Finding {
  dimension: ScanDimension;
  severity: Severity;
  issue: string;
  recommendation: string;
}

/** Outcome of one sub-check, degraded or not. */
export interface CheckResult {
  dimension: ScanDimension;
  grade: Grade;
  score: number;
  riskPoints: number;
  findings: Finding[];
  degraded: boolean;
  error: string | null;
  details: Record<string, unknown>;
}

/** A check as stored with its scan: grade, risk and the raw details. */
export interface CheckReport {
  grade: Grade;
  score: number;
  risk_points: number;
  degraded: boolean;
  error: string | null;
  details: Record<string, unknown>;
}

export type OwaspId =
  | 'A01:2021'
  | 'A02:2021'
  | 'A03:2021'
  | 'A04:2021'
  | 'A05:2021'
  | 'A06:2021'
  | 'A07:2021'
  | 'A08:2021'
  | 'A09:2021'
  | 'A10:2021';

export interface OwaspCategoryResult {
  id: OwaspId;
  name: string;
  severity: Severity;
  status: 'COMPLIANT' | 'NON-COMPLIANT';
  issues_found: string[];
  recommendations: string[];
}

export interface OwaspAssessment {
  /** Percentage of the ten categories with no finding. */
  compliance_score: number;
  verdict: string;
  compliant_categories: OwaspId[];
  non_compliant_categories: OwaspId[];
  categories: OwaspCategoryResult[];
  priority_actions: string[];
}

export interface ScanResult {
  scan_id: string;
  url: string;
  scanned_at: string;
  scan_duration_ms: number;
  overall_grade: Grade;
  risk_score: number;
  risk_level: RiskLevel;
  http_grade: Grade;
  ssl_grade: Grade;
  dns_grade: Grade;
  critical_issues_count: number;
  high_issues_count: number;
  medium_issues_count: number;
  low_issues_count: number;
  recommendations: string[];
  findings: Finding[];
  degraded_checks: ScanDimension[];
  http_scan: CheckReport;
  ssl_scan: CheckReport;
  dns_scan: CheckReport;
  owasp: OwaspAssessment;
}

export interface ScanWebsiteResponse {
  scan_id: string;
  url: string;
  scan_timestamp: string;
  scan_duration_ms: number;
  overall_grade: Grade;
  risk_score: number;
  risk_level: RiskLevel;
  http_grade: Grade;
  ssl_grade: Grade;
  dns_grade: Grade;
  critical_issues_count: number;
  high_issues_count: number;
  medium_issues_count: number;
  low_issues_count: number;
  recommendations: string[];
  degraded_checks: ScanDimension[];
}

export interface ScanProgress {
  scan_id: string;
  url: string;
  status: ScanStatus;
  phase: ScanPhase | null;
  completed_phases: ScanPhase[];
  progress_percentage: number;
  current_step: string;
  started_at: string;
  updated_at: string;
  /** "MM:SS" since the scan started, fixed when the snapshot is written. */
  time_elapsed: string;
  is_complete: boolean;
  has_error: boolean;
  error_message: string | null;
}

export interface HistoryQuery {
  limit?: number;
  skip?: number;
}
