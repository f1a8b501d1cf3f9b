import { clamp, websiteGrade, websiteRiskLevel } from '../domain/riskEngine';
import { SEVERITY_ORDER, type Grade, type RiskLevel, type Severity } from '../types/common';
import type { CheckReport, CheckResult, Finding, ScanDimension } from '../types/scan';

export const DIMENSION_ORDER: readonly ScanDimension[] = ['http', 'ssl', 'dns'];

export const DIMENSION_WEIGHTS: Record<ScanDimension, number> = {
  http: 0.35,
  ssl: 0.45,
  dns: 0.2,
};

export interface CheckSet {
  http: CheckResult;
  ssl: CheckResult;
  dns: CheckResult;
}

export interface RiskSummary {
  riskScore: number;
  riskLevel: RiskLevel;
  overallGrade: Grade;
  grades: Record<ScanDimension, Grade>;
  counts: Record<Severity, number>;
  findings: Finding[];
  recommendations: string[];
  degraded: ScanDimension[];
}

export const formatRecommendation = (finding: Finding): string =>
  `[${finding.severity}] [${finding.dimension.toUpperCase()}] ${finding.issue}: ${finding.recommendation}`;

/**
 * Orders findings by severity, then dimension, then the order each check
 * reported them. The sort is stable, so the last key needs no comparator.
 */
export const orderFindings = (checks: CheckSet): Finding[] =>
  DIMENSION_ORDER.flatMap((dimension) => checks[dimension].findings).sort(
    (a, b) =>
      SEVERITY_ORDER.indexOf(a.severity) - SEVERITY_ORDER.indexOf(b.severity) ||
      DIMENSION_ORDER.indexOf(a.dimension) - DIMENSION_ORDER.indexOf(b.dimension)
  );

export const summarizeRisk = (checks: CheckSet): RiskSummary => {
  const weighted = DIMENSION_ORDER.reduce(
    (sum, dimension) => sum + DIMENSION_WEIGHTS[dimension] * checks[dimension].riskPoints,
    0
  );
  const riskScore = clamp(Math.round(weighted), 0, 100);

  const findings = orderFindings(checks);
  const counts: Record<Severity, number> = { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0 };
  for (const finding of findings) counts[finding.severity] += 1;

  return {
    riskScore,
    riskLevel: websiteRiskLevel(riskScore),
    overallGrade: websiteGrade(riskScore),
    grades: { http: checks.http.grade, ssl: checks.ssl.grade, dns: checks.dns.grade },
    counts,
    findings,
    recommendations: findings.map(formatRecommendation),
    degraded: DIMENSION_ORDER.filter((dimension) => checks[dimension].degraded),
  };
};

export const toCheckReport = (check: CheckResult): CheckReport => ({
  grade: check.grade,
  score: check.score,
  risk_points: check.riskPoints,
  degraded: check.degraded,
  error: check.error,
  details: check.details,
});
