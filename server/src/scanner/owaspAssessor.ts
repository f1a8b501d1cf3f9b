import type { Severity } from '../types/common';
import type { Finding, OwaspAssessment, OwaspCategoryResult, OwaspId } from '../types/scan';
import { DIMENSION_ORDER, type CheckSet } from './riskScorer';

interface OwaspCategory {
  id: OwaspId;
  name: string;
  severity: Severity;
  recommendations: string[];
}

export const OWASP_TOP_10: readonly OwaspCategory[] = [
  {
    id: 'A01:2021',
    name: 'Broken Access Control',
    severity: 'CRITICAL',
    recommendations: [
      'Implement proper access control headers (CORS, Referrer-Policy)',
      'Use principle of least privilege for all resources',
    ],
  },
  {
    id: 'A02:2021',
    name: 'Cryptographic Failures',
    severity: 'CRITICAL',
    recommendations: [
      'Enable HTTPS with TLS 1.2+ on all pages',
      'Implement HSTS with long max-age',
      'Use strong cipher suites only',
    ],
  },
  {
    id: 'A03:2021',
    name: 'Injection',
    severity: 'CRITICAL',
    recommendations: [
      'Implement strict Content-Security-Policy',
      'Validate and sanitize all user inputs',
    ],
  },
  {
    id: 'A04:2021',
    name: 'Insecure Design',
    severity: 'HIGH',
    recommendations: ['Implement anti-clickjacking headers (X-Frame-Options, CSP frame-ancestors)'],
  },
  {
    id: 'A05:2021',
    name: 'Security Misconfiguration',
    severity: 'HIGH',
    recommendations: [
      'Remove server version disclosure from headers',
      'Implement all recommended security headers',
      'Publish SPF, DKIM and DMARC records and enable DNSSEC',
    ],
  },
  {
    id: 'A06:2021',
    name: 'Vulnerable and Outdated Components',
    severity: 'HIGH',
    recommendations: ['Keep all software components up-to-date', 'Monitor CVE databases for known vulnerabilities'],
  },
  { id: 'A07:2021', name: 'Identification and Authentication Failures', severity: 'HIGH', recommendations: [] },
  { id: 'A08:2021', name: 'Software and Data Integrity Failures', severity: 'MEDIUM', recommendations: [] },
  { id: 'A09:2021', name: 'Security Logging and Monitoring Failures', severity: 'MEDIUM', recommendations: [] },
  { id: 'A10:2021', name: 'Server-Side Request Forgery (SSRF)', severity: 'MEDIUM', recommendations: [] },
];

const MAX_PRIORITY_ACTIONS = 5;
const MAX_CRITICAL_ACTIONS = 3;

// first match wins; HTTP findings that match nothing are misconfiguration
const HTTP_RULES: ReadonlyArray<[RegExp, OwaspId]> = [
  [/^(Referrer-Policy|Referrer policy|Cross-Origin-Opener-Policy)/, 'A01:2021'],
  [/^(Strict-Transport-Security|HSTS)/, 'A02:2021'],
  [/^(Content-Security-Policy|CSP)/, 'A03:2021'],
  [/^X-Frame-Options/, 'A04:2021'],
  [/end-of-life/, 'A06:2021'],
];

export const owaspCategoryOf = (finding: Finding): OwaspId => {
  switch (finding.dimension) {
    case 'http':
      return HTTP_RULES.find(([pattern]) => pattern.test(finding.issue))?.[1] ?? 'A05:2021';
    case 'ssl':
      return 'A02:2021';
    case 'dns':
      return 'A05:2021';
  }
};

export const owaspVerdict = (complianceScore: number): string => {
  if (complianceScore >= 90) return 'EXCELLENT - Strong OWASP Top 10 compliance';
  if (complianceScore >= 70) return 'GOOD - Moderate compliance with room for improvement';
  if (complianceScore >= 50) return 'FAIR - Multiple OWASP categories need attention';
  return 'POOR - Significant security gaps identified';
};

/**
 * Places every finding of the completed checks under one OWASP Top 10
 * (2021) category. Degraded checks say nothing about the site and are
 * left out.
 */
export const assessOwasp = (checks: CheckSet): OwaspAssessment => {
  const findings = DIMENSION_ORDER.filter((dimension) => !checks[dimension].degraded).flatMap(
    (dimension) => checks[dimension].findings
  );

  const categories: OwaspCategoryResult[] = OWASP_TOP_10.map((category) => {
    const issues = findings.filter((finding) => owaspCategoryOf(finding) === category.id);
    return {
      id: category.id,
      name: category.name,
      severity: category.severity,
      status: issues.length === 0 ? 'COMPLIANT' : 'NON-COMPLIANT',
      issues_found: issues.map((finding) => finding.issue),
      recommendations: issues.length === 0 ? [] : category.recommendations,
    };
  });

  const compliant = categories.filter((category) => category.status === 'COMPLIANT');
  const nonCompliant = categories.filter((category) => category.status === 'NON-COMPLIANT');
  const complianceScore = Math.floor((compliant.length / categories.length) * 100);

  const actions = findings
    .filter((finding) => finding.severity === 'CRITICAL')
    .slice(0, MAX_CRITICAL_ACTIONS)
    .map((finding) => `[CRITICAL] ${finding.issue}`);
  for (const category of nonCompliant) {
    if (category.severity === 'CRITICAL' && actions.length < MAX_PRIORITY_ACTIONS) {
      actions.push(`[${category.id}] ${category.issues_found[0]}`);
    }
  }

  return {
    compliance_score: complianceScore,
    verdict: owaspVerdict(complianceScore),
    compliant_categories: compliant.map((category) => category.id),
    non_compliant_categories: nonCompliant.map((category) => category.id),
    categories,
    priority_actions: actions,
  };
};
