import axios from 'axios';
import type { Readable } from 'stream';
import { gradeFromScore } from '../domain/riskEngine';
import type { Grade, Severity } from '../types/common';
import type { CheckResult, Finding } from '../types/scan';
import { detectTechnologies, technologyFindings } from './techDetector';

/** Response headers keyed by lower-case name. */
export type HeaderMap = Record<string, string>;

export type HeaderFetcher = (url: string, timeoutMs: number) => Promise<HeaderMap>;

export interface SecurityHeader {
  name: string;
  severity: Severity;
  description: string;
  recommendedValue: string;
}

export interface HeaderAssessment {
  present: boolean;
  value: string | null;
  grade: Grade;
  score: number;
  feedback: string;
}

export const SECURITY_HEADERS: readonly SecurityHeader[] = [
  {
    name: 'Strict-Transport-Security',
    severity: 'CRITICAL',
    description: 'Forces HTTPS connections and prevents protocol downgrade attacks',
    recommendedValue: 'max-age=31536000; includeSubDomains; preload',
  },
  {
    name: 'Content-Security-Policy',
    severity: 'CRITICAL',
    description: 'Prevents XSS, clickjacking and other code injection attacks',
    recommendedValue: "default-src 'self'; script-src 'self'; object-src 'none'",
  },
  {
    name: 'X-Frame-Options',
    severity: 'HIGH',
    description: 'Prevents clickjacking by controlling iframe embedding',
    recommendedValue: 'DENY or SAMEORIGIN',
  },
  {
    name: 'X-Content-Type-Options',
    severity: 'MEDIUM',
    description: 'Prevents MIME-sniffing attacks',
    recommendedValue: 'nosniff',
  },
  {
    name: 'Referrer-Policy',
    severity: 'MEDIUM',
    description: 'Controls referrer information sent with requests',
    recommendedValue: 'strict-origin-when-cross-origin or no-referrer',
  },
  {
    name: 'Permissions-Policy',
    severity: 'MEDIUM',
    description: 'Controls browser features and APIs available to the page',
    recommendedValue: 'geolocation=(), microphone=(), camera=()',
  },
  {
    name: 'Cross-Origin-Opener-Policy',
    severity: 'MEDIUM',
    description: 'Isolates the browsing context from cross-origin windows',
    recommendedValue: 'same-origin',
  },
  {
    name: 'X-Permitted-Cross-Domain-Policies',
    severity: 'LOW',
    description: 'Controls cross-domain requests from Flash and PDF documents',
    recommendedValue: 'none',
  },
];

const MISSING_HEADER_GRADES: Record<Severity, [Grade, number]> = {
  CRITICAL: ['F', 0],
  HIGH: ['D', 40],
  MEDIUM: ['C', 60],
  LOW: ['B', 70],
};

const FINDING_RISK: Record<Severity, number> = {
  CRITICAL: 15,
  HIGH: 10,
  MEDIUM: 5,
  LOW: 2,
};

const SEVERITY_WEIGHTS: Record<Severity, number> = {
  CRITICAL: 4,
  HIGH: 3,
  MEDIUM: 2,
  LOW: 1,
};

const ONE_YEAR = 31_536_000;
const SIX_MONTHS = 15_768_000;
const PASSING_SCORE = 90;

const assess = (grade: Grade, score: number, feedback: string) => ({ grade, score, feedback });

export const gradeHeader = (
  header: SecurityHeader,
  value: string | null
): Omit<HeaderAssessment, 'present' | 'value'> => {
  if (value === null) {
    const [grade, score] = MISSING_HEADER_GRADES[header.severity];
    return assess(grade, score, `${header.name} header missing`);
  }

  const lower = value.toLowerCase().trim();

  switch (header.name) {
    case 'Strict-Transport-Security': {
      const match = /max-age=\s*"?(\d+)/.exec(lower);
      if (!lower.includes('max-age')) {
        return assess('D', 40, 'HSTS present but missing max-age directive');
      }
      if (!match) {
        return assess('D', 50, 'HSTS present but max-age value is invalid');
      }
      const maxAge = Number(match[1]);
      if (maxAge >= ONE_YEAR) {
        return lower.includes('includesubdomains') && lower.includes('preload')
          ? assess('A', 100, 'HSTS configured with preload')
          : assess('A', 95, 'Strong HSTS configuration');
      }
      if (maxAge >= SIX_MONTHS) {
        return assess('B', 85, 'HSTS max-age below the recommended one year');
      }
      return assess('C', 70, 'HSTS max-age too short');
    }
    case 'Content-Security-Policy':
      if (!lower.includes('default-src') && !lower.includes('script-src')) {
        return assess('D', 50, 'CSP present but missing default-src and script-src');
      }
      if (lower.includes("'unsafe-inline'") || lower.includes("'unsafe-eval'")) {
        return assess('C', 65, 'CSP allows unsafe-inline or unsafe-eval');
      }
      return assess('A', 95, 'Strong CSP configuration');
    case 'X-Frame-Options':
      return lower === 'deny' || lower === 'sameorigin'
        ? assess('A', 100, `X-Frame-Options set to ${lower.toUpperCase()}`)
        : assess('C', 70, 'X-Frame-Options value does not fully prevent framing');
    case 'X-Content-Type-Options':
      return lower === 'nosniff'
        ? assess('A', 100, 'X-Content-Type-Options set to nosniff')
        : assess('C', 70, 'X-Content-Type-Options should be "nosniff"');
    case 'Referrer-Policy':
      return ['no-referrer', 'strict-origin-when-cross-origin', 'same-origin'].includes(lower)
        ? assess('A', 95, 'Strong referrer policy')
        : assess('B', 80, 'Referrer policy could be stricter');
    default:
      return assess('A', PASSING_SCORE, `${header.name} present`);
  }
};

export const evaluateHeaders = (headers: HeaderMap): CheckResult => {
  const analysis: Record<string, HeaderAssessment> = {};
  const findings: Finding[] = [];
  let riskPoints = 0;
  let weightedScore = 0;
  let totalWeight = 0;

  for (const header of SECURITY_HEADERS) {
    const value = headers[header.name.toLowerCase()] ?? null;
    const result = gradeHeader(header, value);
    analysis[header.name] = { present: value !== null, value, ...result };

    if (value === null) {
      riskPoints += FINDING_RISK[header.severity];
    }
    if (result.score < PASSING_SCORE) {
      findings.push({
        dimension: 'http',
        severity: header.severity,
        issue: result.feedback,
        recommendation: `Set ${header.name}: ${header.recommendedValue}`,
      });
    }

    const weight = SEVERITY_WEIGHTS[header.severity];
    weightedScore += result.score * weight;
    totalWeight += weight;
  }

  const technologies = detectTechnologies(headers);
  for (const finding of technologyFindings(technologies)) {
    riskPoints += FINDING_RISK[finding.severity];
    findings.push(finding);
  }

  const score = Math.floor(weightedScore / totalWeight);

  return {
    dimension: 'http',
    grade: gradeFromScore(score, [95, 85, 70, 50]),
    score,
    riskPoints: Math.min(riskPoints, 100),
    findings,
    degraded: false,
    error: null,
    details: { headers: analysis, technologies },
  };
};

const flattenHeaders = (raw: Record<string, unknown>): HeaderMap => {
  const headers: HeaderMap = {};
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined || value === null) continue;
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return headers;
};

/** Plain GET; the body is discarded as soon as the headers arrive. */
export const fetchHeaders: HeaderFetcher = async (url, timeoutMs) => {
  const response = await axios.get<Readable>(url, {
    timeout: timeoutMs,
    maxRedirects: 5,
    responseType: 'stream',
    validateStatus: () => true,
    headers: { 'User-Agent': 'WebSecurityScanner/1.0 (passive header check)' },
  });
  response.data.destroy();
  return flattenHeaders({ ...response.headers });
};
