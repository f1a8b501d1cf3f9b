// Pure threshold rules shared by the URL, e-mail and website checks.
import type { Grade, RiskLevel } from '../types/common';

export const PHISHING_THRESHOLDS = {
  CRITICAL: 0.85,
  HIGH: 0.7,
  MEDIUM: 0.4,
} as const;

/** `score` is a phishing probability in [0, 1]. */
export const phishingRiskLevel = (score: number): RiskLevel => {
  if (score >= PHISHING_THRESHOLDS.CRITICAL) return 'CRITICAL';
  if (score >= PHISHING_THRESHOLDS.HIGH) return 'HIGH';
  if (score >= PHISHING_THRESHOLDS.MEDIUM) return 'MEDIUM';
  return 'LOW';
};

export const breachRiskLevel = (breachCount: number): RiskLevel => {
  if (breachCount <= 0) return 'LOW';
  if (breachCount === 1) return 'MEDIUM';
  if (breachCount <= 3) return 'HIGH';
  return 'CRITICAL';
};

/** Website risk score: 0 is best, 100 is worst. */
export const websiteRiskLevel = (riskScore: number): RiskLevel => {
  if (riskScore >= 80) return 'CRITICAL';
  if (riskScore >= 60) return 'HIGH';
  if (riskScore >= 40) return 'MEDIUM';
  if (riskScore >= 20) return 'LOW';
  return 'MINIMAL';
};

export const websiteGrade = (riskScore: number): Grade => {
  if (riskScore <= 10) return 'A';
  if (riskScore <= 25) return 'B';
  if (riskScore <= 45) return 'C';
  if (riskScore <= 70) return 'D';
  return 'F';
};

export type GradeCutoffs = readonly [a: number, b: number, c: number, d: number];

/** Maps a 0–100 quality score (higher is better) onto a letter grade. */
export const gradeFromScore = (score: number, cutoffs: GradeCutoffs): Grade => {
  const [a, b, c, d] = cutoffs;
  if (score >= a) return 'A';
  if (score >= b) return 'B';
  if (score >= c) return 'C';
  if (score >= d) return 'D';
  return 'F';
};

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);
