import { describe, expect, it } from 'vitest';
import {
  breachRiskLevel,
  clamp,
  gradeFromScore,
  phishingRiskLevel,
  websiteGrade,
  websiteRiskLevel,
} from './riskEngine';

describe('riskEngine', () => {
  describe('phishingRiskLevel', () => {
    it('should map probabilities onto the threshold bands', () => {
      expect(phishingRiskLevel(0)).toBe('LOW');
      expect(phishingRiskLevel(0.39)).toBe('LOW');
      expect(phishingRiskLevel(0.4)).toBe('MEDIUM');
      expect(phishingRiskLevel(0.69)).toBe('MEDIUM');
      expect(phishingRiskLevel(0.7)).toBe('HIGH');
      expect(phishingRiskLevel(0.84)).toBe('HIGH');
      expect(phishingRiskLevel(0.85)).toBe('CRITICAL');
      expect(phishingRiskLevel(1)).toBe('CRITICAL');
    });
  });

  describe('breachRiskLevel', () => {
    it('should grow with the number of breaches', () => {
      expect(breachRiskLevel(0)).toBe('LOW');
      expect(breachRiskLevel(1)).toBe('MEDIUM');
      expect(breachRiskLevel(2)).toBe('HIGH');
      expect(breachRiskLevel(3)).toBe('HIGH');
      expect(breachRiskLevel(4)).toBe('CRITICAL');
      expect(breachRiskLevel(12)).toBe('CRITICAL');
    });
  });

  describe('website risk', () => {
    it('should treat 0 as the best risk score', () => {
      expect(websiteRiskLevel(0)).toBe('MINIMAL');
      expect(websiteGrade(0)).toBe('A');
    });

    it('should band the risk level', () => {
      expect(websiteRiskLevel(19)).toBe('MINIMAL');
      expect(websiteRiskLevel(20)).toBe('LOW');
      expect(websiteRiskLevel(40)).toBe('MEDIUM');
      expect(websiteRiskLevel(60)).toBe('HIGH');
      expect(websiteRiskLevel(80)).toBe('CRITICAL');
    });

    it('should band the overall grade', () => {
      expect(websiteGrade(10)).toBe('A');
      expect(websiteGrade(11)).toBe('B');
      expect(websiteGrade(25)).toBe('B');
      expect(websiteGrade(45)).toBe('C');
      expect(websiteGrade(70)).toBe('D');
      expect(websiteGrade(71)).toBe('F');
    });
  });

  it('should grade a score against the given cutoffs', () => {
    const cutoffs = [90, 80, 70, 60] as const;
    expect(gradeFromScore(96, cutoffs)).toBe('A');
    expect(gradeFromScore(80, cutoffs)).toBe('B');
    expect(gradeFromScore(79, cutoffs)).toBe('C');
    expect(gradeFromScore(60, cutoffs)).toBe('D');
    expect(gradeFromScore(59, cutoffs)).toBe('F');
  });

  it('should clamp values into range', () => {
    expect(clamp(-3, 0, 100)).toBe(0);
    expect(clamp(140, 0, 100)).toBe(100);
    expect(clamp(42, 0, 100)).toBe(42);
  });
});
