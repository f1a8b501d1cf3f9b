import type { RiskLevel } from './common';

export type FeatureRisk = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface FeatureAnalysis {
  feature: string;
  value: number;
  contribution: number;
  risk: FeatureRisk;
  explanation: string;
}

export interface ModelInfo {
  name: string;
  version: string;
}

export interface UrlCheckResult {
  url: string;
  is_phishing: boolean;
  /** Probability of phishing on a 0–1 scale. */
  phishing_score: number;
  confidence: number;
  risk_level: RiskLevel;
  message: string;
  model_info: ModelInfo;
  feature_analysis: FeatureAnalysis[];
  recommendations: string[];
}

export interface BreachDetail {
  name: string;
  date: string;
  accounts: number;
  data_classes: string[];
}

export interface EmailCheckResult {
  email: string;
  breached: boolean;
  pwned_count: number;
  risk_level: RiskLevel;
  message: string;
  breaches: BreachDetail[];
  recommendations: string[];
}

export interface HealthStatus {
  project: string;
  version: string;
  status: 'running';
}

export type PasswordStrength = 'VERY WEAK' | 'WEAK' | 'MODERATE' | 'STRONG' | 'EXCELLENT';

export interface CharacterAnalysis {
  has_uppercase: boolean;
  has_lowercase: boolean;
  has_digits: boolean;
  has_special: boolean;
  unique_characters: number;
  total_length: number;
}

export interface CrackTimeEstimates {
  online_attack: string;
  offline_slow_hash: string;
  offline_fast_hash: string;
  gpu_cluster: string;
  description: string;
}

export interface PasswordBreachCheck {
  /** First five hex digits of the uppercase SHA-1; the rest never leaves the server. */
  sha1_prefix: string;
  found_in_breach_db: boolean;
  note: string;
  recommendation: string;
}

export interface ComplexityBreakdown {
  length_score: number;
  diversity_score: number;
  uniqueness_score: number;
  entropy_score: number;
  pattern_penalty: number;
}

export interface PasswordCheckResult {
  password_length: number;
  score: number;
  strength: PasswordStrength;
  entropy_bits: number;
  charset_size: number;
  character_analysis: CharacterAnalysis;
  patterns_detected: string[];
  is_common_password: boolean;
  crack_time_estimates: CrackTimeEstimates;
  breach_check: PasswordBreachCheck;
  issues: string[];
  recommendations: string[];
  complexity_breakdown: ComplexityBreakdown;
}

export type PasswordMode = 'random' | 'memorable';

export interface GeneratedPassword {
  password: string;
  length: number;
  mode: PasswordMode;
  /** Only set for memorable passphrases. */
  word_count?: number;
  strength: PasswordStrength;
  score: number;
  entropy_bits: number;
  crack_time_estimates: CrackTimeEstimates;
}
