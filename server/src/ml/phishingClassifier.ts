import fs from 'fs';
import { ModelUnavailableError } from '../errors/AppError';
import { phishingRiskLevel } from '../domain/riskEngine';
import type { RiskLevel } from '../types/common';
import type { FeatureAnalysis, FeatureRisk, ModelInfo } from '../types/checks';
import { createLogger } from '../utils/logger';
import {
  FEATURE_NAMES,
  type FeatureName,
  type FeatureVector,
  type Lexicons,
  isFeatureName,
  mapFeatures,
} from './featureExtractor';

const logger = createLogger({ component: 'MODEL' });

export interface PhishingModel {
  name: string;
  version: string;
  intercept: number;
  weights: FeatureVector;
  riskyFeatures: FeatureName[];
  lexicons: Lexicons;
}

export interface Prediction {
  probability: number;
  isPhishing: boolean;
  confidence: number;
  riskLevel: RiskLevel;
  featureAnalysis: FeatureAnalysis[];
}

const FEATURE_EXPLANATIONS: Record<FeatureName, string> = {
  url_length: 'Long URLs are often used to hide the real destination',
  num_dots: 'Many dots usually mean deeply nested subdomains',
  num_hyphens: 'Hyphenated domains are a common brand-impersonation technique',
  num_digits: 'Digits in a domain often replace look-alike letters',
  digit_ratio: 'A high share of digits is unusual for legitimate sites',
  has_at: 'An @ symbol makes browsers ignore everything before it',
  has_https: 'HTTPS encrypts traffic between browser and site',
  subdomain_count: 'Extra subdomains can make a URL look like a trusted site',
  path_length: 'Long paths may be attempting obfuscation',
  special_char_ratio: 'Encoded or special characters can disguise a URL',
  is_ip_host: 'Legitimate sites rarely use a raw IP address as host',
  brand_token: 'Domain contains a well-known brand name but is not owned by that brand',
  suspicious_token: 'Words such as "verify" or "login" are typical phishing lures',
  url_shortener: 'Shortened links hide the final destination',
  trusted_domain: 'Domain belongs to a well-established site',
};

const DISPLAYED_FEATURES = 5;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

const sigmoid = (z: number) => 1 / (1 + Math.exp(-z));

const round = (value: number, digits = 4) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/**
 * Validates a parsed model artifact. Risky features must carry a
 * non-negative weight so the probability never drops when one grows.
 */
export const parseModel = (raw: unknown): PhishingModel => {
  if (!isRecord(raw)) {
    throw new ModelUnavailableError('Model artifact is not a JSON object');
  }

  const { name, version, intercept, weights, risky_features, lexicons } = raw;

  if (typeof name !== 'string' || typeof version !== 'string') {
    throw new ModelUnavailableError('Model artifact is missing name or version');
  }
  if (typeof intercept !== 'number' || !Number.isFinite(intercept)) {
    throw new ModelUnavailableError('Model intercept must be a finite number');
  }
  if (!isRecord(weights)) {
    throw new ModelUnavailableError('Model weights must be an object');
  }

  const parsedWeights = mapFeatures((feature) => {
    const weight = weights[feature];
    if (typeof weight !== 'number' || !Number.isFinite(weight)) {
      throw new ModelUnavailableError(`Model has no numeric weight for feature "${feature}"`);
    }
    return weight;
  });

  if (!isStringArray(risky_features)) {
    throw new ModelUnavailableError('Model risky_features must be a list of feature names');
  }
  const riskyFeatures: FeatureName[] = [];
  for (const feature of risky_features) {
    if (!isFeatureName(feature)) {
      throw new ModelUnavailableError(`Unknown risky feature "${feature}"`);
    }
    if (parsedWeights[feature] < 0) {
      throw new ModelUnavailableError(`Risky feature "${feature}" has a negative weight`);
    }
    riskyFeatures.push(feature);
  }

  if (
    !isRecord(lexicons) ||
    !isStringArray(lexicons.brand_tokens) ||
    !isStringArray(lexicons.suspicious_keywords) ||
    !isStringArray(lexicons.url_shorteners) ||
    !isStringArray(lexicons.trusted_domains)
  ) {
    throw new ModelUnavailableError('Model lexicons are missing or malformed');
  }

  return {
    name,
    version,
    intercept,
    weights: parsedWeights,
    riskyFeatures,
    lexicons: {
      brandTokens: lexicons.brand_tokens,
      suspiciousKeywords: lexicons.suspicious_keywords,
      urlShorteners: lexicons.url_shorteners,
      trustedDomains: lexicons.trusted_domains,
    },
  };
};

const qualitativeRisk = (contribution: number): FeatureRisk => {
  if (contribution >= 2) return 'CRITICAL';
  if (contribution >= 1) return 'HIGH';
  if (contribution >= 0.3) return 'MEDIUM';
  return 'LOW';
};

export class PhishingClassifier {
  private readonly model: PhishingModel;

  constructor(model: PhishingModel) {
    this.model = model;
  }

  /** Reads and validates the artifact; any failure is a ModelUnavailableError. */
  static fromFile(modelPath: string): PhishingClassifier {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(modelPath, 'utf8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ModelUnavailableError(`Cannot load phishing model from ${modelPath}: ${reason}`);
    }
    const model = parseModel(raw);
    logger.info(`Loaded ${model.name} v${model.version}`);
    return new PhishingClassifier(model);
  }

  get info(): ModelInfo {
    return { name: this.model.name, version: this.model.version };
  }

  get lexicons(): Lexicons {
    return this.model.lexicons;
  }

  get riskyFeatures(): readonly FeatureName[] {
    return this.model.riskyFeatures;
  }

  contributions(features: FeatureVector): FeatureVector {
    return mapFeatures((feature) => this.model.weights[feature] * features[feature]);
  }

  probability(features: FeatureVector): number {
    const contributions = this.contributions(features);
    const z = FEATURE_NAMES.reduce(
      (sum, feature) => sum + contributions[feature],
      this.model.intercept
    );
    return sigmoid(z);
  }

  predict(features: FeatureVector): Prediction {
    const probability = this.probability(features);
    const contributions = this.contributions(features);

    const featureAnalysis = FEATURE_NAMES.filter((feature) => contributions[feature] !== 0)
      .map<FeatureAnalysis>((feature) => ({
        feature,
        value: round(features[feature]),
        contribution: round(contributions[feature]),
        risk: qualitativeRisk(contributions[feature]),
        explanation: FEATURE_EXPLANATIONS[feature],
      }))
      .sort((a, b) => Math.abs(b.contribution) - Math.abs(a.contribution))
      .slice(0, DISPLAYED_FEATURES);

    return {
      probability,
      isPhishing: probability >= 0.5,
      confidence: Math.abs(probability - 0.5) * 2,
      riskLevel: phishingRiskLevel(probability),
      featureAnalysis,
    };
  }
}
