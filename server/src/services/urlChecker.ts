import { extractUrlFeatures } from '../ml/featureExtractor';
import type { PhishingClassifier } from '../ml/phishingClassifier';
import type { UrlCheckResult } from '../types/checks';

const percent = (value: number) => `${(value * 100).toFixed(1)}%`;

export class UrlChecker {
  constructor(private readonly classifier: PhishingClassifier) {}

  check(url: string): UrlCheckResult {
    const { features } = extractUrlFeatures(url, this.classifier.lexicons);
    const prediction = this.classifier.predict(features);

    const recommendations: string[] = [];
    if (prediction.isPhishing) {
      recommendations.push(
        'This URL shows multiple phishing indicators. Do not click it or enter credentials'
      );
      if (features.has_https === 0) {
        recommendations.push('Missing HTTPS encryption. Legitimate login pages use HTTPS');
      }
      if (features.brand_token === 1) {
        recommendations.push('Domain imitates a known brand. Type the official address yourself');
      }
      if (features.has_at === 1) {
        recommendations.push('Contains an @ symbol, often used to disguise the real destination');
      }
      if (features.num_hyphens >= 2) {
        recommendations.push('Multiple hyphens in the domain suggest brand impersonation');
      }
      if (features.url_shortener === 1) {
        recommendations.push('Expand the shortened link before opening it');
      }
      recommendations.push(
        'Verify the URL matches the official website',
        'Check for spelling errors in the domain name'
      );
    } else {
      recommendations.push(
        'URL appears legitimate based on lexical analysis',
        'Always verify the sender before clicking links in emails',
        'Look for HTTPS and a valid certificate before entering credentials'
      );
    }

    const message = prediction.isPhishing
      ? `High phishing probability (${percent(prediction.probability)}), confidence ${percent(prediction.confidence)}`
      : `Appears legitimate (phishing probability: ${percent(prediction.probability)}, confidence: ${percent(prediction.confidence)})`;

    return {
      url,
      is_phishing: prediction.isPhishing,
      phishing_score: prediction.probability,
      confidence: prediction.confidence,
      risk_level: prediction.riskLevel,
      message,
      model_info: this.classifier.info,
      feature_analysis: prediction.featureAnalysis,
      recommendations,
    };
  }
}
