import { InvalidInputError } from '../errors/AppError';

/** Model input order. Changing it invalidates every trained artifact. */
export const FEATURE_NAMES = [
  'url_length',
  'num_dots',
  'num_hyphens',
  'num_digits',
  'digit_ratio',
  'has_at',
  'has_https',
  'subdomain_count',
  'path_length',
  'special_char_ratio',
  'is_ip_host',
  'brand_token',
  'suspicious_token',
  'url_shortener',
  'trusted_domain',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export type FeatureVector = Record<FeatureName, number>;

export interface Lexicons {
  brandTokens: string[];
  suspiciousKeywords: string[];
  urlShorteners: string[];
  trustedDomains: string[];
}

export interface ExtractedFeatures {
  normalizedUrl: string;
  hostname: string;
  features: FeatureVector;
}

const IPV4_PATTERN = /^\d{1,3}(\.\d{1,3}){3}$/;
const SPECIAL_CHAR_PATTERN = /[^a-zA-Z0-9/.\-_:]/g;

export const isFeatureName = (name: string): name is FeatureName =>
  FEATURE_NAMES.some((feature) => feature === name);

const countOf = (text: string, char: string): number => text.split(char).length - 1;

/**
 * Adds a scheme to bare hosts and parses the result.
 * Anything without an http(s) scheme and a host is rejected.
 */
export const parseTargetUrl = (raw: string): { normalized: string; parsed: URL } => {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new InvalidInputError('URL must not be empty');
  }

  const normalized = trimmed.includes('://') ? trimmed : `http://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(normalized);
  } catch {
    throw new InvalidInputError(`Invalid URL: ${raw}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidInputError('URL must use HTTP or HTTPS protocol');
  }
  if (!parsed.hostname) {
    throw new InvalidInputError('Invalid URL: missing domain');
  }

  return { normalized, parsed };
};

const stripWww = (hostname: string) =>
  hostname.startsWith('www.') ? hostname.slice(4) : hostname;

const registrableDomain = (hostname: string): string => {
  const labels = stripWww(hostname).split('.');
  return labels.slice(-2).join('.');
};

const isIpHost = (hostname: string): boolean =>
  IPV4_PATTERN.test(hostname) || hostname.startsWith('[');

/**
 * Derives the lexical feature vector of a URL.
 * Pure: the lexicons are passed in and nothing is looked up on the network.
 */
export const extractUrlFeatures = (url: string, lexicons: Lexicons): ExtractedFeatures => {
  const { normalized, parsed } = parseTargetUrl(url);
  const hostname = parsed.hostname.toLowerCase();
  const lowerUrl = normalized.toLowerCase();
  const ipHost = isIpHost(hostname);

  const urlLength = normalized.length;
  const numDigits = (normalized.match(/\d/g) ?? []).length;
  const specialChars = (normalized.match(SPECIAL_CHAR_PATTERN) ?? []).length;
  const path = parsed.pathname === '/' ? '' : parsed.pathname;

  const domain = registrableDomain(hostname);
  const trusted = !ipHost && lexicons.trustedDomains.includes(domain);

  const hostTokens = stripWww(hostname).split(/[.-]/);
  const brandToken =
    !trusted &&
    lexicons.brandTokens.some((brand) => hostTokens.some((token) => token.includes(brand)));

  const suspiciousHits = lexicons.suspiciousKeywords.filter((keyword) =>
    lowerUrl.includes(keyword)
  ).length;

  const features: FeatureVector = {
    url_length: urlLength,
    num_dots: countOf(normalized, '.'),
    num_hyphens: countOf(normalized, '-'),
    num_digits: numDigits,
    digit_ratio: urlLength > 0 ? numDigits / urlLength : 0,
    has_at: normalized.includes('@') ? 1 : 0,
    has_https: parsed.protocol === 'https:' ? 1 : 0,
    subdomain_count: ipHost ? 0 : Math.max(0, stripWww(hostname).split('.').length - 2),
    path_length: path.length,
    special_char_ratio: urlLength > 0 ? specialChars / urlLength : 0,
    is_ip_host: ipHost ? 1 : 0,
    brand_token: brandToken ? 1 : 0,
    suspicious_token: suspiciousHits,
    url_shortener: lexicons.urlShorteners.includes(stripWww(hostname)) ? 1 : 0,
    trusted_domain: trusted ? 1 : 0,
  };

  return { normalizedUrl: normalized, hostname, features };
};

export const featuresToArray = (features: FeatureVector): number[] =>
  FEATURE_NAMES.map((name) => features[name]);

/** Builds a complete vector by evaluating `fn` once per feature, in model order. */
export const mapFeatures = (fn: (name: FeatureName) => number): FeatureVector => ({
  url_length: fn('url_length'),
  num_dots: fn('num_dots'),
  num_hyphens: fn('num_hyphens'),
  num_digits: fn('num_digits'),
  digit_ratio: fn('digit_ratio'),
  has_at: fn('has_at'),
  has_https: fn('has_https'),
  subdomain_count: fn('subdomain_count'),
  path_length: fn('path_length'),
  special_char_ratio: fn('special_char_ratio'),
  is_ip_host: fn('is_ip_host'),
  brand_token: fn('brand_token'),
  suspicious_token: fn('suspicious_token'),
  url_shortener: fn('url_shortener'),
  trusted_domain: fn('trusted_domain'),
});
