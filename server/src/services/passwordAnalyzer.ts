import crypto from 'crypto';
import fs from 'fs';
import { ConfigurationError, InvalidInputError } from '../errors/AppError';
import type {
  CrackTimeEstimates,
  GeneratedPassword,
  PasswordBreachCheck,
  PasswordCheckResult,
  PasswordMode,
  PasswordStrength,
} from '../types/checks';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'PASSWORD' });

export const MAX_PASSWORD_LENGTH = 256;
export const MIN_GENERATED_LENGTH = 8;
export const MAX_GENERATED_LENGTH = 128;

const KEYBOARD_ROWS = ['qwertyuiop', 'asdfghjkl', 'zxcvbnm', '1234567890', '!@#$%^&*()'];
const SEQUENCE_SOURCES = ['abcdefghijklmnopqrstuvwxyz', '01234567890'];

const LEET_MAP: Record<string, string> = {
  '4': 'a',
  '@': 'a',
  '8': 'b',
  '(': 'c',
  '3': 'e',
  '6': 'g',
  '#': 'h',
  '1': 'i',
  '!': 'i',
  '0': 'o',
  $: 's',
  '5': 's',
  '7': 't',
  '+': 't',
  '2': 'z',
};

const LOWER = 'abcdefghijklmnopqrstuvwxyz';
const UPPER = LOWER.toUpperCase();
const DIGITS = '0123456789';
const SPECIAL = '!@#$%^&*()-_+=<>?';
const SEPARATORS = ['-', '.', '_', '+'];

/** Guesses per second for each attack scenario. */
const GUESS_RATES: Record<Exclude<keyof CrackTimeEstimates, 'description'>, number> = {
  online_attack: 1_000,
  offline_slow_hash: 10_000,
  offline_fast_hash: 10_000_000_000,
  gpu_cluster: 100_000_000_000,
};

const YEAR = 86_400 * 365;
// 2 ** entropy overflows to Infinity for long passwords; report those as this bound
const MAX_REPORTED_SECONDS = YEAR * 1e15;

export interface PasswordLexicon {
  commonPasswords: string[];
  commonWords: string[];
  passphraseWords: string[];
}

export interface GenerateOptions {
  length: number;
  mode: PasswordMode;
  includeUpper: boolean;
  includeLower: boolean;
  includeDigits: boolean;
  includeSpecial: boolean;
}

/** Uniform integer in [min, max). */
export type RandomInt = (min: number, max: number) => number;

const secureRandomInt: RandomInt = (min, max) => crypto.randomInt(min, max);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

const readWordList = (raw: Record<string, unknown>, key: keyof PasswordLexicon): string[] => {
  const value = raw[key];
  if (!isStringArray(value) || value.length === 0) {
    throw new ConfigurationError(`Password lexicon "${key}" must be a non-empty list of strings`);
  }
  return value.map((item) => item.toLowerCase());
};

export const parseLexicon = (raw: unknown): PasswordLexicon => {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Password lexicon must be a JSON object');
  }
  return {
    commonPasswords: readWordList(raw, 'commonPasswords'),
    commonWords: readWordList(raw, 'commonWords'),
    passphraseWords: readWordList(raw, 'passphraseWords'),
  };
};

const trigrams = (source: string): string[] => {
  const grams: string[] = [];
  for (let i = 0; i + 3 <= source.length; i++) {
    grams.push(source.slice(i, i + 3));
  }
  return grams;
};

const reverse = (value: string) => [...value].reverse().join('');

const detectWalks = (lower: string, sources: string[], label: string): string[] => {
  const found: string[] = [];
  for (const gram of sources.flatMap(trigrams)) {
    if (lower.includes(gram)) found.push(`${label}: '${gram}'`);
    const reversed = reverse(gram);
    if (lower.includes(reversed)) found.push(`Reverse ${label.toLowerCase()}: '${reversed}'`);
  }
  return found;
};

const decodeLeet = (lower: string): { decoded: string; substitutions: string[] } => {
  const substitutions: string[] = [];
  const decoded = [...lower]
    .map((char) => {
      const plain = LEET_MAP[char];
      if (plain === undefined) return char;
      substitutions.push(`'${char}' -> '${plain}'`);
      return plain;
    })
    .join('');
  return { decoded, substitutions };
};

const detectRepeats = (lower: string): string[] => {
  const found: string[] = [];
  const chars = [...lower];

  for (let i = 0; i + 2 < chars.length; i++) {
    if (chars[i] === chars[i + 1] && chars[i] === chars[i + 2]) {
      found.push(`Repeated character: '${chars[i]}' x3+`);
      break;
    }
  }

  for (let size = 2; size <= Math.floor(chars.length / 2); size++) {
    for (let i = 0; i + size * 2 <= chars.length; i++) {
      const chunk = chars.slice(i, i + size).join('');
      if (chars.slice(i + size).join('').includes(chunk)) {
        found.push(`Repeated pattern: '${chunk}'`);
        break;
      }
    }
    if (found.length > 2) break;
  }

  return found;
};

export const strengthLabel = (score: number): PasswordStrength => {
  if (score >= 90) return 'EXCELLENT';
  if (score >= 75) return 'STRONG';
  if (score >= 55) return 'MODERATE';
  if (score >= 30) return 'WEAK';
  return 'VERY WEAK';
};

export const formatCrackTime = (seconds: number): string => {
  if (!(seconds < MAX_REPORTED_SECONDS)) return 'more than 1,000,000 billion years';
  if (seconds < 0.001) return 'Instant';
  if (seconds < 1) return `${(seconds * 1000).toFixed(0)} milliseconds`;
  if (seconds < 60) return `${seconds.toFixed(0)} seconds`;
  if (seconds < 3600) return `${(seconds / 60).toFixed(0)} minutes`;
  if (seconds < 86_400) return `${(seconds / 3600).toFixed(1)} hours`;
  if (seconds < YEAR) return `${(seconds / 86_400).toFixed(0)} days`;
  if (seconds < YEAR * 1e3) return `${(seconds / YEAR).toFixed(0)} years`;
  if (seconds < YEAR * 1e6) return `${(seconds / (YEAR * 1e3)).toFixed(0)} thousand years`;
  if (seconds < YEAR * 1e9) return `${(seconds / (YEAR * 1e6)).toFixed(0)} million years`;
  return `${Math.round(seconds / (YEAR * 1e9)).toLocaleString('en-US')} billion years`;
};

const estimateCrackTime = (entropyBits: number, isCommon: boolean): CrackTimeEstimates => {
  if (isCommon) {
    return {
      online_attack: 'Instant',
      offline_slow_hash: 'Instant',
      offline_fast_hash: 'Instant',
      gpu_cluster: 'Instant',
      description: 'This password is in common password lists and would be cracked instantly',
    };
  }
  // average case: half the keyspace
  const guesses = 2 ** entropyBits / 2;
  return {
    online_attack: formatCrackTime(guesses / GUESS_RATES.online_attack),
    offline_slow_hash: formatCrackTime(guesses / GUESS_RATES.offline_slow_hash),
    offline_fast_hash: formatCrackTime(guesses / GUESS_RATES.offline_fast_hash),
    gpu_cluster: formatCrackTime(guesses / GUESS_RATES.gpu_cluster),
    description: `Based on ${entropyBits.toFixed(0)} bits of entropy`,
  };
};

const roundTo = (value: number, digits: number) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const readBoolean = (body: Record<string, unknown>, key: string): boolean => {
  const value = body[key];
  if (value === undefined) return true;
  if (typeof value !== 'boolean') {
    throw new InvalidInputError(`${key} must be a boolean`);
  }
  return value;
};

/** Reads generator options from a request body, filling in the defaults. */
export const readGenerateOptions = (body: unknown): GenerateOptions => {
  const input: Record<string, unknown> = isRecord(body) ? body : {};

  const length = input.length ?? 16;
  if (typeof length !== 'number' || !Number.isInteger(length)) {
    throw new InvalidInputError('length must be an integer');
  }
  if (length < MIN_GENERATED_LENGTH) {
    throw new InvalidInputError(`Minimum password length is ${MIN_GENERATED_LENGTH}`);
  }
  if (length > MAX_GENERATED_LENGTH) {
    throw new InvalidInputError(`Maximum password length is ${MAX_GENERATED_LENGTH}`);
  }

  const mode = input.mode ?? 'random';
  if (mode !== 'random' && mode !== 'memorable') {
    throw new InvalidInputError('mode must be "random" or "memorable"');
  }

  return {
    length,
    mode,
    includeUpper: readBoolean(input, 'include_upper'),
    includeLower: readBoolean(input, 'include_lower'),
    includeDigits: readBoolean(input, 'include_digits'),
    includeSpecial: readBoolean(input, 'include_special'),
  };
};

/**
 * Offline password strength analysis and generation.
 *
 * The analysed password is never logged or returned; only its length,
 * derived metrics and the first five characters of its SHA-1 leave this class.
 */
export class PasswordAnalyzer {
  private readonly commonPasswords: Set<string>;

  constructor(
    private readonly lexicon: PasswordLexicon,
    private readonly randomInt: RandomInt = secureRandomInt
  ) {
    this.commonPasswords = new Set(lexicon.commonPasswords);
  }

  static fromFile(lexiconPath: string, randomInt?: RandomInt): PasswordAnalyzer {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(lexiconPath, 'utf8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Cannot read password lexicon ${lexiconPath}: ${reason}`);
    }
    const lexicon = parseLexicon(raw);
    logger.info(
      `Loaded password lexicon: ${lexicon.commonPasswords.length} common passwords, ` +
        `${lexicon.passphraseWords.length} passphrase words`
    );
    return new PasswordAnalyzer(lexicon, randomInt);
  }

  analyze(password: string): PasswordCheckResult {
    const length = [...password].length;
    if (length === 0) {
      throw new InvalidInputError('Password cannot be empty');
    }
    if (length > MAX_PASSWORD_LENGTH) {
      throw new InvalidInputError(`Password too long (max ${MAX_PASSWORD_LENGTH} characters)`);
    }
    return this.evaluate(password);
  }

  generate(options: GenerateOptions): GeneratedPassword {
    const length = Math.max(MIN_GENERATED_LENGTH, Math.min(MAX_GENERATED_LENGTH, options.length));
    if (options.mode === 'memorable') {
      return this.generatePassphrase(length);
    }

    const pools = [
      options.includeLower ? LOWER : '',
      options.includeUpper ? UPPER : '',
      options.includeDigits ? DIGITS : '',
      options.includeSpecial ? SPECIAL : '',
    ].filter((pool) => pool.length > 0);

    const charset = pools.length > 0 ? pools.join('') : LOWER + UPPER + DIGITS;
    // one of each requested class, then fill from the whole set
    const chars = pools.map((pool) => this.pick(pool));
    while (chars.length < length) {
      chars.push(this.pick(charset));
    }
    const password = this.shuffle(chars).join('');

    const analysis = this.evaluate(password);
    return {
      password,
      length: password.length,
      mode: 'random',
      strength: analysis.strength,
      score: analysis.score,
      entropy_bits: analysis.entropy_bits,
      crack_time_estimates: analysis.crack_time_estimates,
    };
  }

  /** No length limit: long generated passphrases exceed {@link MAX_PASSWORD_LENGTH}. */
  private evaluate(password: string): PasswordCheckResult {
    const chars = [...password];
    const length = chars.length;

    const hasUpper = /[A-Z]/.test(password);
    const hasLower = /[a-z]/.test(password);
    const hasDigit = /[0-9]/.test(password);
    const hasSpecial = /[^A-Za-z0-9]/.test(password);
    const uniqueChars = new Set(chars).size;
    const diversity = [hasUpper, hasLower, hasDigit, hasSpecial].filter(Boolean).length;

    const charsetSize =
      (hasLower ? 26 : 0) + (hasUpper ? 26 : 0) + (hasDigit ? 10 : 0) + (hasSpecial ? 32 : 0);
    const entropyBits = roundTo(length * Math.log2(charsetSize), 1);

    const lower = password.toLowerCase();
    const isCommon = this.commonPasswords.has(lower);
    const patterns = this.detectPatterns(lower);
    if (isCommon) {
      patterns.unshift('This is a commonly used password');
    }

    const uniquenessRatio = uniqueChars / length;
    const score = isCommon
      ? Math.max(5, Math.min(15, length))
      : this.score(length, diversity, uniquenessRatio, entropyBits, patterns.length);

    const issues: string[] = [];
    if (isCommon) issues.push('This password is in the top 100 most common passwords');
    if (length < 8) {
      issues.push(`Too short (${length} chars) - minimum 8 recommended`);
    } else if (length < 12) {
      issues.push(`Short (${length} chars) - 12+ recommended for strong security`);
    }
    if (!hasUpper) issues.push('No uppercase letters');
    if (!hasLower) issues.push('No lowercase letters');
    if (!hasDigit) issues.push('No numbers');
    if (!hasSpecial) issues.push('No special characters');
    if (uniquenessRatio < 0.5) {
      issues.push('Low character diversity - too many repeated characters');
    }
    issues.push(...patterns.slice(0, 5).map((pattern) => `Pattern detected: ${pattern}`));

    logger.debug(`Analysed a ${length}-character password: score ${score}`);

    return {
      password_length: length,
      score,
      strength: strengthLabel(score),
      entropy_bits: entropyBits,
      charset_size: charsetSize,
      character_analysis: {
        has_uppercase: hasUpper,
        has_lowercase: hasLower,
        has_digits: hasDigit,
        has_special: hasSpecial,
        unique_characters: uniqueChars,
        total_length: length,
      },
      patterns_detected: patterns,
      is_common_password: isCommon,
      crack_time_estimates: estimateCrackTime(entropyBits, isCommon),
      breach_check: this.breachCheck(password, isCommon),
      issues,
      recommendations: this.recommend(
        { length, hasUpper, hasLower, hasDigit, hasSpecial },
        patterns.length > 0,
        score
      ),
      complexity_breakdown: {
        length_score: Math.min(30, length * 2),
        diversity_score: Math.min(25, diversity * 6),
        uniqueness_score: roundTo(Math.min(15, uniquenessRatio * 15), 2),
        entropy_score: roundTo(Math.min(20, entropyBits / 5), 2),
        pattern_penalty: Math.min(30, patterns.length * 8),
      },
    };
  }

  private generatePassphrase(length: number): GeneratedPassword {
    const wordCount = Math.max(4, Math.floor(length / 4));
    const words = Array.from({ length: wordCount }, () => this.pick(this.lexicon.passphraseWords));
    const capIndex = this.randomInt(0, words.length);
    words[capIndex] = words[capIndex].charAt(0).toUpperCase() + words[capIndex].slice(1);

    const separator = this.pick(SEPARATORS);
    const password = [...words, String(this.randomInt(1, 100))].join(separator);

    const analysis = this.evaluate(password);
    return {
      password,
      length: password.length,
      mode: 'memorable',
      word_count: wordCount,
      strength: analysis.strength,
      score: analysis.score,
      entropy_bits: analysis.entropy_bits,
      crack_time_estimates: analysis.crack_time_estimates,
    };
  }

  private detectPatterns(lower: string): string[] {
    const { decoded, substitutions } = decodeLeet(lower);
    const patterns = [
      ...detectWalks(lower, KEYBOARD_ROWS, 'Keyboard walk'),
      ...detectWalks(lower, SEQUENCE_SOURCES, 'Sequential pattern'),
    ];
    if (substitutions.length > 0) {
      patterns.push(`Leet speak detected: ${substitutions.slice(0, 3).join(', ')}`);
    }
    patterns.push(...detectRepeats(lower));
    for (const word of this.lexicon.commonWords) {
      if (lower.includes(word) || decoded.includes(word)) {
        patterns.push(`Common word: '${word}'`);
      }
    }
    return patterns;
  }

  private score(
    length: number,
    diversity: number,
    uniquenessRatio: number,
    entropyBits: number,
    patternCount: number
  ): number {
    let score = Math.min(30, length * 2);
    score += diversity * 6 + (diversity === 4 ? 1 : 0);
    score += Math.round(uniquenessRatio * 15);
    score += Math.min(20, entropyBits / 5);
    score -= patternCount * 8;
    if (length >= 16) {
      score += 10;
    } else if (length >= 12) {
      score += 5;
    }
    return Math.max(0, Math.min(100, Math.round(score)));
  }

  private recommend(
    traits: { length: number; hasUpper: boolean; hasLower: boolean; hasDigit: boolean; hasSpecial: boolean },
    hasPatterns: boolean,
    score: number
  ): string[] {
    if (score >= 90) {
      return ['Excellent password! Consider using a password manager to remember it.'];
    }

    const recommendations: string[] = [];
    if (traits.length < 12) {
      recommendations.push(`Increase length to at least 12 characters (currently ${traits.length})`);
    }

    const missing = [
      traits.hasUpper ? null : 'uppercase letters (A-Z)',
      traits.hasLower ? null : 'lowercase letters (a-z)',
      traits.hasDigit ? null : 'numbers (0-9)',
      traits.hasSpecial ? null : 'special characters (!@#$%)',
    ].filter((item): item is string => item !== null);
    if (missing.length > 0) {
      recommendations.push(`Add: ${missing.join(', ')}`);
    }
    if (hasPatterns) {
      recommendations.push('Avoid common patterns, sequences, and keyboard walks');
    }

    recommendations.push(
      "Consider using a passphrase: 4+ random words (e.g., 'correct horse battery staple')",
      'Use a password manager to generate and store unique passwords',
      'Never reuse passwords across different accounts'
    );
    return recommendations;
  }

  private breachCheck(password: string, isCommon: boolean): PasswordBreachCheck {
    const sha1 = crypto.createHash('sha1').update(password, 'utf8').digest('hex').toUpperCase();
    return {
      sha1_prefix: sha1.slice(0, 5),
      found_in_breach_db: isCommon,
      note: 'Checked against the local list of known breached passwords',
      recommendation: isCommon
        ? 'Change this password immediately'
        : 'Password not found in local breach database',
    };
  }

  private pick<T>(items: ArrayLike<T>): T {
    return items[this.randomInt(0, items.length)];
  }

  private shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.randomInt(0, i + 1);
      [items[i], items[j]] = [items[j], items[i]];
    }
    return items;
  }
}
