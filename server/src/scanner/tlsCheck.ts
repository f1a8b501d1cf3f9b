import tls, { type ConnectionOptions } from 'tls';
import { isIP } from 'net';
import { differenceInCalendarDays, isValid } from 'date-fns';
import { gradeFromScore } from '../domain/riskEngine';
import type { CheckResult, Finding } from '../types/scan';

export interface TlsInfo {
  authorized: boolean;
  authorizationError: string | null;
  protocol: string | null;
  cipher: string | null;
  subject: string | null;
  issuer: string | null;
  validFrom: Date | null;
  validTo: Date | null;
}

export type TlsInspector = (host: string, port: number, timeoutMs: number) => Promise<TlsInfo>;

const INSECURE_PROTOCOLS = ['SSLv2', 'SSLv3', 'TLSv1', 'TLSv1.1'];
const EXPIRY_WARNING_DAYS = 30;

export const evaluatePlainHttp = (): CheckResult => ({
  dimension: 'ssl',
  grade: 'F',
  score: 0,
  riskPoints: 100,
  findings: [
    {
      dimension: 'ssl',
      severity: 'CRITICAL',
      issue: 'Website does not use HTTPS',
      recommendation: 'Enable HTTPS with a certificate from a trusted CA',
    },
  ],
  degraded: false,
  error: null,
  details: { https: false },
});

export const evaluateTls = (info: TlsInfo, now: Date): CheckResult => {
  const findings: Finding[] = [];
  let riskPoints = 0;

  const daysUntilExpiry = info.validTo ? differenceInCalendarDays(info.validTo, now) : null;
  const expired = daysUntilExpiry !== null && daysUntilExpiry < 0;

  // an expired certificate is reported once, by the expiry check below
  if (!info.authorized && !(expired && info.authorizationError === 'CERT_HAS_EXPIRED')) {
    riskPoints += 20;
    findings.push({
      dimension: 'ssl',
      severity: 'CRITICAL',
      issue: `Certificate validation failed: ${info.authorizationError ?? 'untrusted certificate'}`,
      recommendation: 'Install a valid certificate from a trusted CA',
    });
  }

  if (expired) {
    riskPoints += 20;
    findings.push({
      dimension: 'ssl',
      severity: 'CRITICAL',
      issue: 'Certificate has expired',
      recommendation: 'Renew the certificate immediately',
    });
  } else if (daysUntilExpiry !== null && daysUntilExpiry < EXPIRY_WARNING_DAYS) {
    riskPoints += 5;
    findings.push({
      dimension: 'ssl',
      severity: 'HIGH',
      issue: `Certificate expires in ${daysUntilExpiry} days`,
      recommendation: 'Renew the certificate before it expires',
    });
  }

  if (info.protocol && INSECURE_PROTOCOLS.includes(info.protocol)) {
    riskPoints += 20;
    findings.push({
      dimension: 'ssl',
      severity: 'HIGH',
      issue: `Using insecure protocol: ${info.protocol}`,
      recommendation: 'Disable legacy protocols and serve TLS 1.2 or TLS 1.3 only',
    });
  }

  const cipher = info.cipher ?? '';
  if (/RC4|MD5|NULL/.test(cipher)) {
    riskPoints += 15;
    findings.push({
      dimension: 'ssl',
      severity: 'CRITICAL',
      issue: `Weak cipher suite negotiated: ${cipher}`,
      recommendation: 'Disable weak ciphers and prefer AES-GCM or ChaCha20',
    });
  } else if (cipher.includes('CBC')) {
    riskPoints += 5;
    findings.push({
      dimension: 'ssl',
      severity: 'MEDIUM',
      issue: `CBC mode cipher negotiated: ${cipher}`,
      recommendation: 'Prefer AEAD cipher suites such as AES-GCM',
    });
  }

  riskPoints = Math.min(riskPoints, 100);
  const score = 100 - riskPoints;

  return {
    dimension: 'ssl',
    grade: gradeFromScore(score, [95, 85, 70, 50]),
    score,
    riskPoints,
    findings,
    degraded: false,
    error: null,
    details: {
      https: true,
      protocol: info.protocol,
      cipher: info.cipher,
      subject: info.subject,
      issuer: info.issuer,
      valid_from: info.validFrom?.toISOString() ?? null,
      valid_until: info.validTo?.toISOString() ?? null,
      days_until_expiry: daysUntilExpiry,
    },
  };
};

const certDate = (value: string | undefined): Date | null => {
  if (!value) return null;
  const date = new Date(value);
  return isValid(date) ? date : null;
};

const firstValue = (value: string | string[] | undefined): string | null => {
  if (value === undefined) return null;
  return Array.isArray(value) ? value[0] ?? null : value;
};

/** SNI is only sent for host names; IP literals are not valid server names. */
export const tlsConnectOptions = (host: string, port: number, timeoutMs: number): ConnectionOptions => ({
  host,
  port,
  ...(isIP(host) === 0 ? { servername: host } : {}),
  rejectUnauthorized: false,
  timeout: timeoutMs,
});

/**
 * Completes one handshake and reports what was negotiated. Untrusted
 * certificates are accepted so they can be graded instead of failing.
 */
export const inspectTls: TlsInspector = (host, port, timeoutMs) =>
  new Promise<TlsInfo>((resolve, reject) => {
    const socket = tls.connect(tlsConnectOptions(host, port, timeoutMs));

    socket.once('secureConnect', () => {
      const cert = socket.getPeerCertificate();
      const authorizationError = socket.authorizationError;
      resolve({
        authorized: socket.authorized,
        authorizationError: authorizationError ? String(authorizationError) : null,
        protocol: socket.getProtocol(),
        cipher: socket.getCipher()?.name ?? null,
        subject: firstValue(cert.subject?.CN),
        issuer: firstValue(cert.issuer?.O),
        validFrom: certDate(cert.valid_from),
        validTo: certDate(cert.valid_to),
      });
      socket.end();
    });
    socket.once('timeout', () => {
      socket.destroy();
      reject(Object.assign(new Error(`TLS handshake timed out after ${timeoutMs}ms`), { code: 'ETIMEDOUT' }));
    });
    socket.once('error', reject);
  });
