import type { CaaRecord, MxRecord } from 'dns';
import type { DnsLookup } from '../scanner/dnsCheck';
import type { HeaderMap } from '../scanner/headersCheck';
import type { TlsInfo } from '../scanner/tlsCheck';
import type { WebsiteScannerDeps } from '../scanner/websiteScanner';
import type { CheckReport, OwaspAssessment } from '../types/scan';

export const IDEAL_HEADERS: HeaderMap = {
  'strict-transport-security': 'max-age=31536000; includeSubDomains; preload',
  'content-security-policy': "default-src 'self'",
  'x-frame-options': 'DENY',
  'x-content-type-options': 'nosniff',
  'referrer-policy': 'no-referrer',
  'permissions-policy': 'geolocation=()',
  'cross-origin-opener-policy': 'same-origin',
  'x-permitted-cross-domain-policies': 'none',
};

export const GOOD_TLS: TlsInfo = {
  authorized: true,
  authorizationError: null,
  protocol: 'TLSv1.3',
  cipher: 'TLS_AES_256_GCM_SHA384',
  subject: 'secure.example.com',
  issuer: 'Example Test CA',
  validFrom: new Date('2025-01-01T00:00:00Z'),
  validTo: new Date('2030-01-01T00:00:00Z'),
};

export const dnsError = (code: string) =>
  Object.assign(new Error(`query ${code}`), { code });

export interface FakeZone {
  txt?: Record<string, string[][]>;
  caa?: Record<string, CaaRecord[]>;
  mx?: Record<string, MxRecord[]>;
  /** Names that publish a DNSKEY set. */
  dnskey?: string[];
}

/** In-process resolver answering from a fixed zone; unknown names are ENODATA. */
export const fakeDns = (zone: FakeZone): DnsLookup => {
  const answer = async <T>(records: Record<string, T[]> | undefined, name: string): Promise<T[]> => {
    const found = records?.[name];
    if (!found) throw dnsError('ENODATA');
    return found;
  };
  return {
    resolveTxt: (name) => answer(zone.txt, name),
    resolveCaa: (name) => answer(zone.caa, name),
    resolveMx: (name) => answer(zone.mx, name),
    hasDnskey: async (name) => zone.dnskey?.includes(name) ?? false,
  };
};

export const HARDENED_ZONE: FakeZone = {
  txt: {
    'secure.example.com': [['v=spf1 mx -all']],
    '_dmarc.secure.example.com': [['v=DMARC1; p=reject']],
    'selector1._domainkey.secure.example.com': [['v=DKIM1; k=rsa; p=dGVzdC1rZXk=']],
  },
  caa: { 'secure.example.com': [{ critical: 0, issue: 'ca.example.net' }] },
  mx: { 'secure.example.com': [{ priority: 10, exchange: 'mail.secure.example.com' }] },
  dnskey: ['secure.example.com'],
};

export const FIXED_NOW = new Date('2026-01-01T00:00:00Z');

/** Scanner wired to in-process fakes describing a fully hardened site. */
export const hardenedScannerDeps = (
  overrides: Partial<WebsiteScannerDeps> = {}
): WebsiteScannerDeps => ({
  fetchHeaders: async () => IDEAL_HEADERS,
  inspectTls: async () => GOOD_TLS,
  dns: fakeDns(HARDENED_ZONE),
  resolveHost: async () => ({ address: '192.0.2.10', family: 4 }),
  timeoutMs: 1000,
  now: () => FIXED_NOW,
  ...overrides,
});

export const checkReport = (overrides: Partial<CheckReport> = {}): CheckReport => ({
  grade: 'A',
  score: 100,
  risk_points: 0,
  degraded: false,
  error: null,
  details: {},
  ...overrides,
});

export const BLANK_OWASP: OwaspAssessment = {
  compliance_score: 100,
  verdict: 'EXCELLENT - Strong OWASP Top 10 compliance',
  compliant_categories: [],
  non_compliant_categories: [],
  categories: [],
  priority_actions: [],
};
