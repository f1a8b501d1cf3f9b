import { Resolver } from 'dns/promises';
import type { CaaRecord, MxRecord } from 'dns';
import { gradeFromScore } from '../domain/riskEngine';
import { hasErrorCode } from '../errors/AppError';
import type { CheckResult, Finding } from '../types/scan';
import { createLogger, errorMessage } from '../utils/logger';
import { parseDnsServer, queryDnskey } from './dnskeyQuery';

const logger = createLogger({ component: 'DNS' });

/** Subset of the node resolver the DNS check needs, plus a DNSKEY query. */
export interface DnsLookup {
  resolveTxt(hostname: string): Promise<string[][]>;
  resolveCaa(hostname: string): Promise<CaaRecord[]>;
  resolveMx(hostname: string): Promise<MxRecord[]>;
  hasDnskey(hostname: string): Promise<boolean>;
}

export interface DnsRecords {
  domain: string;
  spf: string | null;
  dmarc: string | null;
  /** Selectors from DKIM_SELECTORS that publish a key. */
  dkim: string[];
  /** null when the DNSKEY query itself failed. */
  dnssec: boolean | null;
  caa: CaaRecord[];
  mx: string[];
}

export const DKIM_SELECTORS = ['default', 'google', 'selector1', 'selector2', 'k1'] as const;

// "no such record" answers; anything else means the lookup itself failed
const ABSENT_CODES = new Set(['ENODATA', 'ENOTFOUND', 'NOTFOUND', 'ENONAME']);

const orEmpty = async <T>(lookup: Promise<T[]>): Promise<T[]> => {
  try {
    return await lookup;
  } catch (err) {
    if (hasErrorCode(err) && ABSENT_CODES.has(err.code)) return [];
    throw err;
  }
};

const joinTxt = (records: string[][]) => records.map((chunks) => chunks.join(''));

const isDkimKey = (record: string) => record.startsWith('v=DKIM1') || /(^|;)\s*p=/.test(record);

export const mailDomain = (hostname: string) =>
  hostname.startsWith('www.') ? hostname.slice(4) : hostname;

const dkimSelectors = async (resolver: DnsLookup, domain: string): Promise<string[]> => {
  const answers = await Promise.all(
    DKIM_SELECTORS.map((selector) => orEmpty(resolver.resolveTxt(`${selector}._domainkey.${domain}`)))
  );
  return DKIM_SELECTORS.filter((_, index) => joinTxt(answers[index]).some(isDkimKey));
};

const dnssecEnabled = async (resolver: DnsLookup, domain: string): Promise<boolean | null> => {
  try {
    return await resolver.hasDnskey(domain);
  } catch (err) {
    logger.warn(`DNSKEY query for ${domain} failed: ${errorMessage(err)}`);
    return null;
  }
};

export const lookupDnsRecords = async (
  resolver: DnsLookup,
  hostname: string
): Promise<DnsRecords> => {
  const domain = mailDomain(hostname);
  const [txt, dmarcTxt, dkim, dnssec, caa, mx] = await Promise.all([
    orEmpty(resolver.resolveTxt(domain)),
    orEmpty(resolver.resolveTxt(`_dmarc.${domain}`)),
    dkimSelectors(resolver, domain),
    dnssecEnabled(resolver, domain),
    orEmpty(resolver.resolveCaa(domain)),
    orEmpty(resolver.resolveMx(domain)),
  ]);

  return {
    domain,
    spf: joinTxt(txt).find((record) => record.startsWith('v=spf1')) ?? null,
    dmarc: joinTxt(dmarcTxt).find((record) => record.startsWith('v=DMARC1')) ?? null,
    dkim,
    dnssec,
    caa,
    mx: mx.map((record) => record.exchange),
  };
};

const dmarcPolicy = (record: string): string | null => {
  for (const part of record.split(';')) {
    const [key, value] = part.split('=').map((item) => item.trim());
    if (key === 'p' && value) return value.toLowerCase();
  }
  return null;
};

export const evaluateDns = (records: DnsRecords): CheckResult => {
  const findings: Finding[] = [];
  let riskPoints = 0;

  if (!records.spf) {
    riskPoints += 8;
    findings.push({
      dimension: 'dns',
      severity: 'HIGH',
      issue: 'No SPF record configured',
      recommendation: "Add an SPF TXT record such as 'v=spf1 mx -all'",
    });
  } else if (/[+?]all\b/.test(records.spf)) {
    riskPoints += 12;
    findings.push({
      dimension: 'dns',
      severity: 'HIGH',
      issue: 'SPF record is too permissive',
      recommendation: 'Replace +all or ?all with -all or ~all',
    });
  }

  const policy = records.dmarc ? dmarcPolicy(records.dmarc) : null;
  if (!records.dmarc) {
    riskPoints += 8;
    findings.push({
      dimension: 'dns',
      severity: 'HIGH',
      issue: 'No DMARC record configured',
      recommendation: `Add a DMARC TXT record at _dmarc.${records.domain} with p=quarantine or p=reject`,
    });
  } else if (policy === 'none') {
    riskPoints += 5;
    findings.push({
      dimension: 'dns',
      severity: 'MEDIUM',
      issue: "DMARC policy is 'none' (monitoring only)",
      recommendation: 'Raise the DMARC policy to p=quarantine or p=reject',
    });
  }

  if (records.dkim.length === 0) {
    riskPoints += 5;
    findings.push({
      dimension: 'dns',
      severity: 'MEDIUM',
      issue: 'No DKIM record found',
      recommendation: `Publish a DKIM public key (selectors checked: ${DKIM_SELECTORS.join(', ')})`,
    });
  }

  if (records.dnssec === false) {
    riskPoints += 10;
    findings.push({
      dimension: 'dns',
      severity: 'MEDIUM',
      issue: 'DNSSEC not enabled',
      recommendation: 'Enable DNSSEC at your domain registrar',
    });
  }

  if (records.caa.length === 0) {
    riskPoints += 4;
    findings.push({
      dimension: 'dns',
      severity: 'LOW',
      issue: 'No CAA record',
      recommendation: 'Add a CAA record naming the certificate authorities allowed to issue for the domain',
    });
  }

  riskPoints = Math.min(riskPoints, 100);
  const score = 100 - riskPoints;

  return {
    dimension: 'dns',
    grade: gradeFromScore(score, [90, 80, 70, 60]),
    score,
    riskPoints,
    findings,
    degraded: false,
    error: null,
    details: {
      domain: records.domain,
      spf: records.spf,
      dmarc: records.dmarc,
      dmarc_policy: policy,
      dkim_selectors: records.dkim,
      dnssec: records.dnssec,
      caa: records.caa,
      mx: records.mx,
    },
  };
};

export const createDnsLookup = (timeoutMs: number): DnsLookup => {
  const resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
  return {
    resolveTxt: (hostname) => resolver.resolveTxt(hostname),
    resolveCaa: (hostname) => resolver.resolveCaa(hostname),
    resolveMx: (hostname) => resolver.resolveMx(hostname),
    hasDnskey: async (hostname) => {
      const [server] = resolver.getServers();
      if (!server) throw new Error('No DNS server configured');
      return queryDnskey(hostname, parseDnsServer(server), timeoutMs);
    },
  };
};
