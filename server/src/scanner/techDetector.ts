import type { Finding } from '../types/scan';
import type { HeaderMap } from './headersCheck';

export type TechnologyKind = 'server' | 'cdn' | 'framework';

interface HeaderSignature {
  name: string;
  header: string;
  pattern: RegExp;
  kind: TechnologyKind;
}

const HEADER_SIGNATURES: readonly HeaderSignature[] = [
  { name: 'Apache', header: 'server', pattern: /apache/i, kind: 'server' },
  { name: 'Nginx', header: 'server', pattern: /nginx/i, kind: 'server' },
  { name: 'IIS', header: 'server', pattern: /microsoft-iis/i, kind: 'server' },
  { name: 'LiteSpeed', header: 'server', pattern: /litespeed/i, kind: 'server' },
  { name: 'Cloudflare', header: 'server', pattern: /cloudflare/i, kind: 'cdn' },
  { name: 'Akamai', header: 'server', pattern: /akamaighost/i, kind: 'cdn' },
  { name: 'Varnish', header: 'via', pattern: /varnish/i, kind: 'cdn' },
  { name: 'Django', header: 'server', pattern: /wsgiserver/i, kind: 'framework' },
  { name: 'Express', header: 'x-powered-by', pattern: /express/i, kind: 'framework' },
  { name: 'ASP.NET', header: 'x-powered-by', pattern: /asp\.net/i, kind: 'framework' },
];

const SECURITY_TECHNOLOGY_HEADERS = [
  'Strict-Transport-Security',
  'Content-Security-Policy',
  'X-Frame-Options',
  'X-Content-Type-Options',
];

/** What the response headers give away about the stack behind a site. */
export interface TechnologyReport {
  web_server: string | null;
  web_server_version: string | null;
  programming_languages: string[];
  frameworks: string[];
  cdn: string | null;
  security_technologies: string[];
}

export const detectTechnologies = (headers: HeaderMap): TechnologyReport => {
  const report: TechnologyReport = {
    web_server: null,
    web_server_version: null,
    programming_languages: [],
    frameworks: [],
    cdn: null,
    security_technologies: [],
  };

  const server = headers['server'] ?? '';
  const serverMatch = /^([A-Za-z0-9-]+)(?:\/([0-9.]+))?/.exec(server);
  if (serverMatch) {
    report.web_server = serverMatch[1];
    report.web_server_version = serverMatch[2] ?? null;
  }

  const poweredBy = headers['x-powered-by'] ?? '';
  const php = /PHP(?:\/([0-9.]+))?/i.exec(poweredBy);
  if (php) report.programming_languages.push(php[1] ? `PHP ${php[1]}` : 'PHP');
  if (/asp\.net/i.test(poweredBy)) report.programming_languages.push('ASP.NET');

  for (const signature of HEADER_SIGNATURES) {
    if (!signature.pattern.test(headers[signature.header] ?? '')) continue;
    if (signature.kind === 'server') report.web_server = report.web_server ?? signature.name;
    else if (signature.kind === 'cdn') report.cdn = signature.name;
    else if (!report.frameworks.includes(signature.name)) report.frameworks.push(signature.name);
  }

  report.security_technologies = SECURITY_TECHNOLOGY_HEADERS.filter(
    (name) => headers[name.toLowerCase()] !== undefined
  );
  return report;
};

/** Version disclosures and end-of-life runtimes, as HTTP findings. */
export const technologyFindings = (report: TechnologyReport): Finding[] => {
  const findings: Finding[] = [];

  if (report.web_server && report.web_server_version) {
    findings.push({
      dimension: 'http',
      severity: 'LOW',
      issue: `Server version disclosed: ${report.web_server}/${report.web_server_version}`,
      recommendation: 'Remove or mask the server version in HTTP headers',
    });
  }

  for (const language of report.programming_languages) {
    if (!/\d/.test(language)) continue;
    findings.push({
      dimension: 'http',
      severity: 'LOW',
      issue: `Programming language version disclosed: ${language}`,
      recommendation: 'Remove the X-Powered-By header',
    });
    if (/^PHP 5\./.test(language)) {
      findings.push({
        dimension: 'http',
        severity: 'HIGH',
        issue: 'PHP 5 is end-of-life and unsupported',
        recommendation: 'Upgrade to a supported PHP release',
      });
    }
  }

  return findings;
};
