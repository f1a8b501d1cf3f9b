import nodemailer, { type Transporter } from 'nodemailer';
import type { MailConfig } from '../config';
import type { ScanResult } from '../types/scan';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'MAIL' });

export interface ScanNotifier {
  notify(email: string, result: ScanResult): Promise<void>;
}

export const formatScanReport = (result: ScanResult): string => {
  const lines = [
    `The scan results for ${result.url} are as follows:`,
    '',
    `Scan ID: ${result.scan_id}`,
    `Scanned at: ${result.scanned_at}`,
    `Overall grade: ${result.overall_grade}`,
    `Risk score: ${result.risk_score}/100 (${result.risk_level})`,
    `HTTP headers: ${result.http_grade}  SSL/TLS: ${result.ssl_grade}  DNS: ${result.dns_grade}`,
    `Issues: ${result.critical_issues_count} critical, ${result.high_issues_count} high, ` +
      `${result.medium_issues_count} medium, ${result.low_issues_count} low`,
    `OWASP Top 10: ${result.owasp.compliance_score}% compliant`,
  ];
  if (result.degraded_checks.length > 0) {
    lines.push(`Incomplete checks: ${result.degraded_checks.join(', ')}`);
  }
  if (result.recommendations.length > 0) {
    lines.push('', 'Recommendations:', ...result.recommendations.map((item) => `- ${item}`));
  }
  return lines.join('\n');
};

export class EmailScanNotifier implements ScanNotifier {
  private readonly transporter: Transporter;

  constructor(private readonly mail: MailConfig) {
    this.transporter = nodemailer.createTransport({
      service: mail.service,
      auth: {
        user: mail.user,
        pass: mail.pass,
      },
    });
  }

  async notify(email: string, result: ScanResult): Promise<void> {
    try {
      await this.transporter.sendMail({
        from: this.mail.user,
        to: email,
        subject: `Scan Results for ${result.url}`,
        text: formatScanReport(result),
      });
      logger.info(`Scan summary for ${result.scan_id} sent`);
    } catch (error) {
      logger.error(`Error sending email: ${error}`);
      throw error;
    }
  }
}
