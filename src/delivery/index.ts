/**
 * GrantRadar — Delivery Module
 *
 * Text report, CSV export and email digest of scan results.
 */

export {
  summarizeScan,
  renderScanReport,
  HIGH_RELEVANCE_MIN,
  MEDIUM_RELEVANCE_MIN,
  type ScanSummary,
  type SectorCount,
} from './report';

export {
  opportunitiesToCsv,
  exportScanResults,
  formatTimestamp,
  CSV_COLUMNS,
  DEFAULT_HIGH_PRIORITY_MIN,
  type CsvExportOptions,
  type CsvExportResult,
} from './export';

export {
  sendEmail,
  buildDigestEmail,
  sendOpportunityDigest,
  renderDigestHtml,
  renderDigestText,
  digestSubject,
  formatDigestDate,
  DEFAULT_DIGEST_MIN_SCORE,
  type EmailConfig,
  type EmailRecipient,
  type EmailMessage,
  type EmailAttachment,
  type EmailResult,
  type DigestOptions,
} from './email';
