/**
 * GrantRadar — Email Delivery
 *
 * Sends the opportunity digest through Resend, SendGrid or the console.
 * Sending never throws; failures come back as `{ success: false, error }`.
 */

import { z } from 'zod';
import { logger, errorMessage } from '../lib/logger';
import { loadEmailSettings, type EmailSettings } from '../lib/config';
import type { InterestProfile, OpportunityRecord } from '../types';
import { formatTimestamp, opportunitiesToCsv } from './export';

// ============================================================
// TYPES
// ============================================================

export type EmailConfig = EmailSettings;

export interface EmailRecipient {
  email: string;
  name?: string;
}

export interface EmailAttachment {
  filename: string;
  content: string;
  contentType: string;
}

export interface EmailMessage {
  to: EmailRecipient[];
  subject: string;
  text: string;
  html?: string;
  attachments?: EmailAttachment[];
}

export interface EmailResult {
  success: boolean;
  messageId?: string;
  error?: string;
  /** Nothing to send */
  skipped?: boolean;
  recipients: string[];
  sentAt: string;
}

// ============================================================
// EMAIL PROVIDERS
// ============================================================

type HttpProviderName = Exclude<EmailConfig['provider'], 'console'>;

interface EncodedAttachment {
  filename: string;
  /** base64 */
  content: string;
  contentType: string;
}

/**
 * One JSON-over-HTTPS mail API. Both supported providers take a bearer
 * key and differ only in payload shape and where the message id comes back.
 */
interface HttpProvider {
  label: string;
  endpoint: string;
  keyVariable: string;
  apiKey(config: EmailConfig): string | undefined;
  payload(config: EmailConfig, message: EmailMessage, attachments: EncodedAttachment[]): unknown;
  messageId(res: Response): Promise<string | undefined>;
}

const ResendResponseSchema = z.object({ id: z.string() });

const HTTP_PROVIDERS: Record<HttpProviderName, HttpProvider> = {
  resend: {
    label: 'Resend',
    endpoint: 'https://api.resend.com/emails',
    keyVariable: 'RESEND_API_KEY',
    apiKey: config => config.resendApiKey,
    payload: (config, message, attachments) => ({
      from: config.from,
      to: message.to.map(r => r.email),
      subject: message.subject,
      text: message.text,
      html: message.html,
      reply_to: config.replyTo,
      attachments: attachments.map(({ filename, content }) => ({ filename, content })),
    }),
    messageId: async res => ResendResponseSchema.parse(await res.json()).id,
  },
  sendgrid: {
    label: 'SendGrid',
    endpoint: 'https://api.sendgrid.com/v3/mail/send',
    keyVariable: 'SENDGRID_API_KEY',
    apiKey: config => config.sendgridApiKey,
    payload: (config, message, attachments) => ({
      personalizations: [{ to: message.to.map(r => ({ email: r.email, name: r.name })) }],
      from: { email: config.from },
      reply_to: config.replyTo ? { email: config.replyTo } : undefined,
      subject: message.subject,
      content: [
        { type: 'text/plain', value: message.text },
        ...(message.html ? [{ type: 'text/html', value: message.html }] : []),
      ],
      attachments: attachments.map(a => ({
        filename: a.filename,
        content: a.content,
        type: a.contentType,
        disposition: 'attachment',
      })),
    }),
    // SendGrid answers 202 with an empty body
    messageId: async res => res.headers.get('x-message-id') ?? undefined,
  },
};

async function postToProvider(
  provider: HttpProvider,
  config: EmailConfig,
  message: EmailMessage
): Promise<string | undefined> {
  const apiKey = provider.apiKey(config);
  if (!apiKey) {
    throw new Error(`${provider.keyVariable} not configured`);
  }

  const attachments = (message.attachments ?? []).map(a => ({
    ...a,
    content: Buffer.from(a.content).toString('base64'),
  }));

  const res = await fetch(provider.endpoint, {
    method: 'POST',
    headers: {
      'Authorization': `Bearer ${apiKey}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify(provider.payload(config, message, attachments)),
  });

  if (!res.ok) {
    throw new Error(`${provider.label} API error: ${res.status} - ${await res.text()}`);
  }

  return provider.messageId(res);
}

/**
 * Local runs: print the message instead of sending it.
 */
function printToConsole(message: EmailMessage): string {
  const lines = [
    '='.repeat(60),
    `To: ${message.to.map(r => r.email).join(', ')}`,
    `Subject: ${message.subject}`,
    ...(message.attachments ?? []).map(
      a => `Attachment: ${a.filename} (${a.content.length} bytes)`
    ),
    '-'.repeat(40),
    message.text,
    '='.repeat(60),
  ];
  console.log(lines.join('\n'));

  return `console-${Date.now()}`;
}

// ============================================================
// SEND FUNCTION
// ============================================================

/**
 * Send an email message. Missing config fields come from the environment.
 */
export async function sendEmail(
  message: EmailMessage,
  config?: Partial<EmailConfig>
): Promise<EmailResult> {
  const recipients = message.to.map(r => r.email);

  try {
    const settings: EmailConfig = { ...loadEmailSettings(), ...config };
    const log = logger.child({ provider: settings.provider });
    log.info('Sending email', { recipients: recipients.length, subject: message.subject });

    const messageId =
      settings.provider === 'console'
        ? printToConsole(message)
        : await postToProvider(HTTP_PROVIDERS[settings.provider], settings, message);

    log.info('Email sent', { messageId });
    return { success: true, messageId, recipients, sentAt: new Date().toISOString() };
  } catch (error) {
    const errorMsg = errorMessage(error);
    logger.error('Email send failed', { error: errorMsg });

    return { success: false, error: errorMsg, recipients, sentAt: new Date().toISOString() };
  }
}

// ============================================================
// DIGEST
// ============================================================

export interface DigestOptions {
  /** Minimum relevance for the top-matches section */
  minScore?: number;
  profile?: Pick<InterestProfile, 'country' | 'sectors'>;
  date?: Date;
}

export const DEFAULT_DIGEST_MIN_SCORE = 7;
const MAX_DEADLINE_ITEMS = 5;
const MAX_TOP_ITEMS = 10;

/**
 * "Oct 19, 2026"
 */
export function formatDigestDate(date: Date): string {
  return date.toLocaleDateString('en-US', {
    month: 'short',
    day: 'numeric',
    year: 'numeric',
    timeZone: 'UTC',
  });
}

export function digestSubject(count: number, date: Date): string {
  return `[GrantRadar] ${count} New Donor Opportunities — ${formatDigestDate(date)}`;
}

function titleCase(value: string): string {
  return value.replace(/\b\w/g, c => c.toUpperCase());
}

function renderItemHtml(record: OpportunityRecord): string {
  const meta = [
    escapeHtml(record.sourceName),
    `score ${record.relevanceScore.toFixed(1)}`,
    ...(record.deadline ? [`deadline ${escapeHtml(record.deadline)}`] : []),
    ...(record.amount ? [escapeHtml(record.amount)] : []),
  ];

  return `
    <div class="opportunity">
      <h3><a href="${escapeHtml(record.url)}">${escapeHtml(record.title)}</a></h3>
      <p class="meta">${meta.join(' | ')}</p>
      <p>${escapeHtml(record.sectors.join(', '))}</p>
    </div>`;
}

function renderItemText(record: OpportunityRecord): string {
  const details = [record.sourceName, `score ${record.relevanceScore.toFixed(1)}`];
  if (record.deadline) details.push(`deadline ${record.deadline}`);
  if (record.amount) details.push(record.amount);
  return `- ${record.title}\n  ${details.join(' | ')}\n  ${record.url}`;
}

const EMAIL_STYLES = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Arial, sans-serif; line-height: 1.6; color: #333; max-width: 700px; margin: 0 auto; padding: 20px; }
  .header { background: #14532d; color: white; padding: 24px; border-radius: 8px 8px 0 0; }
  .header h1 { margin: 0; font-size: 22px; }
  .content { background: #fff; border: 1px solid #e1e5eb; border-top: none; padding: 24px; border-radius: 0 0 8px 8px; }
  .opportunity { background: #f8fafc; border-left: 4px solid #16a34a; padding: 12px 15px; margin: 12px 0; border-radius: 0 8px 8px 0; }
  .opportunity h3 { margin: 0 0 6px 0; font-size: 16px; }
  .opportunity p { margin: 0; color: #475569; font-size: 14px; }
  .meta { color: #64748b; }
  .footer { text-align: center; padding: 20px; color: #64748b; font-size: 12px; }
`;

export function renderDigestHtml(
  records: OpportunityRecord[],
  options: DigestOptions = {}
): string {
  const minScore = options.minScore ?? DEFAULT_DIGEST_MIN_SCORE;
  const withDeadline = records.filter(r => r.deadline !== null).slice(0, MAX_DEADLINE_ITEMS);
  const top = records.filter(r => r.relevanceScore >= minScore).slice(0, MAX_TOP_ITEMS);
  const remaining = records.length - top.length;
  const profileLine = options.profile
    ? `<p>Profile: <strong>${escapeHtml(titleCase(options.profile.country))}</strong> | ${escapeHtml(options.profile.sectors.join(', '))}</p>`
    : '';

  return `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Donor Opportunities</title>
  <style>${EMAIL_STYLES}</style>
</head>
<body>
  <div class="header">
    <h1>${records.length} New Donor Opportunities</h1>
  </div>

  <div class="content">
    ${profileLine}
    <p>${records.filter(r => r.isDomainMatch).length} domain matches, ${records.filter(r => r.deadline !== null).length} with deadlines.</p>

    ${withDeadline.length > 0 ? `
    <h2>Upcoming Deadlines</h2>
    ${withDeadline.map(renderItemHtml).join('')}
    ` : ''}

    ${top.length > 0 ? `
    <h2>Top Matches (score ${minScore}+)</h2>
    ${top.map(renderItemHtml).join('')}
    ` : ''}

    ${remaining > 0 ? `
    <p style="text-align: center; color: #64748b;">
      + ${remaining} more opportunities in the attached CSV
    </p>
    ` : ''}
  </div>

  <div class="footer">
    <p>Automated donor opportunity digest.</p>
  </div>
</body>
</html>
`;
}

export function renderDigestText(
  records: OpportunityRecord[],
  options: DigestOptions = {}
): string {
  const minScore = options.minScore ?? DEFAULT_DIGEST_MIN_SCORE;
  const withDeadline = records.filter(r => r.deadline !== null).slice(0, MAX_DEADLINE_ITEMS);
  const top = records.filter(r => r.relevanceScore >= minScore).slice(0, MAX_TOP_ITEMS);
  const remaining = records.length - top.length;

  const lines = [`${records.length} new donor opportunities`];
  if (options.profile) {
    lines.push(`Profile: ${options.profile.country} | ${options.profile.sectors.join(', ')}`);
  }
  if (withDeadline.length > 0) {
    lines.push('', 'UPCOMING DEADLINES', ...withDeadline.map(renderItemText));
  }
  if (top.length > 0) {
    lines.push('', `TOP MATCHES (score ${minScore}+)`, ...top.map(renderItemText));
  }
  if (remaining > 0) {
    lines.push('', `+ ${remaining} more opportunities in the attached CSV`);
  }
  return lines.join('\n');
}

/**
 * Digest message with the full list attached as CSV.
 */
export function buildDigestEmail(
  records: OpportunityRecord[],
  recipients: EmailRecipient[],
  options: DigestOptions = {}
): EmailMessage {
  const date = options.date ?? new Date();

  return {
    to: recipients,
    subject: digestSubject(records.length, date),
    text: renderDigestText(records, options),
    html: renderDigestHtml(records, options),
    attachments: [
      {
        filename: `donor_opportunities_${formatTimestamp(date)}.csv`,
        content: opportunitiesToCsv(records),
        contentType: 'text/csv',
      },
    ],
  };
}

/**
 * Build and send the digest. Skips when there is nothing new.
 */
export async function sendOpportunityDigest(
  records: OpportunityRecord[],
  recipients: EmailRecipient[],
  options: DigestOptions & { config?: Partial<EmailConfig> } = {}
): Promise<EmailResult> {
  const emails = recipients.map(r => r.email);

  if (records.length === 0) {
    logger.info('No opportunities to send, skipping digest');
    return { success: true, skipped: true, recipients: emails, sentAt: new Date().toISOString() };
  }

  if (recipients.length === 0) {
    logger.warn('Digest has no recipients');
    return {
      success: false,
      error: 'No recipients configured',
      recipients: emails,
      sentAt: new Date().toISOString(),
    };
  }

  const { config, ...digestOptions } = options;
  return sendEmail(buildDigestEmail(records, recipients, digestOptions), config);
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}
