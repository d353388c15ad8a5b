/**
 * Tests for Email Delivery
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  sendEmail,
  buildDigestEmail,
  sendOpportunityDigest,
  digestSubject,
  formatDigestDate,
} from '../../src/delivery/email';
import { makeRecord } from '../fixtures/records';

// Mock fetch for API calls
const mockFetch = vi.fn();
global.fetch = mockFetch;

const DATE = new Date(Date.UTC(2026, 9, 19, 12, 0));
const recipients = [{ email: 'team@example.org' }];

describe('Email Delivery', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubEnv('EMAIL_PROVIDER', 'console');
    vi.stubEnv('RESEND_API_KEY', '');
    vi.stubEnv('SENDGRID_API_KEY', '');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('sendEmail', () => {
    it('should send via console provider by default', async () => {
      const result = await sendEmail({
        to: recipients,
        subject: 'Test Email',
        text: 'Test content',
      });

      expect(result.success).toBe(true);
      expect(result.messageId).toContain('console-');
      expect(result.recipients).toEqual(['team@example.org']);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should send via Resend when configured', async () => {
      mockFetch.mockResolvedValueOnce({
        ok: true,
        json: async () => ({ id: 'resend-msg-123' }),
      });

      const result = await sendEmail(
        {
          to: recipients,
          subject: 'Test Email',
          text: 'Test content',
          attachments: [{ filename: 'a.csv', content: 'a,b', contentType: 'text/csv' }],
        },
        { provider: 'resend', from: 'sender@example.org', resendApiKey: 'test-secret' }
      );

      expect(result.success).toBe(true);
      expect(result.messageId).toBe('resend-msg-123');
      expect(mockFetch).toHaveBeenCalledWith(
        'https://api.resend.com/emails',
        expect.objectContaining({
          method: 'POST',
          headers: expect.objectContaining({ 'Authorization': 'Bearer test-secret' }),
        })
      );

      const body = JSON.parse(mockFetch.mock.calls[0][1].body);
      expect(body.attachments).toEqual([
        { filename: 'a.csv', content: Buffer.from('a,b').toString('base64') },
      ]);
    });

    it('should handle Resend API errors', async () => {
      mockFetch.mockResolvedValueOnce({
        ok: false,
        status: 401,
        text: async () => 'Invalid API key',
      });

      const result = await sendEmail(
        { to: recipients, subject: 'Test Email', text: 'Test content' },
        { provider: 'resend', from: 'sender@example.org', resendApiKey: 'test-secret' }
      );

      expect(result.success).toBe(false);
      expect(result.error).toBe('Resend API error: 401 - Invalid API key');
    });

    it('should fail when the Resend key is missing', async () => {
      const result = await sendEmail(
        { to: recipients, subject: 'Test Email', text: 'Test content' },
        { provider: 'resend', from: 'sender@example.org' }
      );

      expect(result.success).toBe(false);
      expect(result.error).toBe('RESEND_API_KEY not configured');
    });

    it('should send via SendGrid when configured', async () => {
      mockFetch.mockResolvedValueOnce({
        ok: true,
        headers: new Headers({ 'x-message-id': 'sg-msg-1' }),
      });

      const result = await sendEmail(
        { to: recipients, subject: 'Test Email', text: 'Test content', html: '<p>Test</p>' },
        { provider: 'sendgrid', from: 'sender@example.org', sendgridApiKey: 'test-secret' }
      );

      expect(result.success).toBe(true);
      expect(result.messageId).toBe('sg-msg-1');
      expect(mockFetch.mock.calls[0][0]).toBe('https://api.sendgrid.com/v3/mail/send');

      const body = JSON.parse(mockFetch.mock.calls[0][1].body);
      expect(body.content).toEqual([
        { type: 'text/plain', value: 'Test content' },
        { type: 'text/html', value: '<p>Test</p>' },
      ]);
    });

    it('should encode SendGrid attachments and fail without its key', async () => {
      mockFetch.mockResolvedValueOnce({ ok: true, headers: new Headers() });

      const attachment = { filename: 'a.csv', content: 'a,b', contentType: 'text/csv' };
      const sent = await sendEmail(
        { to: recipients, subject: 'Test Email', text: 'Test content', attachments: [attachment] },
        { provider: 'sendgrid', from: 'sender@example.org', sendgridApiKey: 'test-secret' }
      );

      expect(sent.messageId).toBeUndefined();
      expect(JSON.parse(mockFetch.mock.calls[0][1].body).attachments).toEqual([
        {
          filename: 'a.csv',
          content: Buffer.from('a,b').toString('base64'),
          type: 'text/csv',
          disposition: 'attachment',
        },
      ]);

      const missing = await sendEmail(
        { to: recipients, subject: 'Test Email', text: 'Test content' },
        { provider: 'sendgrid', from: 'sender@example.org' }
      );
      expect(missing.error).toBe('SENDGRID_API_KEY not configured');
    });

    it('should report an invalid provider from the environment', async () => {
      vi.stubEnv('EMAIL_PROVIDER', 'smtp');

      const result = await sendEmail({ to: recipients, subject: 'Test', text: 'Test' });

      expect(result.success).toBe(false);
      expect(result.error).toContain('EMAIL_PROVIDER');
    });
  });

  describe('digest', () => {
    it('should format the subject with the count and date', () => {
      expect(formatDigestDate(DATE)).toBe('Oct 19, 2026');
      expect(digestSubject(3, DATE)).toBe(
        '[GrantRadar] 3 New Donor Opportunities — Oct 19, 2026'
      );
    });

    it('should list deadlines, top matches and the rest', () => {
      const records = [
        ...Array.from({ length: 12 }, (_, i) =>
          makeRecord({ url: `https://example.org/top/${i}`, title: `Top grant ${i}`, relevanceScore: 7.5, deadline: null })
        ),
        ...Array.from({ length: 3 }, (_, i) =>
          makeRecord({ url: `https://example.org/low/${i}`, title: `Low grant ${i}`, relevanceScore: 5 })
        ),
      ];

      const message = buildDigestEmail(records, recipients, {
        date: DATE,
        profile: { country: 'tanzania', sectors: ['education'] },
      });

      expect(message.subject).toBe('[GrantRadar] 15 New Donor Opportunities — Oct 19, 2026');
      expect(message.html).toContain('<h2>Upcoming Deadlines</h2>');
      expect(message.html).toContain('<h2>Top Matches (score 7+)</h2>');
      expect(message.html).toContain('Top grant 9');
      expect(message.html).not.toContain('Top grant 10');
      expect(message.html).toContain('+ 5 more opportunities in the attached CSV');
      expect(message.html).toContain('<strong>Tanzania</strong>');

      expect(message.text.split('\n')).toEqual(
        expect.arrayContaining([
          '15 new donor opportunities',
          'Profile: tanzania | education',
          'UPCOMING DEADLINES',
          'TOP MATCHES (score 7+)',
          '+ 5 more opportunities in the attached CSV',
        ])
      );
    });

    it('should attach the CSV export', () => {
      const message = buildDigestEmail([makeRecord()], recipients, { date: DATE });

      expect(message.attachments).toHaveLength(1);
      expect(message.attachments?.[0]?.filename).toBe('donor_opportunities_20261019_1200.csv');
      expect(message.attachments?.[0]?.contentType).toBe('text/csv');
      expect(message.attachments?.[0]?.content.split('\n')[0]).toMatch(/^source,category,priority,/);
    });

    it('should escape HTML in feed content', () => {
      const message = buildDigestEmail(
        [makeRecord({ title: '<script>alert(1)</script>', relevanceScore: 9 })],
        recipients,
        { date: DATE }
      );

      expect(message.html).toContain('&lt;script&gt;alert(1)&lt;/script&gt;');
      expect(message.html).not.toContain('<script>');
    });
  });

  describe('sendOpportunityDigest', () => {
    it('should skip when there is nothing new', async () => {
      const result = await sendOpportunityDigest([], recipients);

      expect(result.success).toBe(true);
      expect(result.skipped).toBe(true);
      expect(console.log).toHaveBeenCalledTimes(1);
    });

    it('should fail without recipients', async () => {
      const result = await sendOpportunityDigest([makeRecord()], []);

      expect(result.success).toBe(false);
      expect(result.error).toBe('No recipients configured');
    });

    it('should send through the configured provider', async () => {
      mockFetch.mockResolvedValueOnce({
        ok: true,
        json: async () => ({ id: 'digest-1' }),
      });

      const result = await sendOpportunityDigest([makeRecord()], recipients, {
        date: DATE,
        config: { provider: 'resend', from: 'sender@example.org', resendApiKey: 'test-secret' },
      });

      expect(result.messageId).toBe('digest-1');
      const body = JSON.parse(mockFetch.mock.calls[0][1].body);
      expect(body.subject).toBe('[GrantRadar] 1 New Donor Opportunities — Oct 19, 2026');
      expect(body.to).toEqual(['team@example.org']);
    });
  });
});
