/**
 * GrantRadar — Environment Configuration
 *
 * Validates every setting with zod. Entry points load .env through
 * `dotenv/config` before reading it.
 */

import { z } from 'zod';
import { ConfigurationError, formatIssues } from './errors';
import type { InterestProfileInput } from '../types';

const commaList = z
  .string()
  .transform(value => value.split(',').map(v => v.trim()).filter(v => v.length > 0));

const EnvSchema = z.object({
  SCAN_COUNTRY: z.string().trim().min(1).default('tanzania'),
  SCAN_SECTORS: commaList.default('children,education,health,food,agriculture'),
  SEEN_STORE: z.enum(['file', 'supabase']).default('file'),
  SEEN_STORE_PATH: z.string().min(1).default('data/seen-opportunities.json'),
  FEED_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MAX_ENTRIES_PER_SOURCE: z.coerce.number().int().positive().default(30),
  INTER_SOURCE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  INCLUSION_THRESHOLD: z.coerce.number().min(0).max(10).default(6),
  EXPORT_DIR: z.string().min(1).default('exports'),
  DIGEST_MIN_SCORE: z.coerce.number().min(0).max(10).default(7),
  EMAIL_TO: commaList.default(''),
  EMAIL_PROVIDER: z.enum(['resend', 'sendgrid', 'console']).default('console'),
  EMAIL_FROM: z.string().email().default('alerts@grantradar.local'),
  EMAIL_REPLY_TO: z.string().email().optional(),
  RESEND_API_KEY: z.string().min(1).optional(),
  SENDGRID_API_KEY: z.string().min(1).optional(),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
});

export type EmailProvider = 'resend' | 'sendgrid' | 'console';

export interface EmailSettings {
  provider: EmailProvider;
  from: string;
  replyTo?: string;
  resendApiKey?: string;
  sendgridApiKey?: string;
}

export interface AppConfig {
  profile: InterestProfileInput;
  seenStore: {
    backend: 'file' | 'supabase';
    path: string;
    supabaseUrl?: string;
    supabaseKey?: string;
  };
  fetcher: {
    timeoutMs: number;
    maxEntriesPerSource: number;
  };
  interSourceDelayMs: number;
  inclusionThreshold: number;
  exportDir: string;
  digest: {
    minScore: number;
    recipients: string[];
  };
  email: EmailSettings;
}

/**
 * Build the application config from an environment map.
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = parseEnv(env);

  if (e.SEEN_STORE === 'supabase' && (!e.SUPABASE_URL || !e.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new ConfigurationError('Invalid environment configuration', [
      'SEEN_STORE=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY',
    ]);
  }

  return {
    profile: {
      country: e.SCAN_COUNTRY,
      sectors: e.SCAN_SECTORS,
    },
    seenStore: {
      backend: e.SEEN_STORE,
      path: e.SEEN_STORE_PATH,
      supabaseUrl: e.SUPABASE_URL,
      supabaseKey: e.SUPABASE_SERVICE_ROLE_KEY,
    },
    fetcher: {
      timeoutMs: e.FEED_TIMEOUT_MS,
      maxEntriesPerSource: e.MAX_ENTRIES_PER_SOURCE,
    },
    interSourceDelayMs: e.INTER_SOURCE_DELAY_MS,
    inclusionThreshold: e.INCLUSION_THRESHOLD,
    exportDir: e.EXPORT_DIR,
    digest: {
      minScore: e.DIGEST_MIN_SCORE,
      recipients: e.EMAIL_TO,
    },
    email: toEmailSettings(e),
  };
}

/**
 * Email delivery settings only. Used by the mailer when no explicit
 * config is passed.
 */
export function loadEmailSettings(env: NodeJS.ProcessEnv = process.env): EmailSettings {
  return toEmailSettings(parseEnv(env));
}

function parseEnv(env: NodeJS.ProcessEnv): z.infer<typeof EnvSchema> {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid environment configuration', formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

function toEmailSettings(e: z.infer<typeof EnvSchema>): EmailSettings {
  return {
    provider: e.EMAIL_PROVIDER,
    from: e.EMAIL_FROM,
    replyTo: e.EMAIL_REPLY_TO,
    resendApiKey: e.RESEND_API_KEY,
    sendgridApiKey: e.SENDGRID_API_KEY,
  };
}
