/**
 * GrantRadar — Daily Alert
 *
 * Scheduled entry point: scan, export CSVs and email the digest of
 * opportunities not seen before.
 *
 * Usage:
 *   npm run daily-alert
 *   npm run daily-alert -- --no-email   # Scan and export only
 */

import 'dotenv/config';
import { logger, errorMessage } from '../src/lib/logger';
import { loadConfig } from '../src/lib/config';
import { RssFeedFetcher, createDefaultRegistry } from '../src/feeds';
import { createSeenStore } from '../src/store';
import { runScan } from '../src/pipeline';
import { exportScanResults, sendOpportunityDigest } from '../src/delivery';

async function main(): Promise<void> {
  const sendMail = !process.argv.includes('--no-email');
  const config = loadConfig();

  const result = await runScan(config.profile, {
    registry: createDefaultRegistry(),
    fetcher: new RssFeedFetcher(config.fetcher),
    store: createSeenStore(config.seenStore),
    scoring: { inclusionThreshold: config.inclusionThreshold },
    interSourceDelayMs: config.interSourceDelayMs,
    onPhase: phase => logger.info('Daily alert phase', { phase }),
  });

  const fresh = result.opportunities.filter(o => o.isNew);
  logger.info('Daily scan finished', {
    opportunities: result.totals.opportunities,
    new: fresh.length,
    failedSources: result.failedSources.length,
  });

  if (fresh.length === 0) {
    console.log('No new opportunities today.');
    return;
  }

  const exported = await exportScanResults(fresh, {
    dir: config.exportDir,
    highPriorityMin: config.digest.minScore,
  });

  if (!sendMail) return;

  const sent = await sendOpportunityDigest(
    fresh,
    config.digest.recipients.map(email => ({ email })),
    {
      minScore: config.digest.minScore,
      profile: result.profile,
      config: config.email,
    }
  );

  if (!sent.success || !exported.success) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error('Daily alert failed', { error: errorMessage(error) });
  process.exit(1);
});
