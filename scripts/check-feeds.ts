/**
 * GrantRadar — Feed Health Check
 *
 * Probes every registered feed and prints which ones respond and parse.
 *
 * Usage:
 *   npm run check-feeds
 *   npm run check-feeds -- --tier very_high
 */

import 'dotenv/config';
import { logger, errorMessage } from '../src/lib/logger';
import { loadConfig } from '../src/lib/config';
import { PriorityTierSchema } from '../src/types';
import { createDefaultRegistry, probeAll } from '../src/feeds';

async function main(): Promise<void> {
  const config = loadConfig();
  const registry = createDefaultRegistry();

  const tierIndex = process.argv.indexOf('--tier');
  const tierArg = tierIndex >= 0 ? process.argv[tierIndex + 1] : undefined;
  const sources = tierArg
    ? registry.getSourcesByTier(PriorityTierSchema.parse(tierArg))
    : registry.listSources();

  console.log('\n' + '='.repeat(60));
  console.log(`FEED HEALTH CHECK (${sources.length} feeds)`);
  console.log('='.repeat(60));

  const results = await probeAll(sources, { timeoutMs: config.fetcher.timeoutMs });

  for (const r of results) {
    const status = r.ok ? 'OK  ' : 'FAIL';
    const detail = r.ok ? `${r.entries} entries` : (r.error ?? 'unknown error');
    console.log(`${status} ${r.name.padEnd(45)} ${String(r.httpStatus ?? '-').padEnd(4)} ${detail}`);
  }

  const working = results.filter(r => r.ok).length;
  console.log('='.repeat(60));
  console.log(`Working: ${working}/${results.length}`);
  console.log('='.repeat(60) + '\n');

  if (working === 0) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error('Feed check failed', { error: errorMessage(error) });
  process.exit(1);
});
