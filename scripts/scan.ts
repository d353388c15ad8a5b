/**
 * GrantRadar — Scan Script
 *
 * Runs one scan and prints the report.
 *
 * Usage:
 *   npm run scan                                  # Profile from .env
 *   npm run scan -- --country kenya --sectors education,health
 *   npm run scan -- --show-all                    # Include previously seen items
 *   npm run scan -- --tier very_high --tier high  # Only these tiers
 *   npm run scan -- --dry-run                     # Don't touch the seen store
 *   npm run scan -- --export                      # Also write CSV files
 */

import 'dotenv/config';
import { logger, errorMessage } from '../src/lib/logger';
import { loadConfig } from '../src/lib/config';
import { PriorityTierSchema, type PriorityTier } from '../src/types';
import { RssFeedFetcher, createDefaultRegistry } from '../src/feeds';
import { MemorySeenStore, createSeenStore } from '../src/store';
import { runScan } from '../src/pipeline';
import { exportScanResults, renderScanReport } from '../src/delivery';

// ============================================================
// CONFIGURATION
// ============================================================

interface ScanScriptOptions {
  country?: string;
  sectors?: string[];
  showAll: boolean;
  tiers: PriorityTier[];
  dryRun: boolean;
  export: boolean;
}

function parseArgs(): ScanScriptOptions {
  const args = process.argv.slice(2);
  const options: ScanScriptOptions = {
    showAll: false,
    tiers: [],
    dryRun: false,
    export: false,
  };

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (args[i] === '--country' && next) {
      options.country = next;
      i++;
    } else if (args[i] === '--sectors' && next) {
      options.sectors = next.split(',').map(s => s.trim()).filter(s => s.length > 0);
      i++;
    } else if (args[i] === '--tier' && next) {
      options.tiers.push(PriorityTierSchema.parse(next));
      i++;
    } else if (args[i] === '--show-all') {
      options.showAll = true;
    } else if (args[i] === '--dry-run') {
      options.dryRun = true;
    } else if (args[i] === '--export') {
      options.export = true;
    }
  }

  return options;
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<void> {
  const options = parseArgs();
  const config = loadConfig();

  const result = await runScan(
    {
      country: options.country ?? config.profile.country,
      sectors: options.sectors ?? config.profile.sectors,
      showAll: options.showAll,
    },
    {
      registry: createDefaultRegistry(),
      tiers: options.tiers.length > 0 ? options.tiers : undefined,
      fetcher: new RssFeedFetcher(config.fetcher),
      store: options.dryRun ? new MemorySeenStore() : createSeenStore(config.seenStore),
      scoring: { inclusionThreshold: config.inclusionThreshold },
      interSourceDelayMs: config.interSourceDelayMs,
    }
  );

  console.log('\n' + renderScanReport(result) + '\n');

  if (options.export && result.opportunities.length > 0) {
    const exported = await exportScanResults(result.opportunities, {
      dir: config.exportDir,
      highPriorityMin: config.digest.minScore,
    });
    for (const file of exported.files) {
      console.log(`Exported: ${file}`);
    }
    if (!exported.success) {
      process.exitCode = 1;
    }
  }
}

main().catch((error: unknown) => {
  logger.error('Scan failed', { error: errorMessage(error) });
  console.error('\nScan failed:', errorMessage(error));
  process.exit(1);
});
