/**
 * GrantRadar — Pipeline Module
 */

export {
  runScan,
  scan,
  resolveProfile,
  sortOpportunities,
  DEFAULT_INTER_SOURCE_DELAY_MS,
  DESCRIPTION_MAX_LENGTH,
  type ScanOptions,
} from './scanner';
