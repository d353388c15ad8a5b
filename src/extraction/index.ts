/**
 * GrantRadar — Field Extraction
 *
 * Pure text heuristics. Misses are null, never errors.
 */

export { extractDeadline, DEADLINE_RULES } from './deadline';
export { extractAmount, AMOUNT_RULES } from './amount';
export { classifySectors, GENERAL_SECTOR } from './sectors';
export { firstMatch, type PatternRule, type RuleMatch } from './rules';
