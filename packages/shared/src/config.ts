/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * Per-call parse options override these.
 */

import { DEFAULT_HEADER_PATTERNS } from './extractors/book-in-report/preprocess';
import { resolveStallCeiling } from './extractors/book-in-report/progress-guard';

export interface Config {
  // Name matching
  nameRegexStrict: boolean;

  // Layout
  allowTwoLineIdDate: boolean;

  // Progress guard
  parserStallCeiling: number;

  // Preprocessing
  headerPatterns: readonly string[];
}

function parseHeaderPatterns(raw: string | undefined): readonly string[] {
  if (!raw) return DEFAULT_HEADER_PATTERNS;
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed) || !parsed.every((p): p is string => typeof p === 'string')) {
    throw new Error('HEADER_PATTERNS must be a JSON array of regular expression strings');
  }
  return parsed;
}

export const config: Config = {
  // Name matching
  nameRegexStrict: process.env.NAME_REGEX_STRICT !== 'false',

  // Layout
  allowTwoLineIdDate: process.env.ALLOW_TWO_LINE_ID_DATE !== 'false',

  // Progress guard
  parserStallCeiling: resolveStallCeiling(
    process.env.PARSER_STALL_CEILING ? Number(process.env.PARSER_STALL_CEILING) : undefined
  ),

  // Preprocessing
  headerPatterns: parseHeaderPatterns(process.env.HEADER_PATTERNS),
};
