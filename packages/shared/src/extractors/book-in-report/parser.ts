/**
 * Book-In Report Parser
 *
 * Drives the state machine over page-tagged lines: classify the line, run the
 * first matching rule of the current state, advance. The progress guard skips
 * any line the table fails to move past. Finalized records go through the
 * reclassifier once before they are returned.
 *
 * Pure and synchronous; no I/O and no state shared between calls.
 */

import type { ArrestRecord, PageLines, ParseResult, TaggedLine } from '../../types';
import { config } from '../../config';
import { logger } from '../../logger';
import { classifyLine, type LineFeatures } from './classifier';
import { RecordAccumulator, WARNINGS } from './accumulator';
import { resolvePatternSet } from './patterns';
import { ProgressGuard, resolveStallCeiling } from './progress-guard';
import { reclassifyRecords } from './reclassifier';
import {
  TRANSITIONS,
  dispatch,
  type ParserState,
  type ScanContext,
  type ScannedLine,
  type TransitionTable,
} from './transitions';

/**
 * Algorithm version for tracking
 */
export const ALGORITHM_VERSION = '1.0.0';

export interface ParseOptions {
  /** Upper-case names only (default from NAME_REGEX_STRICT) */
  strict?: boolean;
  /** Identifier and date on consecutive lines (default from ALLOW_TWO_LINE_ID_DATE) */
  allowTwoLineIdDate?: boolean;
  /** Iterations allowed on one line before it is skipped (default from PARSER_STALL_CEILING) */
  stallCeiling?: number;
  transitions?: TransitionTable;
}

export interface ResolvedParseOptions {
  strict: boolean;
  allowTwoLineIdDate: boolean;
  stallCeiling: number;
  transitions: TransitionTable;
}

export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  return {
    strict: options.strict ?? config.nameRegexStrict,
    allowTwoLineIdDate: options.allowTwoLineIdDate ?? config.allowTwoLineIdDate,
    stallCeiling: resolveStallCeiling(options.stallCeiling ?? config.parserStallCeiling),
    transitions: options.transitions ?? TRANSITIONS,
  };
}

function emptyResult(): ParseResult {
  return { records: [], warnings: [], stats: { lines: 0, iterations: 0, stalls: 0 } };
}

/**
 * Flatten pages into page-tagged lines. No filtering happens here.
 */
export function flattenPages(pages: readonly PageLines[]): TaggedLine[] {
  return pages.flatMap((page) => page.lines.map((text) => ({ text, page: page.pageNumber })));
}

/**
 * Scan page-tagged lines into records.
 */
export function parseTaggedLines(lines: readonly TaggedLine[], options: ParseOptions = {}): ParseResult {
  if (lines.length === 0) return emptyResult();

  const resolved = resolveParseOptions(options);
  const patterns = resolvePatternSet(resolved.strict);
  const acc = new RecordAccumulator();
  const guard = new ProgressGuard(resolved.stallCeiling);

  // Classification is pure, so each line is classified at most once
  const features = new Map<number, LineFeatures>();
  const scanned = (index: number): ScannedLine | null => {
    const line = lines[index];
    if (!line) return null;
    let f = features.get(index);
    if (!f) {
      f = classifyLine(line.text, patterns);
      features.set(index, f);
    }
    return { line, features: f };
  };

  let state: ParserState = 'SEEK_NAME';
  let index = 0;
  let iterations = 0;

  while (index < lines.length) {
    iterations += 1;
    const current = scanned(index);
    if (!current) break;

    // Blank lines carry nothing
    if (current.features.text === '') {
      index += 1;
      continue;
    }

    if (guard.observe(index) === 'stalled') {
      acc.warn(WARNINGS.noProgress(index + 1, current.features.text));
      logger.debug('Progress guard skipped line', { line: index + 1, state });
      index += 1;
      continue;
    }

    const ctx: ScanContext = {
      ...current,
      peek: (offset) => scanned(index + offset),
      acc,
      patterns,
      allowTwoLineIdDate: resolved.allowTwoLineIdDate,
    };

    const step = dispatch(state, ctx, resolved.transitions);
    const advance = Math.max(0, Math.min(step.advance, lines.length - index));

    for (let k = 0; k < advance; k++) {
      const consumed = lines[index + k];
      if (consumed) acc.touch(consumed.page);
    }
    if (advance > 0 && !step.keepDeferred) acc.clearDeferred();

    state = step.next;
    index += advance;
  }

  acc.finalizeCurrent();

  const records = reclassifyRecords(acc.records);

  logger.debug('Book-in scan complete', {
    lines: lines.length,
    records: records.length,
    iterations,
    stalls: guard.stalls,
  });

  return {
    records,
    warnings: [...acc.warnings],
    stats: { lines: lines.length, iterations, stalls: guard.stalls },
  };
}

/**
 * Parse extracted pages. `null`, `undefined` and empty input yield an empty result.
 */
export function parseBookInPages(
  pages: readonly PageLines[] | null | undefined,
  options: ParseOptions = {}
): ParseResult {
  if (!pages || pages.length === 0) return emptyResult();
  return parseTaggedLines(flattenPages(pages), options);
}

/**
 * Parse a plain list of lines, treated as page 1.
 */
export function parseBookInLines(
  lines: readonly string[] | null | undefined,
  options: ParseOptions = {}
): ParseResult {
  if (!lines || lines.length === 0) return emptyResult();
  return parseBookInPages([{ pageNumber: 1, lines }], options);
}

export function extractArrestRecords(
  pages: readonly PageLines[] | null | undefined,
  options: ParseOptions = {}
): ArrestRecord[] {
  return parseBookInPages(pages, options).records;
}
