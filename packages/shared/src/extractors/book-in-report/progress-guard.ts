/**
 * Progress Guard
 *
 * Loop invariant for the scan: the line index must move. When the same index
 * is observed more than `ceiling` consecutive times the caller is told to
 * skip the line.
 */

export type GuardVerdict = 'ok' | 'stalled';

export const DEFAULT_STALL_CEILING = 500;

/**
 * Ceilings that are not finite and non-negative fall back to the default.
 */
export function resolveStallCeiling(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) return DEFAULT_STALL_CEILING;
  return Math.floor(value);
}

export class ProgressGuard {
  readonly ceiling: number;
  private lastIndex = -1;
  private hits = 0;
  private stallCount = 0;

  constructor(ceiling: number = DEFAULT_STALL_CEILING) {
    this.ceiling = resolveStallCeiling(ceiling);
  }

  get stalls(): number {
    return this.stallCount;
  }

  observe(index: number): GuardVerdict {
    if (index !== this.lastIndex) {
      this.lastIndex = index;
      this.hits = 0;
      return 'ok';
    }

    this.hits += 1;
    if (this.hits > this.ceiling) {
      this.hits = 0;
      this.stallCount += 1;
      return 'stalled';
    }
    return 'ok';
  }
}
