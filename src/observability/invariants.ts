/**
 * Data-model invariant checks and enforcement
 *
 * Behavior:
 * - STRICT_INVARIANTS=true: the first violation throws and aborts the run
 * - otherwise: the violation is logged loudly, recorded in the run report,
 *   and the affected race / driver-season is skipped (never swallowed)
 *
 * ENFORCED INVARIANTS:
 * 1. LAP LADDER: per (race, driver) laps run contiguously from 0 to the last lap
 * 2. LAP PERMUTATION: within a (race, lap) positions are exactly 1..N
 * 3. DRIVE PARTITION: a driver-season's drives tile [min_round, max_round]
 */

import { ClassificationAmbiguity, DataIntegrityError } from '../etl/errors';
import { DerivationLogger } from './logger';

/**
 * Check if strict invariant enforcement is enabled
 */
export function isStrictMode(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.STRICT_INVARIANTS === 'true';
}

/**
 * First missing lap in a driver's ladder, or null when laps are 0..max without gaps
 */
export function checkLapLadder(laps: readonly number[]): number | null {
  const sorted = [...laps].sort((a, b) => a - b);
  for (let i = 0; i < sorted.length; i++) {
    if (sorted[i] !== i) {
      return i;
    }
  }
  return null;
}

/**
 * Describe how a lap's positions fail to be a permutation of 1..N, or null
 */
export function checkLapPermutation(positions: readonly number[]): string | null {
  const sorted = [...positions].sort((a, b) => a - b);
  for (let i = 0; i < sorted.length; i++) {
    const expected = i + 1;
    if (sorted[i] !== expected) {
      return sorted[i] < expected
        ? `position ${sorted[i]} appears more than once`
        : `position ${expected} is missing`;
    }
  }
  return null;
}

export interface RoundSpan {
  first_round: number;
  last_round: number;
}

/**
 * Describe how spans fail to tile [minRound, maxRound], or null
 */
export function checkDrivePartition(
  spans: readonly RoundSpan[],
  minRound: number,
  maxRound: number
): string | null {
  const sorted = [...spans].sort((a, b) => a.first_round - b.first_round);
  let expected = minRound;
  for (const span of sorted) {
    if (span.first_round > span.last_round) {
      return `drive ${span.first_round}-${span.last_round} is empty`;
    }
    if (span.first_round !== expected) {
      return span.first_round < expected
        ? `round ${span.first_round} is covered twice`
        : `round ${expected} is not covered`;
    }
    expected = span.last_round + 1;
  }
  if (expected !== maxRound + 1) {
    return `rounds ${expected}-${maxRound} are not covered`;
  }
  return null;
}

/**
 * Collects integrity issues and classification ambiguities during a run
 */
export class IssueCollector {
  private integrity: DataIntegrityError[] = [];
  private ambiguities: ClassificationAmbiguity[] = [];

  constructor(
    private readonly strict: boolean,
    private readonly logger: DerivationLogger
  ) {}

  /**
   * In strict mode: throws. Otherwise: records, logs, and lets the caller skip.
   */
  flagIntegrity(error: DataIntegrityError): void {
    if (this.strict) {
      throw error;
    }
    this.integrity.push(error);
    this.logger.warn(`${error.message} ${JSON.stringify(error.context)}`);
  }

  reportAmbiguity(ambiguity: ClassificationAmbiguity): void {
    this.ambiguities.push(ambiguity);
    this.logger.warn(
      `Ambiguous ${ambiguity.rule}: "${ambiguity.input}" classified as ${ambiguity.fallback} ${JSON.stringify(ambiguity.context)}`
    );
  }

  getIntegrityIssues(): DataIntegrityError[] {
    return [...this.integrity];
  }

  getAmbiguities(): ClassificationAmbiguity[] {
    return [...this.ambiguities];
  }

  isStrict(): boolean {
    return this.strict;
  }
}

/**
 * Log current invariant enforcement mode on startup
 */
export function logInvariantMode(strict: boolean, logger: DerivationLogger): void {
  const mode = strict ? 'STRICT (will throw)' : 'LENIENT (flag and skip)';
  logger.info(`[Invariants] Mode: ${mode}`);
  if (!strict) {
    logger.info('[Invariants] Set STRICT_INVARIANTS=true to abort on the first violation');
  }
}
