/**
 * DERIVATION CONFIGURATION
 *
 * Thresholds and switches shared by the derivation stages and the scheduler.
 * Values come from the environment (loaded from .env by entry points) with
 * the defaults below.
 */

import { isStrictMode } from '../observability/invariants';

/**
 * Heuristic thresholds
 */
export const DERIVATION_DEFAULTS = {
  /** Max grid-slot difference for a lap-1 position change to count as a Start overtake */
  start_grid_window: 2,

  /** Minimum poles for a driver to appear in polesitter_stats */
  polesitter_min_poles: 5,

  /** Only races with at least one recorded pit stop get overtakes */
  overtakes_require_pit_data: true,

  /** overtakes_by_circuit keeps circuits still raced in or after this season */
  circuit_summary_min_last_year: 2019,

  /** ...and hosting at least this many races */
  circuit_summary_min_races: 5,

  /** Advisory lock key guarding the derived-table set */
  lock_key: 727_001
};

export interface DerivationConfig {
  /** Abort on the first data-integrity issue instead of flagging and skipping */
  strictInvariants: boolean;
  overtakesRequirePitData: boolean;
  startGridWindow: number;
  polesitterMinPoles: number;
  lockKey: number;
}

export const DEFAULT_DERIVATION_CONFIG: DerivationConfig = {
  strictInvariants: false,
  overtakesRequirePitData: DERIVATION_DEFAULTS.overtakes_require_pit_data,
  startGridWindow: DERIVATION_DEFAULTS.start_grid_window,
  polesitterMinPoles: DERIVATION_DEFAULTS.polesitter_min_poles,
  lockKey: DERIVATION_DEFAULTS.lock_key
};

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return value.trim().toLowerCase() === 'true';
}

function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`FAIL_CLOSED: ${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Read the derivation configuration from an environment map
 */
export function getDerivationConfig(env: NodeJS.ProcessEnv = process.env): DerivationConfig {
  return {
    strictInvariants: isStrictMode(env),
    overtakesRequirePitData: parseBoolean(
      env.OVERTAKES_REQUIRE_PIT_DATA,
      DEFAULT_DERIVATION_CONFIG.overtakesRequirePitData
    ),
    startGridWindow: parseInteger('START_GRID_WINDOW', env.START_GRID_WINDOW, DEFAULT_DERIVATION_CONFIG.startGridWindow),
    polesitterMinPoles: parseInteger(
      'POLESITTER_MIN_POLES',
      env.POLESITTER_MIN_POLES,
      DEFAULT_DERIVATION_CONFIG.polesitterMinPoles
    ),
    lockKey: parseInteger('DERIVATION_LOCK_KEY', env.DERIVATION_LOCK_KEY, DEFAULT_DERIVATION_CONFIG.lockKey)
  };
}
