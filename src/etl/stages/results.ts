import { ResultRow } from '../../db/schema';
import { pairKey } from '../pipeline/stage';

/**
 * One result per (race, driver): the best-classified one
 *
 * Shared drives give a driver several results in one race; every per-driver
 * derivation works from the car they were classified highest in.
 */
export function primaryResults(results: readonly ResultRow[]): ResultRow[] {
  const best = new Map<string, ResultRow>();
  for (const result of results) {
    const key = pairKey(result.race_id, result.driver_id);
    const current = best.get(key);
    if (!current || result.position_order < current.position_order) {
      best.set(key, result);
    }
  }
  return [...best.values()];
}
