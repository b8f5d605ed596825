import { TABLES, ResultRow, LapTimeRow, RetirementRow } from '../../db/schema';
import {
  GridLapType,
  GridStart,
  LapPosition,
  isRetirementCause,
  toLapPositionRow
} from '../../types/derived';
import { checkLapLadder, checkLapPermutation } from '../../observability/invariants';
import { DataIntegrityError } from '../errors';
import { DerivationStage, StageContext, emit, groupBy } from '../pipeline/stage';
import { primaryResults } from './results';

/**
 * Grid lap type from qualifying position against the slot actually taken
 *
 * A pit-lane start (grid 0) counts as a drop from any qualifying position.
 */
export function gridLapType(qualifyingPosition: number | null | undefined, grid: number): GridLapType {
  if (qualifyingPosition === null || qualifyingPosition === undefined) {
    return 'Starting Position - No Qualification';
  }
  if (grid === 0 || qualifyingPosition < grid) {
    return 'Starting Position - Grid Drop';
  }
  if (qualifyingPosition > grid) {
    return 'Starting Position - Grid Increase';
  }
  return 'Starting Position - Qualifying';
}

/**
 * Lap-0 ladder: grid slots re-ranked into 1..N, pit-lane starters last
 */
export function buildGridStarts(
  results: readonly ResultRow[],
  qualifyingPosition: (driverId: number) => number | null | undefined
): GridStart[] {
  const ordered = [...results].sort((a, b) => {
    const gridA = a.grid === 0 ? Number.POSITIVE_INFINITY : a.grid;
    const gridB = b.grid === 0 ? Number.POSITIVE_INFINITY : b.grid;
    if (gridA !== gridB) {
      return gridA < gridB ? -1 : 1;
    }
    if (a.position_order !== b.position_order) {
      return a.position_order - b.position_order;
    }
    return a.driver_id - b.driver_id;
  });

  return ordered.map((result, index) => ({
    kind: 'grid',
    race_id: result.race_id,
    driver_id: result.driver_id,
    lap: 0,
    position: index + 1,
    grid_type: gridLapType(qualifyingPosition(result.driver_id), result.grid)
  }));
}

/**
 * First ladder or permutation violation in a race, or null
 */
export function findLadderViolation(raceId: number, positions: readonly LapPosition[]): DataIntegrityError | null {
  for (const [driverId, laps] of groupBy(positions, p => p.driver_id)) {
    const missingLap = checkLapLadder(laps.map(p => p.lap));
    if (missingLap !== null) {
      return new DataIntegrityError('lap_ladder_gap', `Driver ${driverId} has no record for lap ${missingLap}`, {
        table: TABLES.lapPositions.name,
        race_id: raceId,
        driver_id: driverId,
        lap: missingLap
      });
    }
  }

  for (const [lap, entries] of groupBy(positions, p => p.lap)) {
    const problem = checkLapPermutation(entries.map(p => p.position));
    if (problem !== null) {
      return new DataIntegrityError('lap_position_permutation', `Lap ${lap}: ${problem}`, {
        table: TABLES.lapPositions.name,
        race_id: raceId,
        lap
      });
    }
  }

  return null;
}

/**
 * Retirement records slot in behind the cars still running on their lap,
 * ranked among themselves by classified position
 *
 * A car disqualified after finishing lands on lap laps + 1 with nobody else
 * running, so it takes position 1 there.
 */
function toRetirementLaps(
  ctx: StageContext,
  rows: readonly RetirementRow[],
  raceLaps: readonly LapTimeRow[]
): LapPosition[] | null {
  const runningOnLap = new Map<number, number>();
  for (const lap of raceLaps) {
    runningOnLap.set(lap.lap, (runningOnLap.get(lap.lap) ?? 0) + 1);
  }

  const laps: LapPosition[] = [];
  for (const [lap, retiring] of groupBy(rows, r => r.lap)) {
    const ranked = [...retiring].sort((a, b) => a.position_order - b.position_order || a.driver_id - b.driver_id);
    for (const [index, row] of ranked.entries()) {
      if (!isRetirementCause(row.retirement_cause)) {
        ctx.issues.flagIntegrity(
          new DataIntegrityError('unknown_lap_type', `Unrecognised retirement cause "${row.retirement_cause}"`, {
            stage: ctx.stage,
            race_id: row.race_id,
            driver_id: row.driver_id
          })
        );
        return null;
      }
      laps.push({
        kind: 'retirement',
        race_id: row.race_id,
        driver_id: row.driver_id,
        lap,
        position: (runningOnLap.get(lap) ?? 0) + index + 1,
        cause: row.retirement_cause
      });
    }
  }
  return laps;
}

export const lapPositionsStage: DerivationStage = {
  name: 'lap_positions',
  description: 'Lap-by-lap position ladder: grid, race laps and retirements',
  inputs: [TABLES.lapTimes, TABLES.results, TABLES.qualifying, TABLES.retirements],
  outputs: [TABLES.lapPositions],

  async run(ctx) {
    const lapTimes = await ctx.read(TABLES.lapTimes);
    const results = primaryResults(await ctx.read(TABLES.results));
    const qualifying = await ctx.read(TABLES.qualifying);
    const retirements = await ctx.read(TABLES.retirements);

    const lapsByRace = groupBy(lapTimes, l => l.race_id);
    const resultsByRace = groupBy(results, r => r.race_id);
    const retirementsByRace = groupBy(retirements, r => r.race_id);
    const qualifyingByRace = groupBy(qualifying, q => q.race_id);

    const raceIds = [...new Set([...resultsByRace.keys(), ...lapsByRace.keys()])].sort((a, b) => a - b);
    const positions: LapPosition[] = [];
    let racesSkipped = 0;

    for (const raceId of raceIds) {
      const qualified = new Map((qualifyingByRace.get(raceId) ?? []).map(q => [q.driver_id, q.position]));
      const racePositions: LapPosition[] = buildGridStarts(resultsByRace.get(raceId) ?? [], driverId =>
        qualified.get(driverId)
      );

      const raceLaps: readonly LapTimeRow[] = lapsByRace.get(raceId) ?? [];
      for (const lap of raceLaps) {
        racePositions.push({
          kind: 'normal',
          race_id: lap.race_id,
          driver_id: lap.driver_id,
          lap: lap.lap,
          position: lap.position
        });
      }

      // without lap data a retirement lap would float above an empty ladder
      if (raceLaps.length > 0) {
        const retirementLaps = toRetirementLaps(ctx, retirementsByRace.get(raceId) ?? [], raceLaps);
        if (retirementLaps === null) {
          racesSkipped++;
          continue;
        }
        racePositions.push(...retirementLaps);
      }

      const violation = findLadderViolation(raceId, racePositions);
      if (violation) {
        ctx.issues.flagIntegrity(violation);
        racesSkipped++;
        continue;
      }

      positions.push(...racePositions);
    }

    if (racesSkipped > 0) {
      ctx.logger.warn(`${racesSkipped} race(s) excluded from lap_positions`);
    }

    return [emit(TABLES.lapPositions, positions.map(toLapPositionRow))];
  }
};
