import { TABLES, DriveRow } from '../../db/schema';
import { checkDrivePartition } from '../../observability/invariants';
import { DataIntegrityError } from '../errors';
import { DerivationStage, groupBy, emit, pairKey } from '../pipeline/stage';
import { primaryResults } from './results';

export interface SeasonResult {
  round: number;
  constructor_id: number;
}

export interface DriveSpan {
  /** null for a hiatus between two different constructors */
  constructor_id: number | null;
  first_round: number;
  last_round: number;
}

/**
 * Rounds a driver sat out that separate two different constructors
 */
function hiatusSpans(results: readonly SeasonResult[], standingsRounds: readonly number[]): DriveSpan[] {
  const byRound = new Map(results.map(r => [r.round, r]));
  const first = results[0].round;
  const last = results[results.length - 1].round;

  const absent = [...new Set(standingsRounds)]
    .filter(round => round > first && round < last && !byRound.has(round))
    .sort((a, b) => a - b);

  const spans: DriveSpan[] = [];
  let start = 0;
  while (start < absent.length) {
    let end = start;
    while (end + 1 < absent.length && absent[end + 1] === absent[end] + 1) {
      end++;
    }

    const before = byRound.get(absent[start] - 1);
    const after = byRound.get(absent[end] + 1);
    if (before && after && before.constructor_id !== after.constructor_id) {
      spans.push({ constructor_id: null, first_round: absent[start], last_round: absent[end] });
    }
    start = end + 1;
  }

  return spans;
}

/**
 * Drive intervals for one driver-season, ordered by first round
 *
 * A new drive starts whenever the constructor changes; absences followed by a
 * return to the same constructor stay inside one drive.
 */
export function reconstructDrives(
  seasonResults: readonly SeasonResult[],
  standingsRounds: readonly number[]
): DriveSpan[] {
  const results = [...seasonResults].sort((a, b) => a.round - b.round);
  if (results.length === 0) {
    return [];
  }

  const spans: DriveSpan[] = [];
  let current: DriveSpan | null = null;
  for (const result of results) {
    if (current && current.constructor_id === result.constructor_id) {
      current.last_round = result.round;
      continue;
    }
    current = { constructor_id: result.constructor_id, first_round: result.round, last_round: result.round };
    spans.push(current);
  }

  return [...spans, ...hiatusSpans(results, standingsRounds)].sort((a, b) => a.first_round - b.first_round);
}

export const drivesStage: DerivationStage = {
  name: 'drives',
  description: 'Contiguous constructor intervals per driver-season, with hiatus drives',
  inputs: [TABLES.results, TABLES.races, TABLES.driverStandings],
  outputs: [TABLES.drives],

  async run(ctx) {
    const races = await ctx.read(TABLES.races);
    const results = primaryResults(await ctx.read(TABLES.results));
    const standings = await ctx.read(TABLES.driverStandings);
    const raceById = new Map(races.map(r => [r.race_id, r]));

    const seasonResults = new Map<string, { year: number; driver_id: number; results: SeasonResult[] }>();
    for (const result of results) {
      const race = raceById.get(result.race_id);
      if (!race) {
        ctx.issues.flagIntegrity(
          new DataIntegrityError('missing_reference', `Result ${result.result_id} references unknown race`, {
            stage: ctx.stage,
            race_id: result.race_id,
            driver_id: result.driver_id
          })
        );
        continue;
      }
      const key = pairKey(race.year, result.driver_id);
      const season = seasonResults.get(key) ?? { year: race.year, driver_id: result.driver_id, results: [] };
      season.results.push({ round: race.round, constructor_id: result.constructor_id });
      seasonResults.set(key, season);
    }

    const standingsRounds = groupBy(
      standings.flatMap(s => {
        const race = raceById.get(s.race_id);
        return race ? [{ key: pairKey(race.year, s.driver_id), round: race.round }] : [];
      }),
      s => s.key
    );

    const rows: DriveRow[] = [];
    for (const [key, season] of seasonResults) {
      const spans = reconstructDrives(season.results, (standingsRounds.get(key) ?? []).map(s => s.round));
      const minRound = spans[0].first_round;
      const maxRound = Math.max(...spans.map(s => s.last_round));

      const problem = checkDrivePartition(spans, minRound, maxRound);
      if (problem !== null) {
        ctx.issues.flagIntegrity(
          new DataIntegrityError('drive_partition', problem, {
            stage: ctx.stage,
            year: season.year,
            driver_id: season.driver_id
          })
        );
        continue;
      }

      spans.forEach((span, index) => {
        const isConstructorDrive = span.constructor_id !== null;
        rows.push({
          year: season.year,
          driver_id: season.driver_id,
          drive_id: index + 1,
          constructor_id: span.constructor_id,
          first_round: span.first_round,
          last_round: span.last_round,
          is_first_drive_of_season: isConstructorDrive && span.first_round === minRound,
          is_final_drive_of_season: isConstructorDrive && span.last_round === maxRound
        });
      });
    }

    return [emit(TABLES.drives, rows)];
  }
};
