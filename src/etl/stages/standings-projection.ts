import {
  TABLES,
  ConstructorExtRow,
  DriveRow,
  DriverStandingRow,
  LiveryRow,
  StandingsProjectionRow
} from '../../db/schema';
import { DataIntegrityError } from '../errors';
import { DerivationStage, emit, groupBy, pairKey } from '../pipeline/stage';

export const HIATUS_CONSTRUCTOR_NAME = 'Hiatus';
export const DEFAULT_HEX_CODE = '#000000';

export interface StandingEntry {
  driver_id: number;
  points: number;
  position: number;
}

export interface PositionBounds {
  driver_id: number;
  max_points_next_race: number;
  max_points_this_season: number;
  best_position_next_race: number;
  best_position_this_season: number;
  worst_position_next_race: number;
  worst_position_this_season: number;
}

/**
 * Best position reachable: the highest-placed driver whose current points
 * this driver could still match
 */
function bestPosition(entry: StandingEntry, maxPoints: number, field: readonly StandingEntry[]): number {
  const beatable = field.filter(other => other.points <= maxPoints).map(other => other.position);
  return beatable.length > 0 ? Math.min(...beatable) : entry.position;
}

/**
 * Worst position reachable: every other driver whose ceiling reaches this
 * driver's current points is counted as a threat, capped at the field size
 */
function worstPosition(
  entry: StandingEntry,
  ceilings: ReadonlyMap<number, number>,
  field: readonly StandingEntry[]
): number {
  const threats = field.filter(
    other => other.driver_id !== entry.driver_id && (ceilings.get(other.driver_id) ?? other.points) >= entry.points
  ).length;
  return Math.min(entry.position + threats, field.length);
}

/**
 * Championship bounds for every driver in one round's standings
 */
export function projectStandings(
  field: readonly StandingEntry[],
  nextRaceMaxPoints: number,
  remainingMaxPoints: number
): PositionBounds[] {
  const nextCeiling = new Map(field.map(e => [e.driver_id, e.points + nextRaceMaxPoints]));
  const seasonCeiling = new Map(field.map(e => [e.driver_id, e.points + remainingMaxPoints]));

  return field.map(entry => {
    const maxNext = entry.points + nextRaceMaxPoints;
    const maxSeason = entry.points + remainingMaxPoints;
    return {
      driver_id: entry.driver_id,
      max_points_next_race: maxNext,
      max_points_this_season: maxSeason,
      best_position_next_race: bestPosition(entry, maxNext, field),
      best_position_this_season: bestPosition(entry, maxSeason, field),
      worst_position_next_race: worstPosition(entry, nextCeiling, field),
      worst_position_this_season: worstPosition(entry, seasonCeiling, field)
    };
  });
}

/**
 * The drive a driver is attributed to at a round
 *
 * The drive covering the round wins; otherwise one starting at the next round
 * (a driver standing between teams); otherwise their final drive if it has
 * already ended.
 */
export function selectDrive(drives: readonly DriveRow[], round: number): DriveRow | undefined {
  const covering = drives.find(d => d.first_round <= round && d.last_round >= round);
  if (covering) {
    return covering;
  }
  const upcoming = drives.find(d => d.first_round === round + 1);
  if (upcoming) {
    return upcoming;
  }
  return drives.find(d => d.is_final_drive_of_season && d.last_round < round);
}

export function findLivery(liveries: readonly LiveryRow[], constructorRef: string, year: number): LiveryRow | undefined {
  return liveries.find(
    l => l.constructor_ref === constructorRef && l.start_year <= year && (l.end_year === null || year <= l.end_year)
  );
}

function describeConstructor(
  drive: DriveRow | undefined,
  constructors: ReadonlyMap<number, ConstructorExtRow>,
  liveries: readonly LiveryRow[],
  year: number
): { constructor_id: number | null; constructor_name: string; hex_code: string } {
  const constructor = drive && drive.constructor_id !== null ? constructors.get(drive.constructor_id) : undefined;
  if (!constructor) {
    return { constructor_id: null, constructor_name: HIATUS_CONSTRUCTOR_NAME, hex_code: DEFAULT_HEX_CODE };
  }
  return {
    constructor_id: constructor.constructor_id,
    constructor_name: constructor.short_name,
    hex_code: findLivery(liveries, constructor.constructor_ref, year)?.primary_hex_code ?? DEFAULT_HEX_CODE
  };
}

export const standingsProjectionStage: DerivationStage = {
  name: 'standings_projection',
  description: 'Best and worst reachable championship positions after every round',
  inputs: [TABLES.driverStandings, TABLES.racesExt, TABLES.drives, TABLES.constructorsExt, TABLES.liveries],
  outputs: [TABLES.standingsProjection],

  async run(ctx) {
    const races = await ctx.read(TABLES.racesExt);
    const standingsByRace = groupBy(await ctx.read(TABLES.driverStandings), s => s.race_id);
    const drivesBySeason = groupBy(await ctx.read(TABLES.drives), d => pairKey(d.year, d.driver_id));
    const constructors = new Map((await ctx.read(TABLES.constructorsExt)).map(c => [c.constructor_id, c]));
    const liveries = await ctx.read(TABLES.liveries);
    const racesBySeason = groupBy(races, r => r.year);

    const rows: StandingsProjectionRow[] = [];
    for (const race of races) {
      const standings = standingsByRace.get(race.race_id);
      if (!standings) {
        continue;
      }

      const field: StandingEntry[] = [];
      let unpositioned: DriverStandingRow | undefined;
      for (const standing of standings) {
        if (standing.position === null) {
          unpositioned = standing;
          break;
        }
        field.push({ driver_id: standing.driver_id, points: standing.points, position: standing.position });
      }
      if (unpositioned) {
        ctx.issues.flagIntegrity(
          new DataIntegrityError('missing_standing_position', `Driver ${unpositioned.driver_id} has no standings position`, {
            stage: ctx.stage,
            race_id: race.race_id,
            driver_id: unpositioned.driver_id,
            year: race.year,
            round: race.round
          })
        );
        continue;
      }

      const upcoming = (racesBySeason.get(race.year) ?? []).filter(r => r.round > race.round);
      const nextRace = upcoming.find(r => r.round === race.round + 1);
      const remaining = upcoming.reduce((sum, r) => sum + r.max_points, 0);

      for (const bounds of projectStandings(field, nextRace?.max_points ?? 0, remaining)) {
        const entry = field.find(e => e.driver_id === bounds.driver_id);
        if (!entry) {
          continue;
        }
        const drive = selectDrive(drivesBySeason.get(pairKey(race.year, entry.driver_id)) ?? [], race.round);
        rows.push({
          race_id: race.race_id,
          year: race.year,
          round: race.round,
          ...describeConstructor(drive, constructors, liveries, race.year),
          current_points: entry.points,
          current_position: entry.position,
          ...bounds
        });
      }
    }

    return [emit(TABLES.standingsProjection, rows)];
  }
};
