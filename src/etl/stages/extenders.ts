/**
 * Base-table extenders
 *
 * Thin derived copies of base tables with the computed columns every later
 * stage relies on (short names, pit-data flag, max points, running time,
 * guaranteed driver codes), plus per-circuit history and per-driver lap
 * consistency.
 */

import {
  TABLES,
  CircuitExtRow,
  RaceExtRow,
  LapTimeExtRow,
  LapTimeStatsRow,
  DriverExtRow,
  ConstructorExtRow
} from '../../db/schema';
import { getMaxPointsForRound } from '../../config/points-systems';
import { DataIntegrityError } from '../errors';
import { DerivationStage, emit, groupBy, pairKey } from '../pipeline/stage';

export const circuitsExtStage: DerivationStage = {
  name: 'circuits_ext',
  description: 'Circuits that have hosted a race, with race count and last season raced',
  inputs: [TABLES.circuits, TABLES.races],
  outputs: [TABLES.circuitsExt],

  async run(ctx) {
    const circuits = await ctx.read(TABLES.circuits);
    const racesByCircuit = groupBy(await ctx.read(TABLES.races), r => r.circuit_id);

    const rows: CircuitExtRow[] = [];
    for (const circuit of circuits) {
      const races = racesByCircuit.get(circuit.circuit_id);
      if (!races) {
        continue;
      }
      rows.push({
        ...circuit,
        last_race_year: Math.max(...races.map(r => r.year)),
        number_of_races: new Set(races.map(r => r.race_id)).size
      });
    }

    return [emit(TABLES.circuitsExt, rows)];
  }
};

export const racesExtStage: DerivationStage = {
  name: 'races_ext',
  description: 'Races with short name, pit-data availability, sprint flag and max points',
  inputs: [TABLES.races, TABLES.pitStops, TABLES.sprintResults, TABLES.shortGrandPrixNames],
  outputs: [TABLES.racesExt],

  async run(ctx) {
    const races = await ctx.read(TABLES.races);
    const pitStops = await ctx.read(TABLES.pitStops);
    const sprintResults = await ctx.read(TABLES.sprintResults);
    const shortNames = await ctx.read(TABLES.shortGrandPrixNames);

    const racesWithPitData = new Set(pitStops.map(p => p.race_id));
    const racesWithSprint = new Set(sprintResults.map(s => s.race_id));
    const shortNameByFull = new Map(shortNames.map(s => [s.full_name, s.short_name]));

    const seen = new Set<string>();
    const rows: RaceExtRow[] = [];
    for (const race of races) {
      const key = pairKey(race.year, race.round);
      if (seen.has(key)) {
        ctx.issues.flagIntegrity(
          new DataIntegrityError('duplicate_key', `Round ${race.round} of ${race.year} appears more than once`, {
            stage: ctx.stage,
            table: TABLES.races.name,
            race_id: race.race_id,
            year: race.year,
            round: race.round
          })
        );
        continue;
      }
      seen.add(key);

      const hasSprint = racesWithSprint.has(race.race_id);
      rows.push({
        race_id: race.race_id,
        year: race.year,
        round: race.round,
        circuit_id: race.circuit_id,
        name: race.name,
        short_name: shortNameByFull.get(race.name) ?? race.name,
        date: race.date,
        is_pit_data_available: racesWithPitData.has(race.race_id),
        has_sprint: hasSprint,
        max_points: getMaxPointsForRound(race.year, hasSprint)
      });
    }

    return [emit(TABLES.racesExt, rows)];
  }
};

export const lapTimesExtStage: DerivationStage = {
  name: 'lap_times_ext',
  description: 'Lap times with cumulative race time per driver',
  inputs: [TABLES.lapTimes],
  outputs: [TABLES.lapTimesExt],

  async run(ctx) {
    const lapTimes = await ctx.read(TABLES.lapTimes);
    const rows: LapTimeExtRow[] = [];

    // read order is (race, driver, lap)
    for (const laps of groupBy(lapTimes, l => pairKey(l.race_id, l.driver_id)).values()) {
      let running: number | null = 0;
      for (const lap of laps) {
        running = running === null || lap.milliseconds === null ? null : running + lap.milliseconds;
        rows.push({ ...lap, running_milliseconds: running });
      }
    }

    return [emit(TABLES.lapTimesExt, rows)];
  }
};

/**
 * Mean and population standard deviation of a driver's timed laps
 */
export function summarizeLapTimes(milliseconds: ReadonlyArray<number | null>): {
  timed_laps: number;
  avg_milliseconds: number | null;
  stdev_milliseconds: number | null;
} {
  const timed = milliseconds.filter((ms): ms is number => ms !== null);
  if (timed.length === 0) {
    return { timed_laps: 0, avg_milliseconds: null, stdev_milliseconds: null };
  }
  const mean = timed.reduce((sum, ms) => sum + ms, 0) / timed.length;
  const variance = timed.reduce((sum, ms) => sum + (ms - mean) ** 2, 0) / timed.length;
  return { timed_laps: timed.length, avg_milliseconds: mean, stdev_milliseconds: Math.sqrt(variance) };
}

export const lapTimeStatsStage: DerivationStage = {
  name: 'lap_time_stats',
  description: 'Average lap time and its spread per race and driver',
  inputs: [TABLES.lapTimesExt],
  outputs: [TABLES.lapTimeStats],

  async run(ctx) {
    const lapTimes = await ctx.read(TABLES.lapTimesExt);
    const rows: LapTimeStatsRow[] = [];

    for (const laps of groupBy(lapTimes, l => pairKey(l.race_id, l.driver_id)).values()) {
      const [first] = laps;
      rows.push({
        race_id: first.race_id,
        driver_id: first.driver_id,
        ...summarizeLapTimes(laps.map(l => l.milliseconds))
      });
    }

    return [emit(TABLES.lapTimeStats, rows)];
  }
};

/**
 * Three-letter code from a surname: diacritics folded, letters only, padded with X
 */
export function synthesizeDriverCode(surname: string): string {
  return surname
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^A-Za-z]/g, '')
    .slice(0, 3)
    .toUpperCase()
    .padEnd(3, 'X');
}

export const driversExtStage: DerivationStage = {
  name: 'drivers_ext',
  description: 'Drivers with full name and a guaranteed three-letter code',
  inputs: [TABLES.drivers],
  outputs: [TABLES.driversExt],

  async run(ctx) {
    const drivers = await ctx.read(TABLES.drivers);
    const rows: DriverExtRow[] = drivers.map(driver => {
      const code = driver.code?.trim();
      return {
        driver_id: driver.driver_id,
        driver_ref: driver.driver_ref,
        forename: driver.forename,
        surname: driver.surname,
        full_name: `${driver.forename} ${driver.surname}`,
        code: code && code.length > 0 ? code.toUpperCase() : synthesizeDriverCode(driver.surname)
      };
    });

    return [emit(TABLES.driversExt, rows)];
  }
};

export const constructorsExtStage: DerivationStage = {
  name: 'constructors_ext',
  description: 'Constructors with short display name',
  inputs: [TABLES.constructors, TABLES.shortConstructorNames],
  outputs: [TABLES.constructorsExt],

  async run(ctx) {
    const constructors = await ctx.read(TABLES.constructors);
    const shortNames = await ctx.read(TABLES.shortConstructorNames);
    const shortNameByRef = new Map(shortNames.map(s => [s.constructor_ref, s.short_name]));

    const rows: ConstructorExtRow[] = constructors.map(c => ({
      constructor_id: c.constructor_id,
      constructor_ref: c.constructor_ref,
      name: c.name,
      short_name: shortNameByRef.get(c.constructor_ref) ?? c.name
    }));

    return [emit(TABLES.constructorsExt, rows)];
  }
};
