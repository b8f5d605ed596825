import { TABLES, OvertakeRow, PitStopRow, LapTimeExtRow, RetirementRow } from '../../db/schema';
import {
  LapPosition,
  RetirementCause,
  describeOvertakeCause,
  fromLapPositionRow,
  isRetirementCause,
  overtakeTypeCode
} from '../../types/derived';
import {
  OvertakePolicyOptions,
  RaceTimeline,
  classifyOvertake
} from '../policies/overtake-causes';
import { DerivationStage, emit, groupBy, pairKey } from '../pipeline/stage';

/**
 * Lookups for one race, built from that race's rows only
 */
export function buildRaceTimeline(
  positions: readonly LapPosition[],
  retirements: readonly RetirementRow[],
  pitStops: readonly PitStopRow[],
  lapTimes: readonly LapTimeExtRow[]
): RaceTimeline {
  const retired = new Map<number, { lap: number; cause: RetirementCause }>();
  for (const row of retirements) {
    if (isRetirementCause(row.retirement_cause)) {
      retired.set(row.driver_id, { lap: row.lap, cause: row.retirement_cause });
    }
  }

  // several stops on one lap (drive-throughs, repairs) add up
  const pitDuration = new Map<string, number | null>();
  for (const stop of pitStops) {
    const key = pairKey(stop.driver_id, stop.lap);
    const previous = pitDuration.get(key);
    if (previous === undefined) {
      pitDuration.set(key, stop.milliseconds);
    } else {
      pitDuration.set(key, previous === null || stop.milliseconds === null ? null : previous + stop.milliseconds);
    }
  }

  const runningMs = new Map(lapTimes.map(l => [pairKey(l.driver_id, l.lap), l.running_milliseconds]));

  const gridSlot = new Map<number, number>();
  for (const p of positions) {
    if (p.kind === 'grid') {
      gridSlot.set(p.driver_id, p.position);
    }
  }

  return {
    retirementOf: driverId => retired.get(driverId),
    pitDurationAt: (driverId, lap) => {
      const key = pairKey(driverId, lap);
      return pitDuration.has(key) ? pitDuration.get(key) ?? null : undefined;
    },
    runningMsAt: (driverId, lap) => (lap === 0 ? 0 : runningMs.get(pairKey(driverId, lap))),
    gridSlotOf: driverId => gridSlot.get(driverId)
  };
}

/**
 * Every (lap, ordered pair) whose relative order flipped between lap L-1 and L
 */
export function detectOvertakes(
  raceId: number,
  positions: readonly LapPosition[],
  timeline: RaceTimeline,
  options: OvertakePolicyOptions
): OvertakeRow[] {
  const byLap = new Map<number, Map<number, LapPosition>>();
  for (const p of positions) {
    const lap = byLap.get(p.lap) ?? new Map<number, LapPosition>();
    lap.set(p.driver_id, p);
    byLap.set(p.lap, lap);
  }

  const rows: OvertakeRow[] = [];
  const laps = [...byLap.keys()].filter(lap => lap >= 1).sort((a, b) => a - b);

  for (const lap of laps) {
    const current = byLap.get(lap);
    const previous = byLap.get(lap - 1);
    if (!current || !previous) {
      continue;
    }

    for (const overtaking of current.values()) {
      const overtakingBefore = previous.get(overtaking.driver_id);
      if (!overtakingBefore) {
        continue;
      }

      for (const overtaken of current.values()) {
        if (overtaken.position <= overtaking.position) {
          continue;
        }
        const overtakenBefore = previous.get(overtaken.driver_id);
        if (!overtakenBefore || overtakenBefore.position > overtakingBefore.position) {
          continue;
        }

        const cause = classifyOvertake(
          { lap, overtakingDriverId: overtaking.driver_id, overtakenDriverId: overtaken.driver_id },
          timeline,
          options
        );
        rows.push({
          race_id: raceId,
          lap,
          overtaking_driver_id: overtaking.driver_id,
          overtaken_driver_id: overtaken.driver_id,
          current_position: overtaking.position,
          previous_position: overtakingBefore.position,
          overtaken_position: overtaken.position,
          overtake_type: overtakeTypeCode(cause),
          overtake_desc: describeOvertakeCause(cause)
        });
      }
    }
  }

  return rows;
}

export const overtakesStage: DerivationStage = {
  name: 'overtakes',
  description: 'Lap-over-lap position flips with classified cause',
  inputs: [TABLES.lapPositions, TABLES.retirements, TABLES.pitStops, TABLES.lapTimesExt, TABLES.racesExt],
  outputs: [TABLES.overtakes],

  async run(ctx) {
    const races = await ctx.read(TABLES.racesExt);
    const positions = await ctx.read(TABLES.lapPositions);
    const retirements = groupBy(await ctx.read(TABLES.retirements), r => r.race_id);
    const pitStops = groupBy(await ctx.read(TABLES.pitStops), p => p.race_id);
    const lapTimes = groupBy(await ctx.read(TABLES.lapTimesExt), l => l.race_id);
    const positionsByRace = groupBy(positions, p => p.race_id);

    const options: OvertakePolicyOptions = { startGridWindow: ctx.config.startGridWindow };
    const rows: OvertakeRow[] = [];

    for (const race of races) {
      if (ctx.config.overtakesRequirePitData && !race.is_pit_data_available) {
        continue;
      }
      const raceRows = positionsByRace.get(race.race_id);
      if (!raceRows) {
        continue;
      }

      const ladder = raceRows.map(fromLapPositionRow);
      const timeline = buildRaceTimeline(
        ladder,
        retirements.get(race.race_id) ?? [],
        pitStops.get(race.race_id) ?? [],
        lapTimes.get(race.race_id) ?? []
      );
      rows.push(...detectOvertakes(race.race_id, ladder, timeline, options));
    }

    return [emit(TABLES.overtakes, rows)];
  }
};
