/**
 * Overtake cause policy
 *
 * A position flip between consecutive laps is attributed to the overtaken
 * car's circumstances, in strict priority:
 *   retirement > pit entry > pit exit > start > track
 */

import { OvertakeCause, RetirementCause } from '../../types/derived';

export interface OvertakeCandidate {
  lap: number;
  overtakingDriverId: number;
  overtakenDriverId: number;
}

/**
 * Per-race lookups the rules need
 */
export interface RaceTimeline {
  /** Retirement recorded for a driver (lap = classified laps + 1) */
  retirementOf(driverId: number): { lap: number; cause: RetirementCause } | undefined;
  /** Total stationary time of the stops a driver made on a lap; null when any duration is unknown */
  pitDurationAt(driverId: number, lap: number): number | null | undefined;
  /** Cumulative race time at the end of a lap (lap 0 is time 0) */
  runningMsAt(driverId: number, lap: number): number | null | undefined;
  /** Lap-0 slot */
  gridSlotOf(driverId: number): number | undefined;
}

export interface OvertakePolicyOptions {
  startGridWindow: number;
}

export type OvertakeRule = (
  candidate: OvertakeCandidate,
  timeline: RaceTimeline,
  options: OvertakePolicyOptions
) => OvertakeCause | null;

export const isRetirementOvertake: OvertakeRule = (candidate, timeline) => {
  const retirement = timeline.retirementOf(candidate.overtakenDriverId);
  if (retirement && retirement.lap === candidate.lap) {
    return { kind: 'retirement', cause: retirement.cause };
  }
  return null;
};

export const isPitEntryOvertake: OvertakeRule = (candidate, timeline) => {
  const stop = timeline.pitDurationAt(candidate.overtakenDriverId, candidate.lap);
  return stop === undefined ? null : { kind: 'pit_entry' };
};

/**
 * The overtaken car stopped on the previous lap and lost more time in the pit
 * lane than it held over the overtaking car at the lap before that stop
 */
export const isPitExitOvertake: OvertakeRule = (candidate, timeline) => {
  const stopLap = candidate.lap - 1;
  const duration = timeline.pitDurationAt(candidate.overtakenDriverId, stopLap);
  if (duration === undefined || duration === null) {
    return null;
  }

  const referenceLap = stopLap - 1;
  const overtakingMs = timeline.runningMsAt(candidate.overtakingDriverId, referenceLap);
  const overtakenMs = timeline.runningMsAt(candidate.overtakenDriverId, referenceLap);
  if (overtakingMs === undefined || overtakingMs === null || overtakenMs === undefined || overtakenMs === null) {
    return null;
  }

  return duration > overtakingMs - overtakenMs ? { kind: 'pit_exit' } : null;
};

export const isStartOvertake: OvertakeRule = (candidate, timeline, options) => {
  if (candidate.lap !== 1) {
    return null;
  }
  const overtakingSlot = timeline.gridSlotOf(candidate.overtakingDriverId);
  const overtakenSlot = timeline.gridSlotOf(candidate.overtakenDriverId);
  if (overtakingSlot === undefined || overtakenSlot === undefined) {
    return null;
  }
  return overtakingSlot - overtakenSlot <= options.startGridWindow ? { kind: 'start' } : null;
};

export const OVERTAKE_RULES: readonly OvertakeRule[] = [
  isRetirementOvertake,
  isPitEntryOvertake,
  isPitExitOvertake,
  isStartOvertake
];

export function classifyOvertake(
  candidate: OvertakeCandidate,
  timeline: RaceTimeline,
  options: OvertakePolicyOptions
): OvertakeCause {
  for (const rule of OVERTAKE_RULES) {
    const cause = rule(candidate, timeline, options);
    if (cause) {
      return cause;
    }
  }
  return { kind: 'track' };
}
