/**
 * Domain types for derived race facts
 *
 * The relational tables carry these as flat text columns (lap_type,
 * overtake_desc); in code they are closed unions so every consumer handles
 * every case.
 */

import { LapPositionRow } from '../db/schema';
import { DataIntegrityError } from '../etl/errors';

export const RETIREMENT_CAUSES = ['Disqualification', 'Driver Error', 'Mechanical Problem'] as const;
export type RetirementCause = (typeof RETIREMENT_CAUSES)[number];

export const GRID_LAP_TYPES = [
  'Starting Position - No Qualification',
  'Starting Position - Grid Drop',
  'Starting Position - Grid Increase',
  'Starting Position - Qualifying'
] as const;
export type GridLapType = (typeof GRID_LAP_TYPES)[number];

export const RACE_LAP_TYPE = 'Race';

interface LapPositionBase {
  race_id: number;
  driver_id: number;
  lap: number;
  position: number;
}

export interface NormalLap extends LapPositionBase {
  kind: 'normal';
}

export interface GridStart extends LapPositionBase {
  kind: 'grid';
  grid_type: GridLapType;
}

export interface RetirementLap extends LapPositionBase {
  kind: 'retirement';
  cause: RetirementCause;
}

export type LapPosition = NormalLap | GridStart | RetirementLap;

export function retirementType(cause: RetirementCause): string {
  return `Retirement (${cause})`;
}

export function isRetirementCause(value: string): value is RetirementCause {
  return RETIREMENT_CAUSES.some(cause => cause === value);
}

function isGridLapType(value: string): value is GridLapType {
  return GRID_LAP_TYPES.some(type => type === value);
}

export function lapTypeOf(position: LapPosition): string {
  switch (position.kind) {
    case 'normal':
      return RACE_LAP_TYPE;
    case 'grid':
      return position.grid_type;
    case 'retirement':
      return retirementType(position.cause);
  }
}

export function toLapPositionRow(position: LapPosition): LapPositionRow {
  return {
    race_id: position.race_id,
    driver_id: position.driver_id,
    lap: position.lap,
    position: position.position,
    lap_type: lapTypeOf(position)
  };
}

const RETIREMENT_LAP_TYPE = /^Retirement \((.+)\)$/;

export function fromLapPositionRow(row: LapPositionRow): LapPosition {
  const base = { race_id: row.race_id, driver_id: row.driver_id, lap: row.lap, position: row.position };

  if (row.lap_type === RACE_LAP_TYPE) {
    return { kind: 'normal', ...base };
  }
  if (isGridLapType(row.lap_type)) {
    return { kind: 'grid', ...base, grid_type: row.lap_type };
  }
  const match = RETIREMENT_LAP_TYPE.exec(row.lap_type);
  if (match && isRetirementCause(match[1])) {
    return { kind: 'retirement', ...base, cause: match[1] };
  }

  throw new DataIntegrityError('unknown_lap_type', `Unrecognised lap_type "${row.lap_type}"`, {
    table: 'lap_positions',
    race_id: row.race_id,
    driver_id: row.driver_id,
    lap: row.lap
  });
}

export type OvertakeCause =
  | { kind: 'track' }
  | { kind: 'pit_entry' }
  | { kind: 'pit_exit' }
  | { kind: 'start' }
  | { kind: 'retirement'; cause: RetirementCause };

export type OvertakeTypeCode = 'T' | 'P' | 'S' | 'R';

export function describeOvertakeCause(cause: OvertakeCause): string {
  switch (cause.kind) {
    case 'track':
      return 'Track';
    case 'pit_entry':
      return 'Pit Stop (Pit Entry)';
    case 'pit_exit':
      return 'Pit Stop (Pit Exit)';
    case 'start':
      return 'Start';
    case 'retirement':
      return retirementType(cause.cause);
  }
}

export function overtakeTypeCode(cause: OvertakeCause): OvertakeTypeCode {
  switch (cause.kind) {
    case 'track':
      return 'T';
    case 'pit_entry':
    case 'pit_exit':
      return 'P';
    case 'start':
      return 'S';
    case 'retirement':
      return 'R';
  }
}

/**
 * Every overtake description, in summary order
 */
export const OVERTAKE_DESCRIPTIONS: readonly string[] = [
  describeOvertakeCause({ kind: 'track' }),
  describeOvertakeCause({ kind: 'pit_entry' }),
  describeOvertakeCause({ kind: 'pit_exit' }),
  describeOvertakeCause({ kind: 'start' }),
  ...RETIREMENT_CAUSES.map(cause => describeOvertakeCause({ kind: 'retirement', cause }))
];
