/**
 * Relational schema for base (input), derived (output) and metadata tables
 *
 * Each table is declared once: a zod row schema (which also coerces the string
 * numerics `pg` returns for NUMERIC/BIGINT) and the ordered SQL column list used
 * for DDL, inserts and information_schema validation.
 */

import { z } from 'zod';

export type ColumnType = 'integer' | 'numeric' | 'text' | 'boolean' | 'date';

export interface ColumnDef<Row> {
  name: keyof Row & string;
  type: ColumnType;
  nullable?: boolean;
}

export interface TableMeta {
  name: string;
  kind: 'base' | 'derived' | 'meta';
  columns: ReadonlyArray<{ name: string; type: ColumnType; nullable?: boolean }>;
  /** Columns used to order reads so every consumer sees rows in a stable order */
  orderBy: readonly string[];
}

export interface TableDefinition<Row> extends TableMeta {
  schema: z.ZodType<Row, z.ZodTypeDef, unknown>;
  columns: ReadonlyArray<ColumnDef<Row>>;
  orderBy: ReadonlyArray<keyof Row & string>;
}

function defineTable<Row>(
  name: string,
  kind: TableMeta['kind'],
  schema: z.ZodType<Row, z.ZodTypeDef, unknown>,
  columns: ReadonlyArray<ColumnDef<Row>>,
  orderBy: ReadonlyArray<keyof Row & string>
): TableDefinition<Row> {
  return { name, kind, schema, columns, orderBy };
}

// ─── Column codecs ───────────────────────────────────────────────────────────

function blankToNull(value: unknown): unknown {
  if (value === undefined || value === '') {
    return null;
  }
  return value;
}

function numericOrNull(value: unknown): unknown {
  const v = blankToNull(value);
  return typeof v === 'string' ? Number(v) : v;
}

function isoDate(value: unknown): unknown {
  return value instanceof Date ? value.toISOString().slice(0, 10) : value;
}

const int = z.coerce.number().int();
const num = z.coerce.number();
const text = z.string();
const bool = z.boolean();
const date = z.preprocess(isoDate, z.string());
const nullableInt = z.preprocess(numericOrNull, z.number().int().nullable());
const nullableNum = z.preprocess(numericOrNull, z.number().nullable());
const nullableText = z.preprocess(blankToNull, z.string().nullable());

// ─── Base tables ─────────────────────────────────────────────────────────────

export const circuitRowSchema = z.object({
  circuit_id: int,
  circuit_ref: text,
  name: text,
  location: nullableText,
  country: nullableText
});
export type CircuitRow = z.infer<typeof circuitRowSchema>;

export const raceRowSchema = z.object({
  race_id: int,
  year: int,
  round: int,
  circuit_id: int,
  name: text,
  date
});
export type RaceRow = z.infer<typeof raceRowSchema>;

export const driverRowSchema = z.object({
  driver_id: int,
  driver_ref: text,
  number: nullableInt,
  code: nullableText,
  forename: text,
  surname: text
});
export type DriverRow = z.infer<typeof driverRowSchema>;

export const constructorRowSchema = z.object({
  constructor_id: int,
  constructor_ref: text,
  name: text
});
export type ConstructorRow = z.infer<typeof constructorRowSchema>;

export const resultRowSchema = z.object({
  result_id: int,
  race_id: int,
  driver_id: int,
  constructor_id: int,
  grid: int,
  position: nullableInt,
  position_order: int,
  points: num,
  laps: int,
  status_id: int
});
export type ResultRow = z.infer<typeof resultRowSchema>;

export const lapTimeRowSchema = z.object({
  race_id: int,
  driver_id: int,
  lap: int,
  position: int,
  milliseconds: nullableInt
});
export type LapTimeRow = z.infer<typeof lapTimeRowSchema>;

export const pitStopRowSchema = z.object({
  race_id: int,
  driver_id: int,
  stop: int,
  lap: int,
  milliseconds: nullableInt
});
export type PitStopRow = z.infer<typeof pitStopRowSchema>;

export const qualifyingRowSchema = z.object({
  race_id: int,
  driver_id: int,
  position: nullableInt
});
export type QualifyingRow = z.infer<typeof qualifyingRowSchema>;

export const statusRowSchema = z.object({
  status_id: int,
  status: text
});
export type StatusRow = z.infer<typeof statusRowSchema>;

export const driverStandingRowSchema = z.object({
  race_id: int,
  driver_id: int,
  points: num,
  position: nullableInt,
  wins: int
});
export type DriverStandingRow = z.infer<typeof driverStandingRowSchema>;

export const sprintResultRowSchema = z.object({
  race_id: int,
  driver_id: int,
  points: num
});
export type SprintResultRow = z.infer<typeof sprintResultRowSchema>;

export const shortGrandPrixNameRowSchema = z.object({
  full_name: text,
  short_name: text
});
export type ShortGrandPrixNameRow = z.infer<typeof shortGrandPrixNameRowSchema>;

export const shortConstructorNameRowSchema = z.object({
  constructor_ref: text,
  short_name: text
});
export type ShortConstructorNameRow = z.infer<typeof shortConstructorNameRowSchema>;

export const liveryRowSchema = z.object({
  constructor_ref: text,
  start_year: int,
  end_year: nullableInt,
  primary_hex_code: text
});
export type LiveryRow = z.infer<typeof liveryRowSchema>;

export const tdrOverrideRowSchema = z.object({
  year: int,
  constructor_ref: text,
  driver_ref: text,
  team_driver_rank: int
});
export type TdrOverrideRow = z.infer<typeof tdrOverrideRowSchema>;

// ─── Derived tables ──────────────────────────────────────────────────────────

export const raceExtRowSchema = z.object({
  race_id: int,
  year: int,
  round: int,
  circuit_id: int,
  name: text,
  short_name: text,
  date,
  is_pit_data_available: bool,
  has_sprint: bool,
  max_points: num
});
export type RaceExtRow = z.infer<typeof raceExtRowSchema>;

export const circuitExtRowSchema = circuitRowSchema.extend({
  last_race_year: int,
  number_of_races: int
});
export type CircuitExtRow = z.infer<typeof circuitExtRowSchema>;

export const lapTimeExtRowSchema = z.object({
  race_id: int,
  driver_id: int,
  lap: int,
  position: int,
  milliseconds: nullableInt,
  running_milliseconds: nullableInt
});
export type LapTimeExtRow = z.infer<typeof lapTimeExtRowSchema>;

export const lapTimeStatsRowSchema = z.object({
  race_id: int,
  driver_id: int,
  timed_laps: int,
  avg_milliseconds: nullableNum,
  stdev_milliseconds: nullableNum
});
export type LapTimeStatsRow = z.infer<typeof lapTimeStatsRowSchema>;

export const driverExtRowSchema = z.object({
  driver_id: int,
  driver_ref: text,
  forename: text,
  surname: text,
  full_name: text,
  code: text
});
export type DriverExtRow = z.infer<typeof driverExtRowSchema>;

export const constructorExtRowSchema = z.object({
  constructor_id: int,
  constructor_ref: text,
  name: text,
  short_name: text
});
export type ConstructorExtRow = z.infer<typeof constructorExtRowSchema>;

export const retirementRowSchema = z.object({
  race_id: int,
  driver_id: int,
  lap: int,
  position_order: int,
  status_id: int,
  status: text,
  retirement_cause: text,
  retirement_type: text
});
export type RetirementRow = z.infer<typeof retirementRowSchema>;

export const lapPositionRowSchema = z.object({
  race_id: int,
  driver_id: int,
  lap: int,
  position: int,
  lap_type: text
});
export type LapPositionRow = z.infer<typeof lapPositionRowSchema>;

export const overtakeRowSchema = z.object({
  race_id: int,
  lap: int,
  overtaking_driver_id: int,
  overtaken_driver_id: int,
  current_position: int,
  previous_position: int,
  overtaken_position: int,
  overtake_type: text,
  overtake_desc: text
});
export type OvertakeRow = z.infer<typeof overtakeRowSchema>;

export const overtakesByRaceRowSchema = z.object({
  race_id: int,
  year: int,
  round: int,
  race_name: text,
  overtake_desc: text,
  num_overtakes: int
});
export type OvertakesByRaceRow = z.infer<typeof overtakesByRaceRowSchema>;

export const overtakesByCircuitRowSchema = z.object({
  circuit_id: int,
  circuit_name: text,
  race_id: int,
  year: int,
  race_name: text,
  overtake_type: text,
  num_overtakes: int
});
export type OvertakesByCircuitRow = z.infer<typeof overtakesByCircuitRowSchema>;

export const driveRowSchema = z.object({
  year: int,
  driver_id: int,
  drive_id: int,
  constructor_id: nullableInt,
  first_round: int,
  last_round: int,
  is_first_drive_of_season: bool,
  is_final_drive_of_season: bool
});
export type DriveRow = z.infer<typeof driveRowSchema>;

export const teamDriverRankRowSchema = z.object({
  year: int,
  constructor_id: int,
  constructor_ref: text,
  driver_id: int,
  driver_ref: text,
  eoy_position: nullableInt,
  team_driver_rank: int,
  is_override: bool
});
export type TeamDriverRankRow = z.infer<typeof teamDriverRankRowSchema>;

export const standingsProjectionRowSchema = z.object({
  race_id: int,
  year: int,
  round: int,
  driver_id: int,
  constructor_id: nullableInt,
  constructor_name: text,
  hex_code: text,
  current_points: num,
  current_position: int,
  max_points_next_race: num,
  max_points_this_season: num,
  best_position_next_race: int,
  best_position_this_season: int,
  worst_position_next_race: int,
  worst_position_this_season: int
});
export type StandingsProjectionRow = z.infer<typeof standingsProjectionRowSchema>;

export const polesitterRowSchema = z.object({
  race_id: int,
  year: int,
  round: int,
  race_short_name: text,
  driver_id: int,
  full_name: text,
  won_from_pole: bool
});
export type PolesitterRow = z.infer<typeof polesitterRowSchema>;

export const polesitterStatsRowSchema = z.object({
  driver_id: int,
  full_name: text,
  num_poles: int,
  pole_to_win_pct: num
});
export type PolesitterStatsRow = z.infer<typeof polesitterStatsRowSchema>;

// ─── Metadata tables ─────────────────────────────────────────────────────────

export const manifestRowSchema = z.object({
  table_name: text,
  run_id: text,
  build_seq: int,
  row_count: int,
  content_hash: text,
  input_hashes: text,
  built_at: text
});
export type ManifestRow = z.infer<typeof manifestRowSchema>;

export const derivationRunRowSchema = z.object({
  run_id: text,
  status: text,
  stages: text,
  rows_written: int,
  integrity_issues: int,
  ambiguities: int,
  execution_hash: text,
  started_at: text,
  finished_at: text,
  failure_reason: nullableText
});
export type DerivationRunRow = z.infer<typeof derivationRunRowSchema>;

// ─── Table definitions ───────────────────────────────────────────────────────

export const TABLES = {
  circuits: defineTable<CircuitRow>('circuits', 'base', circuitRowSchema, [
    { name: 'circuit_id', type: 'integer' },
    { name: 'circuit_ref', type: 'text' },
    { name: 'name', type: 'text' },
    { name: 'location', type: 'text', nullable: true },
    { name: 'country', type: 'text', nullable: true }
  ], ['circuit_id']),

  races: defineTable<RaceRow>('races', 'base', raceRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'year', type: 'integer' },
    { name: 'round', type: 'integer' },
    { name: 'circuit_id', type: 'integer' },
    { name: 'name', type: 'text' },
    { name: 'date', type: 'date' }
  ], ['year', 'round']),

  drivers: defineTable<DriverRow>('drivers', 'base', driverRowSchema, [
    { name: 'driver_id', type: 'integer' },
    { name: 'driver_ref', type: 'text' },
    { name: 'number', type: 'integer', nullable: true },
    { name: 'code', type: 'text', nullable: true },
    { name: 'forename', type: 'text' },
    { name: 'surname', type: 'text' }
  ], ['driver_id']),

  constructors: defineTable<ConstructorRow>('constructors', 'base', constructorRowSchema, [
    { name: 'constructor_id', type: 'integer' },
    { name: 'constructor_ref', type: 'text' },
    { name: 'name', type: 'text' }
  ], ['constructor_id']),

  results: defineTable<ResultRow>('results', 'base', resultRowSchema, [
    { name: 'result_id', type: 'integer' },
    { name: 'race_id', type: 'integer' },
    { name: 'driver_id', type: 'integer' },
    { name: 'constructor_id', type: 'integer' },
    { name: 'grid', type: 'integer' },
    { name: 'position', type: 'integer', nullable: true },
    { name: 'position_order', type: 'integer' },
    { name: 'points', type: 'numeric' },
    { name: 'laps', type: 'integer' },
    { name: 'status_id', type: 'integer' }
  ], ['race_id', 'position_order', 'result_id']),

  lapTimes: defineTable<LapTimeRow>('lap_times', 'base', lapTimeRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'driver_id', type: 'integer' },
    { name: 'lap', type: 'integer' },
    { name: 'position', type: 'integer' },
    { name: 'milliseconds', type: 'integer', nullable: true }
  ], ['race_id', 'driver_id', 'lap']),

  pitStops: defineTable<PitStopRow>('pit_stops', 'base', pitStopRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'driver_id', type: 'integer' },
    { name: 'stop', type: 'integer' },
    { name: 'lap', type: 'integer' },
    { name: 'milliseconds', type: 'integer', nullable: true }
  ], ['race_id', 'driver_id', 'stop']),

  qualifying: defineTable<QualifyingRow>('qualifying', 'base', qualifyingRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'driver_id', type: 'integer' },
    { name: 'position', type: 'integer', nullable: true }
  ], ['race_id', 'driver_id']),

  status: defineTable<StatusRow>('status', 'base', statusRowSchema, [
    { name: 'status_id', type: 'integer' },
    { name: 'status', type: 'text' }
  ], ['status_id']),

  driverStandings: defineTable<DriverStandingRow>('driver_standings', 'base', driverStandingRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'driver_id', type: 'integer' },
    { name: 'points', type: 'numeric' },
    { name: 'position', type: 'integer', nullable: true },
    { name: 'wins', type: 'integer' }
  ], ['race_id', 'driver_id']),

  sprintResults: defineTable<SprintResultRow>('sprint_results', 'base', sprintResultRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'driver_id', type: 'integer' },
    { name: 'points', type: 'numeric' }
  ], ['race_id', 'driver_id']),

  shortGrandPrixNames: defineTable<ShortGrandPrixNameRow>('short_grand_prix_names', 'base', shortGrandPrixNameRowSchema, [
    { name: 'full_name', type: 'text' },
    { name: 'short_name', type: 'text' }
  ], ['full_name']),

  shortConstructorNames: defineTable<ShortConstructorNameRow>('short_constructor_names', 'base', shortConstructorNameRowSchema, [
    { name: 'constructor_ref', type: 'text' },
    { name: 'short_name', type: 'text' }
  ], ['constructor_ref']),

  liveries: defineTable<LiveryRow>('liveries', 'base', liveryRowSchema, [
    { name: 'constructor_ref', type: 'text' },
    { name: 'start_year', type: 'integer' },
    { name: 'end_year', type: 'integer', nullable: true },
    { name: 'primary_hex_code', type: 'text' }
  ], ['constructor_ref', 'start_year']),

  tdrOverrides: defineTable<TdrOverrideRow>('tdr_overrides', 'base', tdrOverrideRowSchema, [
    { name: 'year', type: 'integer' },
    { name: 'constructor_ref', type: 'text' },
    { name: 'driver_ref', type: 'text' },
    { name: 'team_driver_rank', type: 'integer' }
  ], ['year', 'constructor_ref', 'driver_ref']),

  circuitsExt: defineTable<CircuitExtRow>('circuits_ext', 'derived', circuitExtRowSchema, [
    { name: 'circuit_id', type: 'integer' },
    { name: 'circuit_ref', type: 'text' },
    { name: 'name', type: 'text' },
    { name: 'location', type: 'text', nullable: true },
    { name: 'country', type: 'text', nullable: true },
    { name: 'last_race_year', type: 'integer' },
    { name: 'number_of_races', type: 'integer' }
  ], ['circuit_id']),

  racesExt: defineTable<RaceExtRow>('races_ext', 'derived', raceExtRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'year', type: 'integer' },
    { name: 'round', type: 'integer' },
    { name: 'circuit_id', type: 'integer' },
    { name: 'name', type: 'text' },
    { name: 'short_name', type: 'text' },
    { name: 'date', type: 'date' },
    { name: 'is_pit_data_available', type: 'boolean' },
    { name: 'has_sprint', type: 'boolean' },
    { name: 'max_points', type: 'numeric' }
  ], ['year', 'round']),

  lapTimesExt: defineTable<LapTimeExtRow>('lap_times_ext', 'derived', lapTimeExtRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'driver_id', type: 'integer' },
    { name: 'lap', type: 'integer' },
    { name: 'position', type: 'integer' },
    { name: 'milliseconds', type: 'integer', nullable: true },
    { name: 'running_milliseconds', type: 'integer', nullable: true }
  ], ['race_id', 'driver_id', 'lap']),

  lapTimeStats: defineTable<LapTimeStatsRow>('lap_time_stats', 'derived', lapTimeStatsRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'driver_id', type: 'integer' },
    { name: 'timed_laps', type: 'integer' },
    { name: 'avg_milliseconds', type: 'numeric', nullable: true },
    { name: 'stdev_milliseconds', type: 'numeric', nullable: true }
  ], ['race_id', 'driver_id']),

  driversExt: defineTable<DriverExtRow>('drivers_ext', 'derived', driverExtRowSchema, [
    { name: 'driver_id', type: 'integer' },
    { name: 'driver_ref', type: 'text' },
    { name: 'forename', type: 'text' },
    { name: 'surname', type: 'text' },
    { name: 'full_name', type: 'text' },
    { name: 'code', type: 'text' }
  ], ['driver_id']),

  constructorsExt: defineTable<ConstructorExtRow>('constructors_ext', 'derived', constructorExtRowSchema, [
    { name: 'constructor_id', type: 'integer' },
    { name: 'constructor_ref', type: 'text' },
    { name: 'name', type: 'text' },
    { name: 'short_name', type: 'text' }
  ], ['constructor_id']),

  retirements: defineTable<RetirementRow>('retirements', 'derived', retirementRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'driver_id', type: 'integer' },
    { name: 'lap', type: 'integer' },
    { name: 'position_order', type: 'integer' },
    { name: 'status_id', type: 'integer' },
    { name: 'status', type: 'text' },
    { name: 'retirement_cause', type: 'text' },
    { name: 'retirement_type', type: 'text' }
  ], ['race_id', 'lap', 'position_order']),

  lapPositions: defineTable<LapPositionRow>('lap_positions', 'derived', lapPositionRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'driver_id', type: 'integer' },
    { name: 'lap', type: 'integer' },
    { name: 'position', type: 'integer' },
    { name: 'lap_type', type: 'text' }
  ], ['race_id', 'lap', 'position']),

  overtakes: defineTable<OvertakeRow>('overtakes', 'derived', overtakeRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'lap', type: 'integer' },
    { name: 'overtaking_driver_id', type: 'integer' },
    { name: 'overtaken_driver_id', type: 'integer' },
    { name: 'current_position', type: 'integer' },
    { name: 'previous_position', type: 'integer' },
    { name: 'overtaken_position', type: 'integer' },
    { name: 'overtake_type', type: 'text' },
    { name: 'overtake_desc', type: 'text' }
  ], ['race_id', 'lap', 'current_position', 'overtaken_position']),

  overtakesByRace: defineTable<OvertakesByRaceRow>('overtakes_by_race', 'derived', overtakesByRaceRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'year', type: 'integer' },
    { name: 'round', type: 'integer' },
    { name: 'race_name', type: 'text' },
    { name: 'overtake_desc', type: 'text' },
    { name: 'num_overtakes', type: 'integer' }
  ], ['year', 'round', 'overtake_desc']),

  overtakesByCircuit: defineTable<OvertakesByCircuitRow>('overtakes_by_circuit', 'derived', overtakesByCircuitRowSchema, [
    { name: 'circuit_id', type: 'integer' },
    { name: 'circuit_name', type: 'text' },
    { name: 'race_id', type: 'integer' },
    { name: 'year', type: 'integer' },
    { name: 'race_name', type: 'text' },
    { name: 'overtake_type', type: 'text' },
    { name: 'num_overtakes', type: 'integer' }
  ], ['circuit_name', 'year', 'race_id', 'overtake_type']),

  drives: defineTable<DriveRow>('drives', 'derived', driveRowSchema, [
    { name: 'year', type: 'integer' },
    { name: 'driver_id', type: 'integer' },
    { name: 'drive_id', type: 'integer' },
    { name: 'constructor_id', type: 'integer', nullable: true },
    { name: 'first_round', type: 'integer' },
    { name: 'last_round', type: 'integer' },
    { name: 'is_first_drive_of_season', type: 'boolean' },
    { name: 'is_final_drive_of_season', type: 'boolean' }
  ], ['year', 'driver_id', 'drive_id']),

  teamDriverRanks: defineTable<TeamDriverRankRow>('team_driver_ranks', 'derived', teamDriverRankRowSchema, [
    { name: 'year', type: 'integer' },
    { name: 'constructor_id', type: 'integer' },
    { name: 'constructor_ref', type: 'text' },
    { name: 'driver_id', type: 'integer' },
    { name: 'driver_ref', type: 'text' },
    { name: 'eoy_position', type: 'integer', nullable: true },
    { name: 'team_driver_rank', type: 'integer' },
    { name: 'is_override', type: 'boolean' }
  ], ['year', 'constructor_id', 'team_driver_rank', 'driver_id']),

  standingsProjection: defineTable<StandingsProjectionRow>('standings_projection', 'derived', standingsProjectionRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'year', type: 'integer' },
    { name: 'round', type: 'integer' },
    { name: 'driver_id', type: 'integer' },
    { name: 'constructor_id', type: 'integer', nullable: true },
    { name: 'constructor_name', type: 'text' },
    { name: 'hex_code', type: 'text' },
    { name: 'current_points', type: 'numeric' },
    { name: 'current_position', type: 'integer' },
    { name: 'max_points_next_race', type: 'numeric' },
    { name: 'max_points_this_season', type: 'numeric' },
    { name: 'best_position_next_race', type: 'integer' },
    { name: 'best_position_this_season', type: 'integer' },
    { name: 'worst_position_next_race', type: 'integer' },
    { name: 'worst_position_this_season', type: 'integer' }
  ], ['year', 'round', 'current_position', 'driver_id']),

  polesitters: defineTable<PolesitterRow>('polesitters', 'derived', polesitterRowSchema, [
    { name: 'race_id', type: 'integer' },
    { name: 'year', type: 'integer' },
    { name: 'round', type: 'integer' },
    { name: 'race_short_name', type: 'text' },
    { name: 'driver_id', type: 'integer' },
    { name: 'full_name', type: 'text' },
    { name: 'won_from_pole', type: 'boolean' }
  ], ['year', 'round']),

  polesitterStats: defineTable<PolesitterStatsRow>('polesitter_stats', 'derived', polesitterStatsRowSchema, [
    { name: 'driver_id', type: 'integer' },
    { name: 'full_name', type: 'text' },
    { name: 'num_poles', type: 'integer' },
    { name: 'pole_to_win_pct', type: 'numeric' }
  ], ['pole_to_win_pct', 'driver_id']),

  derivationManifest: defineTable<ManifestRow>('derivation_manifest', 'meta', manifestRowSchema, [
    { name: 'table_name', type: 'text' },
    { name: 'run_id', type: 'text' },
    { name: 'build_seq', type: 'integer' },
    { name: 'row_count', type: 'integer' },
    { name: 'content_hash', type: 'text' },
    { name: 'input_hashes', type: 'text' },
    { name: 'built_at', type: 'text' }
  ], ['table_name']),

  derivationRuns: defineTable<DerivationRunRow>('derivation_runs', 'meta', derivationRunRowSchema, [
    { name: 'run_id', type: 'text' },
    { name: 'status', type: 'text' },
    { name: 'stages', type: 'text' },
    { name: 'rows_written', type: 'integer' },
    { name: 'integrity_issues', type: 'integer' },
    { name: 'ambiguities', type: 'integer' },
    { name: 'execution_hash', type: 'text' },
    { name: 'started_at', type: 'text' },
    { name: 'finished_at', type: 'text' },
    { name: 'failure_reason', type: 'text', nullable: true }
  ], ['started_at', 'run_id'])
};

export const BASE_TABLES: readonly TableMeta[] = Object.values(TABLES).filter(t => t.kind === 'base');
