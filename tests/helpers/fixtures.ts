/**
 * Deterministic derivation fixtures
 *
 * Small hand-built dataset covering every stage:
 * - 1 season (2023), 2 rounds
 * - 3 drivers, 2 constructors (driver 3 switches team between rounds)
 * - round 1 has lap and pit data: a pit-exit overtake on lap 11 and an
 *   engine retirement after lap 4
 * - round 2 has results only
 * - each round at its own circuit
 */

import {
  TABLES,
  CircuitRow,
  ConstructorRow,
  DriverRow,
  DriverStandingRow,
  LapTimeRow,
  LiveryRow,
  PitStopRow,
  QualifyingRow,
  RaceRow,
  ResultRow,
  ShortConstructorNameRow,
  ShortGrandPrixNameRow,
  SprintResultRow,
  StatusRow,
  TdrOverrideRow
} from '../../src/db/schema';
import { MemoryStore } from '../../src/db/memory-store';
import { DEFAULT_DERIVATION_CONFIG, DerivationConfig } from '../../src/config/derivation';
import { IssueCollector } from '../../src/observability/invariants';
import { DerivationLogger } from '../../src/observability/logger';
import { DerivationStage, StageContext, StageOutput } from '../../src/etl/pipeline/stage';

export interface BaseData {
  circuits: CircuitRow[];
  races: RaceRow[];
  drivers: DriverRow[];
  constructors: ConstructorRow[];
  results: ResultRow[];
  lapTimes: LapTimeRow[];
  pitStops: PitStopRow[];
  qualifying: QualifyingRow[];
  status: StatusRow[];
  driverStandings: DriverStandingRow[];
  sprintResults: SprintResultRow[];
  shortGrandPrixNames: ShortGrandPrixNameRow[];
  shortConstructorNames: ShortConstructorNameRow[];
  liveries: LiveryRow[];
  tdrOverrides: TdrOverrideRow[];
}

/**
 * MemoryStore with every base table present (empty unless given)
 */
export async function seedStore(data: Partial<BaseData>): Promise<MemoryStore> {
  const store = new MemoryStore();
  await store.replaceTable(TABLES.circuits, data.circuits ?? []);
  await store.replaceTable(TABLES.races, data.races ?? []);
  await store.replaceTable(TABLES.drivers, data.drivers ?? []);
  await store.replaceTable(TABLES.constructors, data.constructors ?? []);
  await store.replaceTable(TABLES.results, data.results ?? []);
  await store.replaceTable(TABLES.lapTimes, data.lapTimes ?? []);
  await store.replaceTable(TABLES.pitStops, data.pitStops ?? []);
  await store.replaceTable(TABLES.qualifying, data.qualifying ?? []);
  await store.replaceTable(TABLES.status, data.status ?? []);
  await store.replaceTable(TABLES.driverStandings, data.driverStandings ?? []);
  await store.replaceTable(TABLES.sprintResults, data.sprintResults ?? []);
  await store.replaceTable(TABLES.shortGrandPrixNames, data.shortGrandPrixNames ?? []);
  await store.replaceTable(TABLES.shortConstructorNames, data.shortConstructorNames ?? []);
  await store.replaceTable(TABLES.liveries, data.liveries ?? []);
  await store.replaceTable(TABLES.tdrOverrides, data.tdrOverrides ?? []);
  return store;
}

export function testConfig(overrides: Partial<DerivationConfig> = {}): DerivationConfig {
  return { ...DEFAULT_DERIVATION_CONFIG, ...overrides };
}

export function silentLogger(): DerivationLogger {
  return new DerivationLogger({ silent: true });
}

/**
 * Run one stage directly against a store and write its outputs
 */
export async function runStage(
  stage: DerivationStage,
  store: MemoryStore,
  overrides: Partial<DerivationConfig> = {}
): Promise<{ outputs: StageOutput[]; issues: IssueCollector }> {
  const config = testConfig(overrides);
  const logger = silentLogger();
  const issues = new IssueCollector(config.strictInvariants, logger);
  const ctx: StageContext = {
    stage: stage.name,
    config,
    logger,
    issues,
    read: table => store.readTable(table)
  };
  const outputs = await stage.run(ctx);
  for (const output of outputs) {
    await output.write(store);
  }
  return { outputs, issues };
}

// ─── Row builders ────────────────────────────────────────────────────────────

export function result(overrides: Partial<ResultRow> & Pick<ResultRow, 'race_id' | 'driver_id'>): ResultRow {
  return {
    result_id: overrides.race_id * 100 + overrides.driver_id,
    constructor_id: 10,
    grid: 1,
    position: 1,
    position_order: 1,
    points: 0,
    laps: 0,
    status_id: 1,
    ...overrides
  };
}

/**
 * One lap_times row per lap, same duration each lap unless overridden
 */
export function laps(
  raceId: number,
  driverId: number,
  positions: readonly number[],
  lapMs: number | ((lap: number) => number)
): LapTimeRow[] {
  return positions.map((position, index) => {
    const lap = index + 1;
    return {
      race_id: raceId,
      driver_id: driverId,
      lap,
      position,
      milliseconds: typeof lapMs === 'number' ? lapMs : lapMs(lap)
    };
  });
}

export function repeat(value: number, times: number): number[] {
  return Array.from({ length: times }, () => value);
}

// ─── Season fixture ──────────────────────────────────────────────────────────

export const ALPHA = 1;
export const BRAVO = 2;
export const CHARLIE = 3;
export const RED_TEAM = 10;
export const BLUE_TEAM = 20;
export const ROUND_ONE = 101;
export const ROUND_TWO = 102;

export function seasonFixture(): BaseData {
  return {
    circuits: [
      { circuit_id: 1, circuit_ref: 'sakhir', name: 'Sakhir Circuit', location: 'Sakhir', country: 'Bahrain' },
      { circuit_id: 2, circuit_ref: 'jeddah', name: 'Jeddah Street Circuit', location: 'Jeddah', country: null }
    ],
    races: [
      { race_id: ROUND_ONE, year: 2023, round: 1, circuit_id: 1, name: 'Bahrain Grand Prix', date: '2023-03-05' },
      { race_id: ROUND_TWO, year: 2023, round: 2, circuit_id: 2, name: 'Saudi Arabian Grand Prix', date: '2023-03-19' }
    ],
    drivers: [
      { driver_id: ALPHA, driver_ref: 'alpha_one', number: 11, code: 'ALP', forename: 'Anna', surname: 'Alpha' },
      { driver_id: BRAVO, driver_ref: 'bravo_two', number: 22, code: null, forename: 'Bruno', surname: 'Brávo' },
      { driver_id: CHARLIE, driver_ref: 'charlie_three', number: null, code: null, forename: 'Carl', surname: 'Ch' }
    ],
    constructors: [
      { constructor_id: RED_TEAM, constructor_ref: 'red_team', name: 'Red Team' },
      { constructor_id: BLUE_TEAM, constructor_ref: 'blue_team', name: 'Blue Team' }
    ],
    status: [
      { status_id: 1, status: 'Finished' },
      { status_id: 4, status: 'Collision' },
      { status_id: 5, status: 'Engine' },
      { status_id: 11, status: '+1 Lap' }
    ],
    results: [
      result({ race_id: ROUND_ONE, driver_id: ALPHA, constructor_id: RED_TEAM, grid: 2, position: 1, position_order: 1, points: 25, laps: 11 }),
      result({ race_id: ROUND_ONE, driver_id: BRAVO, constructor_id: BLUE_TEAM, grid: 1, position: 2, position_order: 2, points: 18, laps: 11 }),
      result({ race_id: ROUND_ONE, driver_id: CHARLIE, constructor_id: BLUE_TEAM, grid: 3, position: null, position_order: 3, points: 0, laps: 4, status_id: 5 }),
      result({ race_id: ROUND_TWO, driver_id: ALPHA, constructor_id: RED_TEAM, grid: 1, position: 1, position_order: 1, points: 25, laps: 50 }),
      result({ race_id: ROUND_TWO, driver_id: BRAVO, constructor_id: BLUE_TEAM, grid: 2, position: 2, position_order: 2, points: 18, laps: 50 }),
      result({ race_id: ROUND_TWO, driver_id: CHARLIE, constructor_id: RED_TEAM, grid: 3, position: 3, position_order: 3, points: 15, laps: 50 })
    ],
    qualifying: [
      { race_id: ROUND_ONE, driver_id: BRAVO, position: 1 },
      { race_id: ROUND_ONE, driver_id: ALPHA, position: 2 },
      { race_id: ROUND_ONE, driver_id: CHARLIE, position: 3 }
    ],
    lapTimes: [
      // Alpha trails by 15s after lap 1, passes Bravo on lap 11 when Bravo rejoins
      ...laps(ROUND_ONE, ALPHA, [...repeat(2, 10), 1], lap => (lap === 1 ? 105000 : 90000)),
      ...laps(ROUND_ONE, BRAVO, [...repeat(1, 10), 2], 90000),
      ...laps(ROUND_ONE, CHARLIE, repeat(3, 4), 95000)
    ],
    pitStops: [{ race_id: ROUND_ONE, driver_id: BRAVO, stop: 1, lap: 10, milliseconds: 22000 }],
    driverStandings: [
      { race_id: ROUND_ONE, driver_id: ALPHA, points: 25, position: 1, wins: 1 },
      { race_id: ROUND_ONE, driver_id: BRAVO, points: 18, position: 2, wins: 0 },
      { race_id: ROUND_ONE, driver_id: CHARLIE, points: 0, position: 3, wins: 0 },
      { race_id: ROUND_TWO, driver_id: ALPHA, points: 50, position: 1, wins: 2 },
      { race_id: ROUND_TWO, driver_id: BRAVO, points: 36, position: 2, wins: 0 },
      { race_id: ROUND_TWO, driver_id: CHARLIE, points: 15, position: 3, wins: 0 }
    ],
    sprintResults: [],
    shortGrandPrixNames: [{ full_name: 'Bahrain Grand Prix', short_name: 'Bahrain' }],
    shortConstructorNames: [{ constructor_ref: 'red_team', short_name: 'Red' }],
    liveries: [{ constructor_ref: 'red_team', start_year: 2020, end_year: null, primary_hex_code: '#FF0000' }],
    tdrOverrides: []
  };
}
