import { TABLES, PolesitterRow, PolesitterStatsRow } from '../../db/schema';
import { DerivationStage, emit, groupBy, pairKey } from '../pipeline/stage';
import { primaryResults } from './results';

/**
 * Per-driver pole counts and pole-to-win ratio (0..1) for drivers with at least minPoles
 */
export function summarizePoles(polesitters: readonly PolesitterRow[], minPoles: number): PolesitterStatsRow[] {
  const stats: PolesitterStatsRow[] = [];
  for (const [driverId, poles] of groupBy(polesitters, p => p.driver_id)) {
    if (poles.length < minPoles) {
      continue;
    }
    const wins = poles.filter(p => p.won_from_pole).length;
    stats.push({
      driver_id: driverId,
      full_name: poles[0].full_name,
      num_poles: poles.length,
      pole_to_win_pct: wins / poles.length
    });
  }
  return stats;
}

export const polesittersStage: DerivationStage = {
  name: 'polesitters',
  description: 'Pole-position starts and pole-to-win conversion per driver',
  inputs: [TABLES.lapPositions, TABLES.results, TABLES.racesExt, TABLES.driversExt],
  outputs: [TABLES.polesitters, TABLES.polesitterStats],

  async run(ctx) {
    const positions = await ctx.read(TABLES.lapPositions);
    const results = primaryResults(await ctx.read(TABLES.results));
    const races = new Map((await ctx.read(TABLES.racesExt)).map(r => [r.race_id, r]));
    const drivers = new Map((await ctx.read(TABLES.driversExt)).map(d => [d.driver_id, d]));
    const resultByEntry = new Map(results.map(r => [pairKey(r.race_id, r.driver_id), r]));

    const polesitters: PolesitterRow[] = [];
    for (const start of positions) {
      if (start.lap !== 0 || start.position !== 1) {
        continue;
      }
      const race = races.get(start.race_id);
      const driver = drivers.get(start.driver_id);
      const result = resultByEntry.get(pairKey(start.race_id, start.driver_id));
      if (!race || !driver || !result) {
        continue;
      }
      polesitters.push({
        race_id: race.race_id,
        year: race.year,
        round: race.round,
        race_short_name: race.short_name,
        driver_id: driver.driver_id,
        full_name: driver.full_name,
        won_from_pole: result.position === 1
      });
    }

    return [
      emit(TABLES.polesitters, polesitters),
      emit(TABLES.polesitterStats, summarizePoles(polesitters, ctx.config.polesitterMinPoles))
    ];
  }
};
