import { TABLES, OvertakesByRaceRow } from '../../db/schema';
import { OVERTAKE_DESCRIPTIONS } from '../../types/derived';
import { DerivationStage, emit } from '../pipeline/stage';

export const overtakesByRaceStage: DerivationStage = {
  name: 'overtakes_by_race',
  description: 'Overtake counts per race and cause, zeros included',
  inputs: [TABLES.overtakes, TABLES.racesExt],
  outputs: [TABLES.overtakesByRace],

  async run(ctx) {
    const races = await ctx.read(TABLES.racesExt);
    const overtakes = await ctx.read(TABLES.overtakes);

    const counts = new Map<string, number>();
    for (const overtake of overtakes) {
      const key = `${overtake.race_id}:${overtake.overtake_desc}`;
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    const rows: OvertakesByRaceRow[] = [];
    for (const race of races) {
      if (ctx.config.overtakesRequirePitData && !race.is_pit_data_available) {
        continue;
      }
      for (const description of OVERTAKE_DESCRIPTIONS) {
        rows.push({
          race_id: race.race_id,
          year: race.year,
          round: race.round,
          race_name: race.short_name,
          overtake_desc: description,
          num_overtakes: counts.get(`${race.race_id}:${description}`) ?? 0
        });
      }
    }

    const total = rows.reduce((sum, row) => sum + row.num_overtakes, 0);
    if (total !== overtakes.length) {
      ctx.logger.warn(`${overtakes.length - total} overtake(s) belong to races outside the summary`);
    }

    return [emit(TABLES.overtakesByRace, rows)];
  }
};
