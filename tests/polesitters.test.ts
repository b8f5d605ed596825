import { describe, it, expect } from 'vitest';
import { polesittersStage, summarizePoles } from '../src/etl/stages/polesitters';
import { lapPositionsStage } from '../src/etl/stages/lap-positions';
import { retirementsStage } from '../src/etl/stages/retirements';
import { driversExtStage, racesExtStage } from '../src/etl/stages/extenders';
import { TABLES, PolesitterRow } from '../src/db/schema';
import { ALPHA, BRAVO, ROUND_ONE, ROUND_TWO, runStage, seasonFixture, seedStore } from './helpers/fixtures';

function pole(raceId: number, driverId: number, won: boolean): PolesitterRow {
  return {
    race_id: raceId,
    year: 2023,
    round: raceId,
    race_short_name: `Race ${raceId}`,
    driver_id: driverId,
    full_name: `Driver ${driverId}`,
    won_from_pole: won
  };
}

describe('Polesitters', () => {
  describe('summarizePoles', () => {
    it('computes the pole-to-win ratio as a fraction', () => {
      const stats = summarizePoles([pole(1, 7, true), pole(2, 7, false), pole(3, 7, true), pole(4, 7, true)], 1);

      expect(stats).toEqual([{ driver_id: 7, full_name: 'Driver 7', num_poles: 4, pole_to_win_pct: 0.75 }]);
    });

    it('drops drivers below the pole threshold', () => {
      const stats = summarizePoles([pole(1, 7, true), pole(2, 7, true), pole(3, 8, false)], 2);

      expect(stats.map(s => s.driver_id)).toEqual([7]);
    });
  });

  describe('polesitters stage', () => {
    async function derive(minPoles: number) {
      const store = await seedStore(seasonFixture());
      for (const stage of [racesExtStage, driversExtStage, retirementsStage, lapPositionsStage, polesittersStage]) {
        await runStage(stage, store, { polesitterMinPoles: minPoles });
      }
      return store;
    }

    it('records the lap-0 leader of every race and whether they won', async () => {
      const store = await derive(5);

      expect(await store.readTable(TABLES.polesitters)).toEqual([
        {
          race_id: ROUND_ONE,
          year: 2023,
          round: 1,
          race_short_name: 'Bahrain',
          driver_id: BRAVO,
          full_name: 'Bruno Brávo',
          won_from_pole: false
        },
        {
          race_id: ROUND_TWO,
          year: 2023,
          round: 2,
          race_short_name: 'Saudi Arabian Grand Prix',
          driver_id: ALPHA,
          full_name: 'Anna Alpha',
          won_from_pole: true
        }
      ]);
      expect(await store.readTable(TABLES.polesitterStats)).toEqual([]);
    });

    it('orders stats by conversion ratio', async () => {
      const store = await derive(1);

      expect((await store.readTable(TABLES.polesitterStats)).map(s => [s.driver_id, s.num_poles, s.pole_to_win_pct])).toEqual([
        [BRAVO, 1, 0],
        [ALPHA, 1, 1]
      ]);
    });
  });
});
