import { TABLES, OvertakesByCircuitRow } from '../../db/schema';
import { DERIVATION_DEFAULTS } from '../../config/derivation';
import { OvertakeTypeCode } from '../../types/derived';
import { DerivationStage, emit } from '../pipeline/stage';

/**
 * Overtake kinds compared across circuits: on-track passes against passes
 * gained through the pit cycle
 */
export const CIRCUIT_OVERTAKE_TYPES: ReadonlyArray<{ code: OvertakeTypeCode; label: string }> = [
  { code: 'T', label: 'Track' },
  { code: 'P', label: 'Pit' }
];

export const overtakesByCircuitStage: DerivationStage = {
  name: 'overtakes_by_circuit',
  description: 'Track and pit overtake counts per race at current, established circuits',
  inputs: [TABLES.circuitsExt, TABLES.racesExt, TABLES.overtakes],
  outputs: [TABLES.overtakesByCircuit],

  async run(ctx) {
    const circuits = await ctx.read(TABLES.circuitsExt);
    const races = await ctx.read(TABLES.racesExt);
    const overtakes = await ctx.read(TABLES.overtakes);

    const eligible = new Map(
      circuits
        .filter(
          c =>
            c.last_race_year >= DERIVATION_DEFAULTS.circuit_summary_min_last_year &&
            c.number_of_races >= DERIVATION_DEFAULTS.circuit_summary_min_races
        )
        .map(c => [c.circuit_id, c])
    );

    const counts = new Map<string, number>();
    for (const overtake of overtakes) {
      const key = `${overtake.race_id}:${overtake.overtake_type}`;
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    const rows: OvertakesByCircuitRow[] = [];
    for (const race of races) {
      const circuit = eligible.get(race.circuit_id);
      if (!circuit || (ctx.config.overtakesRequirePitData && !race.is_pit_data_available)) {
        continue;
      }
      for (const type of CIRCUIT_OVERTAKE_TYPES) {
        rows.push({
          circuit_id: circuit.circuit_id,
          circuit_name: circuit.name,
          race_id: race.race_id,
          year: race.year,
          race_name: race.name,
          overtake_type: type.label,
          num_overtakes: counts.get(`${race.race_id}:${type.code}`) ?? 0
        });
      }
    }

    return [emit(TABLES.overtakesByCircuit, rows)];
  }
};
