import { TABLES, RetirementRow } from '../../db/schema';
import { retirementType } from '../../types/derived';
import { DataIntegrityError } from '../errors';
import { classifyStatus } from '../policies/retirement-causes';
import { DerivationStage, emit } from '../pipeline/stage';

/**
 * Every result whose status is neither "Finished" nor a lapped classification,
 * placed on the lap after the last one completed
 */
export const retirementsStage: DerivationStage = {
  name: 'retirements',
  description: 'Retirement events with classified cause',
  inputs: [TABLES.results, TABLES.status],
  outputs: [TABLES.retirements],

  async run(ctx) {
    const results = await ctx.read(TABLES.results);
    const statuses = await ctx.read(TABLES.status);
    const statusText = new Map(statuses.map(s => [s.status_id, s.status]));

    const rows: RetirementRow[] = [];
    for (const result of results) {
      const status = statusText.get(result.status_id);
      if (status === undefined) {
        ctx.issues.flagIntegrity(
          new DataIntegrityError('missing_reference', `Result ${result.result_id} references unknown status ${result.status_id}`, {
            stage: ctx.stage,
            table: TABLES.results.name,
            race_id: result.race_id,
            driver_id: result.driver_id
          })
        );
        continue;
      }

      const classification = classifyStatus(status);
      if (classification.kind !== 'retirement') {
        continue;
      }

      if (classification.ambiguous) {
        ctx.issues.reportAmbiguity({
          rule: 'retirement_cause',
          input: status,
          fallback: classification.cause,
          context: { stage: ctx.stage, race_id: result.race_id, driver_id: result.driver_id }
        });
      }

      rows.push({
        race_id: result.race_id,
        driver_id: result.driver_id,
        lap: result.laps + 1,
        position_order: result.position_order,
        status_id: result.status_id,
        status,
        retirement_cause: classification.cause,
        retirement_type: retirementType(classification.cause)
      });
    }

    return [emit(TABLES.retirements, rows)];
  }
};
