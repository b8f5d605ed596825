import { DerivationStage } from '../pipeline/stage';
import {
  circuitsExtStage,
  racesExtStage,
  lapTimesExtStage,
  lapTimeStatsStage,
  driversExtStage,
  constructorsExtStage
} from './extenders';
import { retirementsStage } from './retirements';
import { lapPositionsStage } from './lap-positions';
import { overtakesStage } from './overtakes';
import { overtakesByRaceStage } from './overtakes-by-race';
import { overtakesByCircuitStage } from './overtakes-by-circuit';
import { drivesStage } from './drives';
import { teamDriverRanksStage } from './team-driver-ranks';
import { standingsProjectionStage } from './standings-projection';
import { polesittersStage } from './polesitters';

/**
 * Every derivation stage, in registration order (ties in the topological
 * order are broken by this list)
 */
export const ALL_STAGES: readonly DerivationStage[] = [
  circuitsExtStage,
  racesExtStage,
  lapTimesExtStage,
  lapTimeStatsStage,
  driversExtStage,
  constructorsExtStage,
  retirementsStage,
  lapPositionsStage,
  overtakesStage,
  overtakesByRaceStage,
  overtakesByCircuitStage,
  drivesStage,
  teamDriverRanksStage,
  standingsProjectionStage,
  polesittersStage
];

export {
  circuitsExtStage,
  racesExtStage,
  lapTimesExtStage,
  lapTimeStatsStage,
  driversExtStage,
  constructorsExtStage,
  retirementsStage,
  lapPositionsStage,
  overtakesStage,
  overtakesByRaceStage,
  overtakesByCircuitStage,
  drivesStage,
  teamDriverRanksStage,
  standingsProjectionStage,
  polesittersStage
};
