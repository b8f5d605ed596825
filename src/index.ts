export * from './db/schema';
export * from './db/store';
export { MemoryStore } from './db/memory-store';
export { PgStore } from './db/pg-store';
export { ReadWriteLock } from './db/rw-lock';
export { createDerivationPool, getConnectionInfo } from './db/pool';
export * from './config/derivation';
export * from './config/points-systems';
export * from './etl/errors';
export * from './types/derived';
export { DerivationLogger } from './observability/logger';
export { IssueCollector, isStrictMode } from './observability/invariants';
export type { DerivationStage, StageContext, StageOutput } from './etl/pipeline/stage';
export { emit } from './etl/pipeline/stage';
export {
  DerivationScheduler,
  DerivationRunError,
  type RunOptions,
  type RunReport,
  type StageReport
} from './etl/pipeline/scheduler';
export { ALL_STAGES } from './etl/stages';
export { classifyStatus } from './etl/policies/retirement-causes';
export { classifyOvertake, OVERTAKE_RULES } from './etl/policies/overtake-causes';
