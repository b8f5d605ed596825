/**
 * Structured error types for the derivation pipeline
 *
 * Every failure maps to one of these:
 * - MissingDependencyError: a stage input is absent, stale, or produced by no stage (fatal)
 * - PipelineDefinitionError: the stage graph itself is malformed (fatal, raised at plan time)
 * - DataIntegrityError: an input row breaks a data-model invariant (recoverable, flags the race)
 * - StageExecutionError: anything else thrown while a stage runs (fatal)
 *
 * ClassificationAmbiguity is not thrown: it is a warning record collected for manual review.
 */

export interface IssueContext {
  stage?: string;
  table?: string;
  year?: number;
  race_id?: number;
  driver_id?: number;
  lap?: number;
  round?: number;
  details?: Record<string, unknown>;
}

export class DerivationError extends Error {
  readonly context: IssueContext;

  constructor(message: string, context: IssueContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DerivationError';
    this.context = context;
  }
}

export type DependencyProblem = 'missing' | 'stale' | 'unproduced' | 'undeclared';

export class MissingDependencyError extends DerivationError {
  readonly dependency: string;
  readonly problem: DependencyProblem;

  constructor(dependency: string, problem: DependencyProblem, context: IssueContext = {}) {
    super(describeDependencyProblem(dependency, problem, context.stage), { ...context, table: dependency });
    this.name = 'MissingDependencyError';
    this.dependency = dependency;
    this.problem = problem;
  }
}

function describeDependencyProblem(dependency: string, problem: DependencyProblem, stage?: string): string {
  const consumer = stage ? `stage "${stage}"` : 'pipeline';
  switch (problem) {
    case 'missing':
      return `Table "${dependency}" required by ${consumer} does not exist`;
    case 'stale':
      return `Table "${dependency}" required by ${consumer} is stale relative to its own inputs`;
    case 'unproduced':
      return `Table "${dependency}" required by ${consumer} is neither a base table nor produced by any stage`;
    case 'undeclared':
      return `Table "${dependency}" was read by ${consumer} without being declared as an input`;
  }
}

export class PipelineDefinitionError extends DerivationError {
  constructor(message: string, context: IssueContext = {}) {
    super(message, context);
    this.name = 'PipelineDefinitionError';
  }
}

export type IntegrityInvariant =
  | 'lap_ladder_gap'
  | 'lap_position_permutation'
  | 'duplicate_key'
  | 'missing_reference'
  | 'drive_partition'
  | 'missing_standing_position'
  | 'unknown_lap_type';

export class DataIntegrityError extends DerivationError {
  readonly invariant: IntegrityInvariant;

  constructor(invariant: IntegrityInvariant, message: string, context: IssueContext = {}) {
    super(`[${invariant}] ${message}`, context);
    this.name = 'DataIntegrityError';
    this.invariant = invariant;
  }
}

export class StageExecutionError extends DerivationError {
  constructor(stage: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Stage "${stage}" failed: ${reason}`, { stage }, { cause });
    this.name = 'StageExecutionError';
  }
}

export interface ClassificationAmbiguity {
  rule: string;
  input: string;
  fallback: string;
  context: IssueContext;
}

