/**
 * Derivation scheduler
 *
 * Orders stages topologically from their declared inputs and outputs, then
 * runs them under the store's exclusive lock:
 * - every input must exist, and derived inputs must be fresh (FAIL_CLOSED)
 * - each output table is replaced atomically and recorded in the manifest
 * - the first fatal failure aborts the remaining stages
 * - every run, failed or not, is appended to derivation_runs
 */

import { v4 as uuidv4 } from 'uuid';
import { TABLES, TableMeta } from '../../db/schema';
import { RelationalStore } from '../../db/store';
import { DerivationConfig, getDerivationConfig } from '../../config/derivation';
import { IssueCollector, logInvariantMode } from '../../observability/invariants';
import { DerivationLogger } from '../../observability/logger';
import {
  ClassificationAmbiguity,
  DataIntegrityError,
  DerivationError,
  MissingDependencyError,
  PipelineDefinitionError,
  StageExecutionError
} from '../errors';
import { computeExecutionHash } from '../utils';
import { DerivationStage, StageContext, StageOutput } from './stage';
import { Manifest, loadManifest, nextBuildSeq, parseInputHashes, saveManifest, serializeInputHashes } from './manifest';

export interface RunOptions {
  config?: DerivationConfig;
  logger?: DerivationLogger;
  /** Stage names to run; all stages when omitted */
  targets?: readonly string[];
  /** Also run every stage the targets transitively depend on */
  includeUpstream?: boolean;
}

export interface StageReport {
  stage: string;
  status: 'success' | 'failed' | 'not_run';
  rows_written: number;
  duration_ms: number;
  outputs: Array<{ table: string; row_count: number; content_hash: string }>;
}

export interface RunReport {
  run_id: string;
  status: 'success' | 'failed';
  stages: StageReport[];
  rows_written: number;
  integrity_issues: DataIntegrityError[];
  ambiguities: ClassificationAmbiguity[];
  execution_hash: string;
  started_at: string;
  finished_at: string;
  failure_reason: string | null;
}

/**
 * Thrown when a run aborts; carries the partial report
 */
export class DerivationRunError extends DerivationError {
  readonly report: RunReport;

  constructor(report: RunReport, cause: unknown) {
    super(`Derivation run ${report.run_id} failed: ${report.failure_reason ?? 'unknown reason'}`, {}, { cause });
    this.name = 'DerivationRunError';
    this.report = report;
  }
}

export class DerivationScheduler {
  private readonly stages: readonly DerivationStage[];
  private readonly producers = new Map<string, DerivationStage>();
  private readonly order: readonly DerivationStage[];

  constructor(stages: readonly DerivationStage[], baseTables: readonly TableMeta[]) {
    this.stages = stages;
    const baseNames = new Set(baseTables.map(t => t.name));
    const stageNames = new Set<string>();

    for (const stage of stages) {
      if (stageNames.has(stage.name)) {
        throw new PipelineDefinitionError(`Stage "${stage.name}" is registered twice`, { stage: stage.name });
      }
      stageNames.add(stage.name);

      for (const output of stage.outputs) {
        const existing = this.producers.get(output.name);
        if (existing) {
          throw new PipelineDefinitionError(
            `Table "${output.name}" is produced by both "${existing.name}" and "${stage.name}"`,
            { stage: stage.name, table: output.name }
          );
        }
        if (baseNames.has(output.name)) {
          throw new PipelineDefinitionError(`Stage "${stage.name}" would overwrite base table "${output.name}"`, {
            stage: stage.name,
            table: output.name
          });
        }
        this.producers.set(output.name, stage);
      }
    }

    for (const stage of stages) {
      for (const input of stage.inputs) {
        if (!baseNames.has(input.name) && !this.producers.has(input.name)) {
          throw new MissingDependencyError(input.name, 'unproduced', { stage: stage.name });
        }
      }
    }

    this.order = this.topologicalOrder();
  }

  /**
   * Kahn's algorithm; ties go to the earlier-registered stage
   */
  private topologicalOrder(): DerivationStage[] {
    const indegree = new Map<string, number>();
    const dependents = new Map<string, DerivationStage[]>();
    for (const stage of this.stages) {
      const upstream = this.upstreamOf(stage);
      indegree.set(stage.name, upstream.size);
      for (const producer of upstream) {
        dependents.set(producer, [...(dependents.get(producer) ?? []), stage]);
      }
    }

    const ordered: DerivationStage[] = [];
    const ready = this.stages.filter(s => indegree.get(s.name) === 0);
    while (ready.length > 0) {
      ready.sort((a, b) => this.stages.indexOf(a) - this.stages.indexOf(b));
      const next = ready.shift();
      if (!next) {
        break;
      }
      ordered.push(next);
      for (const dependent of dependents.get(next.name) ?? []) {
        const remaining = (indegree.get(dependent.name) ?? 0) - 1;
        indegree.set(dependent.name, remaining);
        if (remaining === 0) {
          ready.push(dependent);
        }
      }
    }

    if (ordered.length !== this.stages.length) {
      const stuck = this.stages.filter(s => !ordered.includes(s)).map(s => s.name);
      throw new PipelineDefinitionError(`Stage graph has a cycle through: ${stuck.join(', ')}`);
    }
    return ordered;
  }

  /** Names of the stages producing this stage's derived inputs */
  private upstreamOf(stage: DerivationStage): Set<string> {
    const upstream = new Set<string>();
    for (const input of stage.inputs) {
      const producer = this.producers.get(input.name);
      if (producer && producer.name !== stage.name) {
        upstream.add(producer.name);
      }
    }
    return upstream;
  }

  /**
   * Stages to run, in execution order
   */
  plan(targets?: readonly string[], includeUpstream = false): DerivationStage[] {
    if (!targets || targets.length === 0) {
      return [...this.order];
    }

    const known = new Set(this.stages.map(s => s.name));
    const unknown = targets.filter(t => !known.has(t));
    if (unknown.length > 0) {
      throw new PipelineDefinitionError(`Unknown stage(s): ${unknown.join(', ')}`);
    }

    const selected = new Set(targets);
    if (includeUpstream) {
      const pending = [...targets];
      while (pending.length > 0) {
        const name = pending.pop();
        const stage = this.stages.find(s => s.name === name);
        if (!stage) {
          continue;
        }
        for (const producer of this.upstreamOf(stage)) {
          if (!selected.has(producer)) {
            selected.add(producer);
            pending.push(producer);
          }
        }
      }
    }

    return this.order.filter(s => selected.has(s.name));
  }

  async run(store: RelationalStore, options: RunOptions = {}): Promise<RunReport> {
    const config = options.config ?? getDerivationConfig();
    const logger = options.logger ?? new DerivationLogger();
    const planned = this.plan(options.targets, options.includeUpstream ?? false);

    return store.withExclusiveLock(() => this.execute(store, planned, config, logger));
  }

  private async execute(
    store: RelationalStore,
    planned: readonly DerivationStage[],
    config: DerivationConfig,
    logger: DerivationLogger
  ): Promise<RunReport> {
    const runId = uuidv4();
    const startedAt = new Date().toISOString();
    const issues = new IssueCollector(config.strictInvariants, logger);
    const manifest = await loadManifest(store);
    const buildSeq = nextBuildSeq(manifest);
    const builtThisRun = new Map<string, string>();
    const reports = planned.map((stage): StageReport => ({
      stage: stage.name,
      status: 'not_run',
      rows_written: 0,
      duration_ms: 0,
      outputs: []
    }));

    logger.info(`\n=== DERIVATION RUN ${runId} ===\n`);
    logInvariantMode(config.strictInvariants, logger);
    logger.step(`Plan: ${planned.map(s => s.name).join(' → ')}`);

    let failure: DerivationError | null = null;
    for (const [index, stage] of planned.entries()) {
      const report = reports[index];
      const started = Date.now();
      logger.stageStarted(stage.name);

      try {
        const inputHashes = await this.checkInputs(store, stage, manifest, builtThisRun);
        const outputs = await this.runStage(stage, store, { config, logger, issues });

        for (const output of outputs) {
          await output.write(store);
          builtThisRun.set(output.table.name, output.contentHash);
          manifest.set(output.table.name, {
            table_name: output.table.name,
            run_id: runId,
            build_seq: buildSeq,
            row_count: output.rowCount,
            content_hash: output.contentHash,
            input_hashes: serializeInputHashes(inputHashes),
            built_at: new Date().toISOString()
          });
          report.outputs.push({ table: output.table.name, row_count: output.rowCount, content_hash: output.contentHash });
          report.rows_written += output.rowCount;
        }
        await saveManifest(store, manifest);

        report.status = 'success';
        report.duration_ms = Date.now() - started;
        logger.stageSucceeded(stage.name, report.rows_written, report.duration_ms);
      } catch (err) {
        report.status = 'failed';
        report.duration_ms = Date.now() - started;
        failure = err instanceof DerivationError ? err : new StageExecutionError(stage.name, err);
        logger.stageFailed(stage.name, failure.message, report.duration_ms);
        break;
      }
    }

    for (const report of reports.filter(r => r.status === 'not_run')) {
      logger.stageSkipped(report.stage, 'aborted after an earlier failure');
    }

    const outputHashes = Object.fromEntries(builtThisRun);
    const runReport: RunReport = {
      run_id: runId,
      status: failure === null ? 'success' : 'failed',
      stages: reports,
      rows_written: reports.reduce((sum, r) => sum + r.rows_written, 0),
      integrity_issues: issues.getIntegrityIssues(),
      ambiguities: issues.getAmbiguities(),
      execution_hash: computeExecutionHash(planned.map(s => s.name), outputHashes, config),
      started_at: startedAt,
      finished_at: new Date().toISOString(),
      failure_reason: failure === null ? null : failure.message
    };

    await store.appendRows(TABLES.derivationRuns, [
      {
        run_id: runReport.run_id,
        status: runReport.status,
        stages: planned.map(s => s.name).join(','),
        rows_written: runReport.rows_written,
        integrity_issues: runReport.integrity_issues.length,
        ambiguities: runReport.ambiguities.length,
        execution_hash: runReport.execution_hash,
        started_at: runReport.started_at,
        finished_at: runReport.finished_at,
        failure_reason: runReport.failure_reason
      }
    ]);

    if (failure !== null) {
      throw new DerivationRunError(runReport, failure);
    }

    logger.info('\n=== DERIVATION SUMMARY ===\n');
    logger.info(`Execution hash:    ${runReport.execution_hash}`);
    logger.info(`Stages run:        ${reports.length}`);
    logger.info(`Rows written:      ${runReport.rows_written}`);
    logger.info(`Integrity issues:  ${runReport.integrity_issues.length}`);
    logger.info(`Ambiguities:       ${runReport.ambiguities.length}`);

    return runReport;
  }

  /**
   * Verify every input is present and fresh; returns the current hashes of
   * the stage's derived inputs for the manifest
   */
  private async checkInputs(
    store: RelationalStore,
    stage: DerivationStage,
    manifest: Manifest,
    builtThisRun: ReadonlyMap<string, string>
  ): Promise<Record<string, string>> {
    const inputHashes: Record<string, string> = {};

    for (const input of stage.inputs) {
      if (!this.producers.has(input.name)) {
        if (!(await store.hasTable(input.name))) {
          throw new MissingDependencyError(input.name, 'missing', { stage: stage.name });
        }
        continue;
      }

      const freshHash = builtThisRun.get(input.name);
      if (freshHash !== undefined) {
        inputHashes[input.name] = freshHash;
        continue;
      }

      const entry = manifest.get(input.name);
      if (!entry || !(await store.hasTable(input.name))) {
        throw new MissingDependencyError(input.name, 'missing', { stage: stage.name });
      }
      if (!this.isFresh(entry.table_name, manifest, builtThisRun)) {
        throw new MissingDependencyError(input.name, 'stale', { stage: stage.name });
      }
      inputHashes[input.name] = entry.content_hash;
    }

    return inputHashes;
  }

  /**
   * A table is fresh when the hashes it was built from still match the
   * current hashes of those inputs
   */
  private isFresh(table: string, manifest: Manifest, builtThisRun: ReadonlyMap<string, string>): boolean {
    const entry = manifest.get(table);
    if (!entry) {
      return false;
    }
    const recorded = parseInputHashes(entry);
    return Object.entries(recorded).every(([input, hash]) => {
      const current = builtThisRun.get(input) ?? manifest.get(input)?.content_hash;
      return current === hash;
    });
  }

  private async runStage(
    stage: DerivationStage,
    store: RelationalStore,
    shared: Pick<StageContext, 'config' | 'logger' | 'issues'>
  ): Promise<StageOutput[]> {
    const declared = new Set(stage.inputs.map(t => t.name));
    const ctx: StageContext = {
      ...shared,
      stage: stage.name,
      read: table => {
        if (!declared.has(table.name)) {
          throw new MissingDependencyError(table.name, 'undeclared', { stage: stage.name });
        }
        return store.readTable(table);
      }
    };

    let outputs: StageOutput[];
    try {
      outputs = await stage.run(ctx);
    } catch (err) {
      throw err instanceof DerivationError ? err : new StageExecutionError(stage.name, err);
    }

    const expected = stage.outputs.map(t => t.name).sort();
    const actual = outputs.map(o => o.table.name).sort();
    if (expected.join(',') !== actual.join(',')) {
      throw new PipelineDefinitionError(
        `Stage "${stage.name}" returned [${actual.join(', ')}], declared [${expected.join(', ')}]`,
        { stage: stage.name }
      );
    }
    return outputs;
  }
}
