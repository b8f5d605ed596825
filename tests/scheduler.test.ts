import { describe, it, expect } from 'vitest';
import { DerivationRunError, DerivationScheduler, RunOptions } from '../src/etl/pipeline/scheduler';
import { DerivationStage, emit } from '../src/etl/pipeline/stage';
import { parseInputHashes } from '../src/etl/pipeline/manifest';
import { TABLES, StatusRow } from '../src/db/schema';
import { MemoryStore } from '../src/db/memory-store';
import {
  DataIntegrityError,
  MissingDependencyError,
  PipelineDefinitionError,
  StageExecutionError
} from '../src/etl/errors';
import { seedStore, silentLogger, testConfig } from './helpers/fixtures';

// Minimal three-stage chain: status -> retirements -> lap_positions -> overtakes

const retireStage: DerivationStage = {
  name: 'retire',
  description: 'one retirement per status',
  inputs: [TABLES.status],
  outputs: [TABLES.retirements],
  async run(ctx) {
    const statuses = await ctx.read(TABLES.status);
    return [
      emit(
        TABLES.retirements,
        statuses.map(s => ({
          race_id: 1,
          driver_id: s.status_id,
          lap: 1,
          position_order: s.status_id,
          status_id: s.status_id,
          status: s.status,
          retirement_cause: 'Mechanical Problem',
          retirement_type: 'Retirement (Mechanical Problem)'
        }))
      )
    ];
  }
};

const ladderStage: DerivationStage = {
  name: 'ladder',
  description: 'one lap per retirement',
  inputs: [TABLES.retirements],
  outputs: [TABLES.lapPositions],
  async run(ctx) {
    const retirements = await ctx.read(TABLES.retirements);
    return [
      emit(
        TABLES.lapPositions,
        retirements.map(r => ({ race_id: r.race_id, driver_id: r.driver_id, lap: 1, position: r.position_order, lap_type: 'Race' }))
      )
    ];
  }
};

const passesStage: DerivationStage = {
  name: 'passes',
  description: 'no overtakes',
  inputs: [TABLES.lapPositions],
  outputs: [TABLES.overtakes],
  async run(ctx) {
    await ctx.read(TABLES.lapPositions);
    return [emit(TABLES.overtakes, [])];
  }
};

const CHAIN = [retireStage, ladderStage, passesStage];
const STATUSES: StatusRow[] = [
  { status_id: 1, status: 'Engine' },
  { status_id: 2, status: 'Gearbox' }
];

function options(overrides: Partial<RunOptions> = {}): RunOptions {
  return { config: testConfig(), logger: silentLogger(), ...overrides };
}

async function captureRunError(run: Promise<unknown>): Promise<DerivationRunError> {
  try {
    await run;
  } catch (err) {
    if (err instanceof DerivationRunError) {
      return err;
    }
    throw err;
  }
  throw new Error('Expected the run to fail');
}

describe('DerivationScheduler', () => {
  describe('graph validation', () => {
    it('orders stages by their data dependencies', () => {
      const scheduler = new DerivationScheduler([passesStage, ladderStage, retireStage], [TABLES.status]);

      expect(scheduler.plan().map(s => s.name)).toEqual(['retire', 'ladder', 'passes']);
    });

    it('rejects a stage registered twice', () => {
      expect(() => new DerivationScheduler([retireStage, retireStage], [TABLES.status])).toThrow(
        new PipelineDefinitionError('Stage "retire" is registered twice')
      );
    });

    it('rejects two producers of one table', () => {
      const rival: DerivationStage = { ...retireStage, name: 'rival' };

      expect(() => new DerivationScheduler([retireStage, rival], [TABLES.status])).toThrow(
        'Table "retirements" is produced by both "retire" and "rival"'
      );
    });

    it('rejects a stage writing a base table', () => {
      const overwrite: DerivationStage = { ...retireStage, name: 'overwrite', outputs: [TABLES.status] };

      expect(() => new DerivationScheduler([overwrite], [TABLES.status])).toThrow(
        'Stage "overwrite" would overwrite base table "status"'
      );
    });

    it('rejects an input nobody produces', () => {
      let caught: unknown;
      try {
        new DerivationScheduler([ladderStage], [TABLES.status]);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(MissingDependencyError);
      expect(caught).toMatchObject({ dependency: 'retirements', problem: 'unproduced' });
    });

    it('rejects a cycle', () => {
      const forward: DerivationStage = { ...retireStage, name: 'forward', inputs: [TABLES.overtakes] };
      const back: DerivationStage = { ...passesStage, name: 'back', inputs: [TABLES.retirements] };

      expect(() => new DerivationScheduler([forward, back], [TABLES.status])).toThrow(
        'Stage graph has a cycle through: forward, back'
      );
    });
  });

  describe('plan', () => {
    const scheduler = new DerivationScheduler(CHAIN, [TABLES.status]);

    it('runs only the named targets by default', () => {
      expect(scheduler.plan(['passes']).map(s => s.name)).toEqual(['passes']);
    });

    it('pulls in upstream stages on request', () => {
      expect(scheduler.plan(['passes'], true).map(s => s.name)).toEqual(['retire', 'ladder', 'passes']);
      expect(scheduler.plan(['ladder'], true).map(s => s.name)).toEqual(['retire', 'ladder']);
    });

    it('rejects unknown targets', () => {
      expect(() => scheduler.plan(['passes', 'nope'])).toThrow('Unknown stage(s): nope');
    });
  });

  describe('run', () => {
    it('builds every table and records the run', async () => {
      const store = await seedStore({ status: STATUSES });
      const scheduler = new DerivationScheduler(CHAIN, [TABLES.status]);

      const report = await scheduler.run(store, options());

      expect(report.status).toBe('success');
      expect(report.stages.map(s => [s.stage, s.status, s.rows_written])).toEqual([
        ['retire', 'success', 2],
        ['ladder', 'success', 2],
        ['passes', 'success', 0]
      ]);
      expect(report.rows_written).toBe(4);
      expect(report.failure_reason).toBeNull();

      const manifest = await store.readTable(TABLES.derivationManifest);
      expect(manifest.map(m => [m.table_name, m.row_count, m.build_seq])).toEqual([
        ['lap_positions', 2, 1],
        ['overtakes', 0, 1],
        ['retirements', 2, 1]
      ]);

      const ladderEntry = manifest.find(m => m.table_name === 'lap_positions');
      const retirementsEntry = manifest.find(m => m.table_name === 'retirements');
      expect(ladderEntry && parseInputHashes(ladderEntry)).toEqual({ retirements: retirementsEntry?.content_hash });

      const runs = await store.readTable(TABLES.derivationRuns);
      expect(runs).toHaveLength(1);
      expect(runs[0]).toMatchObject({
        run_id: report.run_id,
        status: 'success',
        stages: 'retire,ladder,passes',
        rows_written: 4,
        execution_hash: report.execution_hash,
        failure_reason: null
      });
    });

    it('produces the same execution hash for the same inputs', async () => {
      const store = await seedStore({ status: STATUSES });
      const scheduler = new DerivationScheduler(CHAIN, [TABLES.status]);

      const first = await scheduler.run(store, options());
      const second = await scheduler.run(store, options());

      expect(second.execution_hash).toBe(first.execution_hash);
      expect(second.run_id).not.toBe(first.run_id);
      expect((await store.readTable(TABLES.derivationManifest))[0].build_seq).toBe(2);
      expect(await store.readTable(TABLES.derivationRuns)).toHaveLength(2);
    });

    it('holds the exclusive lock while stages run', async () => {
      const store = await seedStore({ status: STATUSES });
      let observed: ReturnType<MemoryStore['getLockStats']> | undefined;
      const probe: DerivationStage = {
        ...retireStage,
        async run(ctx) {
          observed = store.getLockStats();
          return retireStage.run(ctx);
        }
      };

      await new DerivationScheduler([probe], [TABLES.status]).run(store, options());

      expect(observed).toEqual({ readers: 0, writer: true, queued: 0 });
      expect(store.getLockStats()).toEqual({ readers: 0, writer: false, queued: 0 });
    });

    it('fails closed on a missing derived input', async () => {
      const store = await seedStore({ status: STATUSES });
      const scheduler = new DerivationScheduler(CHAIN, [TABLES.status]);

      const error = await captureRunError(scheduler.run(store, options({ targets: ['passes'] })));

      expect(error.cause).toBeInstanceOf(MissingDependencyError);
      expect(error.report.status).toBe('failed');
      expect(error.report.failure_reason).toBe('Table "lap_positions" required by stage "passes" does not exist');
      expect(error.report.stages.map(s => s.status)).toEqual(['failed']);

      const runs = await store.readTable(TABLES.derivationRuns);
      expect(runs.map(r => [r.status, r.failure_reason])).toEqual([
        ['failed', 'Table "lap_positions" required by stage "passes" does not exist']
      ]);
    });

    it('fails closed on a missing base table', async () => {
      const store = new MemoryStore();
      const scheduler = new DerivationScheduler(CHAIN, [TABLES.status]);

      const error = await captureRunError(scheduler.run(store, options()));

      expect(error.report.failure_reason).toBe('Table "status" required by stage "retire" does not exist');
      expect(error.report.stages.map(s => s.status)).toEqual(['failed', 'not_run', 'not_run']);
    });

    it('refuses a derived input built from outdated upstream data', async () => {
      const store = await seedStore({ status: STATUSES });
      const scheduler = new DerivationScheduler(CHAIN, [TABLES.status]);
      await scheduler.run(store, options());

      await store.replaceTable(TABLES.status, [...STATUSES, { status_id: 3, status: 'Brakes' }]);
      await scheduler.run(store, options({ targets: ['retire'] }));

      const error = await captureRunError(scheduler.run(store, options({ targets: ['passes'] })));

      expect(error.cause).toMatchObject({ dependency: 'lap_positions', problem: 'stale' });
      expect(error.report.failure_reason).toBe(
        'Table "lap_positions" required by stage "passes" is stale relative to its own inputs'
      );
    });

    it('accepts a derived input rebuilt in the same run', async () => {
      const store = await seedStore({ status: STATUSES });
      const scheduler = new DerivationScheduler(CHAIN, [TABLES.status]);
      await scheduler.run(store, options());
      await store.replaceTable(TABLES.status, [{ status_id: 7, status: 'Oil leak' }]);

      const report = await scheduler.run(store, options({ targets: ['passes'], includeUpstream: true }));

      expect(report.status).toBe('success');
      expect((await store.readTable(TABLES.lapPositions)).map(p => p.driver_id)).toEqual([7]);
    });

    it('stops at the first failing stage and wraps unexpected errors', async () => {
      const store = await seedStore({ status: STATUSES });
      const broken: DerivationStage = {
        ...ladderStage,
        async run() {
          throw new Error('kaboom');
        }
      };

      const error = await captureRunError(
        new DerivationScheduler([retireStage, broken, passesStage], [TABLES.status]).run(store, options())
      );

      expect(error.cause).toBeInstanceOf(StageExecutionError);
      expect(error.report.failure_reason).toBe('Stage "ladder" failed: kaboom');
      expect(error.report.stages.map(s => s.status)).toEqual(['success', 'failed', 'not_run']);
      expect(await store.hasTable(TABLES.overtakes.name)).toBe(false);
    });

    it('rejects reads of undeclared tables', async () => {
      const store = await seedStore({ status: STATUSES });
      const sneaky: DerivationStage = {
        ...retireStage,
        async run(ctx) {
          await ctx.read(TABLES.results);
          return retireStage.run(ctx);
        }
      };

      const error = await captureRunError(new DerivationScheduler([sneaky], [TABLES.status]).run(store, options()));

      expect(error.cause).toMatchObject({ dependency: 'results', problem: 'undeclared' });
    });

    it('rejects outputs that differ from the declared ones', async () => {
      const store = await seedStore({ status: STATUSES });
      const silent: DerivationStage = { ...retireStage, async run() { return []; } };

      const error = await captureRunError(new DerivationScheduler([silent], [TABLES.status]).run(store, options()));

      expect(error.cause).toBeInstanceOf(PipelineDefinitionError);
      expect(error.report.failure_reason).toBe('Stage "retire" returned [], declared [retirements]');
    });

    it('aborts on an integrity issue in strict mode and records it otherwise', async () => {
      const flagging: DerivationStage = {
        ...retireStage,
        async run(ctx) {
          ctx.issues.flagIntegrity(new DataIntegrityError('duplicate_key', 'status 1 twice', { stage: ctx.stage }));
          return retireStage.run(ctx);
        }
      };
      const scheduler = new DerivationScheduler([flagging], [TABLES.status]);

      const lenient = await scheduler.run(await seedStore({ status: STATUSES }), options());
      expect(lenient.status).toBe('success');
      expect(lenient.integrity_issues.map(i => i.message)).toEqual(['[duplicate_key] status 1 twice']);

      const error = await captureRunError(
        scheduler.run(await seedStore({ status: STATUSES }), options({ config: testConfig({ strictInvariants: true }) }))
      );
      expect(error.cause).toBeInstanceOf(DataIntegrityError);
      expect(error.report.integrity_issues).toEqual([]);
    });
  });
});
