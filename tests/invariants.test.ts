import { describe, it, expect, vi, afterEach } from 'vitest';
import { IssueCollector, checkLapLadder, checkLapPermutation, logInvariantMode } from '../src/observability/invariants';
import { DerivationLogger } from '../src/observability/logger';
import { DataIntegrityError } from '../src/etl/errors';

describe('Invariant Checks', () => {
  describe('checkLapLadder', () => {
    it('accepts laps 0..N in any order', () => {
      expect(checkLapLadder([2, 0, 1, 3])).toBeNull();
    });

    it('returns the first missing lap', () => {
      expect(checkLapLadder([0, 1, 3, 4])).toBe(2);
      expect(checkLapLadder([1, 2])).toBe(0);
    });
  });

  describe('checkLapPermutation', () => {
    it('accepts exactly 1..N', () => {
      expect(checkLapPermutation([3, 1, 2])).toBeNull();
    });

    it('describes duplicates and gaps', () => {
      expect(checkLapPermutation([1, 2, 2])).toBe('position 2 appears more than once');
      expect(checkLapPermutation([1, 3])).toBe('position 2 is missing');
    });
  });

  describe('IssueCollector', () => {
    const issue = new DataIntegrityError('lap_ladder_gap', 'Driver 4 has no record for lap 9', { race_id: 12 });

    it('records and logs issues in lenient mode', () => {
      const logger = new DerivationLogger({ silent: true });
      const warn = vi.spyOn(logger, 'warn');
      const collector = new IssueCollector(false, logger);

      collector.flagIntegrity(issue);

      expect(collector.getIntegrityIssues()).toEqual([issue]);
      expect(warn).toHaveBeenCalledWith('[lap_ladder_gap] Driver 4 has no record for lap 9 {"race_id":12}');
    });

    it('throws in strict mode', () => {
      const collector = new IssueCollector(true, new DerivationLogger({ silent: true }));

      expect(() => collector.flagIntegrity(issue)).toThrow(issue);
      expect(collector.getIntegrityIssues()).toEqual([]);
      expect(collector.isStrict()).toBe(true);
    });

    it('collects ambiguities in either mode', () => {
      const collector = new IssueCollector(true, new DerivationLogger({ silent: true }));

      collector.reportAmbiguity({ rule: 'retirement_cause', input: 'Mystery', fallback: 'Mechanical Problem', context: {} });

      expect(collector.getAmbiguities()).toHaveLength(1);
    });
  });
});

describe('DerivationLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints step markers', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new DerivationLogger();

    logger.step('Loading');
    logger.done('Loaded');
    logger.warn('Odd');
    logger.error('Broken');

    expect(log.mock.calls).toEqual([['→ Loading'], ['✓ Loaded']]);
    expect(warn).toHaveBeenCalledWith('⚠ Odd');
    expect(error).toHaveBeenCalledWith('✗ Broken');
  });

  it('keeps structured stage entries', () => {
    const logger = new DerivationLogger({ silent: true });

    logger.stageStarted('drives');
    logger.stageSucceeded('drives', 12, 5);
    logger.stageFailed('overtakes', 'boom', 3);
    logger.stageSkipped('polesitters', 'aborted');

    expect(logger.getEntries().map(e => [e.stage, e.status])).toEqual([
      ['drives', 'started'],
      ['drives', 'success'],
      ['overtakes', 'failed'],
      ['polesitters', 'skipped']
    ]);
    expect(logger.getEntriesByStatus('success')[0]).toMatchObject({ rows_written: 12, duration_ms: 5 });
    expect(logger.getEntriesByStatus('failed')[0].failure_reason).toBe('boom');
  });

  it('summarizes finished stages at the end of a run', () => {
    const logger = new DerivationLogger({ silent: true });

    logger.stageStarted('drives');
    logger.stageSucceeded('drives', 12, 5);
    logger.stageSucceeded('team_driver_ranks', 4, 2);
    logger.stageFailed('overtakes', 'boom', 3);
    logger.stageSkipped('polesitters', 'aborted');

    expect(logger.summarize()).toEqual([
      '\n=== DERIVATION SUMMARY ===\n',
      '  ✓ drives: 12 rows in 5ms',
      '  ✓ team_driver_ranks: 4 rows in 2ms',
      '  ✗ overtakes: boom',
      '  - polesitters: aborted',
      '\n2 stage(s) succeeded, 16 rows written'
    ]);
  });

  it('rotates the oldest entries out', () => {
    const logger = new DerivationLogger({ silent: true, maxEntries: 2 });

    logger.stageStarted('a');
    logger.stageStarted('b');
    logger.stageStarted('c');

    expect(logger.getEntries().map(e => e.stage)).toEqual(['b', 'c']);
    logger.clear();
    expect(logger.getEntries()).toEqual([]);
  });

  it('announces the invariant mode', () => {
    const logger = new DerivationLogger({ silent: true });
    const info = vi.spyOn(logger, 'info');

    logInvariantMode(true, logger);

    expect(info).toHaveBeenCalledWith('[Invariants] Mode: STRICT (will throw)');
    expect(info).toHaveBeenCalledTimes(1);
  });
});
