#!/usr/bin/env node

import 'dotenv/config';
import { BASE_TABLES } from '../db/schema';
import { createDerivationPool, getConnectionInfo } from '../db/pool';
import { PgStore } from '../db/pg-store';
import { DerivationConfig, getDerivationConfig } from '../config/derivation';
import { DerivationLogger } from '../observability/logger';
import { ALL_STAGES } from './stages';
import { DerivationRunError, DerivationScheduler } from './pipeline/scheduler';

export interface DeriveArgs {
  stages?: string[];
  withUpstream: boolean;
  strict: boolean;
  dryRun: boolean;
}

/**
 * Parse command line arguments
 *
 *   --stages=overtakes,drives   run only these stages
 *   --with-upstream             also run everything they depend on
 *   --strict                    abort on the first data-integrity issue
 *   --dry-run                   print the plan and exit
 */
export function parseArgs(argv: readonly string[]): DeriveArgs {
  const args: DeriveArgs = { withUpstream: false, strict: false, dryRun: false };

  for (const arg of argv) {
    if (arg.startsWith('--stages=')) {
      const stages = arg
        .slice('--stages='.length)
        .split(',')
        .map(s => s.trim())
        .filter(s => s.length > 0);
      if (stages.length > 0) {
        args.stages = stages;
      }
    } else if (arg === '--with-upstream') {
      args.withUpstream = true;
    } else if (arg === '--strict') {
      args.strict = true;
    } else if (arg === '--dry-run') {
      args.dryRun = true;
    } else {
      throw new Error(`Unknown argument "${arg}"`);
    }
  }

  return args;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const baseConfig = getDerivationConfig();
  const config: DerivationConfig = { ...baseConfig, strictInvariants: baseConfig.strictInvariants || args.strict };
  const logger = new DerivationLogger();
  const scheduler = new DerivationScheduler(ALL_STAGES, BASE_TABLES);

  if (args.dryRun) {
    const plan = scheduler.plan(args.stages, args.withUpstream);
    logger.info('\n=== DERIVATION PLAN ===\n');
    plan.forEach((stage, index) => {
      logger.info(`${index + 1}. ${stage.name}: ${stage.description}`);
      logger.info(`   in:  ${stage.inputs.map(t => t.name).join(', ')}`);
      logger.info(`   out: ${stage.outputs.map(t => t.name).join(', ')}`);
    });
    return;
  }

  const connection = getConnectionInfo();
  logger.step(`Connecting to ${connection.host}${connection.ssl ? ' (ssl)' : ''}`);
  const store = new PgStore(createDerivationPool(), config.lockKey);

  try {
    await scheduler.run(store, {
      config,
      logger,
      targets: args.stages,
      includeUpstream: args.withUpstream
    });
  } finally {
    logger.summarize();
    await store.close();
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch(error => {
    if (error instanceof DerivationRunError) {
      console.error(`\nFATAL ERROR: ${error.report.failure_reason}\n`);
    } else {
      console.error(`\nFATAL ERROR: ${error}\n`);
    }
    process.exit(1);
  });
}
