#!/usr/bin/env node
/**
 * Accent Detector CLI — analyze a video file or URL from the command line
 */

import 'dotenv/config';
import { Command } from 'commander';
import { loadAccentTable } from './core/accent/table.js';
import { loadAccentSettings, loadConfig } from './core/config.js';
import { ConfigurationError } from './core/errors.js';
import { createOrchestrator } from './orchestrator/bootstrap.js';
import { createConsoleLogger } from './services/logger.js';
import { formatOutcome } from './core/report.js';
import type { PipelineOutcome } from './core/types.js';

const program = new Command();

program
  .name('accent-detector')
  .description('Detect the English accent spoken in a video')
  .version('0.3.0');

program
  .command('analyze')
  .description('Analyze a local video file or a video URL')
  .argument('<input>', 'Path to a video file, or a video URL')
  .option('--json', 'Print the raw outcome as JSON')
  .option('-v, --verbose', 'Log pipeline progress to stderr')
  .action(async (input: string, opts: { json?: boolean; verbose?: boolean }) => {
    const logger = createConsoleLogger(opts.verbose ? 'debug' : 'warn');
    let outcome: PipelineOutcome;
    try {
      const orch = await createOrchestrator(loadConfig(process.env), logger);
      outcome = await orch.analyze(input);
    } catch (err) {
      if (err instanceof ConfigurationError) {
        console.error(`❌ ${err.message}`);
        process.exit(1);
      }
      throw err;
    }

    console.log(opts.json ? JSON.stringify(outcome, null, 2) : formatOutcome(outcome));
    process.exitCode = outcome.status === 'done' ? 0 : 1;
  });

program
  .command('accents')
  .description('List the accent labels known to the detector')
  .option('-t, --table <path>', 'YAML file with extra accent codes')
  .action((opts: { table?: string }) => {
    const table = loadAccentTable(opts.table ?? loadAccentSettings(process.env).accentTablePath);
    for (const [code, label] of table) {
      console.log(`  ${code.padEnd(12)} ${label}`);
    }
  });

await program.parseAsync();
