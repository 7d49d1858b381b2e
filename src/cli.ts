#!/usr/bin/env node

/**
 * Immutable Validator CLI
 * Checks the initialization of Solidity immutable state variables
 */

import { Command } from 'commander';
import { readFileSync, existsSync } from 'fs';
import chalk from 'chalk';
import { analyze, checkFile } from './checker.js';
import type { FileCheckOutput } from './checker.js';
import { formatReport, summarize } from './formatter/diagnostic-formatter.js';
import { InternalCompilerError } from './utils/errors.js';

interface CheckCommandOptions {
  contract?: string[];
  json?: boolean;
}

const program = new Command();

program
  .name('immutable-validator')
  .description('Check that Solidity immutable state variables are initialized exactly once during construction')
  .version('0.1.0');

function fail(error: unknown): never {
  if (error instanceof InternalCompilerError) {
    console.error(chalk.red(`Internal error: ${error.message}`));
    process.exit(2);
  }
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
}

// Check command
program
  .command('check')
  .description('Check one or more Solidity files')
  .argument('<files...>', 'Solidity source files (.sol)')
  .option('-c, --contract <names...>', 'Only check these contracts')
  .option('--json', 'Print results as JSON')
  .action((files: string[], options: CheckCommandOptions) => {
    try {
      let failed = false;
      const results: Omit<FileCheckOutput, 'source'>[] = [];

      for (const file of files) {
        const { source, ...result } = checkFile(file, { contracts: options.contract });
        failed = failed || !result.success;

        if (options.json) {
          results.push(result);
          continue;
        }

        result.warnings.forEach(w => console.log(chalk.yellow(`Warning: ${w}`)));

        if (result.errors.length > 0) {
          console.error(chalk.red(`${file}:`));
          result.errors.forEach(e => console.error(chalk.red(`  - ${e}`)));
        }

        for (const report of result.reports) {
          if (report.diagnostics.length === 0) continue;
          console.error(chalk.red(formatReport(report, source ?? undefined)));
          console.error();
        }

        const summary = summarize(result.reports);
        if (result.success) {
          console.log(chalk.green(`${file}: ${summary}`));
        } else if (result.reports.length > 0) {
          console.log(chalk.red(`${file}: ${summary}`));
        }
      }

      if (options.json) {
        console.log(JSON.stringify(results, null, 2));
      }
      if (failed) process.exit(1);
    } catch (error) {
      fail(error);
    }
  });

// Analyze command
program
  .command('analyze')
  .description('Show contracts, linearizations and immutable state variables')
  .argument('<file>', 'Solidity source file (.sol)')
  .action((file: string) => {
    try {
      if (!existsSync(file)) {
        console.error(chalk.red(`Error: File not found: ${file}`));
        process.exit(1);
      }

      const result = analyze(readFileSync(file, 'utf-8'), { sourceName: file });

      if (!result.valid) {
        console.error(chalk.red('Errors:'));
        result.errors.forEach(e => console.error(chalk.red(`  - ${e}`)));
        process.exit(1);
      }

      result.warnings.forEach(w => console.log(chalk.yellow(`Warning: ${w}`)));
      console.log(chalk.blue('Contract Analysis:\n'));

      for (const contract of result.contracts) {
        console.log(chalk.green(`${contract.kind}: ${contract.name}`));
        console.log(`  Linearization: ${contract.linearization.join(' -> ')}`);
        console.log(`  Constructor: ${contract.hasConstructor ? 'yes' : 'no'}`);

        if (contract.immutables.length > 0) {
          console.log(chalk.white('  Immutables:'));
          contract.immutables.forEach(v => console.log(`    - ${v}`));
        }

        console.log();
      }
    } catch (error) {
      fail(error);
    }
  });

program.parse();
