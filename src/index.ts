#!/usr/bin/env node

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { FatalConfigurationError, InvestigationError, errorMessage } from './core/errors';
import {
  handleBatchCommand,
  handleConfigCommand,
  handleInvestigateCommand,
  handleToolsCommand,
} from './cli/commands';

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function reportFailure(err: unknown): void {
  const label = err instanceof InvestigationError ? err.kind : 'Error';
  console.error(chalk.red(`✗ ${label}: ${errorMessage(err)}`));
  if (err instanceof FatalConfigurationError && err.issues.length > 0) {
    for (const issue of err.issues) console.error(chalk.red(`  - ${issue}`));
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('invx')
    .version('0.1.0')
    .description('ReACT investigation engine for fraud and AML cases');

  program
    .command('investigate')
    .description('Investigate one case file')
    .argument('<case-file>', 'path to a case JSON document')
    .option('-n, --max-iterations <n>', 'iteration budget', positiveInt)
    .option('-m, --model <model>', 'chat model to use')
    .option('--json', 'print the result as JSON on stdout')
    .option('-r, --report <file>', 'write a report (.md or .json)')
    .action(async (caseFile: string, options: { maxIterations?: number; model?: string; json?: boolean; report?: string }) => {
      process.exitCode = await handleInvestigateCommand(caseFile, options);
    });

  program
    .command('batch')
    .description('Investigate several case files concurrently on one engine')
    .argument('<case-files...>', 'case JSON documents')
    .option('-c, --concurrency <n>', 'investigations in flight', positiveInt, 2)
    .option('-n, --max-iterations <n>', 'iteration budget', positiveInt)
    .option('-m, --model <model>', 'chat model to use')
    .option('--json', 'print results and merged usage as JSON on stdout')
    .option('-o, --report-dir <dir>', 'write one Markdown report per case')
    .action(
      async (
        caseFiles: string[],
        options: { concurrency: number; maxIterations?: number; model?: string; json?: boolean; reportDir?: string }
      ) => {
        process.exitCode = await handleBatchCommand(caseFiles, options);
      }
    );

  program
    .command('tools')
    .description('List the tools of a toolkit')
    .argument('[toolkit]', 'fraud or aml')
    .action((toolkit?: string) => {
      process.exitCode = handleToolsCommand(toolkit);
    });

  program
    .command('config')
    .description('Show or change the global configuration (~/.invx/config.json)')
    .argument('[action]', 'list or set')
    .argument('[key]')
    .argument('[value]')
    .action((action?: string, key?: string, value?: string) => {
      process.exitCode = handleConfigCommand(action, key, value);
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      reportFailure(err);
      process.exitCode = 1;
    });
}
