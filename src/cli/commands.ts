import chalk from 'chalk';
import prompts from 'prompts';
import {
  InvestigatorConfig,
  InvestigatorConfigSchema,
  SETTABLE_KEYS,
  buildConfigPatch,
  isSettableKey,
  loadInvestigatorConfig,
  redactConfig,
  saveGlobalConfig,
} from '../core/config';
import { FatalConfigurationError, errorMessage } from '../core/errors';
import { createInvestigationEngine } from '../core/investigator/engine';
import { investigateBatch, BatchItem } from '../core/investigator/batch';
import { loadCaseFile, readCaseDocument, Toolkit } from '../core/investigator/case';
import { defaultReportPath, renderJsonReport, saveReport } from '../core/investigator/report';
import type { EngineState, InvestigationResult } from '../core/investigator/types';
import { createToolkitRegistry } from '../core/tools';
import { loadFixtureStore } from '../core/tools/store';
import { Spinner } from './spinner';
import { formatUsage, logResult, logStep, logToolCatalogue } from './ui';

export interface RunOverrides {
  maxIterations?: number;
  model?: string;
}

export interface InvestigateCommandOptions extends RunOverrides {
  json?: boolean;
  report?: string;
}

export interface BatchCommandOptions extends RunOverrides {
  concurrency?: number;
  json?: boolean;
  reportDir?: string;
}

const STATE_TEXT: Partial<Record<EngineState, string>> = {
  reasoning: 'Reasoning...',
  acting: 'Running tool...',
  concluding: 'Scoring evidence...',
};

/** Command-line flags win over config and environment. */
export function applyOverrides(config: InvestigatorConfig, overrides: RunOverrides): InvestigatorConfig {
  const result = InvestigatorConfigSchema.safeParse({
    ...config,
    maxIterations: overrides.maxIterations ?? config.maxIterations,
    model: overrides.model ?? config.model,
  });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new FatalConfigurationError(`Invalid option: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/** Aborts the returned signal on Ctrl+C until `dispose` is called. */
function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSigint = () => {
    process.stderr.write(chalk.yellow('\nCancelling after the current step...\n'));
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  return { signal: controller.signal, dispose: () => process.off('SIGINT', onSigint) };
}

function isToolkit(value: string): value is Toolkit {
  return value === 'fraud' || value === 'aml';
}

function exitCodeFor(result: InvestigationResult): number {
  return result.status === 'failed' ? 1 : 0;
}

async function offerReport(result: InvestigationResult): Promise<void> {
  if (result.status !== 'completed' && result.status !== 'degraded') return;
  const target = defaultReportPath(result);

  const answer = await prompts({
    type: 'confirm',
    name: 'save',
    message: `Save a Markdown report to ${target}?`,
    initial: false,
  });

  if (answer.save === true) {
    await saveReport(result, target);
    console.log(chalk.green(`✓ Report saved to ${target}`));
  }
}

export async function handleInvestigateCommand(caseFile: string, options: InvestigateCommandOptions): Promise<number> {
  const config = applyOverrides(loadInvestigatorConfig(), options);
  const investigationCase = await loadCaseFile(caseFile);
  const engine = createInvestigationEngine(config);

  const spinner = new Spinner('Investigating...', { enabled: !options.json && Boolean(process.stderr.isTTY) });
  const interrupt = interruptSignal();

  if (!options.json) {
    console.log(chalk.magenta(`\n🕵️  Investigating case ${investigationCase.caseId} (${investigationCase.category})`));
    console.log(chalk.dim(`Model ${config.model}, up to ${config.maxIterations} iteration(s)\n`));
  }

  let result: InvestigationResult;
  try {
    result = await engine.investigate(investigationCase, {
      signal: interrupt.signal,
      onStateChange: (state) => {
        if (state === 'terminated') {
          spinner.stop();
          return;
        }
        spinner.update(STATE_TEXT[state] ?? 'Investigating...');
        spinner.start();
      },
      onStep: (step) => {
        spinner.stop();
        if (!options.json) logStep(step);
      },
    });
  } finally {
    spinner.stop();
    interrupt.dispose();
  }

  if (options.json) {
    process.stdout.write(renderJsonReport(result));
  } else {
    console.log('');
    logResult(result);
  }

  if (options.report) {
    await saveReport(result, options.report);
    if (!options.json) console.log(chalk.green(`✓ Report saved to ${options.report}`));
  } else if (!options.json && process.stdin.isTTY) {
    await offerReport(result);
  }

  return exitCodeFor(result);
}

export async function handleBatchCommand(caseFiles: string[], options: BatchCommandOptions): Promise<number> {
  const config = applyOverrides(loadInvestigatorConfig(), options);
  const engine = createInvestigationEngine(config);
  const items: BatchItem[] = [];
  let rejectedFiles = 0;

  for (const file of caseFiles) {
    try {
      items.push({ source: file, input: await readCaseDocument(file) });
    } catch (err) {
      rejectedFiles++;
      console.error(chalk.red(`✗ ${file}: ${errorMessage(err)}`));
    }
  }

  const interrupt = interruptSignal();
  const summary = await investigateBatch(engine, items, {
    concurrency: options.concurrency,
    signal: interrupt.signal,
    onResult: ({ source, result }) => {
      if (options.json) return;
      const outcome =
        result.status === 'completed' || result.status === 'degraded'
          ? `${result.decision} (${result.score}/10)`
          : result.stopReason;
      const mark = result.status === 'failed' ? chalk.red('✗') : chalk.green('✓');
      console.log(`${mark} ${source} ${chalk.dim(result.investigationId)} ${outcome}`);
    },
  }).finally(interrupt.dispose);

  if (options.reportDir) {
    for (const { result } of summary.entries) {
      await saveReport(result, defaultReportPath(result, options.reportDir));
    }
  }

  if (options.json) {
    process.stdout.write(
      JSON.stringify(
        { results: summary.entries.map((entry) => entry.result), usage: summary.ledger.snapshot() },
        null,
        2
      ) + '\n'
    );
  } else {
    console.log(chalk.bold(`\n${summary.ledger.investigations} investigation(s): `) + formatUsage(summary.ledger.snapshot()));
  }

  const failed = summary.entries.some(({ result }) => exitCodeFor(result) !== 0);
  return failed || rejectedFiles > 0 ? 1 : 0;
}

export function handleToolsCommand(toolkit?: string): number {
  if (toolkit !== undefined && !isToolkit(toolkit)) {
    console.log(chalk.yellow('Usage: invx tools [fraud|aml]'));
    return 1;
  }

  const config = loadInvestigatorConfig();
  const store = loadFixtureStore(config.dataFile);
  const toolkits: Toolkit[] = toolkit === undefined ? ['fraud', 'aml'] : [toolkit];

  for (const name of toolkits) {
    logToolCatalogue(name, createToolkitRegistry(name, store, { ctrThreshold: config.ctrThreshold }).list());
  }
  return 0;
}

export function handleConfigCommand(action?: string, key?: string, value?: string): number {
  if (!action || action === 'list') {
    const config = loadInvestigatorConfig();
    console.log(chalk.bold('\n⚙️  Current Configuration:'));
    console.log(JSON.stringify(redactConfig(config), null, 2));
    console.log('');
    return 0;
  }

  if (action === 'set') {
    if (!key || value === undefined) {
      console.log(chalk.yellow('Usage: invx config set <key> <value>'));
      return 1;
    }
    if (!isSettableKey(key)) {
      console.log(chalk.yellow(`Unknown config key: ${key}. Settable keys: ${SETTABLE_KEYS.join(', ')}`));
      return 1;
    }

    saveGlobalConfig(buildConfigPatch(key, value));
    console.log(chalk.green(key === 'openaiApiKey' ? '✓ Updated OpenAI API Key' : `✓ Updated ${key} to: ${value}`));
    return 0;
  }

  console.log(chalk.yellow('Usage: invx config [list|set <key> <value>]'));
  return 1;
}
