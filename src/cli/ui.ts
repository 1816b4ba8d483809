import chalk from 'chalk';
import type { ToolDescriptor } from '../core/tools/registry';
import type { Decision, InvestigationResult, Severity, Step } from '../core/investigator/types';
import type { UsageMetrics } from '../core/investigator/metrics';
import { DECISION_LABEL } from '../core/investigator/report';

const WIDTH = 80;

type BoxStatus = 'ok' | 'error' | 'pending' | 'cancelled';

export interface StepBox {
  status: BoxStatus;
  title: string;
  target: string;
  message?: string;
  preview?: string;
}

const STATUS_STYLE: Record<BoxStatus, { icon: string; color: chalk.Chalk }> = {
  ok: { icon: '✓', color: chalk.green },
  error: { icon: '✗', color: chalk.red },
  pending: { icon: '?', color: chalk.yellow },
  cancelled: { icon: '⊘', color: chalk.gray },
};

const SEVERITY_COLOR: Record<Severity, chalk.Chalk> = {
  critical: chalk.red.bold,
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.gray,
};

const DECISION_COLOR: Record<Decision, chalk.Chalk> = {
  confirmed_fraud: chalk.red.bold,
  suspected_fraud: chalk.yellow.bold,
  needs_review: chalk.cyan.bold,
  legitimate: chalk.green.bold,
};

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 3) + '...' : text;
}

export function stepToBox(step: Step): StepBox {
  const label = `#${step.iteration}`;
  switch (step.kind) {
    case 'action': {
      const { observation } = step;
      const findings = Array.isArray(observation.payload.findings) ? observation.payload.findings.length : 0;
      return {
        status: observation.success ? 'ok' : 'error',
        title: label,
        target: step.action.tool,
        message: observation.success
          ? `${findings} finding(s) in ${observation.durationMs}ms`
          : `${observation.error?.kind ?? 'Error'}: ${observation.error?.message ?? 'unknown'}`,
        preview: step.reasoning || undefined,
      };
    }
    case 'conclusion':
      return {
        status: 'ok',
        title: label,
        target: `FINAL DECISION ${step.conclusion.label}`,
        preview: step.conclusion.summary ?? (step.reasoning || undefined),
      };
    case 'malformed':
      return { status: 'pending', title: label, target: 'unparseable output', message: step.failure.message };
    case 'model_failure':
      return { status: 'cancelled', title: label, target: 'model unavailable', message: step.failure.message };
  }
}

/** Box lines without colour; `logStep` adds it. */
export function formatBox(box: StepBox, width: number = WIDTH): string[] {
  const { icon } = STATUS_STYLE[box.status];
  const inner = width - 2;
  const lines = [`╭${'─'.repeat(width)}╮`];

  const prefix = `${icon}  ${box.title} `;
  const title = prefix + truncate(box.target, inner - prefix.length);
  lines.push(`│ ${title.padEnd(inner)} │`);

  if (box.message) {
    lines.push(`│ ${truncate(box.message, inner).padEnd(inner)} │`);
  }

  if (box.preview) {
    lines.push(`│${' '.repeat(width)}│`);
    for (const line of box.preview.split('\n').slice(0, 6)) {
      lines.push(`│ ${truncate(line, inner).padEnd(inner)} │`);
    }
  }

  lines.push(`╰${'─'.repeat(width)}╯`);
  return lines;
}

/**
 * Renders a structured step box to the terminal.
 */
export function logStep(step: Step) {
  const box = stepToBox(step);
  const { color } = STATUS_STYLE[box.status];
  const [top, title, ...rest] = formatBox(box);
  console.log(top);
  console.log(color(title));
  for (const line of rest) console.log(chalk.dim(line));
}

export function formatUsage(usage: UsageMetrics): string {
  return (
    `${usage.modelCalls} model call(s), ${usage.retries} retries, ${usage.totalTokens} tokens, ` +
    `${usage.toolCalls} tool call(s), ~$${usage.estimatedCostUsd.toFixed(4)}`
  );
}

/**
 * Displays the outcome of one investigation.
 */
export function logResult(result: InvestigationResult) {
  const rule = '═'.repeat(WIDTH);
  console.log(chalk.cyan(`╔${rule}╗`));
  console.log(chalk.cyan(`║ ${`${result.investigationId}  case ${result.caseId}`.padEnd(WIDTH - 2)} ║`));
  console.log(chalk.cyan(`╚${rule}╝`));

  if (result.status === 'failed') {
    console.log(chalk.red(`✗ Investigation failed (${result.stopReason}): ${result.failure.message}`));
  } else if (result.status === 'cancelled') {
    console.log(chalk.yellow(`⊘ Investigation cancelled after ${result.transcript.length} step(s); no decision.`));
  } else {
    const decision = DECISION_COLOR[result.decision](DECISION_LABEL[result.decision].toUpperCase());
    console.log(`${chalk.bold('Decision:')} ${decision}  ${chalk.bold('Score:')} ${result.score}/10`);
    if (result.status === 'degraded') {
      console.log(chalk.yellow(`Degraded result: ${result.stopReason}`));
    }
    console.log(
      `${chalk.bold('Escalate:')} ${result.escalationRequired ? chalk.red('yes') : 'no'}  ` +
        `${chalk.bold('SAR:')} ${result.reportRequired ? chalk.red('yes') : 'no'}`
    );

    if (result.evidence.length > 0) {
      console.log(chalk.bold('\nEvidence:'));
      for (const item of result.evidence) {
        console.log(`  ${SEVERITY_COLOR[item.severity](item.severity.padEnd(8))} ${item.description} ${chalk.dim(`(${item.tool})`)}`);
      }
    }

    if (result.riskFactors.length > 0) {
      console.log(chalk.bold('\nRisk factors:'));
      for (const factor of result.riskFactors) console.log(`  - ${factor}`);
    }

    console.log(chalk.bold('\nRecommendation:'));
    console.log(`  ${result.recommendation}`);
    if (result.sarReasoning) {
      console.log(chalk.red(`\n${result.sarReasoning}`));
    }
    console.log(chalk.bold('\nNext steps:'));
    result.nextSteps.forEach((step, index) => console.log(`  ${index + 1}. ${step}`));
  }

  console.log(chalk.dim(`\n${formatUsage(result.usage)} in ${result.durationMs}ms`));
}

export function logToolCatalogue(toolkit: string, tools: readonly ToolDescriptor[]) {
  console.log(chalk.bold(`\n${toolkit} toolkit`));
  for (const tool of tools) {
    console.log(`  ${chalk.cyan(tool.signature)}`);
    console.log(chalk.dim(`    ${tool.description}`));
  }
}
