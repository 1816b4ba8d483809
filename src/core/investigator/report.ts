import path from 'path';
import fs from 'fs-extra';
import type { Decision, InvestigationResult, Step } from './types';

export const DECISION_LABEL: Record<Decision, string> = {
  confirmed_fraud: 'Confirmed fraud',
  suspected_fraud: 'Suspected fraud',
  needs_review: 'Needs review',
  legitimate: 'Legitimate',
};

export type ReportFormat = 'markdown' | 'json';

function yesNo(value: boolean): string {
  return value ? 'Yes' : 'No';
}

/** Pipes and newlines would break a table row. */
function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function summarizeStep(step: Step): string {
  switch (step.kind) {
    case 'action': {
      const { observation } = step;
      const outcome = observation.success
        ? `ok (${observation.durationMs}ms)`
        : `${observation.error?.kind ?? 'error'}: ${observation.error?.message ?? 'unknown'}`;
      return `${step.action.tool} ${JSON.stringify(step.action.args)} -> ${outcome}`;
    }
    case 'conclusion':
      return `Concluded: ${step.conclusion.label}`;
    case 'malformed':
      return `Unparseable output (${step.failure.reason})`;
    case 'model_failure':
      return `Model call failed: ${step.failure.message}`;
  }
}

export function renderMarkdownReport(result: InvestigationResult): string {
  const lines: string[] = [
    `# Investigation ${result.investigationId}`,
    '',
    `- **Case:** ${result.caseId}`,
    `- **Status:** ${result.status} (${result.stopReason})`,
    `- **Model:** ${result.model}`,
    `- **Started:** ${result.startedAt}`,
    `- **Completed:** ${result.completedAt} (${result.durationMs}ms)`,
    '',
  ];

  if (result.status === 'completed' || result.status === 'degraded') {
    lines.push(
      '## Decision',
      '',
      `- **Decision:** ${DECISION_LABEL[result.decision]}`,
      `- **Risk score:** ${result.score}/10`,
      `- **Escalation required:** ${yesNo(result.escalationRequired)}`,
      `- **SAR required:** ${yesNo(result.reportRequired)}`
    );
    if (result.modelConclusion) {
      lines.push(`- **Model conclusion:** ${result.modelConclusion.label}`);
      if (result.modelConclusion.summary) lines.push(`- **Model summary:** ${result.modelConclusion.summary}`);
    }
    lines.push('');

    if (result.keyFindings.length > 0) {
      lines.push('## Key findings', '', ...result.keyFindings.map((finding) => `- ${finding}`), '');
    }
    if (result.riskFactors.length > 0) {
      lines.push('## Risk factors', '', ...result.riskFactors.map((factor) => `- ${factor}`), '');
    }

    lines.push('## Evidence', '');
    if (result.evidence.length === 0) {
      lines.push('_No evidence collected._');
    } else {
      lines.push('| Severity | Tool | Type | Description |', '| --- | --- | --- | --- |');
      for (const item of result.evidence) {
        lines.push(`| ${item.severity} | ${item.tool} | ${item.type} | ${cell(item.description)} |`);
      }
    }
    lines.push('', '## Recommendation', '', result.recommendation, '');
    if (result.sarReasoning) {
      lines.push('## SAR reasoning', '', result.sarReasoning, '');
    }
    lines.push('## Next steps', '', ...result.nextSteps.map((step, index) => `${index + 1}. ${step}`), '');
  } else if (result.status === 'failed') {
    const attempts = result.failure.attempts ? ` after ${result.failure.attempts} attempt(s)` : '';
    lines.push('## Failure', '', `**${result.failure.kind}**${attempts}: ${result.failure.message}`, '');
  } else {
    lines.push('## Cancelled', '', `Stopped after ${result.transcript.length} step(s); no decision was made.`, '');
  }

  lines.push('## Transcript', '');
  if (result.transcript.length === 0) {
    lines.push('_Empty._');
  } else {
    lines.push(...result.transcript.map((step) => `${step.iteration}. ${summarizeStep(step)}`));
  }

  const { usage } = result;
  lines.push(
    '',
    '## Usage',
    '',
    `- Model calls: ${usage.modelCalls} (${usage.retries} retries)`,
    `- Tokens: ${usage.totalTokens} (${usage.promptTokens} prompt, ${usage.completionTokens} completion)`,
    `- Tool calls: ${usage.toolCalls} (${usage.failedToolCalls} failed)`,
    `- Estimated cost: $${usage.estimatedCostUsd.toFixed(4)}`,
    ''
  );

  return lines.join('\n');
}

export function renderJsonReport(result: InvestigationResult): string {
  return JSON.stringify(result, null, 2) + '\n';
}

export function reportFormatFor(filePath: string): ReportFormat {
  return path.extname(filePath).toLowerCase() === '.json' ? 'json' : 'markdown';
}

export function defaultReportPath(result: InvestigationResult, dir: string = 'reports'): string {
  return path.join(dir, `${result.investigationId}.md`);
}

/** Writes the report, creating parent directories. Format follows the extension. */
export async function saveReport(result: InvestigationResult, filePath: string): Promise<string> {
  const content = reportFormatFor(filePath) === 'json' ? renderJsonReport(result) : renderMarkdownReport(result);
  await fs.outputFile(filePath, content, 'utf-8');
  return filePath;
}
