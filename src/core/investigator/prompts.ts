import type { Case } from './case';
import type { LLMMessage } from '../llm';
import type { Observation, Step, Transcript } from './types';

const MAX_OBSERVATION_CHARS = 4000;

export function buildSystemPrompt(toolCatalogue: string, maxIterations: number): string {
  return `
You are a financial crime investigator. You investigate fraud and anti-money-laundering
alerts with the ReACT method: THOUGHT, then ACTION, then OBSERVATION, repeated until
the evidence supports a decision.

AVAILABLE TOOLS:
${toolCatalogue}

RESPONSE FORMAT (one step per reply):
THOUGHT: what you know so far and what you need next.
Then exactly one JSON block, either a tool call:
\`\`\`json
{"tool": "tool_name", "parameters": {"param": "value"}}
\`\`\`
or, once you have enough evidence, a final decision:
\`\`\`json
{"decision": "confirmed_fraud | suspected_fraud | needs_review | legitimate", "confidence": "high | medium | low", "summary": "evidence summary"}
\`\`\`

RULES:
1. Use only the tools listed above, with the exact parameter names shown.
2. Base conclusions on tool observations, never on assumptions.
3. Do not repeat a call whose result you already have.
4. You have at most ${maxIterations} steps. Conclude before you run out.
5. Explain your reasoning; it is kept for audit.
`.trim();
}

export function buildCaseBrief(investigationCase: Case): string {
  const lines = [
    `CASE ${investigationCase.caseId} (${investigationCase.category}, priority ${investigationCase.priority})`,
    `Customer: ${investigationCase.customerId}`,
    `Account: ${investigationCase.accountId}`,
    `Description: ${investigationCase.description}`,
    `Time window: ${investigationCase.timeWindowHours} hours`,
  ];
  if (investigationCase.amount !== undefined) lines.push(`Amount: $${investigationCase.amount.toFixed(2)}`);
  if (investigationCase.merchant) lines.push(`Merchant: ${investigationCase.merchant}`);
  if (investigationCase.location) lines.push(`Transaction location: ${investigationCase.location}`);
  if (investigationCase.deviceId) lines.push(`Device: ${investigationCase.deviceId}`);
  if (investigationCase.alertSource) lines.push(`Alert source: ${investigationCase.alertSource}`);
  if (investigationCase.explanation) lines.push(`Customer explanation: ${investigationCase.explanation}`);

  lines.push('', 'Begin the investigation.');
  return lines.join('\n');
}

export function formatObservation(observation: Observation, maxChars: number = MAX_OBSERVATION_CHARS): string {
  const body = observation.success
    ? { tool: observation.tool, success: true, result: observation.payload }
    : { tool: observation.tool, success: false, error: observation.error };

  let json = JSON.stringify(body, null, 2);
  if (json.length > maxChars) {
    json = json.slice(0, maxChars) + `\n... (truncated ${json.length - maxChars} chars)`;
  }
  return `OBSERVATION:\n${json}`;
}

export const CORRECTION_HINT = `
Your last reply could not be parsed. Reply with a THOUGHT line followed by exactly one
JSON block: either {"tool": "<tool_name>", "parameters": {...}} or
{"decision": "<confirmed_fraud|suspected_fraud|needs_review|legitimate>", "confidence": "...", "summary": "..."}.
`.trim();

export const FINAL_ITERATION_REMINDER =
  'This is your final step. Do not call another tool; reply with your final decision JSON now.';

function followUp(step: Step): string | undefined {
  switch (step.kind) {
    case 'action':
      return formatObservation(step.observation);
    case 'malformed':
      return CORRECTION_HINT;
    default:
      return undefined;
  }
}

/**
 * Rebuilds the chat context from the transcript: the model's own replies as
 * assistant turns, each followed by the observation (or correction) it produced.
 */
export function buildMessages(
  systemPrompt: string,
  caseBrief: string,
  transcript: Transcript,
  finalIteration: boolean
): LLMMessage[] {
  const messages: LLMMessage[] = [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: caseBrief },
  ];

  for (const step of transcript) {
    if (step.rawText) messages.push({ role: 'assistant', content: step.rawText });
    const next = followUp(step);
    if (next) messages.push({ role: 'user', content: next });
  }

  if (finalIteration) {
    const last = messages[messages.length - 1];
    if (last.role === 'user') {
      messages[messages.length - 1] = { role: 'user', content: `${last.content}\n\n${FINAL_ITERATION_REMINDER}` };
    } else {
      messages.push({ role: 'user', content: FINAL_ITERATION_REMINDER });
    }
  }
  return messages;
}
