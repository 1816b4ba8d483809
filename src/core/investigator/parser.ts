import type { Decision, ModelConclusion, ParseFailureReason, ToolAction, ToolArgs } from './types';

export type ParseResult =
  | { kind: 'action'; reasoning: string; action: ToolAction }
  | { kind: 'conclusion'; reasoning: string; conclusion: ModelConclusion }
  | { kind: 'failure'; reasoning: string; reason: ParseFailureReason; message: string; rawText: string };

const FENCE_RE = /```[A-Za-z]*[ \t]*\r?\n?([\s\S]*?)```/g;
const DECISION_KEYS = ['decision', 'final_decision', 'finalDecision', 'fraud_decision'] as const;
const ARGUMENT_KEYS = ['parameters', 'arguments', 'args', 'input'] as const;
const SUMMARY_KEYS = ['summary', 'reasoning', 'rationale'] as const;

const ACTION_LINE_RE = /^[ \t*]*ACTION[ \t*]*:[ \t*]*([A-Za-z_][\w]*)[ \t*]*$/im;
const ACTION_INPUT_RE = /^[ \t*]*ACTION[ \t]+INPUT[ \t*]*:/im;
const DECISION_LINE_RE = /^[ \t*]*FINAL[ \t]+DECISION[ \t*]*:[ \t*]*(.+)$/im;
const CONFIDENCE_LINE_RE = /^[ \t*-]*CONFIDENCE[ \t*]*:[ \t*]*([A-Za-z]+)/im;

interface Candidate {
  start: number;
  body: string;
}

interface ParsedObject {
  start: number;
  value: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Index of the brace closing the object opened at `start`, or -1. */
function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function scanObjects(text: string, offset: number, anchor?: number): Candidate[] {
  const found: Candidate[] = [];
  let i = 0;
  while (i < text.length) {
    if (text[i] !== '{') {
      i++;
      continue;
    }
    const end = findClosingBrace(text, i);
    const start = anchor ?? offset + i;
    if (end === -1) {
      found.push({ start, body: text.slice(i) });
      break;
    }
    found.push({ start, body: text.slice(i, end + 1) });
    i = end + 1;
  }
  return found;
}

function findCandidates(text: string): Candidate[] {
  const fenced: Candidate[] = [];
  for (const match of text.matchAll(FENCE_RE)) {
    const fenceStart = match.index ?? 0;
    fenced.push(...scanObjects(match[1], fenceStart, fenceStart));
  }
  return fenced.length > 0 ? fenced : scanObjects(text, 0);
}

function parseObjects(candidates: Candidate[]): ParsedObject[] {
  const parsed: ParsedObject[] = [];
  for (const candidate of candidates) {
    let value: unknown;
    try {
      value = JSON.parse(candidate.body);
    } catch {
      continue;
    }
    if (isRecord(value)) parsed.push({ start: candidate.start, value });
  }
  return parsed;
}

function cleanReasoning(segment: string): string {
  return segment
    .replace(/\*\*/g, '')
    .replace(/^\s*THOUGHT\s*:\s*/i, '')
    .replace(/(?:^|\n)[ \t]*(?:ACTION|FINAL DECISION)[ \t]*:?[ \t]*$/i, '')
    .trim();
}

function stringField(record: Record<string, unknown>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
  }
  return undefined;
}

/** Maps free-form decision labels ("Confirmed Fraud", "LEGITIMATE") onto the enumeration. */
export function normalizeDecision(label: string): Decision | null {
  const slug = label.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '');
  if (!slug) return null;
  if (/(^|_)(legitimate|no_fraud|not_fraud|benign|no_action)(_|$)/.test(slug)) return 'legitimate';
  if (/(^|_)confirmed(_|$)/.test(slug)) return 'confirmed_fraud';
  if (/(^|_)(suspected|suspicious|likely_fraud|file_sar)(_|$)/.test(slug)) return 'suspected_fraud';
  if (/(^|_)(needs_review|review|manual_review|escalate|inconclusive)(_|$)/.test(slug)) return 'needs_review';
  return null;
}

function conclusionFromObject(record: Record<string, unknown>, label: string): ModelConclusion {
  return {
    decision: normalizeDecision(label),
    label,
    confidence: stringField(record, ['confidence']),
    summary: stringField(record, SUMMARY_KEYS),
    fields: record,
  };
}

type ArgumentsResult = { ok: true; args: ToolArgs } | { ok: false; message: string };

function extractArguments(record: Record<string, unknown>): ArgumentsResult {
  const key = ARGUMENT_KEYS.find((candidate) => candidate in record);
  if (key === undefined) return { ok: true, args: {} };

  let value = record[key];
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch {
      return { ok: false, message: `"${key}" is a string that is not valid JSON` };
    }
  }
  if (value === null || value === undefined) return { ok: true, args: {} };
  if (!isRecord(value)) return { ok: false, message: `"${key}" must be a JSON object` };
  return { ok: true, args: value };
}

function actionFromObject(
  record: Record<string, unknown>,
  reasoning: string,
  rawText: string
): ParseResult | undefined {
  const tool = stringField(record, ['tool', 'action', 'tool_name', 'name']);
  if (!tool) return undefined;

  const args = extractArguments(record);
  if (!args.ok) {
    return { kind: 'failure', reasoning, reason: 'invalid_arguments', message: args.message, rawText };
  }
  return { kind: 'action', reasoning, action: { tool, args: args.args } };
}

function parseKeyValueAction(text: string, rawText: string): ParseResult | undefined {
  const actionLine = ACTION_LINE_RE.exec(text);
  if (!actionLine) return undefined;

  const reasoning = cleanReasoning(text.slice(0, actionLine.index));
  const tool = actionLine[1];
  const inputLabel = ACTION_INPUT_RE.exec(text);
  if (!inputLabel) return { kind: 'action', reasoning, action: { tool, args: {} } };

  const rest = text.slice(inputLabel.index + inputLabel[0].length);
  const open = rest.indexOf('{');
  const close = open === -1 ? -1 : findClosingBrace(rest, open);
  if (open === -1 || close === -1) {
    return { kind: 'failure', reasoning, reason: 'invalid_arguments', message: 'ACTION INPUT is not a JSON object', rawText };
  }

  let args: unknown;
  try {
    args = JSON.parse(rest.slice(open, close + 1));
  } catch {
    return { kind: 'failure', reasoning, reason: 'invalid_arguments', message: 'ACTION INPUT is not valid JSON', rawText };
  }
  if (!isRecord(args)) {
    return { kind: 'failure', reasoning, reason: 'invalid_arguments', message: 'ACTION INPUT must be a JSON object', rawText };
  }
  return { kind: 'action', reasoning, action: { tool, args } };
}

/**
 * Splits one model completion into reasoning plus either a tool action or a
 * final decision. Never throws: anything unusable becomes a failure result.
 *
 * A JSON block (fenced or bare) is preferred. `ACTION:` / `ACTION INPUT:` and
 * `FINAL DECISION:` lines are accepted as a fallback. Decision fields win
 * over a tool call in the same completion.
 */
export function parseCompletion(rawText: string): ParseResult {
  const text = rawText.replace(/\r\n/g, '\n');
  const candidates = findCandidates(text);
  const objects = parseObjects(candidates);
  const reasoningBefore = (start: number) => cleanReasoning(text.slice(0, start));

  for (const object of objects) {
    const label = stringField(object.value, DECISION_KEYS);
    if (label) {
      return { kind: 'conclusion', reasoning: reasoningBefore(object.start), conclusion: conclusionFromObject(object.value, label) };
    }
  }

  const decisionLine = DECISION_LINE_RE.exec(text);
  const lineConclusion = (): ParseResult | undefined => {
    if (!decisionLine) return undefined;
    const label = decisionLine[1].replace(/\*/g, '').trim();
    if (!label) return undefined;
    const confidence = CONFIDENCE_LINE_RE.exec(text)?.[1]?.toLowerCase();
    return {
      kind: 'conclusion',
      reasoning: reasoningBefore(decisionLine.index),
      conclusion: { decision: normalizeDecision(label), label, confidence, summary: undefined, fields: {} },
    };
  };

  const recognisedLine = lineConclusion();
  if (recognisedLine?.kind === 'conclusion' && recognisedLine.conclusion.decision !== null) {
    return recognisedLine;
  }

  for (const object of objects) {
    const action = actionFromObject(object.value, reasoningBefore(object.start), rawText);
    if (action) return action;
  }

  const keyValueAction = parseKeyValueAction(text, rawText);
  if (keyValueAction) return keyValueAction;

  if (recognisedLine) return recognisedLine;

  const reasoning = candidates.length > 0 ? reasoningBefore(candidates[0].start) : cleanReasoning(text);
  if (objects.length > 0) {
    return { kind: 'failure', reasoning, reason: 'missing_tool', message: 'Structured block names neither a tool nor a decision', rawText };
  }
  if (candidates.length > 0) {
    return { kind: 'failure', reasoning, reason: 'invalid_json', message: 'Structured block is not valid JSON', rawText };
  }
  return { kind: 'failure', reasoning, reason: 'no_structured_block', message: 'No action or decision block found', rawText };
}
