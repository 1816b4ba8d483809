import type { UsageMetrics } from './metrics';

export type Severity = 'critical' | 'high' | 'medium' | 'low';
export const SEVERITIES: readonly Severity[] = ['critical', 'high', 'medium', 'low'];

export type Decision = 'confirmed_fraud' | 'suspected_fraud' | 'needs_review' | 'legitimate';

export type EngineState = 'initializing' | 'reasoning' | 'acting' | 'observing' | 'concluding' | 'terminated';

export type StopReason =
  | 'model_concluded'
  | 'iteration_budget_exhausted'
  | 'malformed_output'
  | 'cancelled'
  | 'model_unavailable'
  | 'case_rejected';

export type ToolArgs = Record<string, unknown>;
export type Payload = Record<string, unknown>;

export interface ToolAction {
  tool: string;
  args: ToolArgs;
}

export type ObservationErrorKind = 'UnknownTool' | 'InvalidArguments' | 'ToolExecutionError';

export interface Observation {
  tool: string;
  args: ToolArgs;
  success: boolean;
  payload: Payload;
  error?: {
    kind: ObservationErrorKind;
    message: string;
    fields?: string[];
  };
  durationMs: number;
}

export interface ModelConclusion {
  /** Normalised label, or null when the model used one we don't recognise. */
  decision: Decision | null;
  label: string;
  confidence?: string;
  summary?: string;
  fields: Record<string, unknown>;
}

export type ParseFailureReason = 'no_structured_block' | 'invalid_json' | 'missing_tool' | 'invalid_arguments';

export interface FailureInfo {
  kind: string;
  message: string;
  attempts?: number;
}

interface StepBase {
  iteration: number;
  rawText: string;
  reasoning: string;
  timestamp: string;
}

export interface ActionStep extends StepBase {
  kind: 'action';
  action: ToolAction;
  observation: Observation;
}

export interface ConclusionStep extends StepBase {
  kind: 'conclusion';
  conclusion: ModelConclusion;
}

export interface MalformedStep extends StepBase {
  kind: 'malformed';
  failure: {
    reason: ParseFailureReason;
    message: string;
  };
}

export interface ModelFailureStep extends StepBase {
  kind: 'model_failure';
  failure: FailureInfo;
}

export type Step = ActionStep | ConclusionStep | MalformedStep | ModelFailureStep;
export type Transcript = readonly Step[];

/** What tools report under `findings`; projected into evidence by the aggregator. */
export interface Finding {
  /** Dedup key within one tool; defaults to `type`. */
  key?: string;
  type: string;
  severity?: Severity;
  description: string;
}

export interface EvidenceItem {
  key: string;
  tool: string;
  type: string;
  severity: Severity;
  description: string;
  iteration: number;
}

export interface Assessment {
  score: number;
  decision: Decision;
  escalationRequired: boolean;
  reportRequired: boolean;
  evidence: EvidenceItem[];
  keyFindings: string[];
  /** Customer and account risk factors reported by the tools. */
  riskFactors: string[];
  recommendation: string;
  /** Present when a SAR is required. */
  sarReasoning?: string;
  nextSteps: string[];
}

interface ResultBase {
  investigationId: string;
  caseId: string;
  model: string;
  transcript: Step[];
  usage: UsageMetrics;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

export interface AssessedResult extends ResultBase, Assessment {
  status: 'completed' | 'degraded';
  stopReason: 'model_concluded' | 'iteration_budget_exhausted' | 'malformed_output';
  modelConclusion?: ModelConclusion;
}

export interface CancelledResult extends ResultBase {
  status: 'cancelled';
  stopReason: 'cancelled';
}

export interface FailedResult extends ResultBase {
  status: 'failed';
  stopReason: 'model_unavailable' | 'case_rejected';
  failure: FailureInfo;
}

export type InvestigationResult = AssessedResult | CancelledResult | FailedResult;
