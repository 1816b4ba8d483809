import { z } from 'zod';
import { SEVERITIES } from './types';
import type { Assessment, Decision, EvidenceItem, Severity, StopReason, Transcript } from './types';

export interface ScoringPolicy {
  severityWeights: Record<Severity, number>;
  /** Minimum score once any critical item is present. */
  criticalFloor: number;
  maxScore: number;
  thresholds: {
    confirmed: number;
    suspected: number;
    needsReview: number;
  };
  escalationThreshold: number;
  reportThreshold: number;
  maxKeyFindings: number;
  defaultSeverity: Severity;
  /** Finding type to tier. Listed types ignore the severity the tool reported. */
  findingSeverity: Record<string, Severity>;
}

export interface ScoringPolicyOverrides {
  severityWeights?: Partial<Record<Severity, number>>;
  criticalFloor?: number;
  maxScore?: number;
  thresholds?: Partial<ScoringPolicy['thresholds']>;
  escalationThreshold?: number;
  reportThreshold?: number;
  maxKeyFindings?: number;
  defaultSeverity?: Severity;
  findingSeverity?: Record<string, Severity>;
}

export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  severityWeights: { critical: 3, high: 2, medium: 1, low: 0.25 },
  criticalFloor: 8,
  maxScore: 10,
  thresholds: { confirmed: 8, suspected: 4, needsReview: 2 },
  escalationThreshold: 8,
  reportThreshold: 7,
  maxKeyFindings: 5,
  defaultSeverity: 'low',
  findingSeverity: {
    velocity_burst: 'critical',
    elevated_velocity: 'high',
    rapid_succession: 'high',
    merchant_spread: 'medium',
    high_total_value: 'medium',
    unusual_location: 'high',
    impossible_travel: 'critical',
    new_device: 'high',
    amount_anomaly: 'high',
    exceeds_max_transaction: 'medium',
    category_anomaly: 'low',
    time_anomaly: 'low',
    potential_structuring: 'high',
    high_velocity: 'medium',
    round_amounts: 'low',
    multiple_daily_transactions: 'medium',
    near_ctr_threshold: 'high',
    ctr_required: 'medium',
    large_cash_transaction: 'low',
    customer_risk_critical: 'critical',
    customer_risk_high: 'high',
    customer_risk_medium: 'medium',
    account_risk_critical: 'critical',
    account_risk_high: 'high',
    account_risk_medium: 'medium',
    structuring_critical: 'critical',
    structuring_high: 'high',
    structuring_medium: 'medium',
  },
};

export function resolveScoringPolicy(overrides: ScoringPolicyOverrides = {}): ScoringPolicy {
  const base = DEFAULT_SCORING_POLICY;
  return {
    severityWeights: { ...base.severityWeights, ...overrides.severityWeights },
    criticalFloor: overrides.criticalFloor ?? base.criticalFloor,
    maxScore: overrides.maxScore ?? base.maxScore,
    thresholds: { ...base.thresholds, ...overrides.thresholds },
    escalationThreshold: overrides.escalationThreshold ?? base.escalationThreshold,
    reportThreshold: overrides.reportThreshold ?? base.reportThreshold,
    maxKeyFindings: overrides.maxKeyFindings ?? base.maxKeyFindings,
    defaultSeverity: overrides.defaultSeverity ?? base.defaultSeverity,
    findingSeverity: { ...base.findingSeverity, ...overrides.findingSeverity },
  };
}

const SEVERITY_RANK: Record<Severity, number> = { critical: 4, high: 3, medium: 2, low: 1 };

const FindingSchema = z.object({
  key: z.string().min(1).optional(),
  type: z.string().min(1),
  severity: z.unknown().optional(),
  description: z.string().min(1),
});

function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

const FindingsPayloadSchema = z.object({ findings: z.array(z.unknown()) });

const RiskFactorsPayloadSchema = z.object({ riskFactors: z.array(z.unknown()) });

const MAX_SAR_REASONS = 5;

const NO_DATA_NOTE = 'No tool returned data, so the decision is not supported by evidence.';

const DECISION_ACTION: Record<Decision, string> = {
  confirmed_fraud: 'Block the account immediately and contact the customer',
  suspected_fraud: 'Block pending transactions and verify the customer',
  needs_review: 'Route to an analyst and monitor closely for additional indicators',
  legitimate: 'No action required; continue normal monitoring',
};

const STOP_NOTE: Partial<Record<StopReason, string>> = {
  malformed_output: 'Manual review required: the model output could not be parsed.',
  iteration_budget_exhausted: 'Investigation stopped at the iteration limit before the model concluded.',
};

/**
 * Projects `findings` from successful observations into evidence, one item
 * per (tool, key) at the highest severity seen. Ordered by severity, then
 * by first appearance.
 */
export function collectEvidence(transcript: Transcript, policy: ScoringPolicy = DEFAULT_SCORING_POLICY): EvidenceItem[] {
  const byIdentity = new Map<string, { order: number; item: EvidenceItem }>();

  for (const step of transcript) {
    if (step.kind !== 'action' || !step.observation.success) continue;

    const payload = FindingsPayloadSchema.safeParse(step.observation.payload);
    if (!payload.success) continue;

    for (const raw of payload.data.findings) {
      const finding = FindingSchema.safeParse(raw);
      if (!finding.success) continue;

      const { type, description } = finding.data;
      const key = finding.data.key ?? type;
      const tabled = Object.hasOwn(policy.findingSeverity, type) ? policy.findingSeverity[type] : undefined;
      const reported = isSeverity(finding.data.severity) ? finding.data.severity : undefined;
      const severity = tabled ?? reported ?? policy.defaultSeverity;
      const identity = JSON.stringify([step.observation.tool, key]);
      const item: EvidenceItem = { key, tool: step.observation.tool, type, severity, description, iteration: step.iteration };

      const existing = byIdentity.get(identity);
      if (!existing) {
        byIdentity.set(identity, { order: byIdentity.size, item });
      } else if (SEVERITY_RANK[severity] > SEVERITY_RANK[existing.item.severity]) {
        byIdentity.set(identity, { order: existing.order, item });
      }
    }
  }

  return [...byIdentity.values()]
    .sort((a, b) => SEVERITY_RANK[b.item.severity] - SEVERITY_RANK[a.item.severity] || a.order - b.order)
    .map((entry) => entry.item);
}

export function scoreEvidence(evidence: readonly EvidenceItem[], policy: ScoringPolicy = DEFAULT_SCORING_POLICY): number {
  let score = evidence.reduce((sum, item) => sum + policy.severityWeights[item.severity], 0);
  if (evidence.some((item) => item.severity === 'critical')) {
    score = Math.max(score, policy.criticalFloor);
  }
  return Math.round(Math.min(score, policy.maxScore) * 100) / 100;
}

export function decide(score: number, policy: ScoringPolicy = DEFAULT_SCORING_POLICY): Decision {
  if (score >= policy.thresholds.confirmed) return 'confirmed_fraud';
  if (score >= policy.thresholds.suspected) return 'suspected_fraud';
  if (score >= policy.thresholds.needsReview) return 'needs_review';
  return 'legitimate';
}

function nextStepsFor(
  assessment: Pick<Assessment, 'score' | 'decision' | 'reportRequired' | 'escalationRequired' | 'evidence'>,
  stopReason: StopReason,
  hasData: boolean,
  policy: ScoringPolicy
): string[] {
  const steps: string[] = [];

  if (assessment.decision === 'confirmed_fraud') {
    steps.push('Block the account and contact the customer through a verified channel');
  }
  if (assessment.reportRequired) {
    steps.push('File a Suspicious Activity Report (SAR) within the required timeframe');
    steps.push('Document all evidence and investigation steps');
    steps.push('Notify compliance management');
  }
  if (assessment.score >= policy.reportThreshold) {
    steps.push('Perform enhanced due diligence (EDD)');
    steps.push('Increase transaction monitoring frequency to daily');
  }
  if (assessment.evidence.some((item) => item.type.includes('structuring'))) {
    steps.push('Review historical transactions for similar patterns');
    steps.push('Check for related accounts or beneficiaries');
  }
  if (stopReason === 'malformed_output' || stopReason === 'iteration_budget_exhausted') {
    steps.push('Have an analyst review the investigation transcript');
  }
  if (!hasData) {
    steps.push('Obtain the missing account data and rerun the investigation');
  }
  if (steps.length === 0) {
    steps.push('Continue standard monitoring');
    steps.push('Review the case in 30 days');
  }
  return steps;
}

function hasObservedData(transcript: Transcript): boolean {
  return transcript.some((step) => step.kind === 'action' && step.observation.success);
}

/** String entries of every successful observation's `riskFactors`, first occurrence kept. */
export function collectRiskFactors(transcript: Transcript): string[] {
  const factors = new Set<string>();
  for (const step of transcript) {
    if (step.kind !== 'action' || !step.observation.success) continue;
    const payload = RiskFactorsPayloadSchema.safeParse(step.observation.payload);
    if (!payload.success) continue;
    for (const factor of payload.data.riskFactors) {
      if (typeof factor === 'string' && factor.length > 0) factors.add(factor);
    }
  }
  return [...factors];
}

export function sarReasoningFor(evidence: readonly EvidenceItem[], score: number): string {
  const reasons = evidence
    .filter((item) => item.severity === 'critical' || item.severity === 'high')
    .slice(0, MAX_SAR_REASONS)
    .map((item) => `- ${item.description}`);
  if (reasons.length === 0) reasons.push(`- Risk score ${score}/10 meets the reporting threshold`);
  return ['SAR filing recommended based on:', ...reasons].join('\n');
}

/**
 * Final assessment of a transcript. Pure: the same transcript, stop reason
 * and policy always give an identical result.
 */
export function assessTranscript(
  transcript: Transcript,
  stopReason: StopReason,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): Assessment {
  const evidence = collectEvidence(transcript, policy);
  const score = scoreEvidence(evidence, policy);
  const hasCritical = evidence.some((item) => item.severity === 'critical');

  const hasData = hasObservedData(transcript);

  let decision = decide(score, policy);
  if (stopReason === 'malformed_output') {
    decision = 'needs_review';
  } else if (decision === 'legitimate' && (stopReason === 'iteration_budget_exhausted' || !hasData)) {
    decision = 'needs_review';
  }

  const escalationRequired = hasCritical || score >= policy.escalationThreshold;
  const reportRequired = hasCritical || score >= policy.reportThreshold;

  const keyFindings = evidence
    .filter((item) => item.severity === 'critical' || item.severity === 'high')
    .slice(0, policy.maxKeyFindings)
    .map((item) => item.description);

  const parts: string[] = [];
  const note = STOP_NOTE[stopReason];
  if (note) parts.push(note);
  if (!hasData) parts.push(NO_DATA_NOTE);
  parts.push(`${DECISION_ACTION[decision]}.`);
  const top = evidence.slice(0, 3).map((item) => item.description);
  if (top.length > 0) parts.push(`Key evidence: ${top.join('; ')}.`);

  const base = { score, decision, escalationRequired, reportRequired, evidence };
  return {
    ...base,
    keyFindings,
    riskFactors: collectRiskFactors(transcript),
    recommendation: parts.join(' '),
    sarReasoning: reportRequired ? sarReasoningFor(evidence, score) : undefined,
    nextSteps: nextStepsFor(base, stopReason, hasData, policy),
  };
}
