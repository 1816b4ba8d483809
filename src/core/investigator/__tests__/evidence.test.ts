import { describe, it, expect } from 'vitest';
import {
  assessTranscript,
  collectEvidence,
  collectRiskFactors,
  decide,
  DEFAULT_SCORING_POLICY,
  resolveScoringPolicy,
  sarReasoningFor,
  scoreEvidence,
} from '../evidence';
import type { ActionStep, EvidenceItem, Severity, Step } from '../types';

// ─── Helpers ────────────────────────────────────────────────────────────────

function actionStep(iteration: number, tool: string, findings: unknown[], success = true): ActionStep {
  return {
    kind: 'action',
    iteration,
    rawText: '',
    reasoning: '',
    timestamp: '2025-03-01T00:00:00.000Z',
    action: { tool, args: {} },
    observation: {
      tool,
      args: {},
      success,
      payload: { findings },
      durationMs: 1,
      ...(success ? {} : { error: { kind: 'ToolExecutionError' as const, message: 'boom' } }),
    },
  };
}

function item(severity: Severity, description: string = severity): EvidenceItem {
  return { key: description, tool: 't', type: description, severity, description, iteration: 1 };
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('collectEvidence', () => {
  const transcript: Step[] = [
    actionStep(1, 'analyze_transaction_velocity', [
      { key: 'velocity', type: 'elevated_velocity', severity: 'high', description: '6 transactions' },
      { type: 'merchant_spread', description: 'spread' },
    ]),
    actionStep(2, 'analyze_transaction_velocity', [{ key: 'velocity', type: 'velocity_burst', description: '15 transactions' }]),
    actionStep(3, 'check_geographic_anomaly', [{ type: 'impossible_travel', description: 'ignored' }], false),
    actionStep(4, 'custom_tool', [
      { type: 'odd', severity: 'extreme', description: 'odd thing' },
      { type: 'other', severity: 'medium', description: 'other thing' },
      { description: 'no type' },
    ]),
  ];

  it('dedupes by tool and key, keeping the highest severity at its first position', () => {
    const evidence = collectEvidence(transcript);

    expect(evidence.map((e) => [e.tool, e.key, e.severity])).toEqual([
      ['analyze_transaction_velocity', 'velocity', 'critical'],
      ['analyze_transaction_velocity', 'merchant_spread', 'medium'],
      ['custom_tool', 'other', 'medium'],
      ['custom_tool', 'odd', 'low'],
    ]);
    expect(evidence[0]).toMatchObject({ type: 'velocity_burst', description: '15 transactions', iteration: 2 });
  });

  it('ignores failed observations and malformed findings', () => {
    const evidence = collectEvidence(transcript);

    expect(evidence.some((e) => e.tool === 'check_geographic_anomaly')).toBe(false);
    expect(evidence.some((e) => e.description === 'no type')).toBe(false);
  });

  it('keeps the first finding when severities tie', () => {
    const evidence = collectEvidence([
      actionStep(1, 'custom_tool', [{ key: 'k', type: 'x', severity: 'high', description: 'first' }]),
      actionStep(2, 'custom_tool', [{ key: 'k', type: 'x', severity: 'high', description: 'second' }]),
    ]);

    expect(evidence).toHaveLength(1);
    expect(evidence[0].description).toBe('first');
  });

  it('takes tabled severities over what the tool reported', () => {
    const evidence = collectEvidence([
      actionStep(1, 'analyze_transaction_velocity', [{ type: 'velocity_burst', severity: 'low', description: 'burst' }]),
    ]);

    expect(evidence[0].severity).toBe('critical');
  });

  it('uses policy overrides for unlisted finding types', () => {
    const policy = resolveScoringPolicy({ findingSeverity: { odd: 'high' } });
    const evidence = collectEvidence(transcript, policy);

    expect(evidence.find((e) => e.key === 'odd')?.severity).toBe('high');
  });

  it('skips payloads without a findings array', () => {
    const step = actionStep(1, 'get_customer_profile', []);
    step.observation.payload = { customerId: 'C1' };

    expect(collectEvidence([step])).toEqual([]);
  });
});

describe('scoreEvidence', () => {
  it('sums severity weights', () => {
    expect(scoreEvidence([item('high', 'a'), item('high', 'b'), item('low')])).toBe(4.25);
  });

  it('raises the score to the critical floor', () => {
    expect(scoreEvidence([item('critical')])).toBe(8);
  });

  it('caps the score at the maximum', () => {
    const evidence = ['a', 'b', 'c', 'd', 'e', 'f'].map((d) => item('high', d));
    expect(scoreEvidence(evidence)).toBe(10);
  });

  it('returns 0 for no evidence', () => {
    expect(scoreEvidence([])).toBe(0);
  });
});

describe('decide', () => {
  it.each([
    [10, 'confirmed_fraud'],
    [8, 'confirmed_fraud'],
    [7.99, 'suspected_fraud'],
    [4, 'suspected_fraud'],
    [3.99, 'needs_review'],
    [2, 'needs_review'],
    [1.99, 'legitimate'],
    [0, 'legitimate'],
  ])('maps %d to %s', (score, decision) => {
    expect(decide(score)).toBe(decision);
  });

  it('follows overridden thresholds', () => {
    expect(decide(8, resolveScoringPolicy({ thresholds: { confirmed: 9 } }))).toBe('suspected_fraud');
  });
});

describe('resolveScoringPolicy', () => {
  it('merges partial overrides onto the defaults', () => {
    const policy = resolveScoringPolicy({ severityWeights: { low: 1 }, reportThreshold: 5 });

    expect(policy.severityWeights).toEqual({ critical: 3, high: 2, medium: 1, low: 1 });
    expect(policy.reportThreshold).toBe(5);
    expect(policy.thresholds).toEqual(DEFAULT_SCORING_POLICY.thresholds);
    expect(policy.findingSeverity.velocity_burst).toBe('critical');
  });
});

describe('assessTranscript', () => {
  it('clears a case whose tools returned data but no findings', () => {
    expect(assessTranscript([actionStep(1, 'get_customer_profile', [])], 'model_concluded')).toEqual({
      score: 0,
      decision: 'legitimate',
      escalationRequired: false,
      reportRequired: false,
      evidence: [],
      keyFindings: [],
      riskFactors: [],
      recommendation: 'No action required; continue normal monitoring.',
      nextSteps: ['Continue standard monitoring', 'Review the case in 30 days'],
    });
  });

  it('sends a conclusion without any tool data to review', () => {
    const assessment = assessTranscript([], 'model_concluded');

    expect(assessment.decision).toBe('needs_review');
    expect(assessment.recommendation).toBe(
      'No tool returned data, so the decision is not supported by evidence. ' +
        'Route to an analyst and monitor closely for additional indicators.'
    );
    expect(assessment.nextSteps).toEqual(['Obtain the missing account data and rerun the investigation']);
  });

  it('treats a transcript of failed tool calls as having no data', () => {
    const transcript = [
      actionStep(1, 'analyze_transaction_velocity', [], false),
      actionStep(2, 'check_geographic_anomaly', [], false),
    ];

    const assessment = assessTranscript(transcript, 'model_concluded');

    expect(assessment.score).toBe(0);
    expect(assessment.decision).toBe('needs_review');
  });

  it('lifts legitimate to needs_review when the budget ran out', () => {
    const assessment = assessTranscript([actionStep(1, 'get_customer_profile', [])], 'iteration_budget_exhausted');

    expect(assessment.decision).toBe('needs_review');
    expect(assessment.recommendation).toBe(
      'Investigation stopped at the iteration limit before the model concluded. ' +
        'Route to an analyst and monitor closely for additional indicators.'
    );
    expect(assessment.nextSteps).toEqual(['Have an analyst review the investigation transcript']);
  });

  it('forces needs_review on malformed output but still flags critical evidence', () => {
    const assessment = assessTranscript(
      [actionStep(1, 'check_geographic_anomaly', [{ type: 'impossible_travel', description: 'Chicago then Lagos' }])],
      'malformed_output'
    );

    expect(assessment.score).toBe(8);
    expect(assessment.decision).toBe('needs_review');
    expect(assessment.escalationRequired).toBe(true);
    expect(assessment.reportRequired).toBe(true);
    expect(assessment.sarReasoning).toBe('SAR filing recommended based on:\n- Chicago then Lagos');
    expect(assessment.nextSteps).toEqual([
      'File a Suspicious Activity Report (SAR) within the required timeframe',
      'Document all evidence and investigation steps',
      'Notify compliance management',
      'Perform enhanced due diligence (EDD)',
      'Increase transaction monitoring frequency to daily',
      'Have an analyst review the investigation transcript',
    ]);
  });

  it('recommends structuring follow-ups for structuring evidence', () => {
    const assessment = assessTranscript(
      [
        actionStep(1, 'analyze_transaction_patterns', [
          { key: 'structuring', type: 'potential_structuring', description: '5 deposits under the threshold' },
        ]),
        actionStep(2, 'check_regulatory_thresholds', [{ type: 'near_ctr_threshold', description: 'Just below CTR' }]),
      ],
      'model_concluded'
    );

    expect(assessment.score).toBe(4);
    expect(assessment.decision).toBe('suspected_fraud');
    expect(assessment.escalationRequired).toBe(false);
    expect(assessment.reportRequired).toBe(false);
    expect(assessment.sarReasoning).toBeUndefined();
    expect(assessment.keyFindings).toEqual(['5 deposits under the threshold', 'Just below CTR']);
    expect(assessment.recommendation).toBe(
      'Block pending transactions and verify the customer. Key evidence: 5 deposits under the threshold; Just below CTR.'
    );
    expect(assessment.nextSteps).toEqual([
      'Review historical transactions for similar patterns',
      'Check for related accounts or beneficiaries',
    ]);
  });

  it('limits key findings to the policy maximum', () => {
    const transcript = [
      actionStep(1, 'custom_tool', ['a', 'b', 'c'].map((d) => ({ type: d, severity: 'high', description: d }))),
    ];

    const assessment = assessTranscript(transcript, 'model_concluded', resolveScoringPolicy({ maxKeyFindings: 2 }));

    expect(assessment.keyFindings).toEqual(['a', 'b']);
  });

  it('is deterministic for the same input', () => {
    const transcript = [actionStep(1, 'analyze_device_fingerprint', [{ key: 'device', type: 'new_device', description: 'new' }])];

    expect(assessTranscript(transcript, 'model_concluded')).toEqual(assessTranscript(transcript, 'model_concluded'));
  });
});

describe('collectRiskFactors', () => {
  it('gathers risk factors from successful observations without repeats', () => {
    const customer = actionStep(1, 'assess_customer_risk', []);
    customer.observation.payload = { riskFactors: ['Politically exposed person', 'Previous SARs filed: 1'], findings: [] };
    const account = actionStep(2, 'calculate_risk_score', []);
    account.observation.payload = { riskFactors: ['Previous SARs filed: 1', 42, 'Frequent cash deposits: 5 deposits'] };
    const failed = actionStep(3, 'calculate_risk_score', [], false);
    failed.observation.payload = { riskFactors: ['Ignored'] };

    expect(collectRiskFactors([customer, account, failed])).toEqual([
      'Politically exposed person',
      'Previous SARs filed: 1',
      'Frequent cash deposits: 5 deposits',
    ]);
  });
});

describe('sarReasoningFor', () => {
  it('lists at most five high or critical items', () => {
    const evidence = ['a', 'b', 'c', 'd', 'e', 'f'].map((d) => item('high', d));

    expect(sarReasoningFor([item('low'), ...evidence], 10)).toBe(
      'SAR filing recommended based on:\n- a\n- b\n- c\n- d\n- e'
    );
  });

  it('falls back to the score when no item is high or critical', () => {
    expect(sarReasoningFor([item('medium')], 7)).toBe(
      'SAR filing recommended based on:\n- Risk score 7/10 meets the reporting threshold'
    );
  });
});
