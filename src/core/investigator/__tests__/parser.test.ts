import { describe, it, expect } from 'vitest';
import { normalizeDecision, parseCompletion } from '../parser';

describe('parseCompletion', () => {
  describe('actions', () => {
    it('reads a fenced JSON tool call and the thought before it', () => {
      const text = [
        'THOUGHT: Check velocity first.',
        '```json',
        '{"tool": "analyze_transaction_velocity", "parameters": {"account_id": "ACCT_1", "hours": 2}}',
        '```',
      ].join('\n');

      expect(parseCompletion(text)).toEqual({
        kind: 'action',
        reasoning: 'Check velocity first.',
        action: { tool: 'analyze_transaction_velocity', args: { account_id: 'ACCT_1', hours: 2 } },
      });
    });

    it('reads a bare JSON object and strips markdown emphasis from the thought', () => {
      const result = parseCompletion('**THOUGHT:** Big spend abroad\n{"action": "check_geographic_anomaly", "args": {"account_id": "A"}}');

      expect(result).toEqual({
        kind: 'action',
        reasoning: 'Big spend abroad',
        action: { tool: 'check_geographic_anomaly', args: { account_id: 'A' } },
      });
    });

    it('parses arguments given as a JSON string', () => {
      const result = parseCompletion('{"tool": "get_customer_profile", "arguments": "{\\"customer_id\\": \\"C1\\"}"}');

      expect(result.kind).toBe('action');
      if (result.kind === 'action') {
        expect(result.action.args).toEqual({ customer_id: 'C1' });
      }
    });

    it('defaults to empty arguments when none are given', () => {
      const result = parseCompletion('{"tool": "search_negative_news"}');

      expect(result).toEqual({ kind: 'action', reasoning: '', action: { tool: 'search_negative_news', args: {} } });
    });

    it('falls back to ACTION / ACTION INPUT lines', () => {
      const text = [
        'THOUGHT: Need device info',
        'ACTION: analyze_device_fingerprint',
        'ACTION INPUT: {"account_id": "A", "device_id": "D"}',
      ].join('\n');

      expect(parseCompletion(text)).toEqual({
        kind: 'action',
        reasoning: 'Need device info',
        action: { tool: 'analyze_device_fingerprint', args: { account_id: 'A', device_id: 'D' } },
      });
    });

    it('prefers a tool call over a FINAL DECISION line with an unknown label', () => {
      const result = parseCompletion('FINAL DECISION: pending\n{"tool": "get_transaction_history"}');

      expect(result.kind).toBe('action');
    });
  });

  describe('conclusions', () => {
    it('lets decision fields win over a tool call in the same object', () => {
      const result = parseCompletion('{"tool": "x", "decision": "Confirmed Fraud", "confidence": "high", "summary": "Card testing"}');

      expect(result.kind).toBe('conclusion');
      if (result.kind === 'conclusion') {
        expect(result.conclusion.decision).toBe('confirmed_fraud');
        expect(result.conclusion.label).toBe('Confirmed Fraud');
        expect(result.conclusion.confidence).toBe('high');
        expect(result.conclusion.summary).toBe('Card testing');
      }
    });

    it('lets a later decision block win over an earlier tool call', () => {
      const text = '```json\n{"tool": "analyze_transaction_velocity"}\n```\nThen:\n```json\n{"final_decision": "legitimate"}\n```';
      const result = parseCompletion(text);

      expect(result.kind).toBe('conclusion');
      if (result.kind === 'conclusion') {
        expect(result.conclusion.decision).toBe('legitimate');
      }
    });

    it('reads a FINAL DECISION line with its confidence', () => {
      const result = parseCompletion('The evidence is clear.\nFINAL DECISION: Suspected Fraud\nCONFIDENCE: Medium');

      expect(result).toEqual({
        kind: 'conclusion',
        reasoning: 'The evidence is clear.',
        conclusion: {
          decision: 'suspected_fraud',
          label: 'Suspected Fraud',
          confidence: 'medium',
          summary: undefined,
          fields: {},
        },
      });
    });

    it('keeps an unknown decision label verbatim with a null decision', () => {
      const result = parseCompletion('{"decision": "Block it"}');

      expect(result.kind).toBe('conclusion');
      if (result.kind === 'conclusion') {
        expect(result.conclusion.decision).toBeNull();
        expect(result.conclusion.label).toBe('Block it');
      }
    });
  });

  describe('block framing', () => {
    const frame = (thought: string, block: string) => ({
      bare: `THOUGHT: ${thought}\n${block}`,
      jsonFence: `THOUGHT: ${thought}\n\`\`\`json\n${block}\n\`\`\``,
      plainFence: `THOUGHT: ${thought}\n\`\`\`\n${block}\n\`\`\``,
      padded: `  \n\tTHOUGHT: ${thought}\n\n   ${block}   \n\n`,
    });

    it('parses an action the same way bare, fenced or padded', () => {
      const variants = frame('Check the devices', '{"tool": "analyze_device_fingerprint", "parameters": {"account_id": "A", "device_id": "D"}}');
      const results = Object.values(variants).map((text) => parseCompletion(text));

      expect(results[0]).toEqual({
        kind: 'action',
        reasoning: 'Check the devices',
        action: { tool: 'analyze_device_fingerprint', args: { account_id: 'A', device_id: 'D' } },
      });
      for (const result of results.slice(1)) expect(result).toEqual(results[0]);
    });

    it('parses a decision the same way bare, fenced or padded', () => {
      const variants = frame('Nothing unusual', '{"decision": "Legitimate", "confidence": "high", "summary": "Normal activity"}');
      const results = Object.values(variants).map((text) => parseCompletion(text));

      expect(results[0]).toEqual({
        kind: 'conclusion',
        reasoning: 'Nothing unusual',
        conclusion: {
          decision: 'legitimate',
          label: 'Legitimate',
          confidence: 'high',
          summary: 'Normal activity',
          fields: { decision: 'Legitimate', confidence: 'high', summary: 'Normal activity' },
        },
      });
      for (const result of results.slice(1)) expect(result).toEqual(results[0]);
    });
  });

  describe('failures', () => {
    it('reports no_structured_block for plain prose', () => {
      const result = parseCompletion('I am not sure what to do.');

      expect(result).toEqual({
        kind: 'failure',
        reasoning: 'I am not sure what to do.',
        reason: 'no_structured_block',
        message: 'No action or decision block found',
        rawText: 'I am not sure what to do.',
      });
    });

    it('reports invalid_json for a block that does not parse', () => {
      const result = parseCompletion('```json\n{tool: velocity}\n```');

      expect(result.kind).toBe('failure');
      if (result.kind === 'failure') expect(result.reason).toBe('invalid_json');
    });

    it('reports missing_tool for an object without tool or decision', () => {
      const result = parseCompletion('{"account_id": "A"}');

      expect(result.kind).toBe('failure');
      if (result.kind === 'failure') expect(result.reason).toBe('missing_tool');
    });

    it('reports invalid_arguments when arguments are not an object', () => {
      const notJson = parseCompletion('{"tool": "x", "parameters": "not json"}');
      const notObject = parseCompletion('{"tool": "x", "parameters": [1, 2]}');

      expect(notJson.kind === 'failure' && notJson.reason).toBe('invalid_arguments');
      expect(notObject.kind === 'failure' && notObject.message).toBe('"parameters" must be a JSON object');
    });

    it('reports invalid_arguments for an unparseable ACTION INPUT', () => {
      const result = parseCompletion('ACTION: get_customer_profile\nACTION INPUT: {customer_id: C1}');

      expect(result.kind === 'failure' && result.reason).toBe('invalid_arguments');
    });
  });
});

describe('normalizeDecision', () => {
  it.each([
    ['Confirmed Fraud', 'confirmed_fraud'],
    ['LEGITIMATE', 'legitimate'],
    ['not fraud', 'legitimate'],
    ['Needs Review', 'needs_review'],
    ['suspicious activity', 'suspected_fraud'],
    ['file_sar', 'suspected_fraud'],
  ])('maps %s to %s', (label, expected) => {
    expect(normalizeDecision(label)).toBe(expected);
  });

  it('returns null for unknown or empty labels', () => {
    expect(normalizeDecision('maybe')).toBeNull();
    expect(normalizeDecision('  ')).toBeNull();
  });
});
