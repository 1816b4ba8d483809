import { z } from 'zod';
import { ToolError } from '../errors';
import { defineTool, RegisteredTool } from './registry';
import type { FixtureStore } from './store';
import type { Decision, Finding } from '../investigator/types';
import { round2, usd } from './format';

export const FRAUD_TOOL_NAMES = [
  'analyze_transaction_velocity',
  'check_geographic_anomaly',
  'analyze_device_fingerprint',
  'check_behavioral_anomalies',
  'assess_fraud_probability',
] as const;

function sameLocation(known: string, candidate: string): boolean {
  const a = known.trim().toLowerCase();
  const b = candidate.trim().toLowerCase();
  return a === b || b.startsWith(`${a},`) || a.startsWith(`${b},`);
}

export function velocityTool(store: FixtureStore): RegisteredTool {
  return defineTool({
    name: 'analyze_transaction_velocity',
    signature: 'analyze_transaction_velocity(account_id, hours=24)',
    description: 'Transaction count, merchant spread and spend over a time window; flags card testing and takeover bursts.',
    parameters: z.object({
      account_id: z.string().min(1),
      hours: z.coerce.number().positive().max(720).default(24),
    }),
    handler: ({ account_id, hours }) => {
      const velocity = store.account(account_id)?.velocity;
      if (!velocity) throw new ToolError(`No transaction velocity data for account ${account_id}`);

      const count = velocity.transactionsCount;
      const perHour = count / hours;
      const findings: Finding[] = [];

      if (perHour > 5) {
        findings.push({
          key: 'velocity',
          type: 'velocity_burst',
          severity: 'critical',
          description: `${count} transactions in ${hours} hours (${perHour.toFixed(1)} per hour)`,
        });
      } else if (perHour > 2) {
        findings.push({
          key: 'velocity',
          type: 'elevated_velocity',
          severity: 'high',
          description: `${count} transactions in ${hours} hours (${perHour.toFixed(1)} per hour)`,
        });
      }
      if (count > 1 && velocity.avgMinutesBetween < 15) {
        findings.push({
          type: 'rapid_succession',
          severity: 'high',
          description: `Average of ${velocity.avgMinutesBetween} minutes between transactions`,
        });
      }
      if (count > 1 && velocity.uniqueMerchants === count) {
        findings.push({
          type: 'merchant_spread',
          severity: 'medium',
          description: `Each of ${count} transactions at a different merchant`,
        });
      }
      if (velocity.totalAmount > 3000) {
        findings.push({
          type: 'high_total_value',
          severity: 'medium',
          description: `Total spend of ${usd(velocity.totalAmount)} in the window`,
        });
      }

      return {
        accountId: account_id,
        timeWindowHours: hours,
        transactionsCount: count,
        uniqueMerchants: velocity.uniqueMerchants,
        totalAmount: velocity.totalAmount,
        avgMinutesBetween: velocity.avgMinutesBetween,
        transactionsPerHour: round2(perHour),
        recentTransactions: velocity.recent,
        findings,
      };
    },
  });
}

export function geographicTool(store: FixtureStore): RegisteredTool {
  return defineTool({
    name: 'check_geographic_anomaly',
    signature: 'check_geographic_anomaly(account_id, transaction_location)',
    description: 'Compares the transaction location with the customer\'s usual locations; detects impossible travel.',
    parameters: z.object({
      account_id: z.string().min(1),
      transaction_location: z.string().min(1),
    }),
    handler: ({ account_id, transaction_location }) => {
      const history = store.account(account_id)?.locations;
      if (!history) throw new ToolError(`No location history for account ${account_id}`);

      const isTypical = history.typical.some((place) => sameLocation(place, transaction_location));
      const last = history.recent[0];
      const findings: Finding[] = [];

      if (!isTypical) {
        findings.push({
          key: 'location',
          type: 'unusual_location',
          severity: 'high',
          description: `Transaction in unusual location: ${transaction_location} (home: ${history.home})`,
        });
        if (last && !sameLocation(last.location, transaction_location)) {
          findings.push({
            type: 'impossible_travel',
            severity: 'critical',
            description: `Last seen in ${last.location} on ${last.date}, now transacting in ${transaction_location}`,
          });
        }
      }

      return {
        accountId: account_id,
        transactionLocation: transaction_location,
        homeLocation: history.home,
        isTypicalLocation: isTypical,
        recentLocations: history.recent,
        internationalTravel: history.internationalTravel,
        findings,
      };
    },
  });
}

export function deviceTool(store: FixtureStore): RegisteredTool {
  return defineTool({
    name: 'analyze_device_fingerprint',
    signature: 'analyze_device_fingerprint(account_id, device_id)',
    description: 'Checks whether the device is known for this account.',
    parameters: z.object({
      account_id: z.string().min(1),
      device_id: z.string().min(1),
    }),
    handler: ({ account_id, device_id }) => {
      const devices = store.account(account_id)?.devices;
      const known = devices?.known ?? [];
      const isNewDevice = !known.includes(device_id);
      const findings: Finding[] = [];

      if (isNewDevice) {
        findings.push({
          key: 'device',
          type: 'new_device',
          severity: 'high',
          description: `Transaction from unrecognised device ${device_id}`,
        });
      }

      return {
        accountId: account_id,
        deviceId: device_id,
        isNewDevice,
        knownDevices: known,
        historyAvailable: devices !== undefined,
        recommendation: isNewDevice ? 'Step-up authentication before approving' : 'Allow with monitoring',
        findings,
      };
    },
  });
}

export function behavioralTool(store: FixtureStore): RegisteredTool {
  return defineTool({
    name: 'check_behavioral_anomalies',
    signature: 'check_behavioral_anomalies(account_id, current_behavior={amount, category, time})',
    description: 'Compares the current transaction with the account\'s spending baseline.',
    parameters: z.object({
      account_id: z.string().min(1),
      current_behavior: z.object({
        amount: z.coerce.number().nonnegative(),
        category: z.string().optional(),
        time: z.string().optional(),
      }),
    }),
    handler: ({ account_id, current_behavior }) => {
      const baseline = store.account(account_id)?.baseline;
      if (!baseline) throw new ToolError(`No behavioural baseline for account ${account_id}`);

      const { amount, category, time } = current_behavior;
      const findings: Finding[] = [];

      if (baseline.avgTransactionAmount > 0 && amount > baseline.avgTransactionAmount * 5) {
        const ratio = (amount / baseline.avgTransactionAmount).toFixed(1);
        findings.push({
          key: 'amount',
          type: 'amount_anomaly',
          severity: 'high',
          description: `Amount ${usd(amount)} is ${ratio}x the account average of ${usd(baseline.avgTransactionAmount)}`,
        });
      }
      if (amount > baseline.maxSingleTransaction) {
        findings.push({
          key: 'max_amount',
          type: 'exceeds_max_transaction',
          severity: 'medium',
          description: `Amount ${usd(amount)} exceeds the largest usual transaction of ${usd(baseline.maxSingleTransaction)}`,
        });
      }
      if (category && !baseline.typicalCategories.includes(category.toLowerCase())) {
        findings.push({
          key: 'category',
          type: 'category_anomaly',
          severity: 'low',
          description: `Unusual merchant category: ${category}`,
        });
      }
      if (time && time.toLowerCase() !== baseline.typicalTime) {
        findings.push({
          key: 'time',
          type: 'time_anomaly',
          severity: 'low',
          description: `Transaction at unusual time: ${time}`,
        });
      }

      return {
        accountId: account_id,
        baseline,
        currentBehavior: current_behavior,
        anomalyCount: findings.length,
        findings,
      };
    },
  });
}

const IndicatorSchema = z.object({
  source: z.string().optional(),
  risk_score: z.coerce.number().min(0).max(10),
  fraud_likelihood: z.enum(['high', 'medium', 'low']).optional(),
  signals: z.array(z.string()).default([]),
});

interface FraudVerdict {
  decision: Decision;
  confidence: 'high' | 'medium' | 'low';
  action: string;
}

function fraudVerdict(avgRisk: number, highRiskCount: number): FraudVerdict {
  if (avgRisk >= 7 || highRiskCount >= 2) {
    return { decision: 'confirmed_fraud', confidence: 'high', action: 'Block account and contact customer' };
  }
  if (avgRisk >= 5) return { decision: 'suspected_fraud', confidence: 'medium', action: 'Additional verification required' };
  if (avgRisk >= 3) return { decision: 'needs_review', confidence: 'low', action: 'Enhanced monitoring' };
  return { decision: 'legitimate', confidence: 'high', action: 'No action required' };
}

/**
 * Combines per-check risk ratings the model read off earlier observations.
 * Reports no findings: the evidence behind each rating is already in the
 * transcript.
 */
export function fraudProbabilityTool(): RegisteredTool {
  return defineTool({
    name: 'assess_fraud_probability',
    signature: 'assess_fraud_probability(indicators=[{source, risk_score, fraud_likelihood, signals}])',
    description: 'Averages risk ratings (0-10) from earlier checks into an overall fraud verdict.',
    parameters: z.object({ indicators: z.array(IndicatorSchema).min(1) }),
    handler: ({ indicators }) => {
      const avgRisk = indicators.reduce((sum, indicator) => sum + indicator.risk_score, 0) / indicators.length;
      const highRiskCount = indicators.filter((indicator) => indicator.fraud_likelihood === 'high').length;
      const signals = indicators.flatMap((indicator) => indicator.signals);
      const verdict = fraudVerdict(avgRisk, highRiskCount);

      return {
        overallRiskScore: round2(avgRisk),
        fraudDecision: verdict.decision,
        confidence: verdict.confidence,
        recommendedAction: verdict.action,
        indicatorsAnalyzed: indicators.length,
        highRiskIndicators: highRiskCount,
        signals: [...new Set(signals)],
        signalCount: signals.length,
        findings: [],
      };
    },
  });
}

export function createFraudTools(store: FixtureStore): RegisteredTool[] {
  return [velocityTool(store), geographicTool(store), deviceTool(store), behavioralTool(store), fraudProbabilityTool()];
}
