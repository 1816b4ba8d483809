import { z } from 'zod';
import { ToolError } from '../errors';
import { defineTool, RegisteredTool } from './registry';
import type { FixtureStore, Transaction } from './store';
import type { Finding, Severity } from '../investigator/types';
import { round2, usd } from './format';

export const AML_TOOL_NAMES = [
  'get_transaction_history',
  'analyze_transaction_patterns',
  'get_customer_profile',
  'search_negative_news',
  'assess_customer_risk',
  'check_regulatory_thresholds',
  'assess_structuring_risk',
  'calculate_risk_score',
] as const;

export interface AmlToolOptions {
  ctrThreshold?: number;
}

type RiskLevel = Severity;

const CUSTOMER_RISK_RECOMMENDATION: Record<RiskLevel, string> = {
  critical: 'Immediate enhanced due diligence required. Consider account restrictions pending review.',
  high: 'Enhanced due diligence required. Increase transaction monitoring frequency.',
  medium: 'Standard due diligence with elevated monitoring. Review quarterly.',
  low: 'Standard monitoring procedures applicable.',
};

const ACCOUNT_RISK_RECOMMENDATION: Record<RiskLevel, string> = {
  critical: 'Immediate SAR filing recommended',
  high: 'Enhanced monitoring and potential SAR filing',
  medium: 'Continued monitoring required',
  low: 'Standard monitoring',
};

const SAR_RISK_THRESHOLD = 7;

const accountArgs = z.object({
  account_id: z.string().min(1),
  days: z.coerce.number().int().positive().max(365).default(30),
});

function riskLevelFor(score: number): RiskLevel {
  if (score >= 8) return 'critical';
  if (score >= 6) return 'high';
  if (score >= 4) return 'medium';
  return 'low';
}

function requireTransactions(store: FixtureStore, accountId: string, days: number): Transaction[] {
  const transactions = store.transactions(accountId, days);
  if (transactions.length === 0) {
    throw new ToolError(`No transactions found for account ${accountId} in the last ${days} days`);
  }
  return transactions;
}

/** Amounts strictly between 90% of the threshold and the threshold itself. */
function underThreshold(transactions: Transaction[], ctrThreshold: number): Transaction[] {
  return transactions.filter((txn) => txn.amount > ctrThreshold * 0.9 && txn.amount < ctrThreshold);
}

export function transactionHistoryTool(store: FixtureStore): RegisteredTool {
  return defineTool({
    name: 'get_transaction_history',
    signature: 'get_transaction_history(account_id, days=30)',
    description: 'Transaction list for an account with summary statistics.',
    parameters: accountArgs,
    handler: ({ account_id, days }) => {
      const transactions = store.transactions(account_id, days);
      if (transactions.length === 0) {
        return {
          accountId: account_id,
          periodDays: days,
          transactionCount: 0,
          totalAmount: 0,
          transactions: [],
          note: 'No transactions found for this account',
        };
      }

      const amounts = transactions.map((txn) => txn.amount);
      const totalAmount = amounts.reduce((sum, amount) => sum + amount, 0);
      return {
        accountId: account_id,
        periodDays: days,
        transactionCount: transactions.length,
        totalAmount,
        transactions,
        cashDepositCount: transactions.filter((txn) => txn.type === 'cash_deposit').length,
        cashWithdrawalCount: transactions.filter((txn) => txn.type === 'cash_withdrawal').length,
        wireTransferCount: transactions.filter((txn) => txn.type.includes('wire')).length,
        avgTransactionAmount: round2(totalAmount / transactions.length),
        maxTransactionAmount: Math.max(...amounts),
        minTransactionAmount: Math.min(...amounts),
      };
    },
  });
}

export function transactionPatternsTool(store: FixtureStore, ctrThreshold: number): RegisteredTool {
  return defineTool({
    name: 'analyze_transaction_patterns',
    signature: 'analyze_transaction_patterns(account_id, days=30)',
    description: 'Looks for structuring, velocity, round amounts and same-day clustering.',
    parameters: accountArgs,
    handler: ({ account_id, days }) => {
      const transactions = requireTransactions(store, account_id, days);
      const findings: Finding[] = [];

      const nearThreshold = underThreshold(transactions, ctrThreshold);
      if (nearThreshold.length >= 3) {
        findings.push({
          key: 'structuring',
          type: 'potential_structuring',
          severity: 'high',
          description: `${nearThreshold.length} transactions between ${usd(ctrThreshold * 0.9)} and ${usd(ctrThreshold)}`,
        });
      }

      if (transactions.length > 10 && days <= 14) {
        findings.push({
          key: 'velocity',
          type: 'high_velocity',
          severity: 'medium',
          description: `${transactions.length} transactions in ${days} days`,
        });
      }

      const roundCount = transactions.filter((txn) => txn.amount % 100 === 0).length;
      if (roundCount / transactions.length > 0.7) {
        findings.push({
          key: 'round_amounts',
          type: 'round_amounts',
          severity: 'low',
          description: `${roundCount} of ${transactions.length} transactions are round amounts`,
        });
      }

      const perDay = new Map<string, number>();
      for (const txn of transactions) perDay.set(txn.date, (perDay.get(txn.date) ?? 0) + 1);
      const busyDays = [...perDay.values()].filter((count) => count > 1).length;
      if (busyDays >= 2) {
        findings.push({
          key: 'daily_clustering',
          type: 'multiple_daily_transactions',
          severity: 'medium',
          description: `Multiple transactions on the same day on ${busyDays} days`,
        });
      }

      const high = findings.filter((finding) => finding.severity === 'high').length;
      const medium = findings.filter((finding) => finding.severity === 'medium').length;
      const overallRisk = high > 0 || medium >= 2 ? 'high' : medium > 0 ? 'medium' : 'low';

      return {
        accountId: account_id,
        analysisPeriodDays: days,
        transactionsAnalyzed: transactions.length,
        overallRisk,
        findings,
      };
    },
  });
}

export function customerProfileTool(store: FixtureStore): RegisteredTool {
  return defineTool({
    name: 'get_customer_profile',
    signature: 'get_customer_profile(customer_id)',
    description: 'KYC profile: occupation, income, risk score, PEP and jurisdiction flags, prior filings.',
    parameters: z.object({ customer_id: z.string().min(1) }),
    handler: ({ customer_id }) => {
      const profile = store.customer(customer_id);
      if (!profile) throw new ToolError(`Customer ${customer_id} not found`);
      return { ...profile };
    },
  });
}

export function negativeNewsTool(store: FixtureStore): RegisteredTool {
  return defineTool({
    name: 'search_negative_news',
    signature: 'search_negative_news(customer_name)',
    description: 'Adverse media screening by customer name.',
    parameters: z.object({ customer_name: z.string().min(1) }),
    handler: ({ customer_name }) => {
      const items = store.adverseMedia(customer_name);
      const findings: Finding[] = items.map((item) => ({
        key: `media:${item.headline}`,
        type: 'adverse_media',
        severity: item.relevance,
        description: `Adverse media (${item.source}, ${item.date}): ${item.headline}`,
      }));

      return {
        customerName: customer_name,
        itemsFound: items.length,
        newsItems: items,
        highRelevanceItems: items.filter((item) => item.relevance === 'high'),
        requiresReview: items.length > 0,
        findings,
      };
    },
  });
}

export function customerRiskTool(store: FixtureStore): RegisteredTool {
  return defineTool({
    name: 'assess_customer_risk',
    signature: 'assess_customer_risk(customer_id)',
    description: 'Adjusts the base customer risk score for PEP status, jurisdiction, cash intensity, prior SARs and adverse media.',
    parameters: z.object({ customer_id: z.string().min(1) }),
    handler: ({ customer_id }) => {
      const profile = store.customer(customer_id);
      if (!profile) throw new ToolError(`Customer ${customer_id} not found`);

      const news = store.adverseMedia(profile.name);
      const factors: string[] = [];
      let score = profile.riskScore;

      if (profile.pepStatus) {
        factors.push('Politically exposed person');
        score += 2;
      }
      if (profile.highRiskCountry) {
        factors.push('Associated with high-risk jurisdiction');
        score += 1.5;
      }
      if (profile.cashIntensiveBusiness) {
        factors.push('Cash-intensive business');
        score += 1;
      }
      if (profile.previousSars > 0) {
        factors.push(`Previous SARs filed: ${profile.previousSars}`);
        score += profile.previousSars * 2;
      }
      if (news.length > 0) {
        factors.push(`Adverse media items: ${news.length}`);
        score += news.length * 1.5;
      }
      if (profile.businessType && profile.annualIncome < 60_000) {
        factors.push('Business owner with low reported income');
        score += 0.5;
      }

      const adjusted = round2(Math.min(score, 10));
      const level = riskLevelFor(adjusted);
      const findings: Finding[] =
        level === 'low'
          ? []
          : [
              {
                key: 'customer_risk',
                type: `customer_risk_${level}`,
                severity: level,
                description: `Customer risk ${level} (${adjusted}/10): ${factors.join('; ') || 'elevated base score'}`,
              },
            ];

      return {
        customerId: customer_id,
        customerName: profile.name,
        baseRiskScore: profile.riskScore,
        adjustedRiskScore: adjusted,
        riskLevel: level,
        riskFactors: factors,
        negativeNewsFound: news.length > 0,
        enhancedDueDiligenceRequired: adjusted >= 7,
        recommendation: CUSTOMER_RISK_RECOMMENDATION[level],
        findings,
      };
    },
  });
}

export function regulatoryThresholdsTool(ctrThreshold: number): RegisteredTool {
  return defineTool({
    name: 'check_regulatory_thresholds',
    signature: 'check_regulatory_thresholds(transaction_amount, transaction_type)',
    description: 'CTR, travel rule and near-threshold checks for a single transaction.',
    parameters: z.object({
      transaction_amount: z.coerce.number().nonnegative(),
      transaction_type: z.string().min(1),
    }),
    handler: ({ transaction_amount: amount, transaction_type: type }) => {
      const kind = type.toLowerCase();
      const notes: string[] = [];
      const sarIndicators: string[] = [];
      const findings: Finding[] = [];

      const ctrRequired = amount >= ctrThreshold;
      if (ctrRequired) {
        notes.push(`CTR filing required for transaction amount ${usd(amount)}`);
        findings.push({
          key: 'ctr',
          type: 'ctr_required',
          severity: 'medium',
          description: `CTR filing required for ${usd(amount)}`,
        });
      }

      const nearThreshold = amount >= ctrThreshold * 0.9 && amount < ctrThreshold;
      if (nearThreshold) {
        sarIndicators.push('potential_structuring');
        notes.push(`Amount ${usd(amount)} is suspiciously close to the CTR threshold`);
        findings.push({
          key: 'near_ctr_threshold',
          type: 'near_ctr_threshold',
          severity: 'high',
          description: `${usd(amount)} is just below the ${usd(ctrThreshold)} CTR threshold`,
        });
      }

      const wire = kind.includes('wire');
      if (wire && amount >= 3000) notes.push('Wire transfer of $3,000 or more: travel rule recordkeeping required');
      if (wire && amount >= 10_000) notes.push('Wire transfer of $10,000 or more: enhanced due diligence required');

      const cash = kind.includes('cash');
      if (cash && amount >= 5000) {
        notes.push('Large cash transaction: verify source of funds');
        findings.push({
          key: 'large_cash',
          type: 'large_cash_transaction',
          severity: 'low',
          description: `Large cash transaction of ${usd(amount)}`,
        });
      }

      return {
        amount,
        type,
        ctrThreshold,
        ctrRequired,
        belowCtrThreshold: nearThreshold,
        wireMonitoring: wire,
        cashTransaction: cash,
        enhancedMonitoring: kind.includes('international') || amount >= ctrThreshold,
        sarIndicators,
        sarConsiderationRequired: sarIndicators.length > 0,
        complianceNotes: notes,
        findings,
      };
    },
  });
}

export function structuringRiskTool(store: FixtureStore, ctrThreshold: number): RegisteredTool {
  return defineTool({
    name: 'assess_structuring_risk',
    signature: 'assess_structuring_risk(account_id, days=30)',
    description: 'Scores the likelihood that deposits were split to stay under the CTR threshold.',
    parameters: accountArgs,
    handler: ({ account_id, days }) => {
      const transactions = requireTransactions(store, account_id, days);
      const under = underThreshold(transactions, ctrThreshold);
      const indicators: string[] = [];

      if (under.length >= 2) {
        indicators.push(`${under.length} transactions between ${usd(ctrThreshold * 0.9)} and ${usd(ctrThreshold)}`);
      }
      const underTotal = under.reduce((sum, txn) => sum + txn.amount, 0);
      if (under.length >= 2 && underTotal >= ctrThreshold) {
        indicators.push(`Combined amount ${usd(underTotal)} exceeds the CTR threshold`);
      }
      const perDay = new Map<string, number>();
      for (const txn of under) perDay.set(txn.date, (perDay.get(txn.date) ?? 0) + 1);
      const sameDay = [...perDay.values()].filter((count) => count > 1).length;
      if (sameDay > 0) {
        indicators.push(`Multiple under-threshold transactions on ${sameDay} day(s)`);
      }

      const level: RiskLevel =
        indicators.length >= 3 ? 'critical' : indicators.length === 2 ? 'high' : indicators.length === 1 ? 'medium' : 'low';
      const findings: Finding[] =
        indicators.length === 0
          ? []
          : [
              {
                key: 'structuring',
                type: `structuring_${level}`,
                severity: level,
                description: `Structuring risk ${level}: ${indicators.join('; ')}`,
              },
            ];

      return {
        accountId: account_id,
        structuringRiskLevel: level,
        indicators,
        transactionsAnalyzed: transactions.length,
        underThresholdTransactions: under.length,
        totalAmount: underTotal,
        sarRecommended: level === 'critical' || level === 'high',
        findings,
      };
    },
  });
}

interface RiskAdjustment {
  factor: string;
  adjustment: number;
  reason: string;
}

export function accountRiskScoreTool(store: FixtureStore): RegisteredTool {
  return defineTool({
    name: 'calculate_risk_score',
    signature: 'calculate_risk_score(customer_id, account_id, days=30)',
    description: 'Adjusts the customer risk score for transaction velocity, cash deposits, spend against income and prior SARs.',
    parameters: z.object({
      customer_id: z.string().min(1),
      account_id: z.string().min(1),
      days: z.coerce.number().int().positive().max(365).default(30),
    }),
    handler: ({ customer_id, account_id, days }) => {
      const profile = store.customer(customer_id);
      if (!profile) throw new ToolError(`Customer ${customer_id} not found`);

      const transactions = store.transactions(account_id, days);
      const adjustments: RiskAdjustment[] = [];

      const perDay = transactions.length / days;
      if (perDay > 2) {
        adjustments.push({
          factor: 'high_velocity',
          adjustment: Math.min(perDay - 2, 2),
          reason: `High transaction velocity: ${perDay.toFixed(1)} transactions per day`,
        });
      }

      const cashDeposits = transactions.filter((txn) => txn.type === 'cash_deposit').length;
      if (cashDeposits >= 5) {
        adjustments.push({
          factor: 'frequent_cash_deposits',
          adjustment: Math.min(cashDeposits * 0.3, 2),
          reason: `Frequent cash deposits: ${cashDeposits} deposits`,
        });
      }

      const total = transactions.reduce((sum, txn) => sum + txn.amount, 0);
      const avgAmount = transactions.length > 0 ? total / transactions.length : 0;
      if (avgAmount > profile.annualIncome / 12) {
        adjustments.push({
          factor: 'transactions_exceed_income',
          adjustment: 1.5,
          reason: `Average transaction ${usd(round2(avgAmount))} exceeds monthly income`,
        });
      }

      if (profile.previousSars > 0) {
        adjustments.push({
          factor: 'previous_sars',
          adjustment: profile.previousSars,
          reason: `Previous SARs filed: ${profile.previousSars}`,
        });
      }

      const totalAdjustment = round2(adjustments.reduce((sum, item) => sum + item.adjustment, 0));
      const finalScore = round2(Math.min(profile.riskScore + totalAdjustment, 10));
      const level = riskLevelFor(finalScore);
      const reasons = adjustments.map((item) => item.reason);
      const findings: Finding[] =
        level === 'low'
          ? []
          : [
              {
                key: 'account_risk',
                type: `account_risk_${level}`,
                severity: level,
                description: `Account risk ${level} (${finalScore}/10): ${reasons.join('; ') || 'elevated base score'}`,
              },
            ];

      return {
        customerId: customer_id,
        accountId: account_id,
        periodDays: days,
        baseRiskScore: profile.riskScore,
        adjustments: adjustments.map((item) => ({ ...item, adjustment: round2(item.adjustment) })),
        totalAdjustment,
        finalRiskScore: finalScore,
        riskLevel: level,
        riskFactors: reasons,
        sarRecommended: finalScore >= SAR_RISK_THRESHOLD,
        recommendation: ACCOUNT_RISK_RECOMMENDATION[level],
        findings,
      };
    },
  });
}

export function createAmlTools(store: FixtureStore, options: AmlToolOptions = {}): RegisteredTool[] {
  const ctrThreshold = options.ctrThreshold ?? 10_000;
  return [
    transactionHistoryTool(store),
    transactionPatternsTool(store, ctrThreshold),
    customerProfileTool(store),
    negativeNewsTool(store),
    customerRiskTool(store),
    regulatoryThresholdsTool(ctrThreshold),
    structuringRiskTool(store, ctrThreshold),
    accountRiskScoreTool(store),
  ];
}
