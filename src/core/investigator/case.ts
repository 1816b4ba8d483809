import fs from 'fs-extra';
import { z } from 'zod';
import { CaseValidationError, errorMessage } from '../errors';

export const FRAUD_CATEGORIES = [
  'credit_card_fraud',
  'account_takeover',
  'payment_fraud',
  'identity_theft',
  'transaction_anomaly',
  'merchant_fraud',
  'refund_abuse',
  'chargeback_fraud',
  'velocity_abuse',
] as const;

export const AML_CATEGORIES = [
  'cash_structuring',
  'wire_transfer',
  'velocity_check',
  'negative_news',
  'high_risk_customer',
  'unusual_activity',
  'regulatory_threshold',
] as const;

export type Toolkit = 'fraud' | 'aml';

export const CaseSchema = z.object({
  caseId: z.string().min(1),
  customerId: z.string().min(1),
  accountId: z.string().min(1),
  category: z.enum([...FRAUD_CATEGORIES, ...AML_CATEGORIES]),
  description: z.string().min(1),
  amount: z.number().nonnegative().optional(),
  explanation: z.string().optional(),
  timeWindowHours: z.number().int().positive().default(24),
  priority: z.enum(['low', 'medium', 'high', 'critical']).default('medium'),
  deviceId: z.string().optional(),
  location: z.string().optional(),
  merchant: z.string().optional(),
  alertSource: z.string().optional(),
});

export type CaseInput = z.input<typeof CaseSchema>;
export type Case = Readonly<z.output<typeof CaseSchema>>;
export type CaseCategory = Case['category'];

export function toolkitFor(category: CaseCategory): Toolkit {
  return FRAUD_CATEGORIES.some((candidate) => candidate === category) ? 'fraud' : 'aml';
}

/** Validates a case and freezes it; throws CaseValidationError. */
export function parseCase(input: unknown): Case {
  const result = CaseSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CaseValidationError(`Case rejected: ${issues.join('; ')}`, issues);
  }
  return Object.freeze(result.data);
}

/** Reads a case document without validating it; missing files and bad JSON throw CaseValidationError. */
export async function readCaseDocument(filePath: string): Promise<unknown> {
  if (!(await fs.pathExists(filePath))) {
    throw new CaseValidationError(`Case file not found: ${filePath}`);
  }

  try {
    return await fs.readJson(filePath);
  } catch (err) {
    throw new CaseValidationError(`Case file ${filePath} is not valid JSON: ${errorMessage(err)}`);
  }
}

export async function loadCaseFile(filePath: string): Promise<Case> {
  return parseCase(await readCaseDocument(filePath));
}
