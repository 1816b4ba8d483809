import * as path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { FatalConfigurationError } from '../errors';

const VelocitySchema = z.object({
  transactionsCount: z.number().int().nonnegative(),
  uniqueMerchants: z.number().int().nonnegative(),
  totalAmount: z.number().nonnegative(),
  avgMinutesBetween: z.number().nonnegative(),
  recent: z
    .array(z.object({ time: z.string(), amount: z.number(), merchant: z.string() }))
    .default([]),
});

const LocationHistorySchema = z.object({
  home: z.string(),
  typical: z.array(z.string()),
  recent: z.array(z.object({ location: z.string(), date: z.string(), count: z.number().int() })).default([]),
  internationalTravel: z.boolean().default(false),
});

const DeviceHistorySchema = z.object({
  known: z.array(z.string()),
  typical: z.string().optional(),
});

const BaselineSchema = z.object({
  avgTransactionAmount: z.number().nonnegative(),
  avgTransactionsPerDay: z.number().nonnegative(),
  typicalCategories: z.array(z.string()),
  typicalTime: z.string(),
  maxSingleTransaction: z.number().nonnegative(),
});

const AccountProfileSchema = z.object({
  customerId: z.string().optional(),
  velocity: VelocitySchema.optional(),
  locations: LocationHistorySchema.optional(),
  devices: DeviceHistorySchema.optional(),
  baseline: BaselineSchema.optional(),
});

const CustomerSchema = z.object({
  customerId: z.string(),
  name: z.string(),
  occupation: z.string(),
  annualIncome: z.number().nonnegative(),
  accountAgeYears: z.number().nonnegative(),
  riskScore: z.number().min(0).max(10),
  previousSars: z.number().int().nonnegative().default(0),
  previousCtrs: z.number().int().nonnegative().default(0),
  pepStatus: z.boolean().default(false),
  highRiskCountry: z.boolean().default(false),
  businessType: z.string().nullable().default(null),
  cashIntensiveBusiness: z.boolean().default(false),
});

const TransactionSchema = z.object({
  transactionId: z.string(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  amount: z.number(),
  type: z.string(),
  method: z.string().optional(),
  location: z.string().optional(),
  description: z.string().optional(),
  counterparty: z.string().optional(),
  country: z.string().optional(),
  flagged: z.boolean().default(false),
  flagReason: z.string().optional(),
});

const NewsItemSchema = z.object({
  source: z.string(),
  date: z.string(),
  headline: z.string(),
  relevance: z.enum(['high', 'medium', 'low']),
  summary: z.string(),
});

export const FixtureDataSchema = z.object({
  accounts: z.record(AccountProfileSchema).default({}),
  customers: z.record(CustomerSchema).default({}),
  transactions: z.record(z.array(TransactionSchema)).default({}),
  adverseMedia: z.record(z.array(NewsItemSchema)).default({}),
});

export type FixtureData = z.output<typeof FixtureDataSchema>;
export type FixtureInput = z.input<typeof FixtureDataSchema>;
export type AccountProfile = z.output<typeof AccountProfileSchema>;
export type CustomerProfile = z.output<typeof CustomerSchema>;
export type Transaction = z.output<typeof TransactionSchema>;
export type NewsItem = z.output<typeof NewsItemSchema>;

/** Read-only lookups the domain tools run against. */
export interface FixtureStore {
  account(accountId: string): AccountProfile | undefined;
  customer(customerId: string): CustomerProfile | undefined;
  /** Transactions within `days` of the account's most recent one, newest first. */
  transactions(accountId: string, days?: number): Transaction[];
  adverseMedia(customerName: string): NewsItem[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class InMemoryFixtureStore implements FixtureStore {
  constructor(private readonly data: FixtureData) {}

  account(accountId: string): AccountProfile | undefined {
    return this.data.accounts[accountId];
  }

  customer(customerId: string): CustomerProfile | undefined {
    return this.data.customers[customerId];
  }

  transactions(accountId: string, days?: number): Transaction[] {
    const all = [...(this.data.transactions[accountId] ?? [])].sort((a, b) => b.date.localeCompare(a.date));
    if (days === undefined || all.length === 0) return all;

    const latest = Date.parse(all[0].date);
    return all.filter((txn) => latest - Date.parse(txn.date) < days * DAY_MS);
  }

  adverseMedia(customerName: string): NewsItem[] {
    return this.data.adverseMedia[customerName] ?? [];
  }
}

export const DEFAULT_FIXTURE_FILE = path.resolve(__dirname, '../../../data/fixtures.json');

function parseFixtures(raw: unknown, source: string): FixtureStore {
  const parsed = FixtureDataSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new FatalConfigurationError(`Invalid fixture data in ${source}: ${issues.slice(0, 5).join('; ')}`, issues);
  }
  return new InMemoryFixtureStore(parsed.data);
}

export function createFixtureStore(input: FixtureInput): FixtureStore {
  return parseFixtures(input, 'inline data');
}

export function loadFixtureStore(filePath: string = DEFAULT_FIXTURE_FILE): FixtureStore {
  if (!fs.existsSync(filePath)) {
    throw new FatalConfigurationError(`Fixture data file not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = fs.readJsonSync(filePath);
  } catch (err) {
    throw new FatalConfigurationError(`Could not read fixture data ${filePath}`, [], { cause: err });
  }
  return parseFixtures(raw, filePath);
}
