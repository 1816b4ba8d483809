import * as os from 'os';
import * as path from 'path';
import fs from 'fs-extra';
import dotenv from 'dotenv';
import { z } from 'zod';
import { FatalConfigurationError } from './errors';
import { LOG_LEVELS } from './logger';

const RetrySettingsSchema = z.object({
  maxAttempts: z.number().int().min(1).max(10),
  initialDelayMs: z.number().min(0),
  backoffFactor: z.number().min(1),
});

export const InvestigatorConfigSchema = z.object({
  model: z.string().min(1),
  openaiApiKey: z.string().min(1).optional(),
  openaiBaseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().positive(),
  maxIterations: z.number().int().min(1).max(50),
  requestTimeoutMs: z.number().int().positive(),
  toolTimeoutMs: z.number().int().positive(),
  retry: RetrySettingsSchema,
  logLevel: z.enum(LOG_LEVELS),
  dataFile: z.string().min(1).optional(),
  ctrThreshold: z.number().positive(),
  pricing: z.object({
    promptPer1k: z.number().min(0),
    completionPer1k: z.number().min(0),
  }),
});

export type InvestigatorConfig = z.infer<typeof InvestigatorConfigSchema>;

const PersistedConfigSchema = InvestigatorConfigSchema.deepPartial();
export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

export const GLOBAL_CONFIG_PATH = path.join(os.homedir(), '.invx', 'config.json');

export const DEFAULT_CONFIG: InvestigatorConfig = {
  model: 'gpt-4o-mini',
  temperature: 0.3,
  maxTokens: 800,
  maxIterations: 5,
  requestTimeoutMs: 30_000,
  toolTimeoutMs: 10_000,
  retry: {
    maxAttempts: 3,
    initialDelayMs: 1000,
    backoffFactor: 2,
  },
  logLevel: 'info',
  ctrThreshold: 10_000,
  pricing: {
    promptPer1k: 0.00015,
    completionPer1k: 0.0006,
  },
};

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

function numberFrom(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function stringFrom(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function definedEntries(record: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

// Raw values; the merged result is validated as a whole.
function fromEnv(env: NodeJS.ProcessEnv): { settings: Record<string, unknown>; retry: Record<string, unknown> } {
  return {
    settings: definedEntries({
      model: stringFrom(env.INVX_MODEL),
      openaiApiKey: stringFrom(env.OPENAI_API_KEY),
      openaiBaseUrl: stringFrom(env.OPENAI_BASE_URL),
      temperature: numberFrom(env.INVX_TEMPERATURE),
      maxTokens: numberFrom(env.INVX_MAX_TOKENS),
      maxIterations: numberFrom(env.INVX_MAX_ITERATIONS),
      requestTimeoutMs: numberFrom(env.INVX_REQUEST_TIMEOUT_MS),
      toolTimeoutMs: numberFrom(env.INVX_TOOL_TIMEOUT_MS),
      logLevel: stringFrom(env.INVX_LOG_LEVEL)?.toLowerCase(),
      dataFile: stringFrom(env.INVX_DATA_FILE),
      ctrThreshold: numberFrom(env.INVX_CTR_THRESHOLD),
    }),
    retry: definedEntries({
      maxAttempts: numberFrom(env.INVX_MAX_ATTEMPTS),
      initialDelayMs: numberFrom(env.INVX_RETRY_DELAY_MS),
      backoffFactor: numberFrom(env.INVX_RETRY_BACKOFF),
    }),
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function readGlobalConfig(configPath: string = GLOBAL_CONFIG_PATH): PersistedConfig {
  if (!fs.existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = fs.readJsonSync(configPath);
  } catch (err) {
    throw new FatalConfigurationError(`Could not read config file ${configPath}`, [], { cause: err });
  }

  const parsed = PersistedConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new FatalConfigurationError(`Invalid config file ${configPath}: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/**
 * Resolves settings from defaults, then ~/.invx/config.json, then the
 * environment (a local .env is loaded first when no env is passed in).
 */
export function loadInvestigatorConfig(options: LoadConfigOptions = {}): InvestigatorConfig {
  let env = options.env;
  if (!env) {
    dotenv.config();
    env = process.env;
  }

  const fileConfig = readGlobalConfig(options.configPath);
  const envConfig = fromEnv(env);

  const merged = {
    ...DEFAULT_CONFIG,
    ...definedEntries(fileConfig),
    ...envConfig.settings,
    retry: { ...DEFAULT_CONFIG.retry, ...definedEntries(fileConfig.retry ?? {}), ...envConfig.retry },
    pricing: { ...DEFAULT_CONFIG.pricing, ...definedEntries(fileConfig.pricing ?? {}) },
  };

  const result = InvestigatorConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new FatalConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function saveGlobalConfig(config: PersistedConfig, configPath: string = GLOBAL_CONFIG_PATH): void {
  const existing = readGlobalConfig(configPath);
  const next: PersistedConfig = {
    ...existing,
    ...config,
    retry: config.retry ? { ...existing.retry, ...config.retry } : existing.retry,
    pricing: config.pricing ? { ...existing.pricing, ...config.pricing } : existing.pricing,
  };
  fs.outputJsonSync(configPath, next, { spaces: 2 });
}

export const SETTABLE_KEYS = [
  'model',
  'openaiApiKey',
  'openaiBaseUrl',
  'temperature',
  'maxTokens',
  'maxIterations',
  'requestTimeoutMs',
  'toolTimeoutMs',
  'logLevel',
  'dataFile',
  'ctrThreshold',
] as const;
export type SettableKey = typeof SETTABLE_KEYS[number];

const NUMERIC_KEYS: ReadonlySet<SettableKey> = new Set<SettableKey>([
  'temperature',
  'maxTokens',
  'maxIterations',
  'requestTimeoutMs',
  'toolTimeoutMs',
  'ctrThreshold',
]);

export function isSettableKey(key: string): key is SettableKey {
  return SETTABLE_KEYS.some((candidate) => candidate === key);
}

/** Validates a single `config set` value and returns the patch to persist. */
export function buildConfigPatch(key: SettableKey, raw: string): PersistedConfig {
  const value = NUMERIC_KEYS.has(key) ? Number(raw) : raw;
  const result = PersistedConfigSchema.safeParse({ [key]: value });
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new FatalConfigurationError(`Invalid value for ${key}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function maskSecret(secret: string): string {
  if (secret.length <= 8) return '****';
  return secret.slice(0, 3) + '...' + secret.slice(-4);
}

export function redactConfig(config: InvestigatorConfig): InvestigatorConfig {
  return config.openaiApiKey ? { ...config, openaiApiKey: maskSecret(config.openaiApiKey) } : config;
}
