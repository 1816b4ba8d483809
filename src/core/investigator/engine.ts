import { v4 as uuidv4 } from 'uuid';
import { createDefaultLLMClient, LLMClient, LLMMessage, Completion } from '../llm';
import { InvestigatorConfig, loadInvestigatorConfig } from '../config';
import {
  CaseValidationError,
  FatalConfigurationError,
  InvestigationError,
  RetryExhaustedError,
  errorMessage,
} from '../errors';
import { createLogger, Logger } from '../logger';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry, withTimeout } from '../retry';
import { ToolRegistry } from '../tools/registry';
import { FixtureStore, loadFixtureStore } from '../tools/store';
import { createToolkitResolver } from '../tools';
import { Case, parseCase } from './case';
import { assessTranscript, resolveScoringPolicy, ScoringPolicy, ScoringPolicyOverrides } from './evidence';
import { Pricing, UsageRecorder } from './metrics';
import { parseCompletion } from './parser';
import { buildCaseBrief, buildMessages, buildSystemPrompt } from './prompts';
import type {
  AssessedResult,
  EngineState,
  FailureInfo,
  InvestigationResult,
  ModelConclusion,
  Step,
} from './types';

export type ToolSource = ToolRegistry | ((investigationCase: Case) => ToolRegistry);

export interface InvestigationEngineOptions {
  llm: LLMClient;
  tools: ToolSource;
  maxIterations?: number;
  requestTimeoutMs?: number;
  /** Per-call tool timeout; the registry default applies when omitted. */
  toolTimeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  scoring?: ScoringPolicyOverrides;
  pricing?: Pricing;
  logger?: Logger;
  clock?: () => Date;
}

export interface InvestigateOptions {
  /** Checked between iterations; a running model or tool call is not interrupted. */
  signal?: AbortSignal;
  onStep?: (step: Step) => void;
  onStateChange?: (state: EngineState) => void;
}

const DEFAULT_MAX_ITERATIONS = 5;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const MAX_CONSECUTIVE_MALFORMED = 2;

export function newInvestigationId(now: Date): string {
  const day = now.toISOString().slice(0, 10).replace(/-/g, '');
  return `INV_${day}_${uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase()}`;
}

function describeFailure(err: unknown): FailureInfo {
  if (err instanceof RetryExhaustedError) {
    return { kind: err.kind, message: err.message, attempts: err.attempts };
  }
  if (err instanceof InvestigationError) return { kind: err.kind, message: err.message };
  return { kind: 'UnexpectedError', message: errorMessage(err) };
}

function assertTimeout(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new FatalConfigurationError(`${name} must be a positive number of milliseconds, got ${value}`);
  }
}

/**
 * Runs bounded reason/act/observe loops. The engine itself only holds
 * read-only collaborators; every `investigate` call gets its own session, so
 * one engine can serve concurrent investigations.
 */
export class InvestigationEngine {
  readonly maxIterations: number;
  private readonly llm: LLMClient;
  private readonly tools: ToolSource;
  private readonly requestTimeoutMs: number;
  private readonly toolTimeoutMs?: number;
  private readonly retry: RetryPolicy;
  private readonly policy: ScoringPolicy;
  private readonly pricing?: Pricing;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: InvestigationEngineOptions) {
    const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new FatalConfigurationError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }

    const retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    if (!Number.isInteger(retry.maxAttempts) || retry.maxAttempts < 1) {
      throw new FatalConfigurationError(`retry.maxAttempts must be a positive integer, got ${retry.maxAttempts}`);
    }
    if (!Number.isFinite(retry.initialDelayMs) || retry.initialDelayMs < 0) {
      throw new FatalConfigurationError(`retry.initialDelayMs must be a non-negative number, got ${retry.initialDelayMs}`);
    }
    if (!Number.isFinite(retry.backoffFactor) || retry.backoffFactor < 1) {
      throw new FatalConfigurationError(`retry.backoffFactor must be at least 1, got ${retry.backoffFactor}`);
    }
    const requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    assertTimeout('requestTimeoutMs', requestTimeoutMs);
    if (options.toolTimeoutMs !== undefined) assertTimeout('toolTimeoutMs', options.toolTimeoutMs);

    this.maxIterations = maxIterations;
    this.llm = options.llm;
    this.tools = options.tools;
    this.requestTimeoutMs = requestTimeoutMs;
    this.toolTimeoutMs = options.toolTimeoutMs;
    this.retry = retry;
    this.policy = resolveScoringPolicy(options.scoring);
    this.pricing = options.pricing;
    this.logger = options.logger ?? createLogger('engine');
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Investigates one case. Resolves with a result for every outcome except a
   * FatalConfigurationError, which is rethrown to the caller.
   */
  async investigate(input: unknown, options: InvestigateOptions = {}): Promise<InvestigationResult> {
    return new InvestigationSession(this, input, options).run();
  }

  /** @internal */
  resolveTools(investigationCase: Case): ToolRegistry {
    return typeof this.tools === 'function' ? this.tools(investigationCase) : this.tools;
  }

  /** @internal */
  settings() {
    return {
      llm: this.llm,
      requestTimeoutMs: this.requestTimeoutMs,
      toolTimeoutMs: this.toolTimeoutMs,
      retry: this.retry,
      policy: this.policy,
      pricing: this.pricing,
      logger: this.logger,
      clock: this.clock,
    };
  }
}

class InvestigationSession {
  private readonly transcript: Step[] = [];
  private readonly usage: UsageRecorder;
  private readonly startedAt: Date;
  private readonly investigationId: string;
  private readonly settings: ReturnType<InvestigationEngine['settings']>;
  private readonly logger: Logger;
  private caseId = 'unknown';

  constructor(
    private readonly engine: InvestigationEngine,
    private readonly input: unknown,
    private readonly options: InvestigateOptions
  ) {
    this.settings = engine.settings();
    this.usage = new UsageRecorder(this.settings.pricing);
    this.startedAt = this.settings.clock();
    this.investigationId = newInvestigationId(this.startedAt);
    this.logger = this.settings.logger.child(this.investigationId);
  }

  private setState(state: EngineState): void {
    this.logger.debug(`state -> ${state}`);
    this.options.onStateChange?.(state);
  }

  private append(step: Step): void {
    this.transcript.push(step);
    this.options.onStep?.(step);
  }

  private now(): string {
    return this.settings.clock().toISOString();
  }

  async run(): Promise<InvestigationResult> {
    this.setState('initializing');

    let investigationCase: Case;
    try {
      investigationCase = parseCase(this.input);
    } catch (err) {
      if (!(err instanceof CaseValidationError)) throw err;
      this.logger.warn('Case rejected before investigation', { issues: err.issues });
      return this.failed('case_rejected', { kind: err.kind, message: err.message });
    }
    this.caseId = investigationCase.caseId;

    const registry = this.engine.resolveTools(investigationCase);
    const systemPrompt = buildSystemPrompt(registry.describe(), this.engine.maxIterations);
    const caseBrief = buildCaseBrief(investigationCase);
    const maxIterations = this.engine.maxIterations;
    let consecutiveMalformed = 0;

    this.logger.info(`Investigating case ${this.caseId}`, { category: investigationCase.category, maxIterations });

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      if (this.options.signal?.aborted) return this.cancelled();

      this.setState('reasoning');
      const messages = buildMessages(systemPrompt, caseBrief, this.transcript, iteration === maxIterations);

      let completion: Completion;
      try {
        completion = await this.callModel(messages);
      } catch (err) {
        if (err instanceof FatalConfigurationError) {
          this.setState('terminated');
          throw err;
        }
        const failure = describeFailure(err);
        this.logger.error('Model unavailable, aborting investigation', { ...failure });
        this.append({ kind: 'model_failure', iteration, rawText: '', reasoning: '', timestamp: this.now(), failure });
        return this.failed('model_unavailable', failure);
      }

      const parsed = parseCompletion(completion.text);

      if (parsed.kind === 'failure') {
        consecutiveMalformed++;
        this.logger.warn(`Unparseable model output (${parsed.reason})`, { iteration, consecutive: consecutiveMalformed });
        this.append({
          kind: 'malformed',
          iteration,
          rawText: completion.text,
          reasoning: parsed.reasoning,
          timestamp: this.now(),
          failure: { reason: parsed.reason, message: parsed.message },
        });
        if (consecutiveMalformed >= MAX_CONSECUTIVE_MALFORMED) {
          return this.conclude('malformed_output');
        }
        continue;
      }
      consecutiveMalformed = 0;

      if (parsed.kind === 'conclusion') {
        this.append({
          kind: 'conclusion',
          iteration,
          rawText: completion.text,
          reasoning: parsed.reasoning,
          timestamp: this.now(),
          conclusion: parsed.conclusion,
        });
        return this.conclude('model_concluded', parsed.conclusion);
      }

      this.setState('acting');
      this.logger.debug(`Calling ${parsed.action.tool}`, { iteration, args: parsed.action.args });
      const observation = await registry.execute(parsed.action.tool, parsed.action.args, { timeoutMs: this.settings.toolTimeoutMs });
      this.usage.recordToolCall(observation);
      if (!observation.success) {
        this.logger.warn(`Tool ${parsed.action.tool} failed: ${observation.error?.message ?? 'unknown error'}`);
      }

      this.setState('observing');
      this.append({
        kind: 'action',
        iteration,
        rawText: completion.text,
        reasoning: parsed.reasoning,
        timestamp: this.now(),
        action: parsed.action,
        observation,
      });
    }

    if (this.options.signal?.aborted) return this.cancelled();
    this.logger.warn('Iteration budget exhausted, concluding with gathered evidence', { maxIterations });
    return this.conclude('iteration_budget_exhausted');
  }

  private async callModel(messages: LLMMessage[]): Promise<Completion> {
    const { llm, requestTimeoutMs, retry } = this.settings;
    const started = Date.now();

    const completion = await withRetry(
      () => withTimeout((signal) => llm.complete({ messages, signal }), requestTimeoutMs, 'Model call'),
      {
        ...retry,
        onRetry: (info) => {
          this.usage.recordRetry();
          this.logger.warn(`Model call failed, retrying in ${info.delayMs}ms`, {
            attempt: info.attempt,
            error: errorMessage(info.error),
          });
          retry.onRetry?.(info);
        },
      }
    );

    this.usage.recordModelCall(completion.usage, Date.now() - started);
    return completion;
  }

  private base() {
    const completedAt = this.settings.clock();
    return {
      investigationId: this.investigationId,
      caseId: this.caseId,
      model: this.settings.llm.model,
      transcript: [...this.transcript],
      usage: this.usage.snapshot(),
      startedAt: this.startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - this.startedAt.getTime(),
    };
  }

  private conclude(
    stopReason: AssessedResult['stopReason'],
    modelConclusion?: ModelConclusion
  ): AssessedResult {
    this.setState('concluding');
    const assessment = assessTranscript(this.transcript, stopReason, this.settings.policy);
    const result: AssessedResult = {
      ...this.base(),
      status: stopReason === 'model_concluded' ? 'completed' : 'degraded',
      stopReason,
      ...assessment,
      modelConclusion,
    };
    this.logger.info(`Case ${this.caseId} concluded: ${result.decision} (${result.score}/10)`, { stopReason });
    this.setState('terminated');
    return result;
  }

  private cancelled(): InvestigationResult {
    this.logger.info(`Case ${this.caseId} cancelled`, { steps: this.transcript.length });
    this.setState('terminated');
    return { ...this.base(), status: 'cancelled', stopReason: 'cancelled' };
  }

  private failed(stopReason: 'model_unavailable' | 'case_rejected', failure: FailureInfo): InvestigationResult {
    this.setState('terminated');
    return { ...this.base(), status: 'failed', stopReason, failure };
  }
}

export interface RunInvestigationOptions extends InvestigateOptions {
  llm?: LLMClient;
  store?: FixtureStore;
  logger?: Logger;
}

/** Builds an engine from configuration: OpenAI client, fixture-backed toolkits. */
export function createInvestigationEngine(
  config: InvestigatorConfig,
  deps: { llm?: LLMClient; store?: FixtureStore; logger?: Logger } = {}
): InvestigationEngine {
  const llm = deps.llm ?? createDefaultLLMClient(config);
  const store = deps.store ?? loadFixtureStore(config.dataFile);

  return new InvestigationEngine({
    llm,
    tools: createToolkitResolver(store, { ctrThreshold: config.ctrThreshold, toolTimeoutMs: config.toolTimeoutMs }),
    maxIterations: config.maxIterations,
    requestTimeoutMs: config.requestTimeoutMs,
    toolTimeoutMs: config.toolTimeoutMs,
    retry: config.retry,
    pricing: config.pricing,
    logger: deps.logger ?? createLogger('engine', { level: config.logLevel }),
  });
}

export async function runInvestigation(
  input: unknown,
  config: InvestigatorConfig = loadInvestigatorConfig(),
  options: RunInvestigationOptions = {}
): Promise<InvestigationResult> {
  const { llm, store, logger, ...investigateOptions } = options;
  const engine = createInvestigationEngine(config, { llm, store, logger });
  return engine.investigate(input, investigateOptions);
}
