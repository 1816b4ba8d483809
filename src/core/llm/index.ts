import { OpenAILLMClient } from './openaiClient';
import { InvestigatorConfig, loadInvestigatorConfig } from '../config';
import { FatalConfigurationError } from '../errors';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
  role: ChatRole;
  content: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionRequest {
  messages: LLMMessage[];
  signal?: AbortSignal;
}

export interface Completion {
  text: string;
  usage: TokenUsage;
  model: string;
}

/**
 * Text in, text out. Implementations throw TransientDependencyFailure for
 * retryable conditions, ModelRequestError for rejected requests and
 * FatalConfigurationError for bad credentials.
 */
export interface LLMClient {
  readonly model: string;
  complete(request: CompletionRequest): Promise<Completion>;
}

export function createDefaultLLMClient(config: InvestigatorConfig = loadInvestigatorConfig()): LLMClient {
  if (!config.openaiApiKey) {
    throw new FatalConfigurationError('OPENAI_API_KEY is not set in the environment or global config.');
  }

  return new OpenAILLMClient({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl,
    model: config.model,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    timeoutMs: config.requestTimeoutMs,
  });
}
