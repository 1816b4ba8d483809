import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { Completion, CompletionRequest, LLMClient, LLMMessage } from './index';
import {
  FatalConfigurationError,
  ModelRequestError,
  TransientDependencyFailure,
  errorMessage,
} from '../errors';

export interface OpenAIClientOptions {
  apiKey: string;
  baseURL?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

function toChatMessage(message: LLMMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

/** Maps SDK failures onto the investigator's error taxonomy. */
export function mapOpenAIError(err: unknown): Error {
  if (err instanceof APIConnectionTimeoutError || err instanceof APIUserAbortError) {
    return new TransientDependencyFailure('timeout', 'Model request timed out', { cause: err });
  }
  if (err instanceof APIConnectionError) {
    return new TransientDependencyFailure('network', `Model connection failed: ${err.message}`, { cause: err });
  }
  if (err instanceof APIError) {
    const status = err.status;
    if (status === 401 || status === 403) {
      return new FatalConfigurationError(`Model provider rejected the credentials (HTTP ${status})`, [], { cause: err });
    }
    if (status === 429) {
      return new TransientDependencyFailure('rate_limit', 'Model provider rate limit reached', { cause: err });
    }
    if (status === undefined || status === 408 || status === 409 || status >= 500) {
      return new TransientDependencyFailure('unavailable', `Model provider unavailable: ${err.message}`, { cause: err });
    }
    return new ModelRequestError(`Model request rejected: ${err.message}`, status, { cause: err });
  }
  return new ModelRequestError(`Model call failed: ${errorMessage(err)}`, undefined, { cause: err });
}

export class OpenAILLMClient implements LLMClient {
  private client: OpenAI;
  readonly model: string;
  private temperature: number;
  private maxTokens: number;

  constructor(options: OpenAIClientOptions) {
    // withRetry owns retrying
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      maxRetries: 0,
      timeout: options.timeoutMs,
    });
    this.model = options.model || 'gpt-4o-mini';
    this.temperature = options.temperature ?? 0.3;
    this.maxTokens = options.maxTokens ?? 800;
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: request.messages.map(toChatMessage),
          temperature: this.temperature,
          max_tokens: this.maxTokens,
        },
        { signal: request.signal }
      );

      const usage = response.usage;
      return {
        text: response.choices[0]?.message?.content ?? '',
        model: response.model,
        usage: {
          promptTokens: usage?.prompt_tokens ?? 0,
          completionTokens: usage?.completion_tokens ?? 0,
          totalTokens: usage?.total_tokens ?? 0,
        },
      };
    } catch (err) {
      throw mapOpenAIError(err);
    }
  }
}
