import { z } from 'zod';
import { FatalConfigurationError, ToolError, errorMessage } from '../errors';
import { withTimeout } from '../retry';
import type { Observation, ObservationErrorKind, Payload, ToolArgs } from '../investigator/types';

export interface ToolContext {
  /** Aborted when the tool call exceeds its timeout. */
  signal: AbortSignal;
}

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  /** Human-readable call shape shown to the model, e.g. `get_customer_profile(customer_id)`. */
  signature: string;
  parameters: S;
  handler: (args: z.output<S>, context: ToolContext) => unknown;
}

type Validation =
  | { ok: true; invoke: (context: ToolContext) => Promise<unknown> }
  | { ok: false; message: string; fields: string[] };

export interface RegisteredTool {
  readonly name: string;
  readonly description: string;
  readonly signature: string;
  validate(args: unknown): Validation;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  signature: string;
}

const TOOL_NAME_RE = /^[a-z][a-z0-9_]*$/;
const DEFAULT_TOOL_TIMEOUT_MS = 10_000;

/** Binds a zod schema to a handler; the registry only sees the erased shape. */
export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
  return {
    name: definition.name,
    description: definition.description,
    signature: definition.signature,
    validate(args: unknown): Validation {
      const parsed = definition.parameters.safeParse(args);
      if (!parsed.success) {
        const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.') || '(root)'))];
        const message = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        return { ok: false, message, fields };
      }
      const data: z.output<S> = parsed.data;
      return { ok: true, invoke: async (context) => definition.handler(data, context) };
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Detached copy, so a caller holding the observation cannot reach shared store data. */
function toPayload(value: unknown): Payload {
  const copy: unknown = structuredClone(value);
  return isRecord(copy) ? copy : { value: copy };
}

export interface ToolRegistryOptions {
  /** Names that must be registered; construction fails otherwise. */
  requiredTools?: readonly string[];
  defaultTimeoutMs?: number;
}

export interface ExecuteOptions {
  timeoutMs?: number;
}

/**
 * Name to tool table, checked once at construction and read-only afterwards,
 * so one registry can serve any number of concurrent investigations.
 */
export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, RegisteredTool>;
  private readonly defaultTimeoutMs: number;

  constructor(tools: readonly RegisteredTool[], options: ToolRegistryOptions = {}) {
    const table = new Map<string, RegisteredTool>();
    for (const tool of tools) {
      if (!TOOL_NAME_RE.test(tool.name)) {
        throw new FatalConfigurationError(`Invalid tool name "${tool.name}": use lower snake_case`);
      }
      if (table.has(tool.name)) {
        throw new FatalConfigurationError(`Tool "${tool.name}" is registered twice`);
      }
      table.set(tool.name, tool);
    }

    const missing = (options.requiredTools ?? []).filter((name) => !table.has(name));
    if (missing.length > 0) {
      throw new FatalConfigurationError(`Required tools are not registered: ${missing.join(', ')}`, missing);
    }

    this.tools = table;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map(({ name, description, signature }) => ({ name, description, signature }));
  }

  /** Catalogue text for the system prompt. */
  describe(): string {
    return this.list()
      .map((tool, index) => `${index + 1}. ${tool.signature}\n   ${tool.description}`)
      .join('\n');
  }

  /**
   * Dispatches one action. Always resolves: unknown tools, bad arguments and
   * handler failures come back as failed observations. Nothing is retried here.
   */
  async execute(name: string, args: ToolArgs, options: ExecuteOptions = {}): Promise<Observation> {
    const started = Date.now();

    const failed = (kind: ObservationErrorKind, message: string, extra: { fields?: string[]; payload?: Payload } = {}): Observation => ({
      tool: name,
      args,
      success: false,
      payload: extra.payload ?? {},
      error: extra.fields ? { kind, message, fields: extra.fields } : { kind, message },
      durationMs: Date.now() - started,
    });

    const tool = this.tools.get(name);
    if (!tool) {
      return failed('UnknownTool', `Unknown tool "${name}". Available tools: ${this.names().join(', ')}`);
    }

    const validation = tool.validate(args);
    if (!validation.ok) {
      return failed('InvalidArguments', `Invalid arguments for ${tool.name}: ${validation.message}`, {
        fields: validation.fields,
      });
    }

    try {
      const result = await withTimeout(
        (signal) => validation.invoke({ signal }),
        options.timeoutMs ?? this.defaultTimeoutMs,
        `Tool ${tool.name}`
      );
      return {
        tool: tool.name,
        args,
        success: true,
        payload: toPayload(result),
        durationMs: Date.now() - started,
      };
    } catch (err) {
      const payload = err instanceof ToolError && err.details ? toPayload(err.details) : undefined;
      return failed('ToolExecutionError', errorMessage(err), { payload });
    }
  }
}

export function createToolRegistry(tools: readonly RegisteredTool[], options: ToolRegistryOptions = {}): ToolRegistry {
  return new ToolRegistry(tools, options);
}
