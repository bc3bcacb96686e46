import type { ServerContext } from "./context.js";
import { isMatchingError, rateLimited } from "../core/errors.js";
import { getErrorMessage, logDebug, logError } from "../core/logging.js";

/** Every stdio tool call comes from the one local client. */
export const MCP_CLIENT_ID = "mcp:stdio";

export type ToolArgs = Record<string, unknown> | undefined;

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError: boolean;
}

/** JSON Schema of a tool's arguments, as MCP lists it. */
export interface ToolInputSchema {
  [key: string]: unknown;
  type: "object";
  properties?: Record<string, unknown>;
  required?: string[];
}

export interface ToolDescription {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface ToolDefinition extends ToolDescription {
  /** Count calls against the shared stdio client's rate limit. */
  rateLimited?: boolean;
  /** Resolves with the `data` of a successful response; throw to fail. */
  handler: (args: ToolArgs, ctx: ServerContext) => Promise<unknown>;
}

export function argString(args: ToolArgs, key: string): string | undefined {
  const val = args?.[key];
  return typeof val === "string" ? val : undefined;
}

function textResponse(
  payload: Record<string, unknown>,
  isError: boolean,
): ToolResponse {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
    isError,
  };
}

export function toolSuccess(data: unknown): ToolResponse {
  return textResponse({ success: true, data }, false);
}

/**
 * Failed tool response. Expected failures keep their message and kind;
 * anything else is logged and reported opaquely.
 */
export function toolFailure(tool: string, err: unknown): ToolResponse {
  if (isMatchingError(err)) {
    return textResponse(
      {
        success: false,
        error: err.message,
        kind: err.kind,
        retryable: err.retryable,
        ...(err.details !== undefined && { details: err.details }),
        ...(err.retryAfterSeconds !== undefined && {
          retryAfterSeconds: err.retryAfterSeconds,
        }),
      },
      true,
    );
  }
  logError(`Tool ${tool} failed:`, getErrorMessage(err));
  return textResponse(
    {
      success: false,
      error: "Internal server error",
      kind: "Internal",
      retryable: false,
    },
    true,
  );
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(defs: ToolDefinition[] = []) {
    for (const def of defs) this.add(def);
  }

  add(def: ToolDefinition): this {
    if (this.tools.has(def.name)) {
      throw new Error(`Duplicate tool name: ${def.name}`);
    }
    this.tools.set(def.name, def);
    return this;
  }

  describe(): ToolDescription[] {
    return [...this.tools.values()].map(({ name, description, inputSchema }) => ({
      name,
      description,
      inputSchema,
    }));
  }

  /** Dispatch a call. Only an unknown tool name rejects; handler errors become failed responses. */
  async call(
    name: string,
    args: ToolArgs,
    ctx: ServerContext,
  ): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new Error(`Unknown tool: ${name}`);
    }

    const started = ctx.now();
    try {
      if (tool.rateLimited) {
        const decision = ctx.rateLimiter.admit(MCP_CLIENT_ID);
        if (!decision.admitted) throw rateLimited(decision.retryAfterSeconds);
      }
      const data = await tool.handler(args, ctx);
      logDebug(`Tool ${name} completed in ${ctx.now() - started}ms`);
      return toolSuccess(data);
    } catch (err) {
      return toolFailure(name, err);
    }
  }
}
