import type { ExecutionContext, RegisteredTool, ToolAnnotations } from "../types/tool.js";
import { TOOL_MODULES } from "../types/tool.js";
import type { ToolResponse } from "../types/response.js";
import { error } from "./helpers.js";
import { errorMessage } from "../shared/errors.js";
import { logger } from "../logger.js";

/**
 * Every kmod_* tool by name. The server publishes list() and routes each
 * tools/call through execute(), which turns a handler throw into an
 * INTERNAL_ERROR envelope so the client always receives a ToolResponse.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register(tool: RegisteredTool): void {
    const { name } = tool.metadata;
    if (this.tools.has(name)) logger.warn({ tool: name }, "Duplicate tool registration, overwriting");
    this.tools.set(name, tool);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  /** Grouped by module (catalog, compat, install), registration order within a group. */
  list(): RegisteredTool[] {
    const all = [...this.tools.values()];
    return TOOL_MODULES.flatMap((module) => all.filter((t) => t.metadata.module === module));
  }

  get size(): number {
    return this.tools.size;
  }

  async execute(name: string, args: Record<string, unknown>, execCtx: ExecutionContext): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      return error(name, execCtx.targetHost, 0, {
        code: "UNKNOWN_TOOL", category: "validation",
        message: `No tool named ${name}`,
        remediation: [`Available tools: ${[...this.tools.keys()].join(", ")}`],
      });
    }
    try {
      return await tool.execute(args, execCtx);
    } catch (err) {
      const message = errorMessage(err);
      logger.error({ tool: name, error: message }, "Tool execution error");
      return error(name, execCtx.targetHost, 0, {
        code: "INTERNAL_ERROR", category: "state", message,
        remediation: ["Check server logs for details"],
      });
    }
  }
}

/** MCP annotations for a tool: declared hints win, the rest follow from its risk level. */
export function annotationsFor(tool: RegisteredTool): Required<ToolAnnotations> {
  const { riskLevel, annotations } = tool.metadata;
  return {
    readOnlyHint: annotations?.readOnlyHint ?? riskLevel === "read-only",
    destructiveHint: annotations?.destructiveHint ?? false,
    idempotentHint: annotations?.idempotentHint ?? riskLevel === "read-only",
    openWorldHint: annotations?.openWorldHint ?? false,
  };
}
