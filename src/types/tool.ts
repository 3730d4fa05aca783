import type { z } from "zod";
import type { RiskLevel, DurationCategory } from "./risk.js";
import type { ToolResponse } from "./response.js";

/** The three tool groups, in the order the server lists them. */
export const TOOL_MODULES = ["catalog", "compat", "install"] as const;
export type ToolModule = (typeof TOOL_MODULES)[number];

export interface ToolAnnotations {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

export interface ToolMetadata {
  readonly name: string;
  readonly description: string;
  readonly module: ToolModule;
  readonly riskLevel: RiskLevel;
  readonly duration: DurationCategory;
  readonly inputSchema: z.AnyZodObject;
  /** Hints left unset are derived from riskLevel when the tool is published. */
  readonly annotations?: ToolAnnotations;
}

export interface ExecutionContext {
  readonly targetHost: string;
}

/** execute() takes the raw MCP arguments; registerTool wraps the handler with schema parsing. */
export interface RegisteredTool {
  readonly metadata: ToolMetadata;
  readonly execute: (args: Record<string, unknown>, context: ExecutionContext) => Promise<ToolResponse>;
}
