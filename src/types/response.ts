import type { RiskLevel } from "./risk.js";

/** Coarse failure class; clients branch on this rather than on error_code. */
export type ErrorCategory =
  | "privilege"
  | "not_found"
  | "dependency"
  | "lock"
  | "network"
  | "validation"
  | "state";

export type ErrorCode =
  // request
  | "INVALID_INPUT"
  | "UNKNOWN_TOOL"
  | "UNKNOWN_KERNEL"
  // lookups
  | "VERSION_UNRESOLVED"
  | "RANGE_UNAVAILABLE"
  // pacman output patterns
  | "PERMISSION_DENIED"
  | "PACKAGE_NOT_FOUND"
  | "RESOURCE_LOCKED"
  | "DEPENDENCY_CONFLICT"
  | "NETWORK_ERROR"
  | "COMMAND_FAILED"
  // install chain
  | "ALL_ATTEMPTS_FAILED"
  | "INTERNAL_ERROR";

interface Envelope<S extends string> {
  status: S;
  tool: string;
  target_host: string;
  /** null when nothing ran, as in a confirmation request. */
  duration_ms: number | null;
  command_executed: string | null;
}

export interface SuccessResponse extends Envelope<"success"> {
  data: Record<string, unknown>;
  total?: number;
  summary?: string;
  dry_run?: boolean;
}

export interface ErrorResponse extends Envelope<"error"> {
  error_code: ErrorCode;
  error_category: ErrorCategory;
  message: string;
  transient: boolean;
  remediation: string[];
  /** Partial results carried by a failure, such as the attempts of an exhausted install chain. */
  details?: Record<string, unknown>;
}

export interface ConfirmationResponse extends Envelope<"confirmation_required"> {
  risk_level: RiskLevel;
  dry_run_available: boolean;
  preview: {
    plan: string;
    description: string;
    warnings: string[];
  };
}

export type ToolResponse = SuccessResponse | ErrorResponse | ConfirmationResponse;
