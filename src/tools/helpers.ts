import type { z } from "zod";
import type { PluginContext } from "./context.js";
import type { ToolResponse, SuccessResponse, ErrorResponse, ErrorCategory, ErrorCode } from "../types/response.js";
import type { ToolMetadata, ExecutionContext } from "../types/tool.js";
import type { KernelVariant } from "../types/kernel.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, targetHost: string, durationMs: number, commandExecuted: string | null, data: Record<string, unknown>, extra?: Partial<SuccessResponse>): SuccessResponse {
  return { status: "success", tool, target_host: targetHost, duration_ms: durationMs, command_executed: commandExecuted, data, ...extra };
}

export function error(tool: string, targetHost: string, durationMs: number, opts: { code: ErrorCode; category: ErrorCategory; message: string; transient?: boolean; remediation?: string[]; details?: Record<string, unknown> }): ErrorResponse {
  return {
    status: "error", tool, target_host: targetHost, duration_ms: durationMs, command_executed: null,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    transient: opts.transient ?? false,
    remediation: opts.remediation ?? [],
    ...(opts.details ? { details: opts.details } : {}),
  };
}

/** Error response for a kernel name the catalog does not know. */
export function unknownKernel(tool: string, ctx: PluginContext, name: string): ErrorResponse {
  return error(tool, ctx.targetHost, 0, {
    code: "UNKNOWN_KERNEL", category: "not_found",
    message: `Unsupported kernel: ${name}. Supported: ${ctx.catalog.list().map((v) => v.name).join(", ")}`,
    remediation: ["Run kmod_list_kernels to see the catalog", "Add a definition under catalog.variants in config.yaml"],
  });
}

export function variantView(variant: KernelVariant): Record<string, unknown> {
  return {
    name: variant.name,
    display_name: variant.displayName,
    kernel_package: variant.kernelPackage,
    headers_package: variant.headersPackage,
    precompiled_package: variant.precompiledPackage,
    supports_precompiled: variant.supportsPrecompiled,
    is_default: variant.isDefault,
  };
}

// ── Error Categorization ───────────────────────────────────────────

interface ErrorPattern {
  test: (message: string) => boolean;
  code: ErrorCode;
  category: ErrorCategory;
  transient: boolean;
  remediation: (ctx: Pick<PluginContext, "config">) => string[];
}

const ERROR_PATTERNS: ErrorPattern[] = [
  { test: (s) => s.includes("you cannot perform this operation unless you are root") || s.includes("sudo:") || s.includes("permission denied"),
    code: "PERMISSION_DENIED", category: "privilege", transient: false,
    remediation: (ctx) => ctx.config.privilege.use_sudo
      ? ["Verify passwordless sudo is configured for pacman", "Run 'sudo -n true' to test sudo access"]
      : ["Run the server as root, or set privilege.use_sudo: true in config.yaml"] },
  { test: (s) => s.includes("target not found"),
    code: "PACKAGE_NOT_FOUND", category: "not_found", transient: false,
    remediation: () => ["Check that the archzfs repository is configured in /etc/pacman.conf", "Run kmod_package_version to see what the index reports"] },
  { test: (s) => s.includes("could not lock database") || s.includes("unable to lock database"),
    code: "RESOURCE_LOCKED", category: "lock", transient: true,
    remediation: () => ["Another pacman process may be running", "Remove /var/lib/pacman/db.lck only if no pacman process is running"] },
  { test: (s) => s.includes("conflicting dependencies") || s.includes("unresolvable package conflicts") || s.includes("could not satisfy dependencies"),
    code: "DEPENDENCY_CONFLICT", category: "dependency", transient: false,
    remediation: () => ["The module package may require a different kernel version", "Run kmod_check for the kernel to see why"] },
  { test: (s) => s.includes("failed retrieving file") || s.includes("could not resolve host") || s.includes("failed to synchronize"),
    code: "NETWORK_ERROR", category: "network", transient: true,
    remediation: () => ["Check network connectivity and mirror availability", "Retry after the mirror list is refreshed"] },
];

export function categorizeError(message: string, ctx: Pick<PluginContext, "config">): { code: ErrorCode; category: ErrorCategory; transient: boolean; remediation: string[] } {
  const lower = message.toLowerCase();
  for (const p of ERROR_PATTERNS) {
    if (p.test(lower)) {
      return { code: p.code, category: p.category, transient: p.transient, remediation: p.remediation(ctx) };
    }
  }
  return { code: "COMMAND_FAILED", category: "state", transient: false, remediation: [
    "Review the error output above for the specific failure",
    "Try with dry_run: true to preview the package set without installing",
  ] };
}

// ── Tool Registration Helper ───────────────────────────────────────

/**
 * Register a tool on the context's registry. Arguments are parsed with the tool's
 * input schema before the handler runs; invalid input becomes a validation error.
 */
export function registerTool<S extends z.AnyZodObject>(
  ctx: Pick<PluginContext, "registry">,
  metadata: Omit<ToolMetadata, "inputSchema"> & { readonly inputSchema: S },
  handler: (args: z.infer<S>, execCtx: ExecutionContext) => Promise<ToolResponse>,
): void {
  ctx.registry.register({
    metadata,
    execute: async (rawArgs, execCtx) => {
      const parsed = metadata.inputSchema.safeParse(rawArgs);
      if (!parsed.success) {
        return error(metadata.name, execCtx.targetHost, 0, {
          code: "INVALID_INPUT", category: "validation",
          message: parsed.error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; "),
        });
      }
      return handler(parsed.data, execCtx);
    },
  });
}
