import { z } from "zod";
import type { PluginContext } from "../context.js";
import { MODULE_MODES } from "../../types/kernel.js";
import { registerTool, success, error, unknownKernel, categorizeError } from "../helpers.js";
import { checkPlanFeasibility, describePlan, planInstallation, recommendedMode } from "../../install/planner.js";
import { PacmanInstaller, summarizeInstallation, type PackageInstaller } from "../../install/installer.js";
import { ReleaseAssetInstaller } from "../../install/release-assets.js";
import { timeoutFor } from "../../types/risk.js";

const modeSchema = z.enum(MODULE_MODES);

export function registerInstallTools(ctx: PluginContext): void {
  // ── kmod_plan ───────────────────────────────────────────────────
  registerTool(ctx, {
    name: "kmod_plan", description: "Show the ordered installation attempts for a kernel and mode, and check that the DKMS fallback packages exist.",
    module: "install", riskLevel: "read-only", duration: "normal",
    inputSchema: z.object({
      kernel: z.string().min(1).describe("Kernel variant name"),
      mode: modeSchema.optional().describe("Preferred module mode; defaults to precompiled where the kernel supports it"),
    }),
    annotations: { readOnlyHint: true, openWorldHint: true },
  }, async (args) => {
    const variant = ctx.catalog.get(args.kernel);
    if (!variant) return unknownKernel("kmod_plan", ctx, args.kernel);
    const mode = args.mode ?? recommendedMode(variant);
    const start = Date.now();
    const problems = await checkPlanFeasibility(variant, mode, ctx.packages, async (pkg) => (await ctx.resolver.resolve(pkg)) !== null);
    const plan = describePlan(variant, mode, ctx.packages);
    return success("kmod_plan", ctx.targetHost, Date.now() - start, null, {
      kernel: variant.name,
      requested_mode: mode,
      attempts: planInstallation(variant, mode).map((a) => a.mode),
      plan,
      problems,
    }, { summary: plan });
  });

  // ── kmod_install ────────────────────────────────────────────────
  registerTool(ctx, {
    name: "kmod_install", description: "Install ZFS modules for a kernel, falling back from precompiled to DKMS. High risk: requires confirmation.",
    module: "install", riskLevel: "high", duration: "long_running",
    inputSchema: z.object({
      kernel: z.string().min(1).describe("Kernel variant name"),
      mode: modeSchema.optional().describe("Preferred module mode; defaults to precompiled where the kernel supports it"),
      confirmed: z.boolean().optional().default(false).describe("Pass true to confirm execution after reviewing a confirmation_required response."),
      dry_run: z.boolean().optional().default(false).describe("Resolve the package sets with pacman --print without installing."),
    }),
    annotations: { readOnlyHint: false, destructiveHint: false, openWorldHint: true },
  }, async (args) => {
    const variant = ctx.catalog.get(args.kernel);
    if (!variant) return unknownKernel("kmod_install", ctx, args.kernel);
    const mode = args.mode ?? recommendedMode(variant);
    const plan = describePlan(variant, mode, ctx.packages);

    const gate = ctx.safetyGate.check({
      toolName: "kmod_install", toolRiskLevel: "high", targetHost: ctx.targetHost,
      plan, description: `Install ZFS kernel modules for ${variant.displayName}`,
      warnings: mode === "precompiled" && !variant.supportsPrecompiled
        ? [`${variant.name} has no precompiled package; DKMS will be built`] : [],
      confirmed: args.confirmed, dryRun: args.dry_run,
    });
    if (gate) return gate;

    const timeoutMs = timeoutFor("long_running", ctx.config.errors.command_timeout_ceiling * 1000);
    const pacman = new PacmanInstaller(ctx.executor, ctx.commands, { dryRun: args.dry_run, timeoutMs });
    const installer: PackageInstaller = ctx.config.sources.precompiled_source === "release"
      ? new ReleaseAssetInstaller(ctx.executor, ctx.commands, {
        binaryDbUrl: ctx.config.sources.binary_db_url, packages: ctx.packages, fallback: pacman,
        dryRun: args.dry_run, timeoutMs,
      })
      : pacman;

    const start = Date.now();
    const result = await ctx.installer.install(variant, mode, installer);
    const durationMs = Date.now() - start;
    const summary = summarizeInstallation(result);
    const attempts = result.attempts.map((a) => ({ mode: a.mode, packages: a.packages, succeeded: a.succeeded, error: a.error }));

    if (!result.success) {
      const lastError = result.errors[result.errors.length - 1] ?? "";
      const categorized = categorizeError(lastError, ctx);
      return error("kmod_install", ctx.targetHost, durationMs, {
        code: "ALL_ATTEMPTS_FAILED", category: categorized.category, transient: categorized.transient,
        message: summary, remediation: categorized.remediation,
        details: { cause: categorized.code, requested_mode: result.requestedMode, errors: result.errors, attempts },
      });
    }

    return success("kmod_install", ctx.targetHost, durationMs, null, {
      kernel: variant.name,
      requested_mode: result.requestedMode,
      actual_mode: result.actualMode,
      fallback_occurred: result.fallbackOccurred,
      installed_packages: result.installedPackages,
      attempts,
    }, { summary, dry_run: args.dry_run });
  });
}
