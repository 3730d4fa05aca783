import { z } from "zod";
import type { PluginContext } from "../context.js";
import { MODULE_MODES } from "../../types/kernel.js";
import type { CompatibilityResult, CompatibilityVerdict } from "../../types/kernel.js";
import { registerTool, success, error, unknownKernel } from "../helpers.js";
import { partitionKernels } from "../../compat/validator.js";
import { releaseTag } from "../../compat/range-fetcher.js";
import type { KernelVariant } from "../../types/kernel.js";

const modeSchema = z.enum(MODULE_MODES);

function verdictView(verdict: CompatibilityVerdict): Record<string, unknown> {
  return { compatible: verdict.compatible, warnings: verdict.warnings, cause: verdict.cause };
}

function resultView(result: CompatibilityResult): Record<string, unknown> {
  return { kernel: result.kernelName, dkms: verdictView(result.dkms), precompiled: verdictView(result.precompiled) };
}

export function registerCompatTools(ctx: PluginContext): void {
  // ── kmod_compat_range ───────────────────────────────────────────
  registerTool(ctx, {
    name: "kmod_compat_range", description: "Fetch the kernel range an OpenZFS release declares in its release notes.",
    module: "compat", riskLevel: "read-only", duration: "normal",
    inputSchema: z.object({ module_version: z.string().min(1).describe("ZFS package version, e.g. 2.3.3-1") }),
    annotations: { readOnlyHint: true, openWorldHint: true },
  }, async (args) => {
    const start = Date.now();
    const range = await ctx.ranges.fetchRange(args.module_version);
    const durationMs = Date.now() - start;
    const tag = releaseTag(args.module_version, ctx.config.sources.release_tag_prefix);
    if (!range) {
      return error("kmod_compat_range", ctx.targetHost, durationMs, {
        code: "RANGE_UNAVAILABLE", category: "network", transient: true,
        message: `Could not fetch ZFS kernel compatibility data for ${tag}`,
        remediation: ["Check network access to the release metadata service", "Verify the release tag exists upstream"],
      });
    }
    return success("kmod_compat_range", ctx.targetHost, durationMs, null, { tag, min: range.min, max: range.max });
  });

  // ── kmod_check ──────────────────────────────────────────────────
  registerTool(ctx, {
    name: "kmod_check", description: "Check one kernel against one module mode. fail-closed (default) treats unresolved data as incompatible; fail-open treats it as compatible.",
    module: "compat", riskLevel: "read-only", duration: "normal",
    inputSchema: z.object({
      kernel: z.string().min(1).describe("Kernel variant name"),
      mode: modeSchema.describe("precompiled (exact match) or dkms (range match)"),
      policy: z.enum(["fail-open", "fail-closed"]).optional().default("fail-closed"),
    }),
    annotations: { readOnlyHint: true, openWorldHint: true },
  }, async (args) => {
    const variant = ctx.catalog.get(args.kernel);
    if (!variant) return unknownKernel("kmod_check", ctx, args.kernel);
    const start = Date.now();
    const verdict = await ctx.evaluator.evaluate(variant, args.mode, args.policy);
    return success("kmod_check", ctx.targetHost, Date.now() - start, null, {
      kernel: variant.name, mode: args.mode, policy: args.policy, ...verdictView(verdict),
    });
  });

  // ── kmod_validate ───────────────────────────────────────────────
  registerTool(ctx, {
    name: "kmod_validate", description: "Fail-closed DKMS validation: split kernels into compatible and incompatible before a build.",
    module: "compat", riskLevel: "read-only", duration: "slow",
    inputSchema: z.object({
      kernels: z.array(z.string().min(1)).optional().describe("Kernel variant names; omit for the whole catalog"),
    }),
    annotations: { readOnlyHint: true, openWorldHint: true },
  }, async (args) => {
    const names = args.kernels ?? ctx.catalog.list().map((v) => v.name);
    const variants: KernelVariant[] = [];
    for (const name of names) {
      const variant = ctx.catalog.get(name);
      if (!variant) return unknownKernel("kmod_validate", ctx, name);
      variants.push(variant);
    }
    const start = Date.now();
    const partition = await partitionKernels(ctx.evaluator, variants);
    return success("kmod_validate", ctx.targetHost, Date.now() - start, null, { ...partition });
  });

  // ── kmod_scan ───────────────────────────────────────────────────
  registerTool(ctx, {
    name: "kmod_scan", description: "Scan every catalog kernel in both modes and cache the results. Unresolved lookups are assumed compatible.",
    module: "compat", riskLevel: "read-only", duration: "long_running",
    inputSchema: z.object({
      filtering: z.boolean().optional().describe("Override compatibility filtering for this scan; omit to use config and ZFS_KMOD_FILTER_KERNELS"),
    }),
    annotations: { readOnlyHint: true, openWorldHint: true },
  }, async (args) => {
    const start = Date.now();
    const summary = await ctx.scanner.scan({ filtering: args.filtering });
    return success("kmod_scan", ctx.targetHost, Date.now() - start, null, {
      summary: { ...summary },
      results: ctx.scanner.allResults().map(resultView),
    }, { total: summary.totalKernels });
  });

  // ── kmod_menu_options ───────────────────────────────────────────
  registerTool(ctx, {
    name: "kmod_menu_options", description: "Kernel + module mode options for presentation, from the last scan (scans first if needed).",
    module: "compat", riskLevel: "read-only", duration: "long_running",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true },
  }, async () => {
    const start = Date.now();
    const menu = await ctx.scanner.menuOptions();
    return success("kmod_menu_options", ctx.targetHost, Date.now() - start, null, {
      options: menu.options.map((o) => ({ label: o.label, kernel: o.kernelName, mode: o.mode })),
      filtered_kernels: menu.filtered,
      filtering: ctx.scanner.filteringEnabled,
    }, { total: menu.options.length });
  });
}
