import { z } from "zod";
import type { PluginContext } from "../context.js";
import { registerTool, success, error, variantView } from "../helpers.js";
import { recommendConfiguration } from "../../install/recommend.js";
import { timeoutFor } from "../../types/risk.js";

export function registerCatalogTools(ctx: PluginContext): void {
  // ── kmod_list_kernels ───────────────────────────────────────────
  registerTool(ctx, {
    name: "kmod_list_kernels", description: "List the kernel variants in the catalog, default first, with a recommended kernel and module mode.",
    module: "catalog", riskLevel: "read-only", duration: "instant",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true },
  }, async () => {
    const r = await ctx.executor.execute(ctx.commands.kernelRelease(), timeoutFor("instant", ctx.config.errors.command_timeout_ceiling * 1000));
    const release = r.exitCode === 0 ? r.stdout.trim() || null : null;
    const recommendation = recommendConfiguration(ctx.catalog, release);
    const kernels = ctx.catalog.list().map(variantView);
    return success("kmod_list_kernels", ctx.targetHost, r.durationMs, null, {
      kernels,
      running_kernel: release,
      recommended: { kernel: recommendation.kernelName, mode: recommendation.mode, reason: recommendation.reason },
      load_errors: ctx.catalogErrors,
    }, { total: kernels.length });
  });

  // ── kmod_package_version ────────────────────────────────────────
  registerTool(ctx, {
    name: "kmod_package_version", description: "Resolve the version the package index offers for a package. ZFS family packages fall back to the binary release database.",
    module: "catalog", riskLevel: "read-only", duration: "normal",
    inputSchema: z.object({ package: z.string().min(1).describe("Package name, e.g. zfs-dkms or linux-lts") }),
    annotations: { readOnlyHint: true, openWorldHint: true },
  }, async (args) => {
    const start = Date.now();
    const version = await ctx.resolver.resolve(args.package);
    const durationMs = Date.now() - start;
    if (version === null) {
      return error("kmod_package_version", ctx.targetHost, durationMs, {
        code: "VERSION_UNRESOLVED", category: "not_found", transient: true,
        message: `Could not determine ${args.package} version`,
        remediation: ["Check that the package name is spelled correctly", "Refresh the package index with pacman -Sy"],
      });
    }
    return success("kmod_package_version", ctx.targetHost, durationMs, null, { package: args.package, version });
  });
}
