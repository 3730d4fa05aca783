#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { hostname } from "node:os";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { ArchCommands } from "./distro/commands/arch.js";
import { LocalExecutor } from "./execution/executor.js";
import { PackageVersionResolver } from "./packages/resolver.js";
import { CompatibilityRangeFetcher } from "./compat/range-fetcher.js";
import { CompatibilityEvaluator } from "./compat/evaluator.js";
import { shouldFilterKernelOptions } from "./compat/validator.js";
import { CatalogBuilder } from "./catalog/catalog.js";
import { loadVariantDefinitions } from "./catalog/loader.js";
import { autoDetectVariants } from "./catalog/detect.js";
import { CompatibilityScanner } from "./scanner/scanner.js";
import { InstallationExecutor } from "./install/installer.js";
import { SafetyGate } from "./safety/gate.js";
import { ToolRegistry, annotationsFor } from "./tools/registry.js";
import type { PluginContext } from "./tools/context.js";
import { timeoutFor } from "./types/risk.js";

// Tool module registrations
import { registerCatalogTools } from "./tools/catalog/index.js";
import { registerCompatTools } from "./tools/compat/index.js";
import { registerInstallTools } from "./tools/install/index.js";

async function main(): Promise<void> {
  logger.info("Starting zfs-kmod-mcp server");

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, firstRun } = loadConfig(process.env.ZFS_KMOD_CONFIG ?? undefined);
  logger.info({ configPath, firstRun }, "Configuration loaded");
  const timeoutCeilingMs = config.errors.command_timeout_ceiling * 1000;

  // ── Phase 2: Create command dispatch and executor ─────────────
  const commands = new ArchCommands({ useSudo: config.privilege.use_sudo });
  const executor = new LocalExecutor();

  // ── Phase 3: Version and range sources ────────────────────────
  const resolver = new PackageVersionResolver(executor, commands, {
    moduleFamilyPrefixes: config.packages.module_family_prefixes,
    binaryDbUrl: config.sources.binary_db_url,
    timeoutCeilingMs,
  });
  const ranges = new CompatibilityRangeFetcher(executor, commands, {
    apiBase: config.sources.release_api_base,
    tagPrefix: config.sources.release_tag_prefix,
    timeoutCeilingMs,
  });

  // ── Phase 4: Build kernel catalog ─────────────────────────────
  const builder = CatalogBuilder.withBuiltins();
  builder.registerDefinitions(config.catalog.variants, configPath);
  const loaded = loadVariantDefinitions(config.catalog.variant_paths);
  for (const { source, definition } of loaded.definitions) builder.registerDefinitions([definition], source);
  for (const message of loaded.errors) builder.recordError(message);
  if (config.catalog.auto_detect) await autoDetectVariants(builder, resolver);
  builder.remove(config.catalog.disabled);
  const catalog = builder.build();
  logger.info({ kernels: catalog.list().map((v) => v.name), errors: builder.loadErrors.length }, "Kernel catalog built");

  // ── Phase 5: Evaluator and scanner ────────────────────────────
  const evaluator = new CompatibilityEvaluator(resolver, ranges, config.packages);
  const scanner = new CompatibilityScanner(catalog, evaluator, {
    filteringDefault: () => shouldFilterKernelOptions(config.scanner.filter_kernels),
    refreshIndex: config.scanner.refresh_index
      ? async () => {
        const cmd = commands.syncIndex();
        const r = await executor.execute(cmd, timeoutFor("slow", timeoutCeilingMs));
        if (r.exitCode !== 0) throw new Error(r.stderr.trim() || `${cmd.argv.join(" ")} exited with ${r.exitCode}`);
      }
      : undefined,
  });

  // ── Phase 6: Installer and safety gate ────────────────────────
  const installer = new InstallationExecutor(config.packages);
  const safetyGate = new SafetyGate(config.safety);

  // ── Phase 7: Create tool registry and plugin context ──────────
  const registry = new ToolRegistry();
  const ctx: PluginContext = {
    config, packages: config.packages, catalog, catalogErrors: builder.loadErrors,
    commands, executor, resolver, ranges, evaluator, scanner, installer, safetyGate, registry,
    targetHost: hostname(), configPath, firstRun,
  };

  // ── Phase 8: Register all tool modules ────────────────────────
  registerCatalogTools(ctx);
  registerCompatTools(ctx);
  registerInstallTools(ctx);

  logger.info({ toolCount: registry.size }, "All tool modules registered");

  // ── Phase 9: Create MCP server and register tools ─────────────
  const server = new McpServer({
    name: "zfs-kmod-mcp",
    version: "0.1.0",
  });

  for (const tool of registry.list()) {
    const meta = tool.metadata;
    server.registerTool(
      meta.name,
      {
        title: meta.name,
        description: meta.description,
        inputSchema: meta.inputSchema.shape,
        annotations: annotationsFor(tool),
      },
      async (args: Record<string, unknown>) => {
        const response = await registry.execute(meta.name, args, { targetHost: ctx.targetHost });
        return {
          content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
          isError: response.status === "error",
        };
      },
    );
  }

  // ── Phase 10: Connect transport ───────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: registry.size, host: ctx.targetHost }, "zfs-kmod-mcp server running on stdio");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
