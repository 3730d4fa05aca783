import type { PluginConfig } from "../types/config.js";
import type { ModulePackages } from "../types/kernel.js";
import type { PackageIndexCommands } from "../distro/commands/interface.js";
import type { Executor } from "../execution/executor.js";
import type { KernelCatalog } from "../catalog/catalog.js";
import type { VersionResolver } from "../packages/resolver.js";
import type { RangeSource } from "../compat/range-fetcher.js";
import type { CompatibilityEvaluator } from "../compat/evaluator.js";
import type { CompatibilityScanner } from "../scanner/scanner.js";
import type { InstallationExecutor } from "../install/installer.js";
import type { SafetyGate } from "../safety/gate.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Shared plugin context: the glue between all components.
 * Created once at startup by server.ts, passed to all tool modules.
 */
export interface PluginContext {
  readonly config: PluginConfig;
  readonly packages: ModulePackages;
  readonly catalog: KernelCatalog;
  readonly catalogErrors: readonly string[];
  readonly commands: PackageIndexCommands;
  readonly executor: Executor;
  readonly resolver: VersionResolver;
  readonly ranges: RangeSource;
  readonly evaluator: CompatibilityEvaluator;
  readonly scanner: CompatibilityScanner;
  readonly installer: InstallationExecutor;
  readonly safetyGate: SafetyGate;
  readonly registry: ToolRegistry;
  readonly targetHost: string;
  readonly configPath: string;
  readonly firstRun: boolean;
}
