// Installation executor: walks a fallback plan strictly in order and stops at the
// first attempt the installer collaborator accepts. Attempts are never run
// concurrently or reordered; a failed attempt may leave partial state (a resynced
// index, repository configuration) that the next one builds on, and nothing is rolled back.
import type { Executor } from "../execution/executor.js";
import type { PackageIndexCommands } from "../distro/commands/interface.js";
import type { AttemptRecord, InstallationResult, KernelVariant, ModuleMode, ModulePackages } from "../types/kernel.js";
import { timeoutFor } from "../types/risk.js";
import { planInstallation, packageSet } from "./planner.js";
import { KmodError, KmodErrorCode, errorMessage } from "../shared/errors.js";
import { logger } from "../logger.js";

/** The only privileged side effect of the core: install a package set or throw. */
export interface PackageInstaller {
  install(packageIds: readonly string[]): Promise<void>;
}

export class InstallationExecutor {
  constructor(private readonly packages: ModulePackages) {}

  async install(variant: KernelVariant, preferred: ModuleMode, installer: PackageInstaller): Promise<InstallationResult> {
    const result: InstallationResult = {
      variant,
      requestedMode: preferred,
      actualMode: null,
      success: false,
      fallbackOccurred: false,
      installedPackages: [],
      errors: [],
      attempts: [],
    };

    const plan = planInstallation(variant, preferred);
    logger.info(
      { kernel: variant.name, preferred, chain: plan.map((a) => a.mode) },
      `Installing ZFS for ${variant.displayName}`,
    );

    for (const [index, attempt] of plan.entries()) {
      logger.info({ attempt: index + 1, kernel: attempt.variant.name, mode: attempt.mode }, "Installation attempt");
      const record = await this.runAttempt(attempt.variant, attempt.mode, installer);
      result.attempts.push(record);

      if (record.succeeded) {
        result.success = true;
        result.actualMode = attempt.mode;
        result.fallbackOccurred = attempt.mode !== preferred;
        result.installedPackages = record.packages;
        result.errors = [];
        if (result.fallbackOccurred) logger.info({ from: preferred, to: attempt.mode }, "Fallback successful");
        return result;
      }

      result.errors = record.error ? [record.error] : [];
      logger.warn({ attempt: index + 1, mode: attempt.mode, error: record.error }, "Installation attempt failed");
    }

    logger.error({ kernel: variant.name }, "All ZFS installation attempts failed");
    return result;
  }

  private async runAttempt(variant: KernelVariant, mode: ModuleMode, installer: PackageInstaller): Promise<AttemptRecord> {
    let packages: string[] = [];
    try {
      packages = packageSet(variant, mode, this.packages);
      await installer.install(packages);
      return { mode, packages, succeeded: true, error: null };
    } catch (err) {
      const label = mode === "precompiled" ? "Precompiled" : "DKMS";
      return { mode, packages, succeeded: false, error: `${label} installation failed: ${errorMessage(err)}` };
    }
  }
}

/** Summary line for reporting a finished installation. */
export function summarizeInstallation(result: InstallationResult): string {
  if (!result.success) {
    const errors = result.errors.length > 0 ? result.errors.join("; ") : "Unknown error";
    return `Installation failed for ${result.variant.name}: ${errors}`;
  }
  const fallback = result.fallbackOccurred ? " (after fallback)" : "";
  return `Successfully installed ZFS ${result.actualMode ?? "unknown"} for ${result.variant.name}${fallback} - Packages: ${result.installedPackages.join(", ")}`;
}

/** Installer collaborator backed by the host package manager. */
export class PacmanInstaller implements PackageInstaller {
  constructor(
    private readonly executor: Executor,
    private readonly commands: PackageIndexCommands,
    private readonly options: { dryRun?: boolean; timeoutMs?: number } = {},
  ) {}

  async install(packageIds: readonly string[]): Promise<void> {
    const cmd = this.commands.packageInstall(packageIds, { dryRun: this.options.dryRun });
    const r = await this.executor.execute(cmd, this.options.timeoutMs ?? timeoutFor("long_running"));
    if (r.exitCode !== 0) {
      throw new KmodError(
        KmodErrorCode.INSTALL_FAILED,
        r.stderr.trim() || `${cmd.argv.join(" ")} exited with ${r.exitCode}`,
        { exitCode: r.exitCode, packages: [...packageIds] },
      );
    }
    logger.info({ packages: packageIds, dryRun: this.options.dryRun ?? false }, "Packages installed");
  }
}
