// Precompiled installs without the archzfs repository in pacman.conf. The binary
// release database names the file of every package and the zfs-utils version each
// module package was built against; the module and that exact zfs-utils are
// installed together with pacman -U. DKMS sets are handed to the fallback installer.
import type { Executor } from "../execution/executor.js";
import type { PackageIndexCommands } from "../distro/commands/interface.js";
import type { ModulePackages } from "../types/kernel.js";
import type { PackageInstaller } from "./installer.js";
import { parseDescRecords, recordFilename, dependencyPin, satisfiesPin, type DescRecord } from "../packages/binary-db.js";
import { timeoutFor } from "../types/risk.js";
import { KmodError, KmodErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface ReleaseAssetOptions {
  binaryDbUrl: string;
  packages: ModulePackages;
  /** Receives every package set that includes the DKMS package. */
  fallback: PackageInstaller;
  dryRun?: boolean;
  timeoutMs?: number;
}

export class ReleaseAssetInstaller implements PackageInstaller {
  constructor(
    private readonly executor: Executor,
    private readonly commands: PackageIndexCommands,
    private readonly options: ReleaseAssetOptions,
  ) {}

  async install(packageIds: readonly string[]): Promise<void> {
    const { packages } = this.options;
    if (packageIds.includes(packages.dkms)) return this.options.fallback.install(packageIds);

    const records = await this.loadRecords();
    const modules = packageIds.filter((id) => id !== packages.utils);
    const moduleRecords = modules.map((id) => this.requireRecord(records, id));

    const urls = moduleRecords.map((r) => this.assetUrl(r));
    if (packageIds.includes(packages.utils)) {
      const pin = moduleRecords.map((r) => dependencyPin(r, packages.utils)).find((p) => p !== null) ?? null;
      const utils = records.find((r) => r.name === packages.utils && (pin === null || satisfiesPin(r.version, pin)));
      if (!utils) {
        throw new KmodError(
          KmodErrorCode.INSTALL_FAILED,
          `Compatible ${packages.utils} package not found for version ${pin ?? "any"}`,
          { pin },
        );
      }
      urls.unshift(this.assetUrl(utils));
    }

    const cmd = this.commands.packageInstallFiles(urls, { dryRun: this.options.dryRun });
    const r = await this.executor.execute(cmd, this.options.timeoutMs ?? timeoutFor("long_running"));
    if (r.exitCode !== 0) {
      throw new KmodError(
        KmodErrorCode.INSTALL_FAILED,
        r.stderr.trim() || `${cmd.argv.join(" ")} exited with ${r.exitCode}`,
        { exitCode: r.exitCode, urls },
      );
    }
    logger.info({ urls, dryRun: this.options.dryRun ?? false }, "Release packages installed");
  }

  private async loadRecords(): Promise<DescRecord[]> {
    const cmd = this.commands.dumpBinaryDatabase(this.options.binaryDbUrl);
    const r = await this.executor.execute(cmd, timeoutFor("slow", this.options.timeoutMs));
    if (r.exitCode !== 0) {
      throw new KmodError(
        KmodErrorCode.INSTALL_FAILED,
        `Could not read binary database ${this.options.binaryDbUrl}: ${r.stderr.trim() || `exit ${r.exitCode}`}`,
        { exitCode: r.exitCode },
      );
    }
    return parseDescRecords(r.stdout);
  }

  private requireRecord(records: readonly DescRecord[], packageId: string): DescRecord {
    const record = records.find((r) => r.name === packageId);
    if (!record) {
      throw new KmodError(
        KmodErrorCode.INSTALL_FAILED,
        `Precompiled package ${packageId} not found in ${this.options.binaryDbUrl}`,
        { package: packageId },
      );
    }
    return record;
  }

  private assetUrl(record: DescRecord): string {
    const filename = recordFilename(record);
    if (!filename) {
      throw new KmodError(KmodErrorCode.INSTALL_FAILED, `No file listed for ${record.name} in the binary database`, { package: record.name });
    }
    const base = this.options.binaryDbUrl.slice(0, this.options.binaryDbUrl.lastIndexOf("/") + 1);
    return `${base}${filename}`;
  }
}
