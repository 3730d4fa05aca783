// Package version lookup against the system package index, with a second source
// for the module family: the binary release database, which carries those packages
// even when their repository is not configured on this machine.
// Every failure (non-zero exit, missing Version line, broken download) ends in null.
// Nothing is cached here; the scanner is the only cache.
import type { Executor } from "../execution/executor.js";
import type { PackageIndexCommands } from "../distro/commands/interface.js";
import { timeoutFor } from "../types/risk.js";
import { findPackageVersion } from "./binary-db.js";
import { errorMessage } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface VersionResolver {
  resolve(packageId: string): Promise<string | null>;
}

export interface PackageVersionResolverOptions {
  /** Name prefixes that mark a package as part of the module family. */
  moduleFamilyPrefixes: readonly string[];
  binaryDbUrl: string;
  /** Upper bound applied to every command timeout, in ms. 0 = none. */
  timeoutCeilingMs?: number;
}

const VERSION_LINE = /^Version\s*:\s*(.+)$/m;

export class PackageVersionResolver implements VersionResolver {
  constructor(
    private readonly executor: Executor,
    private readonly commands: PackageIndexCommands,
    private readonly options: PackageVersionResolverOptions,
  ) {}

  async resolve(packageId: string): Promise<string | null> {
    const primary = await this.queryIndex(packageId);
    if (primary !== null) return primary;
    if (!this.isModuleFamily(packageId)) return null;

    logger.debug({ packageId }, "Trying binary release database fallback");
    return this.queryBinaryDatabase(packageId);
  }

  isModuleFamily(packageId: string): boolean {
    return this.options.moduleFamilyPrefixes.some((prefix) => packageId.startsWith(prefix));
  }

  private async queryIndex(packageId: string): Promise<string | null> {
    try {
      const r = await this.executor.execute(this.commands.packageInfo(packageId), timeoutFor("quick", this.options.timeoutCeilingMs));
      if (r.exitCode !== 0) {
        logger.debug({ packageId, exitCode: r.exitCode }, "Package index query failed");
        return null;
      }
      const version = VERSION_LINE.exec(r.stdout)?.[1]?.trim();
      if (!version) {
        logger.debug({ packageId }, "No Version line in package index output");
        return null;
      }
      logger.debug({ packageId, version }, "Resolved package version");
      return version;
    } catch (err) {
      logger.debug({ packageId, error: errorMessage(err) }, "Package index query threw");
      return null;
    }
  }

  private async queryBinaryDatabase(packageId: string): Promise<string | null> {
    try {
      const cmd = this.commands.dumpBinaryDatabase(this.options.binaryDbUrl);
      const r = await this.executor.execute(cmd, timeoutFor("slow", this.options.timeoutCeilingMs));
      if (r.exitCode !== 0) {
        logger.debug({ packageId, exitCode: r.exitCode, stderr: r.stderr.trim() }, "Binary database download failed");
        return null;
      }
      const version = findPackageVersion(r.stdout, packageId);
      if (version === null) logger.debug({ packageId }, "Package not found in binary database");
      else logger.debug({ packageId, version }, "Resolved package version from binary database");
      return version;
    } catch (err) {
      logger.debug({ packageId, error: errorMessage(err) }, "Binary database lookup threw");
      return null;
    }
  }
}
