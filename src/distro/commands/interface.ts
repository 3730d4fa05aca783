import type { Command } from "../../types/command.js";

/**
 * Package-manager command dispatch.
 * Core components call these methods to express intent;
 * implementations translate to concrete package-manager commands.
 */
export interface PackageIndexCommands {
  /** Query the sync database for one package; stdout carries a "Version : x" line. */
  packageInfo(pkg: string): Command;
  /** Install packages in one transaction. dryRun prints the targets without installing. */
  packageInstall(packages: readonly string[], options?: { dryRun?: boolean }): Command;
  /** Install package files by URL in one transaction; dryRun as for packageInstall. */
  packageInstallFiles(urls: readonly string[], options?: { dryRun?: boolean }): Command;
  /** Resync the package index. */
  syncIndex(): Command;
  /**
   * Download an xz-compressed repository database and print every desc file it holds,
   * concatenated, on stdout.
   */
  dumpBinaryDatabase(url: string): Command;
  /** HTTPS GET of a JSON document. */
  fetchJson(url: string, accept: string): Command;
  /** Kernel release string of the running system. */
  kernelRelease(): Command;
}
