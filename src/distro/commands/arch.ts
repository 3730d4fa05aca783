import type { Command } from "../../types/command.js";
import type { PackageIndexCommands } from "./interface.js";
import { shellQuote } from "../../execution/executor.js";

/** pacman-based command implementations. */
export class ArchCommands implements PackageIndexCommands {
  private readonly privileged: string[];

  constructor(options: { useSudo: boolean }) {
    this.privileged = options.useSudo ? ["sudo", "pacman"] : ["pacman"];
  }

  packageInfo(pkg: string): Command {
    // -Si reads the sync database and needs no root
    return { argv: ["pacman", "-Si", pkg], env: { LC_ALL: "C" } };
  }

  packageInstall(packages: readonly string[], options?: { dryRun?: boolean }): Command {
    const argv = [...this.privileged, "-S", "--needed", "--noconfirm"];
    if (options?.dryRun) argv.push("--print");
    argv.push(...packages);
    return { argv, env: { LC_ALL: "C" } };
  }

  packageInstallFiles(urls: readonly string[], options?: { dryRun?: boolean }): Command {
    const argv = [...this.privileged, "-U", "--needed", "--noconfirm"];
    if (options?.dryRun) argv.push("--print");
    argv.push(...urls);
    return { argv, env: { LC_ALL: "C" } };
  }

  syncIndex(): Command {
    return { argv: [...this.privileged, "-Sy", "--noconfirm"], env: { LC_ALL: "C" } };
  }

  dumpBinaryDatabase(url: string): Command {
    const script = `set -o pipefail; curl -sfL ${shellQuote(url)} | tar -xJO --wildcards '*/desc'`;
    return { argv: ["bash", "-c", script] };
  }

  fetchJson(url: string, accept: string): Command {
    return { argv: ["curl", "-sL", "-H", `Accept: ${accept}`, url] };
  }

  kernelRelease(): Command {
    return { argv: ["uname", "-r"] };
  }
}
