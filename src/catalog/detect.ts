import type { VersionResolver } from "../packages/resolver.js";
import type { VariantDefinition } from "../types/config.js";
import type { CatalogBuilder } from "./catalog.js";
import { logger } from "../logger.js";

/** Kernel packages probed by auto-detection. */
export const DETECTABLE_KERNELS: readonly string[] = [
  "linux", "linux-lts", "linux-zen", "linux-hardened", "linux-rt", "linux-rt-lts",
];

/** Definition for a kernel package that follows the usual naming conventions. */
export function conventionalDefinition(kernelName: string, hasPrecompiled: boolean): VariantDefinition {
  const displayName = kernelName
    .split("-")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
  return {
    name: kernelName,
    display_name: displayName,
    kernel_package: kernelName,
    headers_package: `${kernelName}-headers`,
    precompiled_package: hasPrecompiled ? `zfs-${kernelName}` : null,
    supports_precompiled: hasPrecompiled,
    is_default: kernelName === "linux-lts",
  };
}

/**
 * Register variants for detectable kernels the package index knows about and the
 * builder does not have yet. Probes run one at a time.
 */
export async function autoDetectVariants(builder: CatalogBuilder, resolver: VersionResolver): Promise<string[]> {
  const detected: string[] = [];
  for (const kernelName of DETECTABLE_KERNELS) {
    if (builder.has(kernelName)) continue;
    if ((await resolver.resolve(kernelName)) === null) continue;

    const hasPrecompiled = (await resolver.resolve(`zfs-${kernelName}`)) !== null;
    builder.registerDefinitions([conventionalDefinition(kernelName, hasPrecompiled)], "auto-detect");
    detected.push(kernelName);
  }
  logger.info({ detected }, "Kernel auto-detection complete");
  return detected;
}

/**
 * Map a kernel release string (uname -r) to a variant name.
 * "rt-lts" is checked before "lts" and "rt" since it contains both.
 */
export function variantNameForRelease(release: string): string {
  const r = release.toLowerCase();
  if (r.includes("rt") && r.includes("lts")) return "linux-rt-lts";
  if (r.includes("lts")) return "linux-lts";
  if (r.includes("zen")) return "linux-zen";
  if (r.includes("hardened")) return "linux-hardened";
  if (/-rt\d*/.test(r) || r.endsWith("rt")) return "linux-rt";
  return "linux";
}
