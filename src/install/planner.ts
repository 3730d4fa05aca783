// Fallback planning. The requested kernel variant is never substituted: only the
// module mode may fall back, from precompiled to DKMS. Plans are computed offline
// from the KernelVariant alone.
import type { InstallAttempt, KernelVariant, ModuleMode, ModulePackages } from "../types/kernel.js";
import { KmodError, KmodErrorCode } from "../shared/errors.js";

export function shouldAttemptPrecompiled(variant: KernelVariant, requested: ModuleMode): boolean {
  return requested === "precompiled" && variant.supportsPrecompiled && variant.precompiledPackage !== null;
}

export function planInstallation(variant: KernelVariant, preferred: ModuleMode): InstallAttempt[] {
  if (shouldAttemptPrecompiled(variant, preferred)) {
    return [{ variant, mode: "precompiled" }, { variant, mode: "dkms" }];
  }
  return [{ variant, mode: "dkms" }];
}

export function recommendedMode(variant: KernelVariant): ModuleMode {
  return variant.supportsPrecompiled ? "precompiled" : "dkms";
}

/**
 * Packages for one attempt, first-seen order, duplicates dropped.
 * Throws KmodError(PRECOMPILED_UNSUPPORTED) for a precompiled set on a variant without one.
 */
export function packageSet(variant: KernelVariant, mode: ModuleMode, packages: ModulePackages): string[] {
  if (mode === "precompiled") {
    if (!variant.supportsPrecompiled || !variant.precompiledPackage) {
      throw new KmodError(
        KmodErrorCode.PRECOMPILED_UNSUPPORTED,
        `Kernel variant ${variant.name} does not support precompiled ZFS`,
        { variant: variant.name },
      );
    }
    return dedupe([packages.utils, variant.precompiledPackage]);
  }
  return dedupe([packages.utils, packages.dkms, variant.headersPackage]);
}

function dedupe(items: readonly string[]): string[] {
  return [...new Set(items)];
}

/** Human-readable plan, one line per attempt. */
export function describePlan(variant: KernelVariant, preferred: ModuleMode, packages: ModulePackages): string {
  const lines = [`Installation plan for ${variant.displayName}:`, `Requested mode: ${preferred}`];
  planInstallation(variant, preferred).forEach((attempt, index) => {
    const role = index === 0 ? "Primary" : "Fallback";
    lines.push(`  ${role}: ${attempt.mode} - ${packageSet(attempt.variant, attempt.mode, packages).join(", ")}`);
  });
  return lines.join("\n");
}

/**
 * Problems that would make the plan fail or differ from the request.
 * availability is asked about each DKMS package; all of them must exist for the
 * final fallback to have a chance.
 */
export async function checkPlanFeasibility(
  variant: KernelVariant,
  preferred: ModuleMode,
  packages: ModulePackages,
  isAvailable: (pkg: string) => Promise<boolean>,
): Promise<string[]> {
  const problems: string[] = [];
  if (preferred === "precompiled" && !variant.supportsPrecompiled) {
    problems.push(`Kernel ${variant.name} does not support precompiled ZFS modules. DKMS will be used instead.`);
  }

  const dkmsPackages = packageSet(variant, "dkms", packages);
  const missing: string[] = [];
  for (const pkg of dkmsPackages) {
    if (!(await isAvailable(pkg))) missing.push(pkg);
  }
  if (missing.length > 0) problems.push(`Required DKMS packages not available: ${missing.join(", ")}`);
  return problems;
}
