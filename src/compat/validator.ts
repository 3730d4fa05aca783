// Fail-closed entry points used to gate real installs and builds.
// A DKMS build against an unsupported kernel fails late and expensively, so anything
// the evaluator cannot resolve counts as incompatible here. The scanner makes the
// opposite call for menu options; see scanner/scanner.ts.
import type { CompatibilityVerdict, KernelVariant, ModuleMode } from "../types/kernel.js";
import type { CompatibilityEvaluator } from "./evaluator.js";
import { logger } from "../logger.js";

export function validateForBuild(
  evaluator: CompatibilityEvaluator,
  variant: KernelVariant,
  mode: ModuleMode,
): Promise<CompatibilityVerdict> {
  return evaluator.evaluate(variant, mode, "fail-closed");
}

export interface KernelPartition {
  compatible: string[];
  incompatible: string[];
  warnings: Record<string, string[]>;
}

/** Split kernels by DKMS compatibility. Checked one after another, never in parallel. */
export async function partitionKernels(
  evaluator: CompatibilityEvaluator,
  variants: readonly KernelVariant[],
): Promise<KernelPartition> {
  const partition: KernelPartition = { compatible: [], incompatible: [], warnings: {} };
  for (const variant of variants) {
    const verdict = await validateForBuild(evaluator, variant, "dkms");
    (verdict.compatible ? partition.compatible : partition.incompatible).push(variant.name);
    if (verdict.warnings.length > 0) partition.warnings[variant.name] = verdict.warnings;
  }
  logger.debug({ compatible: partition.compatible, incompatible: partition.incompatible }, "Kernel partition computed");
  return partition;
}

const FILTER_OFF_VALUES = new Set(["0", "false", "no", "off", "disable"]);

export const FILTER_ENV_VAR = "ZFS_KMOD_FILTER_KERNELS";

/**
 * Whether kernel options should be filtered by compatibility.
 * The environment switch can only turn filtering off; otherwise the configured default applies.
 */
export function shouldFilterKernelOptions(configured = true, env: NodeJS.ProcessEnv = process.env): boolean {
  const value = (env[FILTER_ENV_VAR] ?? "").trim().toLowerCase();
  if (FILTER_OFF_VALUES.has(value)) {
    logger.debug("Kernel filtering disabled via environment variable");
    return false;
  }
  return configured;
}
