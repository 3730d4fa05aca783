// Compatibility evaluator: the two policies that decide whether a module build fits a kernel.
//
// Precompiled (exact match): the precompiled package version is
// "{module_version}_{built_against_kernel_version}", and the kernel package version
// must equal the part after the first "_" character for character, revision included.
//
// DKMS (range match): the module's kernel range comes from upstream release notes;
// the kernel version is normalized to major.minor.0 and tested against [min, max].
//
// Both checks first produce an Assessment where "compatible: null" means required
// data could not be resolved. applyPolicy() then turns that into a boolean:
// fail-closed (build gating) reads it as incompatible, fail-open (menu scanning)
// reads it as compatible and suffixes the warning with "assuming compatible".
// A resolved mismatch stays incompatible under both policies.
import type {
  CompatibilityVerdict,
  CompatibilityWarning,
  FailureCause,
  FailurePolicy,
  KernelVariant,
  ModuleMode,
  ModulePackages,
} from "../types/kernel.js";
import type { VersionResolver } from "../packages/resolver.js";
import type { RangeSource } from "./range-fetcher.js";
import { isWithinRange } from "../version/normalizer.js";
import { logger } from "../logger.js";

export interface Assessment {
  /** null when a required version or range could not be determined. */
  readonly compatible: boolean | null;
  readonly warnings: CompatibilityWarning[];
}

const UNRESOLVED_CAUSES: ReadonlySet<FailureCause> = new Set(["lookup_failure", "range_unavailable"]);

export function isUnresolvedCause(cause: FailureCause): boolean {
  return UNRESOLVED_CAUSES.has(cause);
}

export function applyPolicy(assessment: Assessment, policy: FailurePolicy): CompatibilityVerdict {
  const cause = assessment.warnings[0]?.cause ?? null;
  const messages = assessment.warnings.map((w) => w.message);

  if (assessment.compatible !== null) {
    return { compatible: assessment.compatible, warnings: messages, cause };
  }
  if (policy === "fail-closed") {
    return { compatible: false, warnings: messages, cause };
  }
  return {
    compatible: true,
    warnings: assessment.warnings.map((w) =>
      isUnresolvedCause(w.cause) ? `${w.message} - assuming compatible` : w.message,
    ),
    cause,
  };
}

export class CompatibilityEvaluator {
  constructor(
    private readonly resolver: VersionResolver,
    private readonly ranges: RangeSource,
    private readonly packages: Pick<ModulePackages, "dkms">,
  ) {}

  async evaluate(variant: KernelVariant, mode: ModuleMode, policy: FailurePolicy): Promise<CompatibilityVerdict> {
    const assessment = mode === "precompiled"
      ? await this.assessPrecompiled(variant)
      : await this.assessDkms(variant);
    const verdict = applyPolicy(assessment, policy);

    for (const warning of verdict.warnings) logger.warn({ kernel: variant.name, mode, policy }, warning);
    logger.debug({ kernel: variant.name, mode, policy, compatible: verdict.compatible }, "Compatibility evaluated");
    return verdict;
  }

  evaluatePrecompiled(variant: KernelVariant, policy: FailurePolicy): Promise<CompatibilityVerdict> {
    return this.evaluate(variant, "precompiled", policy);
  }

  evaluateDkms(variant: KernelVariant, policy: FailurePolicy): Promise<CompatibilityVerdict> {
    return this.evaluate(variant, "dkms", policy);
  }

  async assessPrecompiled(variant: KernelVariant): Promise<Assessment> {
    const pkg = variant.precompiledPackage;
    if (!variant.supportsPrecompiled || !pkg) {
      return incompatible("unsupported", `No precompiled package available for ${variant.name}`);
    }

    const kernelVersion = await this.resolver.resolve(variant.kernelPackage);
    const moduleVersion = await this.resolver.resolve(pkg);

    const missing: CompatibilityWarning[] = [];
    if (!kernelVersion) {
      missing.push({ cause: "lookup_failure", message: `Could not determine ${variant.kernelPackage} version` });
    }
    if (!moduleVersion) {
      missing.push({
        cause: "lookup_failure",
        message: `Could not determine ${pkg} version - precompiled package may not be available`,
      });
    }
    if (!kernelVersion || !moduleVersion) return { compatible: null, warnings: missing };

    const separator = moduleVersion.indexOf("_");
    const builtAgainst = separator >= 0 ? moduleVersion.slice(separator + 1) : "";
    if (!builtAgainst) {
      return incompatible("malformed_version", `Unexpected ${pkg} version format: ${moduleVersion}`);
    }

    if (kernelVersion === builtAgainst) return { compatible: true, warnings: [] };
    return incompatible(
      "version_mismatch",
      `Kernel ${variant.name} (${kernelVersion}) does not match precompiled ZFS (requires exactly ${builtAgainst})`,
    );
  }

  async assessDkms(variant: KernelVariant): Promise<Assessment> {
    const moduleVersion = await this.resolver.resolve(this.packages.dkms);
    const kernelVersion = await this.resolver.resolve(variant.kernelPackage);
    const range = moduleVersion ? await this.ranges.fetchRange(moduleVersion) : null;

    const missing: CompatibilityWarning[] = [];
    if (!moduleVersion) {
      missing.push({
        cause: "lookup_failure",
        message: `Could not determine ${this.packages.dkms} version - ZFS repository may not be configured or package unavailable`,
      });
    }
    if (!kernelVersion) {
      missing.push({
        cause: "lookup_failure",
        message: `Could not determine ${variant.kernelPackage} version - package repository issue`,
      });
    }
    if (moduleVersion && !range) {
      missing.push({
        cause: "range_unavailable",
        message: `Could not fetch ZFS kernel compatibility data for ${moduleVersion} - network or API issue`,
      });
    }
    if (!moduleVersion || !kernelVersion || !range) return { compatible: null, warnings: missing };

    if (isWithinRange(kernelVersion, range.min, range.max)) return { compatible: true, warnings: [] };

    const kernelBase = kernelVersion.split("-", 1)[0] ?? kernelVersion;
    return incompatible(
      "out_of_range",
      `Kernel ${variant.name} (${kernelBase}) is outside the supported range for ZFS DKMS (${range.min} - ${range.max})`,
    );
  }
}

function incompatible(cause: FailureCause, message: string): Assessment {
  return { compatible: false, warnings: [{ cause, message }] };
}
