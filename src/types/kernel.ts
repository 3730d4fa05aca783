/** How the ZFS kernel module reaches the target system, in fallback order. */
export const MODULE_MODES = ["precompiled", "dkms"] as const;
export type ModuleMode = (typeof MODULE_MODES)[number];

/**
 * A named kernel flavour and the packages that go with it.
 * Instances come from createKernelVariant() and are frozen.
 */
export interface KernelVariant {
  readonly name: string;
  readonly displayName: string;
  readonly kernelPackage: string;
  readonly headersPackage: string;
  readonly precompiledPackage: string | null;
  readonly supportsPrecompiled: boolean;
  readonly isDefault: boolean;
}

/**
 * Normalized kernel version used for range checks only.
 * The patch slot is always 0: any patch level inside a major.minor band is in range.
 */
export type Version = readonly [major: number, minor: number, patch: 0];

/** Inclusive kernel band declared by a module release, as written upstream. */
export interface CompatibilityRange {
  readonly min: string;
  readonly max: string;
}

/** Whether unresolved data reads as compatible (open) or incompatible (closed). */
export type FailurePolicy = "fail-open" | "fail-closed";

/**
 * Why a check did not come out clean.
 * lookup_failure and range_unavailable mean the answer is unknown;
 * the rest mean data was resolved and says no.
 */
export type FailureCause =
  | "lookup_failure"
  | "range_unavailable"
  | "malformed_version"
  | "version_mismatch"
  | "out_of_range"
  | "unsupported";

export interface CompatibilityWarning {
  readonly cause: FailureCause;
  readonly message: string;
}

export interface CompatibilityVerdict {
  readonly compatible: boolean;
  readonly warnings: string[];
  /** Cause of the first warning, null when the check came out clean. */
  readonly cause: FailureCause | null;
}

/** Scanner cache entry for one kernel. */
export interface CompatibilityResult {
  readonly kernelName: string;
  readonly variant: KernelVariant;
  readonly dkms: CompatibilityVerdict;
  readonly precompiled: CompatibilityVerdict;
}

/** One step of a fallback chain. The variant is the one that was requested. */
export interface InstallAttempt {
  readonly variant: KernelVariant;
  readonly mode: ModuleMode;
}

export interface AttemptRecord {
  readonly mode: ModuleMode;
  readonly packages: string[];
  readonly succeeded: boolean;
  readonly error: string | null;
}

export interface InstallationResult {
  readonly variant: KernelVariant;
  readonly requestedMode: ModuleMode;
  actualMode: ModuleMode | null;
  success: boolean;
  fallbackOccurred: boolean;
  installedPackages: string[];
  /** Errors of the last attempt made. */
  errors: string[];
  attempts: AttemptRecord[];
}

/** Package names shared by every variant. */
export interface ModulePackages {
  readonly utils: string;
  readonly dkms: string;
}
