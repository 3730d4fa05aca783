import type { KernelVariant } from "../types/kernel.js";
import type { VariantDefinition } from "../types/config.js";
import { KmodError, KmodErrorCode } from "../shared/errors.js";

/**
 * Build a frozen KernelVariant from its definition.
 * Throws KmodError(INVALID_VARIANT) for empty identity fields, or when the
 * variant claims precompiled support without naming the precompiled package.
 */
export function createKernelVariant(def: VariantDefinition): KernelVariant {
  const required: Array<[string, string]> = [
    ["name", def.name],
    ["display_name", def.display_name],
    ["kernel_package", def.kernel_package],
    ["headers_package", def.headers_package],
  ];
  for (const [field, value] of required) {
    if (!value.trim()) {
      throw new KmodError(KmodErrorCode.INVALID_VARIANT, `Kernel variant ${field} cannot be empty`, { variant: def.name });
    }
  }

  const precompiledPackage = def.precompiled_package ?? null;
  const supportsPrecompiled = def.supports_precompiled ?? precompiledPackage !== null;
  if (supportsPrecompiled && !precompiledPackage) {
    throw new KmodError(
      KmodErrorCode.INVALID_VARIANT,
      `Kernel variant ${def.name} claims to support precompiled ZFS but no precompiled package is specified`,
      { variant: def.name },
    );
  }

  return Object.freeze({
    name: def.name,
    displayName: def.display_name,
    kernelPackage: def.kernel_package,
    headersPackage: def.headers_package,
    precompiledPackage,
    supportsPrecompiled,
    isDefault: def.is_default ?? false,
  });
}

export function toDefinition(variant: KernelVariant): VariantDefinition {
  return {
    name: variant.name,
    display_name: variant.displayName,
    kernel_package: variant.kernelPackage,
    headers_package: variant.headersPackage,
    precompiled_package: variant.precompiledPackage,
    supports_precompiled: variant.supportsPrecompiled,
    is_default: variant.isDefault,
  };
}

/** One-line description for logs. */
export function describeVariant(variant: KernelVariant): string {
  const precompiled = variant.supportsPrecompiled ? "yes" : "no";
  const isDefault = variant.isDefault ? " (default)" : "";
  return `${variant.displayName} [${variant.name}] - Precompiled: ${precompiled}${isDefault}`;
}
