import type { KernelVariant } from "../types/kernel.js";
import type { VariantDefinition } from "../types/config.js";
import { createKernelVariant, describeVariant } from "./variant.js";
import { errorMessage } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Kernels with a precompiled module in the binary release repository. */
export const BUILTIN_VARIANTS: readonly VariantDefinition[] = [
  {
    name: "linux-lts", display_name: "Linux LTS", kernel_package: "linux-lts", headers_package: "linux-lts-headers",
    precompiled_package: "zfs-linux-lts", supports_precompiled: true, is_default: true,
  },
  {
    name: "linux", display_name: "Linux", kernel_package: "linux", headers_package: "linux-headers",
    precompiled_package: "zfs-linux", supports_precompiled: true,
  },
  {
    name: "linux-zen", display_name: "Linux Zen", kernel_package: "linux-zen", headers_package: "linux-zen-headers",
    precompiled_package: "zfs-linux-zen", supports_precompiled: true,
  },
  {
    name: "linux-hardened", display_name: "Linux Hardened", kernel_package: "linux-hardened",
    headers_package: "linux-hardened-headers", precompiled_package: "zfs-linux-hardened", supports_precompiled: true,
  },
];

/**
 * Immutable set of kernel variants, built once by the composition root and
 * handed to every component that needs it.
 */
export class KernelCatalog {
  private readonly variants: ReadonlyMap<string, KernelVariant>;

  constructor(variants: Iterable<KernelVariant>) {
    const byName = new Map<string, KernelVariant>();
    for (const v of variants) byName.set(v.name, v);
    this.variants = byName;
  }

  get(name: string): KernelVariant | undefined {
    return this.variants.get(name);
  }

  has(name: string): boolean {
    return this.variants.has(name);
  }

  /** Default first, then by name. */
  list(): KernelVariant[] {
    return [...this.variants.values()].sort((a, b) => {
      if (a.isDefault !== b.isDefault) return a.isDefault ? -1 : 1;
      return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    });
  }

  precompiledVariants(): KernelVariant[] {
    return this.list().filter((v) => v.supportsPrecompiled);
  }

  defaultVariant(): KernelVariant | undefined {
    return this.list().find((v) => v.isDefault);
  }

  get size(): number {
    return this.variants.size;
  }
}

/** Collects registrations, later ones replacing earlier ones of the same name. */
export class CatalogBuilder {
  private readonly variants = new Map<string, KernelVariant>();
  private readonly errors: string[] = [];

  static withBuiltins(): CatalogBuilder {
    const builder = new CatalogBuilder();
    for (const def of BUILTIN_VARIANTS) builder.register(createKernelVariant(def));
    return builder;
  }

  register(variant: KernelVariant): this {
    if (this.variants.has(variant.name)) {
      logger.warn({ variant: variant.name }, "Overriding existing kernel variant");
    }
    this.variants.set(variant.name, variant);
    logger.debug({ variant: describeVariant(variant) }, "Registered kernel variant");
    return this;
  }

  /** Register definitions, skipping (and recording) the invalid ones. */
  registerDefinitions(definitions: readonly VariantDefinition[], source: string): this {
    for (const def of definitions) {
      try {
        this.register(createKernelVariant(def));
      } catch (err) {
        const message = `${source}: ${def.name}: ${errorMessage(err)}`;
        logger.warn({ source, variant: def.name }, message);
        this.errors.push(message);
      }
    }
    return this;
  }

  remove(names: readonly string[]): this {
    for (const name of names) this.variants.delete(name);
    return this;
  }

  has(name: string): boolean {
    return this.variants.has(name);
  }

  recordError(message: string): void {
    this.errors.push(message);
  }

  get loadErrors(): readonly string[] {
    return this.errors;
  }

  build(): KernelCatalog {
    return new KernelCatalog(this.variants.values());
  }
}
