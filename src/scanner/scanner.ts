// Kernel compatibility scanner: evaluates every catalog variant in both modes before
// options are presented, and caches the results.
//
// The scanner is the fail-open caller of the evaluator. A check that failed because a
// version or range could not be determined is shown as available with a downgraded
// warning, since a flaky or unconfigured package index must not hide every option.
// A check that resolved and found a real mismatch stays filtered.
//
// Each scan builds a fresh result map and swaps it in; nothing from a previous scan survives.
import type {
  CompatibilityResult,
  CompatibilityVerdict,
  KernelVariant,
  ModuleMode,
} from "../types/kernel.js";
import type { KernelCatalog } from "../catalog/catalog.js";
import type { CompatibilityEvaluator } from "../compat/evaluator.js";
import { shouldAttemptPrecompiled } from "../install/planner.js";
import { errorMessage } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface MenuOption {
  readonly label: string;
  readonly kernelName: string;
  readonly mode: ModuleMode;
}

export interface MenuOptions {
  options: MenuOption[];
  /** Display labels of kernels whose DKMS option was filtered out. */
  filtered: string[];
}

export interface ScanSummary {
  filtering: boolean;
  totalKernels: number;
  dkmsCompatible: number;
  precompiledCompatible: number;
  totalOptions: number;
}

export interface ScannerOptions {
  /** Read at the start of each scan that is not given an explicit filtering flag. */
  filteringDefault: () => boolean;
  /** Optional package-index resync before scanning; failures are only logged. */
  refreshIndex?: () => Promise<void>;
}

const NO_PRECOMPILED: CompatibilityVerdict = {
  compatible: false,
  warnings: ["No precompiled package available"],
  cause: "unsupported",
};

const UNCHECKED: CompatibilityVerdict = { compatible: true, warnings: [], cause: null };

export class CompatibilityScanner {
  private results = new Map<string, CompatibilityResult>();
  private filtering = true;
  private scanned = false;

  constructor(
    private readonly catalog: KernelCatalog,
    private readonly evaluator: CompatibilityEvaluator,
    private readonly options: ScannerOptions,
  ) {}

  get hasScanned(): boolean {
    return this.scanned;
  }

  get filteringEnabled(): boolean {
    return this.filtering;
  }

  async scan(options: { filtering?: boolean } = {}): Promise<ScanSummary> {
    const filtering = options.filtering ?? this.options.filteringDefault();
    logger.info({ filtering }, "Scanning kernel compatibility for ZFS");
    if (!filtering) logger.info("Compatibility filtering disabled, all options will be shown");

    if (this.options.refreshIndex) {
      try {
        await this.options.refreshIndex();
      } catch (err) {
        logger.warn({ error: errorMessage(err) }, "Failed to refresh package index; version detection may be unreliable");
      }
    }

    const next = new Map<string, CompatibilityResult>();
    for (const variant of this.catalog.list()) {
      const result = await this.scanVariant(variant, filtering);
      next.set(variant.name, result);
      const modes = [
        result.precompiled.compatible ? "precompiled" : null,
        result.dkms.compatible ? "dkms" : null,
      ].filter((m): m is ModuleMode => m !== null);
      logger.info({ kernel: variant.name, modes }, modes.length > 0 ? "Kernel has compatible ZFS options" : "Kernel has no compatible ZFS options");
    }

    this.results = next;
    this.filtering = filtering;
    this.scanned = true;

    const summary = this.summarize();
    logger.info(summary, "Compatibility scan complete");
    if (filtering && summary.totalOptions === 0) {
      logger.warn("No compatible kernel options found; set ZFS_KMOD_FILTER_KERNELS=false to show all options");
    }
    return summary;
  }

  /** Presentation-ready options from the cache, scanning first if nothing has been scanned. */
  async menuOptions(): Promise<MenuOptions> {
    if (!this.scanned) {
      logger.warn("Compatibility not scanned yet, performing scan now");
      await this.scan();
    }
    const menu = renderMenuOptions(this.catalog.list(), this.results, this.filtering);
    logger.info({ options: menu.options.length, filtered: menu.filtered.length }, "Generated menu options");
    return menu;
  }

  result(kernelName: string): CompatibilityResult | undefined {
    return this.results.get(kernelName);
  }

  allResults(): CompatibilityResult[] {
    return [...this.results.values()];
  }

  isCompatible(kernelName: string, mode: ModuleMode): boolean {
    const result = this.results.get(kernelName);
    if (!result) return false;
    if (mode === "precompiled" && !shouldAttemptPrecompiled(result.variant, mode)) return false;
    if (!this.filtering) return true;
    return mode === "dkms" ? result.dkms.compatible : result.precompiled.compatible;
  }

  private async scanVariant(variant: KernelVariant, filtering: boolean): Promise<CompatibilityResult> {
    const hasPrecompiled = shouldAttemptPrecompiled(variant, "precompiled");
    if (!filtering) {
      return { kernelName: variant.name, variant, dkms: UNCHECKED, precompiled: hasPrecompiled ? UNCHECKED : NO_PRECOMPILED };
    }

    const dkms = await this.evaluateOpen(variant, "dkms");
    const precompiled = hasPrecompiled ? await this.evaluateOpen(variant, "precompiled") : NO_PRECOMPILED;
    return { kernelName: variant.name, variant, dkms, precompiled };
  }

  private async evaluateOpen(variant: KernelVariant, mode: ModuleMode): Promise<CompatibilityVerdict> {
    try {
      return await this.evaluator.evaluate(variant, mode, "fail-open");
    } catch (err) {
      logger.warn({ kernel: variant.name, mode, error: errorMessage(err) }, "Compatibility evaluation threw");
      return { compatible: true, warnings: [`Validation error: ${errorMessage(err)} - assuming compatible`], cause: "lookup_failure" };
    }
  }

  private summarize(): ScanSummary {
    const results = [...this.results.values()];
    const optionCount = renderMenuOptions(this.catalog.list(), this.results, this.filtering).options.length;
    return {
      filtering: this.filtering,
      totalKernels: results.length,
      dkmsCompatible: results.filter((r) => r.dkms.compatible).length,
      precompiledCompatible: results.filter((r) => r.precompiled.compatible).length,
      totalOptions: optionCount,
    };
  }
}

/**
 * Options in catalog order; per kernel the precompiled option comes first.
 * With filtering off every option the planner would attempt is offered.
 */
export function renderMenuOptions(
  variants: readonly KernelVariant[],
  results: ReadonlyMap<string, CompatibilityResult>,
  filtering: boolean,
): MenuOptions {
  const menu: MenuOptions = { options: [], filtered: [] };
  for (const variant of variants) {
    const result = results.get(variant.name);
    if (!result) continue;

    if (shouldAttemptPrecompiled(variant, "precompiled") && (result.precompiled.compatible || !filtering)) {
      const recommended = variant.isDefault ? " (recommended)" : "";
      menu.options.push({ label: `${variant.displayName} + precompiled ZFS${recommended}`, kernelName: variant.name, mode: "precompiled" });
    }
    if (result.dkms.compatible || !filtering) {
      menu.options.push({ label: `${variant.displayName} + ZFS DKMS`, kernelName: variant.name, mode: "dkms" });
    }
    if (filtering && !result.dkms.compatible) menu.filtered.push(variant.displayName);
  }
  return menu;
}
