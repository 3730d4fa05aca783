import type { KernelCatalog } from "../catalog/catalog.js";
import type { ModuleMode } from "../types/kernel.js";
import { variantNameForRelease } from "../catalog/detect.js";
import { recommendedMode } from "./planner.js";

export interface Recommendation {
  kernelName: string;
  mode: ModuleMode;
  reason: "running-kernel" | "catalog-default" | "fallback";
}

/**
 * Kernel and mode to suggest: the running kernel's flavour when the catalog has it,
 * then the catalog default, then linux-lts with precompiled modules.
 */
export function recommendConfiguration(catalog: KernelCatalog, kernelRelease: string | null): Recommendation {
  if (kernelRelease) {
    const running = catalog.get(variantNameForRelease(kernelRelease));
    if (running) return { kernelName: running.name, mode: recommendedMode(running), reason: "running-kernel" };
  }
  const fallback = catalog.defaultVariant();
  if (fallback) return { kernelName: fallback.name, mode: recommendedMode(fallback), reason: "catalog-default" };
  return { kernelName: "linux-lts", mode: "precompiled", reason: "fallback" };
}
