// Kernel range lookup from upstream release notes.
// The release tag is derived from the module version, the release is fetched once
// from the metadata service, and the free-text body is run through RANGE_MATCHERS.
import { z } from "zod";
import type { Executor } from "../execution/executor.js";
import type { PackageIndexCommands } from "../distro/commands/interface.js";
import type { CompatibilityRange } from "../types/kernel.js";
import { timeoutFor } from "../types/risk.js";
import { errorMessage } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface RangeSource {
  fetchRange(moduleVersion: string): Promise<CompatibilityRange | null>;
}

export interface RangeMatcher {
  readonly name: string;
  readonly pattern: RegExp;
}

/**
 * Ordered, first match wins. Each entry is broader than the one before it and
 * only exists to catch older or differently worded release notes, so the order
 * is part of the contract: a broad pattern must never shadow a precise one.
 */
export const RANGE_MATCHERS: readonly RangeMatcher[] = [
  { name: "linux-compatible-bold", pattern: /\*\*Linux\*\*:\s*compatible with\s*([\d.]+)\s*-\s*([\d.]+)\s*kernels/is },
  { name: "linux-compatible", pattern: /Linux.*?compatible with.*?([\d.]+)\s*-\s*([\d.]+)\s*kernels/is },
  { name: "kernel-compatibility", pattern: /Kernel.*?compatibility.*?([\d.]+)\s*-\s*([\d.]+)/is },
  { name: "linux-kernel", pattern: /Linux kernel.*?([\d.]+)\s*-\s*([\d.]+)/is },
];

export function extractRange(body: string, matchers: readonly RangeMatcher[] = RANGE_MATCHERS): CompatibilityRange | null {
  for (const matcher of matchers) {
    const match = matcher.pattern.exec(body);
    const min = match?.[1];
    const max = match?.[2];
    if (min && max) {
      logger.debug({ matcher: matcher.name, min, max }, "Matched kernel range in release notes");
      return { min, max };
    }
  }
  return null;
}

/** "2.3.3-1" -> "zfs-2.3.3" for the default prefix. */
export function releaseTag(moduleVersion: string, prefix: string): string {
  const base = moduleVersion.split("-", 1)[0] ?? moduleVersion;
  return `${prefix}${base}`;
}

const releaseSchema = z.object({
  body: z.string().nullish(),
  message: z.string().optional(),
});

export interface RangeFetcherOptions {
  apiBase: string;
  tagPrefix: string;
  timeoutCeilingMs?: number;
}

export class CompatibilityRangeFetcher implements RangeSource {
  constructor(
    private readonly executor: Executor,
    private readonly commands: PackageIndexCommands,
    private readonly options: RangeFetcherOptions,
  ) {}

  async fetchRange(moduleVersion: string): Promise<CompatibilityRange | null> {
    const tag = releaseTag(moduleVersion, this.options.tagPrefix);
    const body = await this.fetchReleaseBody(tag);
    if (!body) return null;

    const range = extractRange(body);
    if (!range) logger.debug({ tag }, "No kernel range found in release notes");
    return range;
  }

  /** Release notes for a tag, or null on transport failure, error sentinel or empty body. */
  async fetchReleaseBody(tag: string): Promise<string | null> {
    const url = `${this.options.apiBase.replace(/\/+$/, "")}/${encodeURIComponent(tag)}`;
    try {
      const cmd = this.commands.fetchJson(url, "application/vnd.github.v3+json");
      const r = await this.executor.execute(cmd, timeoutFor("normal", this.options.timeoutCeilingMs));
      if (r.exitCode !== 0) {
        logger.debug({ url, exitCode: r.exitCode }, "Release metadata request failed");
        return null;
      }
      const parsed = releaseSchema.safeParse(JSON.parse(r.stdout));
      if (!parsed.success) {
        logger.debug({ url }, "Release metadata has an unexpected shape");
        return null;
      }
      const { body, message } = parsed.data;
      if (message !== undefined) {
        logger.debug({ url, message }, "Release metadata service returned an error");
        return null;
      }
      if (!body) {
        logger.debug({ url }, "Release metadata carries no body");
        return null;
      }
      return body;
    } catch (err) {
      logger.warn({ tag, error: errorMessage(err) }, "Failed to get release metadata");
      return null;
    }
  }
}
