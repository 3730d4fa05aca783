import type { Executor, ExecResult } from '../../src/execution/executor.js';
import type { Command } from '../../src/types/command.js';
import type { VersionResolver } from '../../src/packages/resolver.js';
import type { RangeSource } from '../../src/compat/range-fetcher.js';
import type { CompatibilityRange, KernelVariant } from '../../src/types/kernel.js';
import type { VariantDefinition } from '../../src/types/config.js';
import { createKernelVariant } from '../../src/catalog/variant.js';

/** Executor that answers from a table keyed by argv and records every call. */
export class FakeExecutor implements Executor {
  readonly calls: Array<{ command: Command; timeoutMs: number }> = [];
  private readonly responses = new Map<string, Partial<ExecResult>>();

  constructor(private readonly fallback: Partial<ExecResult> = { exitCode: 1, stderr: 'not stubbed' }) {}

  on(argv: readonly string[], result: Partial<ExecResult>): this {
    this.responses.set(argv.join('\u0000'), result);
    return this;
  }

  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    this.calls.push({ command, timeoutMs });
    const stubbed = this.responses.get(command.argv.join('\u0000')) ?? this.fallback;
    return { stdout: '', stderr: '', exitCode: 0, durationMs: 0, ...stubbed };
  }

  argvs(): string[][] {
    return this.calls.map((c) => [...c.command.argv]);
  }
}

/** Resolver backed by a mutable table; missing entries resolve to null. */
export class MapResolver implements VersionResolver {
  readonly calls: string[] = [];

  constructor(readonly versions: Record<string, string> = {}) {}

  async resolve(packageId: string): Promise<string | null> {
    this.calls.push(packageId);
    return this.versions[packageId] ?? null;
  }
}

export class FixedRanges implements RangeSource {
  readonly calls: string[] = [];

  constructor(public range: CompatibilityRange | null) {}

  async fetchRange(moduleVersion: string): Promise<CompatibilityRange | null> {
    this.calls.push(moduleVersion);
    return this.range;
  }
}

/** `pacman -Si` output trimmed to the fields the resolver reads. */
export function pacmanInfo(name: string, version: string): string {
  return [
    'Repository      : core',
    `Name            : ${name}`,
    `Version         : ${version}`,
    'Architecture    : x86_64',
    '',
  ].join('\n');
}

export function variant(overrides: Partial<VariantDefinition> & { name: string }): KernelVariant {
  return createKernelVariant({
    name: overrides.name,
    display_name: overrides.display_name ?? overrides.name,
    kernel_package: overrides.kernel_package ?? overrides.name,
    headers_package: overrides.headers_package ?? `${overrides.name}-headers`,
    precompiled_package: overrides.precompiled_package,
    supports_precompiled: overrides.supports_precompiled,
    is_default: overrides.is_default,
  });
}

export const LTS = variant({
  name: 'linux-lts', display_name: 'Linux LTS', precompiled_package: 'zfs-linux-lts', is_default: true,
});

export const MAINLINE = variant({
  name: 'linux', display_name: 'Linux', precompiled_package: 'zfs-linux',
});

export const RT = variant({ name: 'linux-rt', display_name: 'Linux RT' });

export const PACKAGES = { utils: 'zfs-utils', dkms: 'zfs-dkms' };
