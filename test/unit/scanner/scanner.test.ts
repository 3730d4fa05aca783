import { CompatibilityScanner, renderMenuOptions } from '../../../src/scanner/scanner.js';
import { CompatibilityEvaluator } from '../../../src/compat/evaluator.js';
import { KernelCatalog } from '../../../src/catalog/catalog.js';
import type { VersionResolver } from '../../../src/packages/resolver.js';
import { planInstallation } from '../../../src/install/planner.js';
import { FixedRanges, MapResolver, LTS, MAINLINE, RT, PACKAGES, variant } from '../../fixtures/fakes.js';

const VERSIONS = {
  'zfs-dkms': '2.3.3-1',
  'linux-lts': '6.12.41-1',
  'zfs-linux-lts': '2.3.3_6.12.41-1',
  linux: '6.16.1-1',
  'zfs-linux': '2.3.3_6.15.9-1',
};

function makeScanner(resolver: VersionResolver, filteringDefault: () => boolean = () => true, refreshIndex?: () => Promise<void>) {
  const catalog = new KernelCatalog([MAINLINE, LTS]);
  const evaluator = new CompatibilityEvaluator(resolver, new FixedRanges({ min: '4.18', max: '6.15' }), PACKAGES);
  return new CompatibilityScanner(catalog, evaluator, { filteringDefault, refreshIndex });
}

describe('CompatibilityScanner', () => {
  it('caches both modes for every kernel and summarizes the scan', async () => {
    const scanner = makeScanner(new MapResolver({ ...VERSIONS }));
    const summary = await scanner.scan();
    expect(summary).toEqual({ filtering: true, totalKernels: 2, dkmsCompatible: 1, precompiledCompatible: 1, totalOptions: 2 });
    expect(scanner.isCompatible('linux-lts', 'precompiled')).toBe(true);
    expect(scanner.isCompatible('linux-lts', 'dkms')).toBe(true);
    expect(scanner.isCompatible('linux', 'dkms')).toBe(false);
    expect(scanner.result('linux')?.precompiled.cause).toBe('version_mismatch');
    expect(scanner.isCompatible('linux-zen', 'dkms')).toBe(false);
  });

  it('offers only compatible options and names the filtered kernels', async () => {
    const scanner = makeScanner(new MapResolver({ ...VERSIONS }));
    const menu = await scanner.menuOptions();
    expect(scanner.hasScanned).toBe(true);
    expect(menu).toEqual({
      options: [
        { label: 'Linux LTS + precompiled ZFS (recommended)', kernelName: 'linux-lts', mode: 'precompiled' },
        { label: 'Linux LTS + ZFS DKMS', kernelName: 'linux-lts', mode: 'dkms' },
      ],
      filtered: ['Linux'],
    });
  });

  it('assumes compatibility when versions cannot be determined', async () => {
    const scanner = makeScanner(new MapResolver({ 'linux-lts': '6.12.41-1', linux: '6.12.41-1' }));
    await scanner.scan();
    expect(scanner.result('linux-lts')?.dkms).toEqual({
      compatible: true,
      warnings: ['Could not determine zfs-dkms version - ZFS repository may not be configured or package unavailable - assuming compatible'],
      cause: 'lookup_failure',
    });
  });

  it('assumes compatibility when the evaluator throws', async () => {
    const resolver: VersionResolver = { resolve: async () => { throw new Error('index locked'); } };
    const scanner = makeScanner(resolver);
    await scanner.scan();
    expect(scanner.result('linux')?.dkms).toEqual({
      compatible: true,
      warnings: ['Validation error: index locked - assuming compatible'],
      cause: 'lookup_failure',
    });
  });

  it('replaces the previous results on every scan', async () => {
    const resolver = new MapResolver({ ...VERSIONS });
    const scanner = makeScanner(resolver);
    await scanner.scan();
    expect(scanner.isCompatible('linux', 'dkms')).toBe(false);

    resolver.versions.linux = '6.15.9-1';
    await scanner.scan();
    expect(scanner.isCompatible('linux', 'dkms')).toBe(true);
    expect(scanner.isCompatible('linux', 'precompiled')).toBe(true);
    expect(scanner.allResults()).toHaveLength(2);
  });

  it('skips evaluation when filtering is off', async () => {
    const resolver = new MapResolver({ ...VERSIONS });
    const filteringDefault = jest.fn(() => false);
    const scanner = makeScanner(resolver, filteringDefault);
    const menu = await scanner.menuOptions();
    expect(filteringDefault).toHaveBeenCalledTimes(1);
    expect(resolver.calls).toEqual([]);
    expect(scanner.filteringEnabled).toBe(false);
    expect(menu.options.map((o) => o.label)).toEqual([
      'Linux LTS + precompiled ZFS (recommended)',
      'Linux LTS + ZFS DKMS',
      'Linux + precompiled ZFS',
      'Linux + ZFS DKMS',
    ]);
    expect(menu.filtered).toEqual([]);
  });

  it('offers precompiled only where the planner would attempt it', async () => {
    const packaged = variant({ name: 'linux-x', precompiled_package: 'zfs-linux-x', supports_precompiled: false });
    const evaluator = new CompatibilityEvaluator(new MapResolver(), new FixedRanges({ min: '4.18', max: '6.15' }), PACKAGES);
    const scanner = new CompatibilityScanner(new KernelCatalog([packaged]), evaluator, { filteringDefault: () => false });
    const menu = await scanner.menuOptions();
    expect(menu.options).toEqual([{ label: 'linux-x + ZFS DKMS', kernelName: 'linux-x', mode: 'dkms' }]);
    expect(scanner.isCompatible('linux-x', 'precompiled')).toBe(false);
    expect(scanner.isCompatible('linux-x', 'dkms')).toBe(true);
    expect(planInstallation(packaged, 'precompiled').map((a) => a.mode)).toEqual(['dkms']);
  });

  it('lets an explicit flag override the default', async () => {
    const scanner = makeScanner(new MapResolver({ ...VERSIONS }), () => false);
    const summary = await scanner.scan({ filtering: true });
    expect(summary.filtering).toBe(true);
    expect(summary.totalOptions).toBe(2);
  });

  it('refreshes the index before scanning and carries on when that fails', async () => {
    const refresh = jest.fn(async () => { throw new Error('failed to synchronize all databases'); });
    const scanner = makeScanner(new MapResolver({ ...VERSIONS }), () => true, refresh);
    const summary = await scanner.scan();
    expect(refresh).toHaveBeenCalledTimes(1);
    expect(summary.totalKernels).toBe(2);
  });
});

describe('renderMenuOptions', () => {
  it('never offers precompiled for a kernel without a package', () => {
    const unchecked = { compatible: true, warnings: [], cause: null };
    const results = new Map([[RT.name, { kernelName: RT.name, variant: RT, dkms: unchecked, precompiled: unchecked }]]);
    expect(renderMenuOptions([RT], results, false)).toEqual({
      options: [{ label: 'Linux RT + ZFS DKMS', kernelName: 'linux-rt', mode: 'dkms' }],
      filtered: [],
    });
  });

  it('skips kernels that were not scanned', () => {
    expect(renderMenuOptions([LTS], new Map(), true)).toEqual({ options: [], filtered: [] });
  });
});
