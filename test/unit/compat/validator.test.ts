import { CompatibilityEvaluator } from '../../../src/compat/evaluator.js';
import { partitionKernels, shouldFilterKernelOptions, validateForBuild, FILTER_ENV_VAR } from '../../../src/compat/validator.js';
import { FixedRanges, MapResolver, LTS, MAINLINE, PACKAGES } from '../../fixtures/fakes.js';

describe('validateForBuild', () => {
  it('reads unresolved data as incompatible', async () => {
    const evaluator = new CompatibilityEvaluator(new MapResolver({ 'zfs-dkms': '2.3.3-1' }), new FixedRanges({ min: '4.18', max: '6.15' }), PACKAGES);
    const verdict = await validateForBuild(evaluator, LTS, 'dkms');
    expect(verdict).toEqual({
      compatible: false,
      warnings: ['Could not determine linux-lts version - package repository issue'],
      cause: 'lookup_failure',
    });
  });
});

describe('partitionKernels', () => {
  it('splits kernels by DKMS compatibility and keeps their warnings', async () => {
    const resolver = new MapResolver({ 'zfs-dkms': '2.3.3-1', 'linux-lts': '6.12.41-1', linux: '6.16.1-1' });
    const evaluator = new CompatibilityEvaluator(resolver, new FixedRanges({ min: '4.18', max: '6.15' }), PACKAGES);
    const partition = await partitionKernels(evaluator, [LTS, MAINLINE]);
    expect(partition).toEqual({
      compatible: ['linux-lts'],
      incompatible: ['linux'],
      warnings: { linux: ['Kernel linux (6.16.1) is outside the supported range for ZFS DKMS (4.18 - 6.15)'] },
    });
  });
});

describe('shouldFilterKernelOptions', () => {
  it.each(['0', 'false', 'no', 'off', 'disable', ' FALSE '])('turns filtering off for %p', (value) => {
    expect(shouldFilterKernelOptions(true, { [FILTER_ENV_VAR]: value })).toBe(false);
  });

  it('keeps the configured default for other values', () => {
    expect(shouldFilterKernelOptions(true, { [FILTER_ENV_VAR]: 'yes' })).toBe(true);
    expect(shouldFilterKernelOptions(true, {})).toBe(true);
    expect(shouldFilterKernelOptions(false, { [FILTER_ENV_VAR]: '1' })).toBe(false);
  });
});
