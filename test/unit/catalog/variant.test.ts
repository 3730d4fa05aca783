import { createKernelVariant, describeVariant, toDefinition } from '../../../src/catalog/variant.js';
import { KmodError, KmodErrorCode } from '../../../src/shared/errors.js';

const BASE = { name: 'linux-zen', display_name: 'Linux Zen', kernel_package: 'linux-zen', headers_package: 'linux-zen-headers' };

describe('createKernelVariant', () => {
  it('derives precompiled support from the package', () => {
    expect(createKernelVariant({ ...BASE, precompiled_package: 'zfs-linux-zen' })).toEqual({
      name: 'linux-zen',
      displayName: 'Linux Zen',
      kernelPackage: 'linux-zen',
      headersPackage: 'linux-zen-headers',
      precompiledPackage: 'zfs-linux-zen',
      supportsPrecompiled: true,
      isDefault: false,
    });
    expect(createKernelVariant(BASE).supportsPrecompiled).toBe(false);
  });

  it('allows a package to be named while support is switched off', () => {
    const v = createKernelVariant({ ...BASE, precompiled_package: 'zfs-linux-zen', supports_precompiled: false });
    expect(v.supportsPrecompiled).toBe(false);
    expect(v.precompiledPackage).toBe('zfs-linux-zen');
  });

  it('returns a frozen value', () => {
    expect(Object.isFrozen(createKernelVariant(BASE))).toBe(true);
  });

  it('rejects blank identity fields', () => {
    expect(() => createKernelVariant({ ...BASE, headers_package: '  ' })).toThrow('Kernel variant headers_package cannot be empty');
  });

  it('rejects claimed precompiled support without a package', () => {
    let caught: unknown;
    try {
      createKernelVariant({ ...BASE, supports_precompiled: true });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(KmodError);
    expect(caught instanceof KmodError && caught.code).toBe(KmodErrorCode.INVALID_VARIANT);
  });
});

describe('toDefinition', () => {
  it('produces a definition that rebuilds the same variant', () => {
    const v = createKernelVariant({ ...BASE, precompiled_package: 'zfs-linux-zen', is_default: true });
    expect(createKernelVariant(toDefinition(v))).toEqual(v);
  });
});

describe('describeVariant', () => {
  it('summarizes a variant on one line', () => {
    expect(describeVariant(createKernelVariant({ ...BASE, precompiled_package: 'zfs-linux-zen', is_default: true })))
      .toBe('Linux Zen [linux-zen] - Precompiled: yes (default)');
    expect(describeVariant(createKernelVariant(BASE))).toBe('Linux Zen [linux-zen] - Precompiled: no');
  });
});
