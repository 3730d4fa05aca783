import { recommendConfiguration } from '../../../src/install/recommend.js';
import { CatalogBuilder, KernelCatalog } from '../../../src/catalog/catalog.js';
import { RT } from '../../fixtures/fakes.js';

describe('recommendConfiguration', () => {
  const catalog = CatalogBuilder.withBuiltins().build();

  it('follows the running kernel when the catalog has it', () => {
    expect(recommendConfiguration(catalog, '6.15.9-zen1-1-zen')).toEqual({ kernelName: 'linux-zen', mode: 'precompiled', reason: 'running-kernel' });
  });

  it('uses the catalog default for an unknown running kernel', () => {
    expect(recommendConfiguration(catalog, '6.8.2-rt11-1-rt')).toEqual({ kernelName: 'linux-lts', mode: 'precompiled', reason: 'catalog-default' });
    expect(recommendConfiguration(catalog, null)).toEqual({ kernelName: 'linux-lts', mode: 'precompiled', reason: 'catalog-default' });
  });

  it('picks DKMS for a running kernel without precompiled modules', () => {
    expect(recommendConfiguration(new KernelCatalog([RT]), '6.8.2-rt11-1-rt')).toEqual({ kernelName: 'linux-rt', mode: 'dkms', reason: 'running-kernel' });
  });

  it('falls back to linux-lts when nothing else applies', () => {
    expect(recommendConfiguration(new KernelCatalog([]), null)).toEqual({ kernelName: 'linux-lts', mode: 'precompiled', reason: 'fallback' });
  });
});
