import {
  checkPlanFeasibility,
  describePlan,
  packageSet,
  planInstallation,
  recommendedMode,
  shouldAttemptPrecompiled,
} from '../../../src/install/planner.js';
import { KmodError, KmodErrorCode } from '../../../src/shared/errors.js';
import { LTS, RT, PACKAGES } from '../../fixtures/fakes.js';

describe('planInstallation', () => {
  it('tries precompiled then DKMS for a supported kernel', () => {
    const plan = planInstallation(LTS, 'precompiled');
    expect(plan.map((a) => a.mode)).toEqual(['precompiled', 'dkms']);
    expect(plan.every((a) => a.variant === LTS)).toBe(true);
  });

  it('goes straight to DKMS when DKMS is requested', () => {
    expect(planInstallation(LTS, 'dkms').map((a) => a.mode)).toEqual(['dkms']);
  });

  it('never substitutes the kernel when precompiled is unsupported', () => {
    const plan = planInstallation(RT, 'precompiled');
    expect(plan).toEqual([{ variant: RT, mode: 'dkms' }]);
    expect(shouldAttemptPrecompiled(RT, 'precompiled')).toBe(false);
  });
});

describe('recommendedMode', () => {
  it('prefers precompiled where available', () => {
    expect(recommendedMode(LTS)).toBe('precompiled');
    expect(recommendedMode(RT)).toBe('dkms');
  });
});

describe('packageSet', () => {
  it('builds the package set for each mode', () => {
    expect(packageSet(LTS, 'precompiled', PACKAGES)).toEqual(['zfs-utils', 'zfs-linux-lts']);
    expect(packageSet(LTS, 'dkms', PACKAGES)).toEqual(['zfs-utils', 'zfs-dkms', 'linux-lts-headers']);
  });

  it('drops duplicates and keeps first-seen order', () => {
    expect(packageSet(RT, 'dkms', { utils: 'zfs', dkms: 'zfs' })).toEqual(['zfs', 'linux-rt-headers']);
  });

  it('refuses a precompiled set for a kernel without one', () => {
    let caught: unknown;
    try {
      packageSet(RT, 'precompiled', PACKAGES);
    } catch (err) {
      caught = err;
    }
    expect(caught instanceof KmodError && caught.code).toBe(KmodErrorCode.PRECOMPILED_UNSUPPORTED);
  });
});

describe('describePlan', () => {
  it('lists the primary attempt and the fallback', () => {
    expect(describePlan(LTS, 'precompiled', PACKAGES)).toBe([
      'Installation plan for Linux LTS:',
      'Requested mode: precompiled',
      '  Primary: precompiled - zfs-utils, zfs-linux-lts',
      '  Fallback: dkms - zfs-utils, zfs-dkms, linux-lts-headers',
    ].join('\n'));
  });
});

describe('checkPlanFeasibility', () => {
  it('reports an unsupported precompiled request and missing DKMS packages', async () => {
    const available = new Set(['zfs-utils', 'linux-rt-headers']);
    const problems = await checkPlanFeasibility(RT, 'precompiled', PACKAGES, async (pkg) => available.has(pkg));
    expect(problems).toEqual([
      'Kernel linux-rt does not support precompiled ZFS modules. DKMS will be used instead.',
      'Required DKMS packages not available: zfs-dkms',
    ]);
  });

  it('returns nothing for a feasible plan', async () => {
    await expect(checkPlanFeasibility(LTS, 'precompiled', PACKAGES, async () => true)).resolves.toEqual([]);
  });
});
