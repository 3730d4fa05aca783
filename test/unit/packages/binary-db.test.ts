import { parseDescRecords, findPackageVersion, recordFilename, dependencyPin, satisfiesPin } from '../../../src/packages/binary-db.js';

const DB = [
  '%FILENAME%',
  'zfs-linux-lts-2.3.3_6.12.41.1-1-x86_64.pkg.tar.zst',
  '',
  '%NAME%',
  'zfs-linux-lts',
  '',
  '%VERSION%',
  '2.3.3_6.12.41.1-1',
  '',
  '%DEPENDS%',
  'zfs-utils=2.3.3',
  'linux-lts=6.12.41-1',
  '',
  '%FILENAME%',
  'zfs-linux-lts-headers-2.3.3_6.12.41.1-1-x86_64.pkg.tar.zst',
  '',
  '%NAME%',
  'zfs-linux-lts-headers',
  '',
  '%VERSION%',
  '2.3.3_6.12.41.1-2',
  '',
].join('\n');

describe('parseDescRecords', () => {
  it('splits records at each %FILENAME%', () => {
    const records = parseDescRecords(DB);
    expect(records.map((r) => r.name)).toEqual(['zfs-linux-lts', 'zfs-linux-lts-headers']);
    expect(records[0]?.fields.get('DEPENDS')).toEqual(['zfs-utils=2.3.3', 'linux-lts=6.12.41-1']);
  });

  it('splits records at a repeated key when there are no filenames', () => {
    const text = '%NAME%\nspl-utils\n%VERSION%\n2.3.3-1\n%NAME%\nzfs-dkms\n%VERSION%\n2.3.3-1\n';
    expect(parseDescRecords(text).map((r) => `${r.name}@${r.version}`)).toEqual(['spl-utils@2.3.3-1', 'zfs-dkms@2.3.3-1']);
  });

  it('skips records without a version', () => {
    expect(parseDescRecords('%NAME%\nzfs-utils\n')).toEqual([]);
  });
});

describe('findPackageVersion', () => {
  it('matches the package name exactly', () => {
    expect(findPackageVersion(DB, 'zfs-linux-lts')).toBe('2.3.3_6.12.41.1-1');
    expect(findPackageVersion(DB, 'zfs-linux-lts-headers')).toBe('2.3.3_6.12.41.1-2');
  });

  it('does not match on a name prefix', () => {
    expect(findPackageVersion(DB, 'zfs-linux')).toBeNull();
  });
});

describe('record fields', () => {
  const [lts, headers] = parseDescRecords(DB);

  it('reads the file name of a record', () => {
    expect(lts && recordFilename(lts)).toBe('zfs-linux-lts-2.3.3_6.12.41.1-1-x86_64.pkg.tar.zst');
  });

  it('reads a pinned dependency version', () => {
    expect(lts && dependencyPin(lts, 'zfs-utils')).toBe('2.3.3');
    expect(lts && dependencyPin(lts, 'zfs-dkms')).toBeNull();
    expect(headers && dependencyPin(headers, 'zfs-utils')).toBeNull();
  });

  it('matches a pin with or without a release number', () => {
    expect(satisfiesPin('2.3.3-1', '2.3.3')).toBe(true);
    expect(satisfiesPin('2.3.3-1', '2.3.3-1')).toBe(true);
    expect(satisfiesPin('2.3.30-1', '2.3.3')).toBe(false);
  });
});
