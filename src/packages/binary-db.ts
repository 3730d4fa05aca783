// Parser for the text form of a repository database: the desc files of every
// package, concatenated. Each desc file is a run of "%KEY%" headers followed by
// value lines and a blank line; a new record starts at every %FILENAME% (or at a
// second %NAME%, for databases built without filenames).

export interface DescRecord {
  readonly name: string;
  readonly version: string;
  readonly fields: ReadonlyMap<string, string[]>;
}

const HEADER = /^%([A-Z0-9_]+)%$/;

export function parseDescRecords(text: string): DescRecord[] {
  const records: DescRecord[] = [];
  let fields = new Map<string, string[]>();
  let key: string | null = null;

  const flush = (): void => {
    const name = fields.get("NAME")?.[0];
    const version = fields.get("VERSION")?.[0];
    if (name && version) records.push({ name, version, fields });
    fields = new Map();
    key = null;
  };

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    const header = HEADER.exec(line);
    if (header) {
      const nextKey = header[1] ?? "";
      if (nextKey === "FILENAME" || fields.has(nextKey)) flush();
      key = nextKey;
      fields.set(key, []);
      continue;
    }
    if (!line || key === null) continue;
    fields.get(key)?.push(line);
  }
  flush();
  return records;
}

/** Version of the record whose %NAME% is exactly packageName. */
export function findPackageVersion(text: string, packageName: string): string | null {
  const record = parseDescRecords(text).find((r) => r.name === packageName);
  return record?.version ?? null;
}

/** The %FILENAME% of a record, relative to the directory holding the database. */
export function recordFilename(record: DescRecord): string | null {
  return record.fields.get("FILENAME")?.[0] ?? null;
}

/** Version a record pins for dependency, from a "name=version" %DEPENDS% entry. */
export function dependencyPin(record: DescRecord, dependency: string): string | null {
  const prefix = `${dependency}=`;
  const entry = record.fields.get("DEPENDS")?.find((d) => d.startsWith(prefix));
  return entry ? entry.slice(prefix.length) : null;
}

/** A pin without a pkgrel ("2.3.3") accepts any release of that version ("2.3.3-1"). */
export function satisfiesPin(version: string, pin: string): boolean {
  return version === pin || version.startsWith(`${pin}-`);
}
