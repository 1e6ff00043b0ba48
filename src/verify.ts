import { strFromU8 } from 'fflate';
import { readFile } from 'node:fs/promises';
import { recordDigestOf } from './checksum.js';
import { AssemblyError } from './errors.js';
import { parseRecord, type RecordEntry } from './record.js';
import { readZip } from './zip.js';

export interface VerifyReport {
  path: string;
  /** Path of the RECORD file inside the wheel */
  record: string;
  /** RECORD entries, self-entry included */
  entries: RecordEntry[];
}

/**
 * Check a built wheel against its own RECORD: every member is listed, every
 * listed digest and size matches the member bytes, and the self-entry is
 * the last line with empty fields.
 */
export async function verifyWheel(wheelPath: string): Promise<VerifyReport> {
  const files = readZip(await readFile(wheelPath));
  const members = [...files.keys()];
  const problems: string[] = [];

  for (const m of members) {
    if (m.includes('\\')) problems.push(`Backslash in member name: ${m}`);
  }

  const records = members.filter(m => /^[^/]+\.dist-info\/RECORD$/.test(m));
  if (records.length !== 1) {
    throw new AssemblyError(`Expected exactly one *.dist-info/RECORD in ${wheelPath}, found ${records.length}`, 'verify');
  }
  const [recordName] = records;
  const entries = parseRecord(strFromU8(files.get(recordName) ?? new Uint8Array()));

  const last = entries.at(-1);
  if (!last || last.path !== recordName || last.digest !== '' || last.size !== '') {
    problems.push(`RECORD self-entry must be the last line with empty digest and size`);
  }

  const listed = new Set<string>();
  for (const entry of entries) {
    if (listed.has(entry.path)) problems.push(`Duplicate RECORD entry: ${entry.path}`);
    listed.add(entry.path);
    if (entry.path === recordName) continue;

    const data = files.get(entry.path);
    if (!data) {
      problems.push(`Listed in RECORD but missing from wheel: ${entry.path}`);
      continue;
    }
    if (entry.digest !== recordDigestOf(data)) problems.push(`Digest mismatch: ${entry.path}`);
    if (entry.size !== data.length) problems.push(`Size mismatch: ${entry.path} (RECORD ${entry.size}, actual ${data.length})`);
  }

  for (const m of members) {
    if (!listed.has(m)) problems.push(`Not listed in RECORD: ${m}`);
  }

  if (problems.length > 0) {
    throw new AssemblyError(`Integrity check failed for ${wheelPath}:\n${problems.map(p => `  ${p}`).join('\n')}`, 'verify');
  }

  return {
    path: wheelPath,
    record: recordName,
    entries,
  };
}
