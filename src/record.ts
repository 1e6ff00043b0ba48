/**
 * RECORD — the wheel's integrity manifest.
 *
 * One `path,digest,size` line per file. The RECORD file lists itself last
 * with empty digest and size, since it cannot hash its own content.
 */
export interface RecordEntry {
  /** Forward-slash path relative to the wheel root */
  path: string;
  /** `sha256=<base64url>`, empty for the self-entry */
  digest: string;
  /** Byte size, empty for the self-entry */
  size: number | '';
}

export function recordPath(distInfo: string): string {
  return `${distInfo}/RECORD`;
}

export function renderRecord(entries: RecordEntry[], selfPath: string): string {
  const lines = entries.map(e => `${e.path},${e.digest},${e.size}`);
  lines.push(`${selfPath},,`);
  return lines.join('\n') + '\n';
}

/**
 * Parse RECORD text. Paths containing commas are not quoted by the
 * renderer, so the last two fields are split from the right.
 */
export function parseRecord(text: string): RecordEntry[] {
  const result: RecordEntry[] = [];
  for (const line of text.split('\n')) {
    if (line === '') continue;
    const sizeSep = line.lastIndexOf(',');
    const digestSep = line.lastIndexOf(',', sizeSep - 1);
    if (sizeSep === -1 || digestSep === -1) throw new Error(`Malformed RECORD line: ${line}`);

    const rawSize = line.slice(sizeSep + 1);
    if (rawSize !== '' && !/^\d+$/.test(rawSize)) throw new Error(`Malformed RECORD size: ${line}`);
    result.push({
      path: line.slice(0, digestSep),
      digest: line.slice(digestSep + 1, sizeSep),
      size: rawSize === '' ? '' : Number(rawSize),
    });
  }
  return result;
}
