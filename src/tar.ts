/**
 * Streaming tar reader — no dependencies.
 * POSIX ustar, plus the GNU long-name and pax `path` extensions that release
 * tooling emits for deep paths. Entry bodies are handed out as they arrive.
 */

const BLOCK = 512;

export type TarEntryType = 'file' | 'directory' | 'symlink' | 'other';

export interface TarEntry {
  name: string;
  type: TarEntryType;
  mode: number;
  size: number;
  /** Entry content. Whatever is not read before advancing is skipped. */
  body(): AsyncGenerator<Buffer>;
}

function headerChecksum(header: Buffer): number {
  let sum = 0;
  for (let i = 0; i < BLOCK; i++) {
    // Treat checksum field (148-155) as spaces
    sum += (i >= 148 && i < 156) ? 32 : header[i];
  }
  return sum;
}

function readString(header: Buffer, start: number, len: number): string {
  const field = header.subarray(start, start + len);
  const end = field.indexOf(0);
  return field.subarray(0, end === -1 ? len : end).toString('utf8');
}

function readNumber(header: Buffer, start: number, len: number): number {
  // GNU base-256 for values that overflow the octal field
  if (header[start] & 0x80) {
    let n = header[start] & 0x7f;
    for (let i = start + 1; i < start + len; i++) n = n * 256 + header[i];
    return n;
  }
  const str = readString(header, start, len).trim();
  return str === '' ? 0 : parseInt(str, 8);
}

function entryType(flag: string): TarEntryType {
  switch (flag) {
    case '0':
    case '\0':
    case '7':
      return 'file';
    case '5':
      return 'directory';
    case '2':
      return 'symlink';
    default:
      return 'other';
  }
}

/** Pull `path=` out of a pax extended header body. */
function paxPath(body: Buffer): string | undefined {
  let offset = 0;
  let path: string | undefined;
  while (offset < body.length) {
    const space = body.indexOf(0x20, offset);
    if (space === -1) break;
    const len = parseInt(body.subarray(offset, space).toString('utf8'), 10);
    if (!Number.isFinite(len) || len <= 0) break;
    const record = body.subarray(space + 1, offset + len - 1).toString('utf8');
    const eq = record.indexOf('=');
    if (eq !== -1 && record.slice(0, eq) === 'path') path = record.slice(eq + 1);
    offset += len;
  }
  return path;
}

/** Takes exact byte counts off a chunked source. */
class ByteReader {
  private buffered: Buffer[] = [];
  private length = 0;

  constructor(private readonly source: AsyncIterator<Buffer>) {}

  /** Buffer at least `n` bytes, or everything left. */
  async fill(n: number): Promise<void> {
    while (this.length < n) {
      const next = await this.source.next();
      if (next.done) return;
      this.buffered.push(next.value);
      this.length += next.value.length;
    }
  }

  /** `n` bytes, or fewer when the source ends first. */
  async read(n: number): Promise<Buffer> {
    await this.fill(n);
    const all = this.buffered.length === 1 ? this.buffered[0] : Buffer.concat(this.buffered);
    const rest = all.subarray(n);
    this.buffered = rest.length > 0 ? [rest] : [];
    this.length = rest.length;
    return all.subarray(0, n);
  }

  /** Up to `n` bytes, chunk by chunk as they arrive. */
  async *chunks(n: number): AsyncGenerator<Buffer> {
    let remaining = n;
    while (remaining > 0) {
      if (this.length === 0) await this.fill(1);
      if (this.length === 0) return;
      const chunk = await this.read(Math.min(remaining, this.length));
      remaining -= chunk.length;
      yield chunk;
    }
  }
}

function truncated(offset: number): Error {
  return new Error(`Truncated tar entry at offset ${offset}`);
}

/**
 * Walk an uncompressed tar stream in order. Extension headers are folded
 * into the entry they describe. Stopping early releases the source.
 */
export async function* entries(source: AsyncIterable<Buffer>): AsyncGenerator<TarEntry> {
  const iterator = source[Symbol.asyncIterator]();
  const reader = new ByteReader(iterator);
  let offset = 0;
  let pendingName: string | undefined;

  try {
    while (true) {
      const h = await reader.read(BLOCK);
      // Zero block or end of stream = end of archive
      if (h.length < BLOCK || h.every(b => b === 0)) return;

      const stored = readNumber(h, 148, 8);
      if (stored !== headerChecksum(h)) {
        throw new Error(`Invalid tar header checksum at offset ${offset}`);
      }

      const headerOffset = offset;
      const size = readNumber(h, 124, 12);
      const flag = String.fromCharCode(h[156]);
      const padding = (BLOCK - (size % BLOCK)) % BLOCK;
      offset += BLOCK + size + padding;

      if (flag === 'L' || flag === 'x' || flag === 'g') {
        const data = await reader.read(size);
        if (data.length < size) throw truncated(headerOffset);
        await reader.read(padding);
        if (flag === 'L') pendingName = readString(data, 0, data.length);
        if (flag === 'x') pendingName = paxPath(data) ?? pendingName;
        continue;
      }

      let name = readString(h, 0, 100);
      const prefix = readString(h, 345, 155);
      if (prefix && readString(h, 257, 6) === 'ustar') name = `${prefix}/${name}`;
      if (pendingName !== undefined) {
        name = pendingName;
        pendingName = undefined;
      }

      let consumed = 0;
      let opened = false;
      async function* body(): AsyncGenerator<Buffer> {
        if (opened) throw new Error(`Tar entry ${name} was already read`);
        opened = true;
        for await (const chunk of reader.chunks(size)) {
          consumed += chunk.length;
          yield chunk;
        }
        if (consumed < size) throw truncated(headerOffset);
      }

      yield { name, type: entryType(flag), mode: readNumber(h, 100, 8), size, body };

      for await (const chunk of reader.chunks(size - consumed)) consumed += chunk.length;
      if (consumed < size) throw truncated(headerOffset);
      await reader.read(padding);
    }
  } finally {
    await iterator.return?.();
  }
}
