import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

const CHUNK_SIZE = 64 * 1024;

/**
 * Stream a file through SHA-256 and return the raw digest.
 * Rejects with the fs error if the file is missing or unreadable.
 */
export async function sha256FileDigest(filePath: string): Promise<Buffer> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath, { highWaterMark: CHUNK_SIZE })) {
    hash.update(chunk);
  }
  return hash.digest();
}

/**
 * Compute SHA-256 hex digest of a file.
 */
export async function sha256File(filePath: string): Promise<string> {
  return (await sha256FileDigest(filePath)).toString('hex');
}

/**
 * Compute SHA-256 hex digest of a buffer.
 */
export function sha256(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * RECORD form of a digest: `sha256=` + unpadded base64url.
 */
export function recordHash(digest: Buffer): string {
  return `sha256=${digest.toString('base64url')}`;
}

export async function recordDigest(filePath: string): Promise<string> {
  return recordHash(await sha256FileDigest(filePath));
}

export function recordDigestOf(data: Uint8Array): string {
  return recordHash(createHash('sha256').update(data).digest());
}
