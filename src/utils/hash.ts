import { createHash } from 'crypto';
import { createReadStream } from 'fs';

/**
 * sha1 of a file's contents as lower-case hex, read as a stream
 */
export async function sha1File(filePath: string): Promise<string> {
  const hash = createHash('sha1');
  const stream = createReadStream(filePath);
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export function sha1(content: string | Uint8Array): string {
  return createHash('sha1').update(content).digest('hex');
}

export function normalizeHash(hash: string): string {
  return hash.trim().toLowerCase();
}
