import { createHash } from 'node:crypto';

export function sha256Hex(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Upsert key for records that come from an API rather than a file: `sha256("<source>:<key>")`. */
export function contentHashFor(sourceKind: string, key: string): string {
  return sha256Hex(`${sourceKind}:${key}`);
}
