import { BucketKey } from '../interfaces/bucket.interface';

function toHex(key: Uint8Array): string {
  return Buffer.from(key.buffer, key.byteOffset, key.byteLength).toString(
    'hex',
  );
}

/**
 * Normalize a bucket key to the string id used by bucket providers.
 * Strings and bytes are tagged so `'x'` and `Uint8Array [0x78]` stay apart.
 */
export function toBucketId(key: BucketKey): string {
  if (typeof key === 'string') {
    return `s:${key}`;
  }

  return `b:${toHex(key)}`;
}

/**
 * Render a key for log messages
 */
export function describeBucketKey(key: BucketKey): string {
  return typeof key === 'string' ? key : `<${toHex(key)}>`;
}
