import { createHash } from 'crypto';

/** Short hex digest of a JSON-serializable value, used in run ids */
export function contentDigest(value: unknown, length: number = 8): string {
  return createHash('sha256').update(JSON.stringify(value)).digest('hex').slice(0, length);
}
