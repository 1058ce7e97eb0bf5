/**
 * Non-cryptographic hashing for telemetry grouping.
 *
 * Raw categorical values never leave the codec in logs or events; a short
 * hash lets operators count distinct unknown categories without seeing them.
 */

/**
 * Java-style 32-bit string hash rendered as fixed-length hex.
 * NOT suitable for security.
 *
 * @example
 * ```typescript
 * fastHash("berlin"); // 8 hex chars
 * ```
 */
export function fastHash(input: string, length: number = 8): string {
  let hash = 0;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) - hash) + input.charCodeAt(i);
    hash = hash & hash;
  }

  const hexHash = Math.abs(hash).toString(16);
  return hexHash.padStart(length, '0').substring(0, length);
}

/**
 * Hash any category label. The type prefix keeps `1` and `"1"` apart.
 */
export function hashCategory(value: unknown): string {
  return fastHash(`${typeof value}:${String(value)}`);
}
