import { createHash } from 'crypto'

const UINT32_RANGE = 2 ** 32

/**
 * Deterministic stand-in for a random draw: maps (key, index) to [0, 1)
 * from the first 32 bits of a SHA-256 digest. Same input, same output,
 * on every platform and every run.
 */
export function hashToUnitInterval(key: string, index: number): number {
  const digest = createHash('sha256').update(`${key}#${index}`, 'utf-8').digest()
  return digest.readUInt32BE(0) / UINT32_RANGE
}
