/**
 * Playhost Runtime Host — ULID Generator
 *
 * 26 characters of Crockford Base32: 10 for a 48-bit millisecond timestamp,
 * 16 for 80 random bits. Sorts lexicographically by creation time.
 *
 * Used as `event_id` on host log lines so lines merged from several machines
 * can be deduplicated.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's alphabet: no I, L, O or U. */
const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;

function encode(value: bigint, length: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < length; i++) {
    out = ALPHABET.charAt(Number(rest & 31n)) + out;
    rest >>= 5n;
  }
  return out;
}

/**
 * Generate a ULID. Within one millisecond the random part is not
 * incremented, so ordering inside a millisecond is arbitrary.
 */
export function ulid(now: number = Date.now()): string {
  let random = 0n;
  for (const byte of randomBytes(RANDOM_BYTES)) {
    random = (random << 8n) | BigInt(byte);
  }
  return encode(BigInt(now), TIME_CHARS) + encode(random, RANDOM_CHARS);
}
