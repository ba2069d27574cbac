/**
 * Arbor CLI — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier, used as the
 * `event_id` of parse log lines so logs merged from several shells can be
 * de-duplicated and sorted by time.
 *
 * Format: 26 characters, Crockford Base32.
 *   - 10 chars: 48-bit millisecond timestamp
 *   - 16 chars: 80-bit cryptographic random
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's Base32 alphabet (no I, L, O, U). */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;

/** Encode `value` as exactly `length` Crockford characters, zero-padded. */
function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 0x1fn)) + out;
    v >>= 5n;
  }
  return out;
}

/**
 * Generate a ULID.
 *
 * The random part is not incremented within one millisecond, so ids made
 * in the same millisecond sort in random order.
 *
 * @param now - Millisecond timestamp, Date.now() by default
 *
 * @example
 * ulid()  // e.g. '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export function ulid(now: number = Date.now()): string {
  let random = 0n;
  for (const byte of randomBytes(10)) {
    random = (random << 8n) | BigInt(byte);
  }
  return encodeCrockford(BigInt(now), TIME_CHARS) + encodeCrockford(random, RANDOM_CHARS);
}
