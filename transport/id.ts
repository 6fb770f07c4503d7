import { randomBytes } from 'node:crypto';
import { customAlphabet } from 'nanoid';

const alphabet = customAlphabet(
  '1234567890abcdefghijklmnopqrstuvxyzABCDEFGHIJKLMNOPQRSTUVXYZ',
);
export const generateId = () => alphabet(12);

/**
 * Random non-zero u64, carried in handshakes and probe payloads.
 */
export function generateSessionId(): bigint {
  for (;;) {
    const id = randomBytes(8).readBigUInt64BE(0);
    if (id !== 0n) return id;
  }
}
