import { getBytes, hexlify, isHexString, keccak256, randomBytes, toUtf8Bytes } from 'ethers';
import { Hashlock, Secret } from '../types/order';

const HASHLOCK_PATTERN = /^0x[a-fA-F0-9]{64}$/;

export function isHashlock(value: string): value is Hashlock {
  return HASHLOCK_PATTERN.test(value);
}

/**
 * Secrets are raw bytes. A 0x-prefixed, even-length hex string is read as
 * the bytes it encodes; any other string is taken as its UTF-8 bytes.
 */
export function secretBytes(secret: Secret): Uint8Array {
  if (secret instanceof Uint8Array) {
    return secret;
  }
  return isHexString(secret, true) ? getBytes(secret) : toUtf8Bytes(secret);
}

export function hashSecret(secret: Secret): Hashlock {
  return keccak256(secretBytes(secret));
}

export function secretMatches(secret: Secret, hashlock: Hashlock): boolean {
  return hashSecret(secret).toLowerCase() === hashlock.toLowerCase();
}

export function secretToHex(secret: Secret): string {
  return hexlify(secretBytes(secret));
}

export function generateSecret(): string {
  return hexlify(randomBytes(32));
}
