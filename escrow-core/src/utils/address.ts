import { getAddress, isAddress } from 'ethers';
import { EscrowError } from '../errors';
import { Address } from '../types/order';

/**
 * Normalise an account identity to its checksum form so that identity checks
 * compare like with like.
 */
export function toAddress(value: string): Address {
  if (!isAddress(value)) {
    throw new EscrowError('INVALID_ADDRESS', `Invalid address: ${value}`);
  }
  return getAddress(value);
}

