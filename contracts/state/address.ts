import { getAddress, isAddress, ZeroAddress } from 'ethers';
import { InvalidAddress } from '../errors';

export { ZeroAddress };

/** Checksummed form of `value`, or InvalidAddress. */
export function normalizeAddress(value: string): string {
  if (!isAddress(value)) throw new InvalidAddress(value);
  return getAddress(value);
}

/** Checksummed form when `value` is an address, otherwise `value` unchanged. */
export function checksumIfAddress(value: string): string {
  return isAddress(value) ? getAddress(value) : value;
}
