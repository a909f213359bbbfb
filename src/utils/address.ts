import { getAddress, isAddress, type Address } from 'viem';
import { OracleError } from '../errors.ts';

/** Validate and checksum an address; checksummed form is the canonical key everywhere. */
export function toAddress(value: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new OracleError('InvalidAddress', `not an address: ${value}`);
  }
  return getAddress(value);
}
