// Persisted record shapes. bigints travel as decimal strings.

import { z } from 'zod';
import { getAddress, isAddress } from 'viem';
import type { StoredPrice, StoredSharePrice, VaultReport } from '../types/oracle.ts';

const UintString = z
  .string()
  .regex(/^\d+$/, 'expected an unsigned integer string')
  .transform((s) => BigInt(s));

const AddressString = z
  .string()
  .refine((s) => isAddress(s, { strict: false }), 'expected an address')
  .transform((s) => getAddress(s));

const Timestamp = z.number().int().nonnegative();

export const StoredPriceRecord = z.object({
  price: UintString,
  timestamp: Timestamp,
  denomination: z.enum(['USD', 'ETH']),
});

export const VaultReportRecord = z.object({
  sharePrice: UintString,
  lastUpdate: Timestamp,
  originChainId: z.number().int().positive(),
  rewardsDelegate: AddressString,
  vaultAddress: AddressString,
  asset: AddressString,
  assetDecimals: z.number().int().min(0).max(255),
});

export const StoredSharePriceRecord = z.object({
  sharePrice: UintString,
  asset: AddressString,
  assetDecimals: z.number().int().min(0).max(255),
  timestamp: Timestamp,
});

export const decodeStoredPrice = (raw: string): StoredPrice =>
  StoredPriceRecord.parse(JSON.parse(raw));

export const decodeVaultReport = (raw: string): VaultReport =>
  VaultReportRecord.parse(JSON.parse(raw));

export const decodeStoredSharePrice = (raw: string): StoredSharePrice =>
  StoredSharePriceRecord.parse(JSON.parse(raw));
