// Oracle domain types

import type { Address } from 'viem';

// unix seconds
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export type Denomination = 'USD' | 'ETH';

export const ASSET_CATEGORIES = ['UNKNOWN', 'BTC_LIKE', 'ETH_LIKE', 'STABLE'] as const;
export type AssetCategory = (typeof ASSET_CATEGORIES)[number];

// What getLatestPrice hands back
export type LatestPrice = {
  price: bigint; // WAD
  timestamp: number;
  isUSD: boolean;
};

// Last known price for one asset, owned by the resolver
export type StoredPrice = {
  price: bigint; // WAD, < 2^240
  timestamp: number;
  denomination: Denomination;
};

// Snapshot of a vault's valuation, produced on the vault's own chain
export type VaultReport = {
  sharePrice: bigint; // asset units per share unit, in asset decimals
  lastUpdate: number;
  originChainId: number;
  rewardsDelegate: Address;
  vaultAddress: Address;
  asset: Address;
  assetDecimals: number;
};

// Best known share price of a vault, already expressed in a local asset
export type StoredSharePrice = {
  sharePrice: bigint;
  asset: Address;
  assetDecimals: number;
  timestamp: number;
};

export type SharePriceSource = 'vault' | 'report' | 'stored' | 'terminal';

export type SharePriceQuote = {
  price: bigint;
  timestamp: number;
  source: SharePriceSource;
};

// An amount on some chain, in the given asset's decimals
export type AssetAmount = {
  amount: bigint;
  asset: Address;
  decimals: number;
  chainId: number;
};

export type Conversion = {
  amount: bigint;
  timestamp: number;
};

// External capabilities

export interface VaultReader {
  asset(vault: Address): Promise<Address>;
  convertToAssets(vault: Address, shares: bigint): Promise<bigint>;
}

export interface TokenReader {
  decimals(token: Address): Promise<number>;
}
