// Store contracts. Each has a memory and a Redis implementation under cache/.

import type { Address, Hex } from 'viem';
import type { StoredPrice, StoredSharePrice, VaultReport } from './oracle.ts';

export interface PriceStore {
  get(asset: Address): Promise<StoredPrice | null>;
  set(asset: Address, price: StoredPrice): Promise<void>;
}

export interface ReportStore {
  latest(chainId: number, vault: Address): Promise<VaultReport | null>;
  // newest first, at most the configured depth
  history(chainId: number, vault: Address): Promise<VaultReport[]>;
  putMany(reports: VaultReport[]): Promise<void>;
}

export interface SharePriceStore {
  get(chainId: number, vault: Address): Promise<StoredSharePrice | null>;
  set(chainId: number, vault: Address, value: StoredSharePrice): Promise<void>;
}

export interface ProcessedMessageStore {
  // true when the guid was not yet recorded and is now
  claim(guid: Hex): Promise<boolean>;
  release(guid: Hex): Promise<void>;
  has(guid: Hex): Promise<boolean>;
}

export interface OracleStores {
  prices: PriceStore;
  reports: ReportStore;
  sharePrices: SharePriceStore;
  processed: ProcessedMessageStore;
}
