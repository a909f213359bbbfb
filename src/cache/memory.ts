// In-process stores, used by tests and by nodes running without Redis

import type { Address, Hex } from 'viem';
import type { StoredPrice, StoredSharePrice, VaultReport } from '../types/oracle.ts';
import type {
  OracleStores,
  PriceStore,
  ProcessedMessageStore,
  ReportStore,
  SharePriceStore,
} from '../types/state.ts';

const vaultKey = (chainId: number, vault: Address) => `${chainId}:${vault}`;

export class MemoryPriceStore implements PriceStore {
  private prices = new Map<Address, StoredPrice>();

  async get(asset: Address): Promise<StoredPrice | null> {
    return this.prices.get(asset) ?? null;
  }

  async set(asset: Address, price: StoredPrice): Promise<void> {
    this.prices.set(asset, { ...price });
  }
}

export class MemoryReportStore implements ReportStore {
  private reports = new Map<string, VaultReport[]>();

  constructor(private historyDepth = 1) {
    if (!Number.isInteger(historyDepth) || historyDepth < 1) {
      throw new RangeError(`historyDepth must be a positive integer, got ${historyDepth}`);
    }
  }

  async latest(chainId: number, vault: Address): Promise<VaultReport | null> {
    return this.reports.get(vaultKey(chainId, vault))?.[0] ?? null;
  }

  async history(chainId: number, vault: Address): Promise<VaultReport[]> {
    return [...(this.reports.get(vaultKey(chainId, vault)) ?? [])];
  }

  async putMany(reports: VaultReport[]): Promise<void> {
    for (const report of reports) {
      const key = vaultKey(report.originChainId, report.vaultAddress);
      const ring = [{ ...report }, ...(this.reports.get(key) ?? [])];
      this.reports.set(key, ring.slice(0, this.historyDepth));
    }
  }
}

export class MemorySharePriceStore implements SharePriceStore {
  private values = new Map<string, StoredSharePrice>();

  async get(chainId: number, vault: Address): Promise<StoredSharePrice | null> {
    return this.values.get(vaultKey(chainId, vault)) ?? null;
  }

  async set(chainId: number, vault: Address, value: StoredSharePrice): Promise<void> {
    this.values.set(vaultKey(chainId, vault), { ...value });
  }
}

export class MemoryProcessedMessageStore implements ProcessedMessageStore {
  private guids = new Set<Hex>();

  async claim(guid: Hex): Promise<boolean> {
    if (this.guids.has(guid)) return false;
    this.guids.add(guid);
    return true;
  }

  async release(guid: Hex): Promise<void> {
    this.guids.delete(guid);
  }

  async has(guid: Hex): Promise<boolean> {
    return this.guids.has(guid);
  }
}

export function createMemoryStores(opts: { historyDepth?: number } = {}): OracleStores {
  return {
    prices: new MemoryPriceStore(),
    reports: new MemoryReportStore(opts.historyDepth),
    sharePrices: new MemorySharePriceStore(),
    processed: new MemoryProcessedMessageStore(),
  };
}
