// Oracle facade: raw prices, share prices, report ingestion and administration
//
// getLatestPrice fails closed with a typed error; getLatestSharePrice never fails.

import type { Address } from 'viem';
import type { PriceSourceAdapter } from '../feeds/interface.ts';
import type { SequencerMonitor } from '../feeds/sequencer.ts';
import type {
  AssetCategory,
  LatestPrice,
  SharePriceQuote,
  StoredPrice,
  StoredSharePrice,
  VaultReport,
} from '../types/oracle.ts';
import type { ReportStore, SharePriceStore } from '../types/state.ts';
import type { PriceResolver } from './price-resolver.ts';
import type { AssetConversionEngine } from './asset-conversion.ts';
import type { AssetMetadata } from './asset-metadata.ts';
import { vaultLockKey, type ShareFallbackChain } from './share-fallback.ts';
import { OracleError, describeError } from '../errors.ts';
import { attempt } from '../types/result.ts';
import { toAddress } from '../utils/address.ts';
import type { KeyedLock } from '../utils/keyed-lock.ts';
import { scaleDecimals } from '../utils/fixed-point.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('ShareOracle');

export const MAX_REPORTS = 100;

export type ShareOracleDeps = {
  localChainId: number;
  resolver: PriceResolver;
  conversion: AssetConversionEngine;
  metadata: AssetMetadata;
  fallback: ShareFallbackChain;
  reports: ReportStore;
  sharePrices: SharePriceStore;
};

function normalizeReport(report: VaultReport): VaultReport {
  return {
    ...report,
    vaultAddress: toAddress(report.vaultAddress),
    asset: toAddress(report.asset),
    rewardsDelegate: toAddress(report.rewardsDelegate),
  };
}

export type IngestionResult = {
  accepted: VaultReport[];
  skipped: VaultReport[];
};

export class VaultShareOracle {
  readonly localChainId: number;
  private readonly locks: KeyedLock;

  constructor(private deps: ShareOracleDeps) {
    this.localChainId = deps.localChainId;
    this.locks = deps.fallback.locks;
  }

  // --- prices ---

  getLatestPrice(asset: Address, inUSD: boolean): Promise<LatestPrice> {
    return this.deps.resolver.getLatestPrice(toAddress(asset), inUSD);
  }

  updatePrice(asset: Address, inUSD: boolean): Promise<StoredPrice> {
    return this.deps.resolver.updatePrice(toAddress(asset), inUSD);
  }

  getLatestSharePrice(originChainId: number, vault: Address, dstAsset: Address): Promise<SharePriceQuote> {
    return this.deps.fallback.getLatestSharePrice(originChainId, toAddress(vault), toAddress(dstAsset));
  }

  // --- ingestion ---

  /**
   * Store a batch of reports produced on `originChainId`. The whole batch is
   * validated before anything is written; reports older than what is already
   * stored for the same vault are skipped. Ingestions touching the same vault
   * run one after another.
   */
  async updateSharePrices(originChainId: number, batch: VaultReport[]): Promise<IngestionResult> {
    if (batch.length > MAX_REPORTS) {
      throw new OracleError('ExceedsMaxReports', `${batch.length} reports, at most ${MAX_REPORTS}`);
    }
    const reports = batch.map(normalizeReport);
    if (originChainId === this.localChainId) {
      throw new OracleError('InvalidChainId', `reports cannot originate from the local chain ${originChainId}`);
    }
    for (const report of reports) {
      if (report.originChainId !== originChainId) {
        throw new OracleError(
          'InvalidChainId',
          `report for ${report.vaultAddress} claims chain ${report.originChainId}, batch is from ${originChainId}`,
        );
      }
      if (report.sharePrice <= 0n) {
        throw new OracleError('InvalidPrice', `report for ${report.vaultAddress} has a zero share price`);
      }
    }

    // newest per vault within the batch; later entries win ties
    const newest = new Map<Address, VaultReport>();
    const skipped: VaultReport[] = [];
    for (const report of reports) {
      const seen = newest.get(report.vaultAddress);
      if (seen && seen.lastUpdate > report.lastUpdate) {
        skipped.push(report);
        continue;
      }
      if (seen) skipped.push(seen);
      newest.set(report.vaultAddress, report);
    }

    const keys = [...newest.keys()].map((vault) => vaultLockKey(originChainId, vault));
    return this.locks.run(keys, async () => {
      const accepted: VaultReport[] = [];
      for (const report of newest.values()) {
        const stored = await this.deps.reports.latest(originChainId, report.vaultAddress);
        if (stored && report.lastUpdate < stored.lastUpdate) {
          logger.debug(`skipping report for ${report.vaultAddress}, older than ${stored.lastUpdate}`);
          skipped.push(report);
          continue;
        }
        accepted.push(report);
      }

      if (accepted.length > 0) await this.deps.reports.putMany(accepted);
      for (const report of accepted) await this.storeMappedSharePrice(report);

      logger.info(
        `ingested ${accepted.length} report(s) from chain ${originChainId}, skipped ${skipped.length}`,
      );
      return { accepted, skipped };
    });
  }

  // Reports whose asset has a local equivalent double as a stored share price
  private async storeMappedSharePrice(report: VaultReport): Promise<void> {
    const localAsset = this.deps.conversion.localEquivalent(report.originChainId, report.asset);
    if (!localAsset) return;

    const written = await attempt(async () => {
      const existing = await this.deps.sharePrices.get(report.originChainId, report.vaultAddress);
      if (existing && existing.timestamp > report.lastUpdate) return;
      const decimals = await this.deps.metadata.decimals(localAsset);
      const next: StoredSharePrice = {
        sharePrice: scaleDecimals(report.sharePrice, report.assetDecimals, decimals),
        asset: localAsset,
        assetDecimals: decimals,
        timestamp: report.lastUpdate,
      };
      await this.deps.sharePrices.set(report.originChainId, report.vaultAddress, next);
    });
    if (!written.ok) {
      logger.warn(
        `could not store share price for ${report.vaultAddress}: ${describeError(written.error)}`,
      );
    }
  }

  latestReport(originChainId: number, vault: Address): Promise<VaultReport | null> {
    return this.deps.reports.latest(originChainId, toAddress(vault));
  }

  reportHistory(originChainId: number, vault: Address): Promise<VaultReport[]> {
    return this.deps.reports.history(originChainId, toAddress(vault));
  }

  // --- administration ---

  addAdapter(adapter: PriceSourceAdapter, priority: number): void {
    this.deps.resolver.addAdapter(adapter, priority);
  }

  removeAdapter(id: string): void {
    this.deps.resolver.removeAdapter(id);
  }

  listAdapters(): { id: string; priority: number }[] {
    return this.deps.resolver.listAdapters();
  }

  setAssetCategory(asset: Address, category: AssetCategory): void {
    this.deps.conversion.setAssetCategory(asset, category);
  }

  setCrossChainAsset(chainId: number, asset: Address, localAsset: Address): void {
    this.deps.conversion.setCrossChainAsset(chainId, asset, localAsset);
  }

  setSequencer(sequencer: SequencerMonitor | undefined): void {
    this.deps.resolver.setSequencer(sequencer);
  }

  setEthUsdAsset(asset: Address | undefined): void {
    this.deps.conversion.setEthUsdAsset(asset);
  }
}
