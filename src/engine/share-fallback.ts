// Ordered fallback for "share price of vault V on chain C in asset A"
//
// 1. local vault read (origin is this chain)
// 2. latest cross-chain report
// 3. stored share price
// 4. terminal 1:1 ratio, timestamp 0
//
// Every step returns a Result; a failed step hands over to the next one and
// getLatestSharePrice itself never throws.

import type { Address } from 'viem';
import type {
  Clock,
  SharePriceQuote,
  StoredSharePrice,
  VaultReader,
} from '../types/oracle.ts';
import { systemClock } from '../types/oracle.ts';
import type { ReportStore, SharePriceStore } from '../types/state.ts';
import { attempt, type Result } from '../types/result.ts';
import type { AssetConversionEngine } from './asset-conversion.ts';
import type { AssetMetadata } from './asset-metadata.ts';
import { OracleError, describeError } from '../errors.ts';
import { WAD_DECIMALS, pow10 } from '../utils/fixed-point.ts';
import { KeyedLock } from '../utils/keyed-lock.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('ShareFallback');

export const SHARE_PRICE_MAX_AGE = 24 * 60 * 60;

export type StaleSharePricePolicy = 'reject' | 'serve';

export const vaultLockKey = (chainId: number, vault: Address): string => `${chainId}:${vault}`;

export type ShareFallbackDeps = {
  vaults: VaultReader;
  metadata: AssetMetadata;
  conversion: AssetConversionEngine;
  reports: ReportStore;
  sharePrices: SharePriceStore;
  locks?: KeyedLock;
};

export type ShareFallbackOptions = {
  localChainId: number;
  clock?: Clock;
  sharePriceMaxAge?: number;
  staleSharePrice?: StaleSharePricePolicy;
};

export class ShareFallbackChain {
  private readonly localChainId: number;
  private readonly clock: Clock;
  private readonly maxAge: number;
  private readonly stalePolicy: StaleSharePricePolicy;
  // per-vault serialization of share price writes; the oracle's ingestion takes the same locks
  readonly locks: KeyedLock;

  constructor(
    private deps: ShareFallbackDeps,
    opts: ShareFallbackOptions,
  ) {
    this.localChainId = opts.localChainId;
    this.clock = opts.clock ?? systemClock;
    this.maxAge = opts.sharePriceMaxAge ?? SHARE_PRICE_MAX_AGE;
    this.stalePolicy = opts.staleSharePrice ?? 'reject';
    this.locks = deps.locks ?? new KeyedLock();
  }

  async getLatestSharePrice(
    originChainId: number,
    vault: Address,
    dstAsset: Address,
  ): Promise<SharePriceQuote> {
    if (originChainId === this.localChainId) {
      const local = await attempt(() => this.fromVault(vault, dstAsset));
      if (local.ok) {
        await this.remember(originChainId, vault, dstAsset, local.value);
        return local.value;
      }
      logger.warn(`vault read failed for ${vault}: ${describeError(local.error)}`);
    }

    const reported = await this.step('report', () => this.fromReport(originChainId, vault, dstAsset));
    if (reported) {
      await this.remember(originChainId, vault, dstAsset, reported);
      return reported;
    }

    const stored = await this.step('stored', () => this.fromStored(originChainId, vault, dstAsset));
    if (stored) return stored;

    return this.terminal(originChainId, vault, dstAsset);
  }

  // Steps that may legitimately have nothing to offer resolve to null
  private async step(
    name: string,
    fn: () => Promise<SharePriceQuote | null>,
  ): Promise<SharePriceQuote | null> {
    const result: Result<SharePriceQuote | null> = await attempt(fn);
    if (!result.ok) {
      logger.warn(`${name} step failed: ${describeError(result.error)}`);
      return null;
    }
    return result.value;
  }

  private async fromVault(vault: Address, dstAsset: Address): Promise<SharePriceQuote> {
    const { vaults, metadata, conversion } = this.deps;
    const asset = await vaults.asset(vault);
    const decimals = await metadata.decimals(asset);
    const raw = await vaults.convertToAssets(vault, pow10(decimals));
    if (raw <= 0n) {
      throw new OracleError('InvalidPrice', `vault ${vault} reports a zero share price`);
    }
    if (asset === dstAsset) {
      return { price: raw, timestamp: this.clock(), source: 'vault' };
    }
    const converted = await conversion.convert(
      { amount: raw, asset, decimals, chainId: this.localChainId },
      dstAsset,
    );
    return { price: converted.amount, timestamp: converted.timestamp, source: 'vault' };
  }

  private async fromReport(
    originChainId: number,
    vault: Address,
    dstAsset: Address,
  ): Promise<SharePriceQuote | null> {
    const report = await this.deps.reports.latest(originChainId, vault);
    if (!report) {
      logger.debug(`no report for ${originChainId}:${vault}`);
      return null;
    }
    if (report.asset === dstAsset) {
      return { price: report.sharePrice, timestamp: report.lastUpdate, source: 'report' };
    }
    const converted = await this.deps.conversion.convert(
      {
        amount: report.sharePrice,
        asset: report.asset,
        decimals: report.assetDecimals,
        chainId: originChainId,
      },
      dstAsset,
    );
    return {
      price: converted.amount,
      timestamp: Math.min(report.lastUpdate, converted.timestamp),
      source: 'report',
    };
  }

  private async fromStored(
    originChainId: number,
    vault: Address,
    dstAsset: Address,
  ): Promise<SharePriceQuote | null> {
    const stored = await this.deps.sharePrices.get(originChainId, vault);
    if (!stored) return null;

    const age = this.clock() - stored.timestamp;
    if (age > this.maxAge && this.stalePolicy === 'reject') {
      logger.debug(`stored share price for ${vault} is ${age}s old, skipping`);
      return null;
    }
    if (stored.asset === dstAsset) {
      return { price: stored.sharePrice, timestamp: stored.timestamp, source: 'stored' };
    }
    const converted = await this.deps.conversion.convert(
      {
        amount: stored.sharePrice,
        asset: stored.asset,
        decimals: stored.assetDecimals,
        chainId: this.localChainId,
      },
      dstAsset,
    );
    return {
      price: converted.amount,
      timestamp: Math.min(stored.timestamp, converted.timestamp),
      source: 'stored',
    };
  }

  private async terminal(
    originChainId: number,
    vault: Address,
    dstAsset: Address,
  ): Promise<SharePriceQuote> {
    const decimals = await attempt(() => this.deps.metadata.decimals(dstAsset));
    const dstDecimals = decimals.ok ? decimals.value : WAD_DECIMALS;
    logger.warn(`no share price path for ${originChainId}:${vault}, falling back to 1:1`);
    return { price: pow10(dstDecimals), timestamp: 0, source: 'terminal' };
  }

  // Keep the freshest resolved price as the step-3 fallback; a failed write never fails the query
  private async remember(
    originChainId: number,
    vault: Address,
    dstAsset: Address,
    quote: SharePriceQuote,
  ): Promise<void> {
    const written = await attempt(() =>
      this.locks.run([vaultLockKey(originChainId, vault)], async () => {
        const existing = await this.deps.sharePrices.get(originChainId, vault);
        if (existing && existing.timestamp > quote.timestamp) return;
        const next: StoredSharePrice = {
          sharePrice: quote.price,
          asset: dstAsset,
          assetDecimals: await this.deps.metadata.decimals(dstAsset),
          timestamp: quote.timestamp,
        };
        await this.deps.sharePrices.set(originChainId, vault, next);
      }),
    );
    if (!written.ok) {
      logger.warn(`could not store share price for ${vault}: ${describeError(written.error)}`);
    }
  }
}
