// Converts amounts between assets using category classification and decimal normalization
//
// Paths, cheapest first:
// - same asset (or a remote asset mapped to the destination): decimals only
// - same category: both legs priced in the category's natural unit
// - otherwise: both legs through USD

import type { Address } from 'viem';
import type { AssetAmount, AssetCategory, Clock, Conversion } from '../types/oracle.ts';
import { systemClock } from '../types/oracle.ts';
import type { PriceResolver } from './price-resolver.ts';
import type { AssetMetadata } from './asset-metadata.ts';
import { OracleError } from '../errors.ts';
import { toAddress } from '../utils/address.ts';
import { WAD, WAD_DECIMALS, mulDiv, pow10, scaleDecimals } from '../utils/fixed-point.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('AssetConversion');

type UsdPrice = { price: bigint; timestamp: number };

export type AssetConversionOptions = {
  localChainId: number;
  // asset whose USD price turns ETH-denominated prices into USD
  ethUsdAsset?: Address;
  clock?: Clock;
};

/**
 * amount * srcPrice / dstPrice, rescaled from srcDecimals to dstDecimals with a
 * single truncating division.
 */
export function convertAmount(
  amount: bigint,
  srcPrice: bigint,
  dstPrice: bigint,
  srcDecimals: number,
  dstDecimals: number,
): bigint {
  if (dstDecimals >= srcDecimals) {
    return mulDiv(amount * pow10(dstDecimals - srcDecimals), srcPrice, dstPrice);
  }
  return mulDiv(amount, srcPrice, dstPrice * pow10(srcDecimals - dstDecimals));
}

export class AssetConversionEngine {
  private categories = new Map<Address, AssetCategory>();
  private crossChain = new Map<string, Address>();
  private readonly clock: Clock;
  readonly localChainId: number;
  private ethUsdAsset?: Address;

  constructor(
    private resolver: PriceResolver,
    private metadata: AssetMetadata,
    opts: AssetConversionOptions,
  ) {
    this.localChainId = opts.localChainId;
    this.ethUsdAsset = opts.ethUsdAsset;
    this.clock = opts.clock ?? systemClock;
  }

  setAssetCategory(asset: Address, category: AssetCategory): void {
    this.categories.set(toAddress(asset), category);
  }

  getAssetCategory(asset: Address): AssetCategory {
    return this.categories.get(toAddress(asset)) ?? 'UNKNOWN';
  }

  setCrossChainAsset(chainId: number, asset: Address, localAsset: Address): void {
    if (chainId === this.localChainId) {
      throw new OracleError('InvalidChainId', 'cross-chain mappings need a remote chain id');
    }
    this.crossChain.set(`${chainId}:${toAddress(asset)}`, toAddress(localAsset));
  }

  localEquivalent(chainId: number, asset: Address): Address | undefined {
    const key = toAddress(asset);
    if (chainId === this.localChainId) return key;
    return this.crossChain.get(`${chainId}:${key}`);
  }

  setEthUsdAsset(asset: Address | undefined): void {
    this.ethUsdAsset = asset;
  }

  async convert(amount: AssetAmount, target: Address): Promise<Conversion> {
    const from = { ...amount, asset: toAddress(amount.asset) };
    const to = toAddress(target);
    const dstDecimals = await this.metadata.decimals(to);

    let srcAsset = from.asset;
    if (from.chainId !== this.localChainId) {
      const mapped = this.crossChain.get(`${from.chainId}:${from.asset}`);
      if (mapped) {
        logger.debug(`${from.chainId}:${from.asset} maps to local ${mapped}`);
        srcAsset = mapped;
      }
    }
    const isLocal = from.chainId === this.localChainId || srcAsset !== from.asset;

    if (isLocal && srcAsset === to) {
      return {
        amount: scaleDecimals(from.amount, from.decimals, dstDecimals),
        timestamp: this.clock(),
      };
    }

    const srcCategory = this.getAssetCategory(srcAsset);
    const dstCategory = this.getAssetCategory(to);
    if (srcCategory === 'UNKNOWN' || dstCategory === 'UNKNOWN') {
      throw new OracleError(
        'InvalidAssetType',
        `cannot price ${srcAsset} (${srcCategory}) into ${to} (${dstCategory})`,
      );
    }

    if (srcCategory === dstCategory) {
      const wantUSD = srcCategory !== 'ETH_LIKE';
      const src = await this.resolver.getLatestPrice(srcAsset, wantUSD);
      const dst = await this.resolver.getLatestPrice(to, wantUSD);
      if (src.isUSD === dst.isUSD) {
        assertPriced(srcAsset, src.price);
        assertPriced(to, dst.price);
        logger.debug(`${srcAsset} -> ${to} within ${srcCategory}`);
        return {
          amount: convertAmount(from.amount, src.price, dst.price, from.decimals, dstDecimals),
          timestamp: Math.min(src.timestamp, dst.timestamp),
        };
      }
      logger.debug(`${srcAsset} and ${to} priced in different units, going through USD`);
    }

    const srcUsd = await this.usdPrice(srcAsset);
    const dstUsd = await this.usdPrice(to);
    const value = mulDiv(scaleDecimals(from.amount, from.decimals, WAD_DECIMALS), srcUsd.price, WAD);
    const amount18 = mulDiv(value, WAD, dstUsd.price);
    logger.debug(`${srcAsset} -> ${to} through USD`);
    return {
      amount: scaleDecimals(amount18, WAD_DECIMALS, dstDecimals),
      timestamp: Math.min(srcUsd.timestamp, dstUsd.timestamp),
    };
  }

  private async usdPrice(asset: Address): Promise<UsdPrice> {
    const quote = await this.resolver.getLatestPrice(asset, true);
    assertPriced(asset, quote.price);
    if (quote.isUSD) return { price: quote.price, timestamp: quote.timestamp };

    if (!this.ethUsdAsset) {
      throw new OracleError('NoValidPrice', `${asset} is only priced in ETH and no ETH/USD asset is set`);
    }
    const eth = await this.resolver.getLatestPrice(this.ethUsdAsset, true);
    if (!eth.isUSD) {
      throw new OracleError('NoValidPrice', `no USD price for ${this.ethUsdAsset}`);
    }
    assertPriced(this.ethUsdAsset, eth.price);
    return {
      price: mulDiv(quote.price, eth.price, WAD),
      timestamp: Math.min(quote.timestamp, eth.timestamp),
    };
  }
}

function assertPriced(asset: Address, price: bigint): void {
  if (price <= 0n) {
    throw new OracleError('NoValidPrice', `zero price for ${asset}`);
  }
}
