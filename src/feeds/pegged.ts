import type { Address } from 'viem';
import type { FeedFactory, PriceDatum, PriceSourceAdapter } from './interface.ts';
import { FAILED_READING } from './interface.ts';
import { toFixedPoint } from '../utils/fixed-point.ts';
import { toAddress } from '../utils/address.ts';

export type PeggedSelector = {
  kind: 'pegged';
  id?: string;
  assets: { asset: string; usdPegValue: number }[];
};

// Fixed USD value per asset; always answers in USD
export class PeggedAdapter implements PriceSourceAdapter {
  private pegs = new Map<Address, bigint>();

  constructor(
    readonly id: string,
    assets: { asset: string; usdPegValue: number }[],
  ) {
    for (const { asset, usdPegValue } of assets) {
      this.pegs.set(toAddress(asset), toFixedPoint(usdPegValue));
    }
  }

  async getPrice(asset: Address, _inUSD: boolean): Promise<PriceDatum> {
    const price = this.pegs.get(asset);
    if (price === undefined || price === 0n) return FAILED_READING;
    return { price, hadError: false, inUSD: true };
  }

  async isSupportedAsset(asset: Address): Promise<boolean> {
    return this.pegs.has(asset);
  }
}

export const peggedFactory: FeedFactory<PeggedSelector> = (selector) =>
  new PeggedAdapter(selector.id ?? selector.kind, selector.assets);
