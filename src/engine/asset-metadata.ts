// Asset metadata resolution, cached per asset for the life of the process

import type { Address } from 'viem';
import type { TokenReader } from '../types/oracle.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('AssetMetadata');

export class AssetMetadata {
  private decimalsCache = new Map<Address, number>();

  constructor(private tokens: TokenReader) {}

  async decimals(asset: Address): Promise<number> {
    const cached = this.decimalsCache.get(asset);
    if (cached !== undefined) return cached;

    const decimals = await this.tokens.decimals(asset);
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 255) {
      throw new Error(`Invalid decimals ${decimals} reported for ${asset}`);
    }
    this.decimalsCache.set(asset, decimals);
    logger.debug(`Cached decimals for ${asset}: ${decimals}`);
    return decimals;
  }

  // known decimals, e.g. from config, skip the read
  prime(asset: Address, decimals: number): void {
    this.decimalsCache.set(asset, decimals);
  }
}
