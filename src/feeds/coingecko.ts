import type { Address } from 'viem';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { FeedFactory, PriceDatum, PriceSourceAdapter } from './interface.ts';
import { FAILED_READING } from './interface.ts';
import { MAX_STORED_PRICE, toFixedPoint } from '../utils/fixed-point.ts';
import { toAddress } from '../utils/address.ts';
import { describeError } from '../errors.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('CoinGeckoAdapter');

export const COINGECKO_BASE_URL = 'https://pro-api.coingecko.com/api/v3';

export type CoinGeckoSelector = {
  kind: 'coingecko';
  id?: string;
  baseUrl?: string;
  apiKey?: string;
  ids: { asset: string; coingeckoId: string }[];
};

const SimplePriceResponse = z.record(
  z.string(),
  z.object({ usd: z.number().optional(), eth: z.number().optional() }),
);

// Spot price per coin id from /simple/price, in usd with eth as the alternative
export class CoinGeckoAdapter implements PriceSourceAdapter {
  private coinIds = new Map<Address, string>();

  constructor(
    readonly id: string,
    ids: { asset: string; coingeckoId: string }[],
    private http: AxiosInstance,
    private opts: { baseUrl?: string; apiKey?: string } = {},
  ) {
    for (const entry of ids) this.coinIds.set(toAddress(entry.asset), entry.coingeckoId);
  }

  async isSupportedAsset(asset: Address): Promise<boolean> {
    return this.coinIds.has(asset);
  }

  async getPrice(asset: Address, inUSD: boolean): Promise<PriceDatum> {
    const coinId = this.coinIds.get(asset);
    if (!coinId) return FAILED_READING;

    let quote: { usd?: number; eth?: number } | undefined;
    try {
      const r = await this.http.get(`${this.opts.baseUrl ?? COINGECKO_BASE_URL}/simple/price`, {
        params: { ids: coinId, vs_currencies: 'usd,eth' },
        headers: {
          accept: 'application/json',
          ...(this.opts.apiKey ? { 'x-cg-pro-api-key': this.opts.apiKey } : {}),
        },
      });
      quote = SimplePriceResponse.parse(r.data)[coinId];
    } catch (error) {
      logger.warn(`Failed to fetch price for ${coinId}: ${describeError(error)}`);
      return FAILED_READING;
    }

    const preferred = inUSD ? quote?.usd : quote?.eth;
    const alternative = inUSD ? quote?.eth : quote?.usd;
    const value = preferred ?? alternative;
    if (value === undefined || !(value > 0)) return FAILED_READING;

    const price = toFixedPoint(value);
    if (price === 0n || price > MAX_STORED_PRICE) return FAILED_READING;
    return { price, hadError: false, inUSD: preferred !== undefined ? inUSD : !inUSD };
  }
}

export const coinGeckoFactory: FeedFactory<CoinGeckoSelector> = (selector, deps) => {
  if (!deps.http) {
    throw new Error(`coingecko feed '${selector.id ?? selector.kind}' needs an http client`);
  }
  return new CoinGeckoAdapter(selector.id ?? selector.kind, selector.ids, deps.http, {
    baseUrl: selector.baseUrl,
    apiKey: selector.apiKey,
  });
};
