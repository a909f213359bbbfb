// interface.ts
import type { Address } from 'viem';
import type { AxiosInstance } from 'axios';
import type { Clock } from '../types/oracle.ts';

// Normalized reading of one price source: a WAD price plus an error flag
export type PriceDatum = {
  price: bigint;
  hadError: boolean;
  inUSD: boolean;
};

export const FAILED_READING: PriceDatum = { price: 0n, hadError: true, inUSD: true };

export interface PriceSourceAdapter {
  readonly id: string;
  getPrice(asset: Address, inUSD: boolean): Promise<PriceDatum>;
  isSupportedAsset(asset: Address): Promise<boolean>;
}

export type RoundData = {
  roundId: bigint;
  answer: bigint;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
};

// Aggregator-style feed contract (price feeds and sequencer uptime feeds)
export interface AggregatorReader {
  latestRoundData(feed: Address): Promise<RoundData>;
  decimals(feed: Address): Promise<number>;
}

// What a feed factory may need to build its adapter
export type FeedDeps = {
  clock: Clock;
  aggregators?: AggregatorReader;
  http?: AxiosInstance;
};

export type FeedFactory<S> = (selector: S, deps: FeedDeps) => PriceSourceAdapter;
