export type {
  PriceDatum,
  PriceSourceAdapter,
  AggregatorReader,
  RoundData,
  FeedDeps,
  FeedFactory,
} from './interface.ts';
export { FAILED_READING } from './interface.ts';
export { PeggedAdapter, peggedFactory } from './pegged.ts';
export type { PeggedSelector } from './pegged.ts';
export { ChainlinkAdapter, chainlinkFactory } from './chainlink.ts';
export type { ChainlinkSelector, AggregatorFeed } from './chainlink.ts';
export { CoinGeckoAdapter, coinGeckoFactory, COINGECKO_BASE_URL } from './coingecko.ts';
export type { CoinGeckoSelector } from './coingecko.ts';
export { SequencerMonitor } from './sequencer.ts';
export { FeedRegistry } from './registry.ts';
export type { FeedSelector, CustomSelector } from './registry.ts';
