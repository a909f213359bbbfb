// Builds price-source adapters from config selectors

import { match } from 'ts-pattern';
import type { FeedDeps, FeedFactory, PriceSourceAdapter } from './interface.ts';
import { peggedFactory, type PeggedSelector } from './pegged.ts';
import { chainlinkFactory, type ChainlinkSelector } from './chainlink.ts';
import { coinGeckoFactory, type CoinGeckoSelector } from './coingecko.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('FeedRegistry');

// Feeds provided by an embedding application; params are validated by its factory
export type CustomSelector = {
  kind: 'custom';
  id?: string;
  factory: string;
  params?: unknown;
};

export type FeedSelector = PeggedSelector | ChainlinkSelector | CoinGeckoSelector | CustomSelector;

export class FeedRegistry {
  private custom = new Map<string, FeedFactory<CustomSelector>>();

  register(name: string, factory: FeedFactory<CustomSelector>, { replace = false } = {}) {
    if (!replace && this.custom.has(name)) {
      logger.debug(`Skipping registration of ${name} - already exists`);
      return;
    }
    logger.debug(`Registering custom feed ${name}`);
    this.custom.set(name, factory);
  }

  registered(): string[] {
    return Array.from(this.custom.keys());
  }

  build(selector: FeedSelector, deps: FeedDeps): PriceSourceAdapter {
    return match(selector)
      .with({ kind: 'pegged' }, (s) => peggedFactory(s, deps))
      .with({ kind: 'chainlink' }, (s) => chainlinkFactory(s, deps))
      .with({ kind: 'coingecko' }, (s) => coinGeckoFactory(s, deps))
      .with({ kind: 'custom' }, (s) => {
        const factory = this.custom.get(s.factory);
        if (!factory) {
          const available = this.registered().join(', ') || 'none';
          throw new Error(`Unknown custom feed: ${s.factory}. Available: ${available}`);
        }
        return factory(s, deps);
      })
      .exhaustive();
  }
}
