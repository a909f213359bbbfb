// Price resolution over a priority-ordered list of price sources
//
// Debug logging shows every adapter tried and why it was skipped.
// To enable it, set LOG_LEVEL=debug in environment

import type { Address } from 'viem';
import type { PriceSourceAdapter } from '../feeds/interface.ts';
import type { SequencerMonitor } from '../feeds/sequencer.ts';
import type { Clock, LatestPrice, StoredPrice } from '../types/oracle.ts';
import { systemClock } from '../types/oracle.ts';
import type { PriceStore } from '../types/state.ts';
import { OracleError, describeError } from '../errors.ts';
import { MAX_STORED_PRICE, formatFixedPoint } from '../utils/fixed-point.ts';
import { KeyedLock } from '../utils/keyed-lock.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('PriceResolver');

export const STALENESS_THRESHOLD = 24 * 60 * 60;

export type PriceResolverOptions = {
  stalenessThreshold?: number;
  clock?: Clock;
  sequencer?: SequencerMonitor;
};

type AdapterEntry = { adapter: PriceSourceAdapter; priority: number };

export class PriceResolver {
  // sorted by ascending priority; lower number is tried first
  private adapters: AdapterEntry[] = [];
  private sequencer?: SequencerMonitor;
  private readonly clock: Clock;
  private readonly writes = new KeyedLock();
  readonly stalenessThreshold: number;

  constructor(
    private store: PriceStore,
    opts: PriceResolverOptions = {},
  ) {
    this.clock = opts.clock ?? systemClock;
    this.stalenessThreshold = opts.stalenessThreshold ?? STALENESS_THRESHOLD;
    this.sequencer = opts.sequencer;
  }

  addAdapter(adapter: PriceSourceAdapter, priority: number): void {
    if (!Number.isInteger(priority) || priority < 0) {
      throw new OracleError('InvalidPriority', `priority must be a non-negative integer, got ${priority}`);
    }
    if (this.adapters.some((e) => e.adapter.id === adapter.id)) {
      throw new OracleError('AdapterAlreadyExists', `adapter ${adapter.id} is already configured`);
    }
    const clash = this.adapters.find((e) => e.priority === priority);
    if (clash) {
      throw new OracleError(
        'AdapterAlreadyExists',
        `priority ${priority} is already held by ${clash.adapter.id}`,
      );
    }
    this.adapters.push({ adapter, priority });
    this.adapters.sort((a, b) => a.priority - b.priority);
    logger.debug(`Added adapter ${adapter.id} at priority ${priority}`);
  }

  removeAdapter(id: string): void {
    const index = this.adapters.findIndex((e) => e.adapter.id === id);
    if (index === -1) {
      throw new OracleError('AdapterNotFound', `no adapter with id ${id}`);
    }
    // splice keeps the remaining adapters in their relative order
    this.adapters.splice(index, 1);
    logger.debug(`Removed adapter ${id}`);
  }

  listAdapters(): { id: string; priority: number }[] {
    return this.adapters.map((e) => ({ id: e.adapter.id, priority: e.priority }));
  }

  setSequencer(sequencer: SequencerMonitor | undefined): void {
    this.sequencer = sequencer;
  }

  async getLatestPrice(asset: Address, wantUSD: boolean): Promise<LatestPrice> {
    if (this.sequencer) await this.sequencer.assertHealthy();

    if (this.adapters.length === 0) {
      throw new OracleError('NoAdaptersConfigured', 'no price adapters configured');
    }

    const now = this.clock();
    for (const { adapter, priority } of this.adapters) {
      try {
        if (!(await adapter.isSupportedAsset(asset))) {
          logger.silly(`${adapter.id} does not support ${asset}`);
          continue;
        }
        const datum = await adapter.getPrice(asset, wantUSD);
        if (!datum.hadError && datum.price > 0n) {
          logger.debug(
            `${asset} priced by ${adapter.id} (priority ${priority}): ${formatFixedPoint(datum.price)} ${datum.inUSD ? 'USD' : 'ETH'}`,
          );
          return { price: datum.price, timestamp: now, isUSD: datum.inUSD };
        }
        logger.debug(`${adapter.id} returned no usable price for ${asset}`);
      } catch (error) {
        logger.warn(`${adapter.id} failed for ${asset}: ${describeError(error)}`);
      }
    }

    const cached = await this.store.get(asset);
    if (cached && now - cached.timestamp <= this.stalenessThreshold) {
      logger.debug(`${asset} served from stored price at ${cached.timestamp}`);
      return {
        price: cached.price,
        timestamp: cached.timestamp,
        isUSD: cached.denomination === 'USD',
      };
    }

    throw new OracleError('NoValidPrice', `no live or cached price for ${asset}`, {
      asset,
      cachedAt: cached?.timestamp,
    });
  }

  /**
   * Resolve and persist the latest price. The stored price never moves back in time.
   */
  async updatePrice(asset: Address, wantUSD: boolean): Promise<StoredPrice> {
    const latest = await this.getLatestPrice(asset, wantUSD);
    if (latest.price > MAX_STORED_PRICE) {
      throw new OracleError('InvalidPrice', `price for ${asset} exceeds 240 bits`);
    }

    return this.writes.run([asset], async () => {
      const existing = await this.store.get(asset);
      if (existing && existing.timestamp >= latest.timestamp) return existing;

      const next: StoredPrice = {
        price: latest.price,
        timestamp: latest.timestamp,
        denomination: latest.isUSD ? 'USD' : 'ETH',
      };
      await this.store.set(asset, next);
      logger.info(`Stored price for ${asset}: ${formatFixedPoint(next.price)} ${next.denomination}`);
      return next;
    });
  }
}
