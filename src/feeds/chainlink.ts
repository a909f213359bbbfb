import type { Address } from 'viem';
import type { Clock, Denomination } from '../types/oracle.ts';
import type {
  AggregatorReader,
  FeedFactory,
  PriceDatum,
  PriceSourceAdapter,
  RoundData,
} from './interface.ts';
import { FAILED_READING } from './interface.ts';
import { MAX_STORED_PRICE, WAD_DECIMALS, scaleDecimals } from '../utils/fixed-point.ts';
import { toAddress } from '../utils/address.ts';
import { describeError } from '../errors.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('ChainlinkAdapter');

export type AggregatorFeed = {
  asset: string;
  aggregator: string;
  denomination: Denomination;
  heartbeat: number; // seconds
};

export type ChainlinkSelector = {
  kind: 'chainlink';
  id?: string;
  feeds: AggregatorFeed[];
};

type ResolvedFeed = { aggregator: Address; denomination: Denomination; heartbeat: number };

/**
 * Reads aggregator rounds. A reading is flagged as failed when the answer is
 * not positive, the round is incomplete or older than the feed heartbeat.
 */
export class ChainlinkAdapter implements PriceSourceAdapter {
  private feeds = new Map<Address, ResolvedFeed[]>();
  private decimalsCache = new Map<Address, number>();

  constructor(
    readonly id: string,
    feeds: AggregatorFeed[],
    private reader: AggregatorReader,
    private clock: Clock,
  ) {
    for (const feed of feeds) {
      const asset = toAddress(feed.asset);
      const list = this.feeds.get(asset) ?? [];
      list.push({
        aggregator: toAddress(feed.aggregator),
        denomination: feed.denomination,
        heartbeat: feed.heartbeat,
      });
      this.feeds.set(asset, list);
    }
  }

  async isSupportedAsset(asset: Address): Promise<boolean> {
    return this.feeds.has(asset);
  }

  async getPrice(asset: Address, inUSD: boolean): Promise<PriceDatum> {
    const candidates = this.feeds.get(asset);
    if (!candidates) return FAILED_READING;

    // requested denomination first, the other one as a second choice
    const wanted: Denomination = inUSD ? 'USD' : 'ETH';
    const ordered = [
      ...candidates.filter((f) => f.denomination === wanted),
      ...candidates.filter((f) => f.denomination !== wanted),
    ];

    for (const feed of ordered) {
      const reading = await this.read(feed);
      if (!reading.hadError) return reading;
    }
    return FAILED_READING;
  }

  private async read(feed: ResolvedFeed): Promise<PriceDatum> {
    const inUSD = feed.denomination === 'USD';
    let round: RoundData;
    let decimals: number;
    try {
      round = await this.reader.latestRoundData(feed.aggregator);
      decimals = await this.feedDecimals(feed.aggregator);
    } catch (error) {
      logger.debug(`read of ${feed.aggregator} failed: ${describeError(error)}`);
      return { ...FAILED_READING, inUSD };
    }

    if (round.answer <= 0n || round.updatedAt === 0n || round.answeredInRound < round.roundId) {
      logger.debug(`incomplete round on ${feed.aggregator}`);
      return { ...FAILED_READING, inUSD };
    }
    if (BigInt(this.clock()) - round.updatedAt > BigInt(feed.heartbeat)) {
      logger.debug(`stale round on ${feed.aggregator}, updatedAt=${round.updatedAt}`);
      return { ...FAILED_READING, inUSD };
    }

    const price = scaleDecimals(round.answer, decimals, WAD_DECIMALS);
    if (price === 0n || price > MAX_STORED_PRICE) return { ...FAILED_READING, inUSD };
    return { price, hadError: false, inUSD };
  }

  private async feedDecimals(aggregator: Address): Promise<number> {
    const cached = this.decimalsCache.get(aggregator);
    if (cached !== undefined) return cached;
    const decimals = await this.reader.decimals(aggregator);
    this.decimalsCache.set(aggregator, decimals);
    return decimals;
  }
}

export const chainlinkFactory: FeedFactory<ChainlinkSelector> = (selector, deps) => {
  if (!deps.aggregators) {
    throw new Error(`chainlink feed '${selector.id ?? selector.kind}' needs an aggregator reader`);
  }
  return new ChainlinkAdapter(
    selector.id ?? selector.kind,
    selector.feeds,
    deps.aggregators,
    deps.clock,
  );
};
