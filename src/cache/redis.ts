// Redis-backed stores via raw calls. Keys are namespaced by the client's keyPrefix.

import type { Address, Hex } from 'viem';
import type { StoredPrice, StoredSharePrice, VaultReport } from '../types/oracle.ts';
import type {
  OracleStores,
  PriceStore,
  ProcessedMessageStore,
  ReportStore,
  SharePriceStore,
} from '../types/state.ts';
import { stringifyWithBigInt } from '../utils/bigint.ts';
import { log } from '../utils/logger.ts';
import { decodeStoredPrice, decodeStoredSharePrice, decodeVaultReport } from './records.ts';

// The slice of ioredis these stores use; an ioredis `Redis` satisfies it
export interface RedisCommands {
  call(command: string, ...args: (string | number)[]): Promise<unknown>;
}

const logger = log.child('RedisStore');

function asString(reply: unknown): string | null {
  if (reply == null) return null;
  if (typeof reply === 'string') return reply;
  if (Buffer.isBuffer(reply)) return reply.toString('utf8');
  throw new Error(`Unexpected Redis reply: ${typeof reply}`);
}

function asStrings(reply: unknown): string[] {
  if (!Array.isArray(reply)) throw new Error(`Unexpected Redis reply: ${typeof reply}`);
  return reply.map((item) => asString(item) ?? '');
}

function asInteger(reply: unknown): number {
  if (typeof reply === 'number') return reply;
  if (typeof reply === 'string' && /^-?\d+$/.test(reply)) return Number(reply);
  throw new Error(`Unexpected Redis reply: ${typeof reply}`);
}

export class RedisPriceStore implements PriceStore {
  constructor(private redis: RedisCommands) {}

  private key(asset: Address) {
    return `price:${asset}`;
  }

  async get(asset: Address): Promise<StoredPrice | null> {
    const raw = asString(await this.redis.call('GET', this.key(asset)));
    return raw == null ? null : decodeStoredPrice(raw);
  }

  async set(asset: Address, price: StoredPrice): Promise<void> {
    await this.redis.call('SET', this.key(asset), stringifyWithBigInt(price));
  }
}

export class RedisReportStore implements ReportStore {
  constructor(
    private redis: RedisCommands,
    private historyDepth = 1,
  ) {
    if (!Number.isInteger(historyDepth) || historyDepth < 1) {
      throw new RangeError(`historyDepth must be a positive integer, got ${historyDepth}`);
    }
  }

  private key(chainId: number, vault: Address) {
    return `report:${chainId}:${vault}`;
  }

  async latest(chainId: number, vault: Address): Promise<VaultReport | null> {
    const raw = asString(await this.redis.call('LINDEX', this.key(chainId, vault), 0));
    return raw == null ? null : decodeVaultReport(raw);
  }

  async history(chainId: number, vault: Address): Promise<VaultReport[]> {
    const raws = asStrings(await this.redis.call('LRANGE', this.key(chainId, vault), 0, -1));
    return raws.map(decodeVaultReport);
  }

  // Callers validate the whole batch first; the writes below are plain data
  async putMany(reports: VaultReport[]): Promise<void> {
    for (const report of reports) {
      const key = this.key(report.originChainId, report.vaultAddress);
      await this.redis.call('LPUSH', key, stringifyWithBigInt(report));
      await this.redis.call('LTRIM', key, 0, this.historyDepth - 1);
    }
    logger.debug(`stored ${reports.length} report(s)`);
  }
}

export class RedisSharePriceStore implements SharePriceStore {
  constructor(private redis: RedisCommands) {}

  private key(chainId: number, vault: Address) {
    return `shareprice:${chainId}:${vault}`;
  }

  async get(chainId: number, vault: Address): Promise<StoredSharePrice | null> {
    const raw = asString(await this.redis.call('GET', this.key(chainId, vault)));
    return raw == null ? null : decodeStoredSharePrice(raw);
  }

  async set(chainId: number, vault: Address, value: StoredSharePrice): Promise<void> {
    await this.redis.call('SET', this.key(chainId, vault), stringifyWithBigInt(value));
  }
}

export class RedisProcessedMessageStore implements ProcessedMessageStore {
  private static readonly KEY = 'processed:guids';

  constructor(private redis: RedisCommands) {}

  async claim(guid: Hex): Promise<boolean> {
    // SADD answers 1 only for a member that was not there yet
    return asInteger(await this.redis.call('SADD', RedisProcessedMessageStore.KEY, guid)) === 1;
  }

  async release(guid: Hex): Promise<void> {
    await this.redis.call('SREM', RedisProcessedMessageStore.KEY, guid);
  }

  async has(guid: Hex): Promise<boolean> {
    return asInteger(await this.redis.call('SISMEMBER', RedisProcessedMessageStore.KEY, guid)) === 1;
  }
}

export function createRedisStores(
  redis: RedisCommands,
  opts: { historyDepth?: number } = {},
): OracleStores {
  return {
    prices: new RedisPriceStore(redis),
    reports: new RedisReportStore(redis, opts.historyDepth),
    sharePrices: new RedisSharePriceStore(redis),
    processed: new RedisProcessedMessageStore(redis),
  };
}
