// Wires stores, feeds, engine and messenger from a validated config

import axios, { type AxiosInstance } from 'axios';
import { Redis } from 'ioredis';
import { createPublicClient, http } from 'viem';
import type { OracleConfig } from './config/schema.ts';
import { EndpointDirectory } from './config/chains.ts';
import { createMemoryStores } from './cache/memory.ts';
import { createRedisStores, type RedisCommands } from './cache/redis.ts';
import { FeedRegistry } from './feeds/registry.ts';
import { SequencerMonitor } from './feeds/sequencer.ts';
import type { AggregatorReader } from './feeds/interface.ts';
import { ViemAggregatorReader, ViemTokenReader, ViemVaultReader, type ContractClient } from './chain/viem.ts';
import { PriceResolver } from './engine/price-resolver.ts';
import { AssetMetadata } from './engine/asset-metadata.ts';
import { AssetConversionEngine } from './engine/asset-conversion.ts';
import { ShareFallbackChain } from './engine/share-fallback.ts';
import { VaultShareOracle } from './engine/share-oracle.ts';
import { ReportCollector } from './engine/report-collector.ts';
import { CrossChainMessenger } from './messaging/messenger.ts';
import { ExchangeTracker } from './messaging/exchanges.ts';
import type { MessagingTransport } from './messaging/transport.ts';
import type { Clock, TokenReader, VaultReader } from './types/oracle.ts';
import { systemClock } from './types/oracle.ts';
import type { OracleStores } from './types/state.ts';
import { log } from './utils/logger.ts';

const logger = log.child('OracleNode');

export type OracleNodeDeps = {
  clock?: Clock;
  // contract access; readers default to viem readers over `client`
  client?: ContractClient;
  vaults?: VaultReader;
  tokens?: TokenReader;
  aggregators?: AggregatorReader;
  // persistence; a client here wins over config.redisUrl
  redis?: RedisCommands;
  http?: AxiosInstance;
  feeds?: FeedRegistry;
  transport?: MessagingTransport;
};

export type OracleNode = {
  config: OracleConfig;
  stores: OracleStores;
  resolver: PriceResolver;
  metadata: AssetMetadata;
  conversion: AssetConversionEngine;
  fallback: ShareFallbackChain;
  oracle: VaultShareOracle;
  collector: ReportCollector;
  endpoints?: EndpointDirectory;
  exchanges?: ExchangeTracker;
  messenger?: CrossChainMessenger;
  close(): Promise<void>;
};

export function connectRedis(url: string, keyPrefix = 'oracle:'): Redis {
  // ioredis auto-connects
  const redis = new Redis(url, { keyPrefix });
  redis.on('error', (err) => {
    log.error('Redis connection error:', err);
  });
  return redis;
}

export function createOracleNode(config: OracleConfig, deps: OracleNodeDeps = {}): OracleNode {
  const clock = deps.clock ?? systemClock;
  const localChainId = config.chainId;

  const client = deps.client ?? (config.rpcUrl ? createPublicClient({ transport: http(config.rpcUrl) }) : undefined);
  const vaults = deps.vaults ?? (client ? new ViemVaultReader(client) : undefined);
  const tokens = deps.tokens ?? (client ? new ViemTokenReader(client) : undefined);
  const aggregators = deps.aggregators ?? (client ? new ViemAggregatorReader(client) : undefined);
  if (!vaults || !tokens) {
    throw new Error('No contract access: set rpcUrl or pass vault and token readers');
  }

  // stores
  let ownedRedis: Redis | undefined;
  let stores: OracleStores;
  const historyDepth = config.reports.historyDepth;
  if (deps.redis) {
    stores = createRedisStores(deps.redis, { historyDepth });
  } else if (config.redisUrl) {
    ownedRedis = connectRedis(config.redisUrl);
    stores = createRedisStores(ownedRedis, { historyDepth });
  } else {
    logger.warn('No Redis configured, state is kept in memory');
    stores = createMemoryStores({ historyDepth });
  }

  // pricing
  const resolver = new PriceResolver(stores.prices, {
    stalenessThreshold: config.pricing.stalenessThreshold,
    clock,
  });
  const feeds = deps.feeds ?? new FeedRegistry();
  const feedDeps = { clock, aggregators, http: deps.http ?? axios.create({ timeout: 10_000 }) };
  for (const { priority, feed } of config.adapters) {
    resolver.addAdapter(feeds.build(feed, feedDeps), priority);
  }
  if (config.pricing.sequencer) {
    if (!aggregators) throw new Error('Sequencer feed configured without contract access');
    const { feed, gracePeriod } = config.pricing.sequencer;
    resolver.setSequencer(new SequencerMonitor(feed, aggregators, gracePeriod, clock));
  }

  const metadata = new AssetMetadata(tokens);
  const conversion = new AssetConversionEngine(resolver, metadata, {
    localChainId,
    ethUsdAsset: config.pricing.ethUsdAsset,
    clock,
  });
  for (const asset of config.assets) {
    conversion.setAssetCategory(asset.address, asset.category);
    if (asset.decimals !== undefined) metadata.prime(asset.address, asset.decimals);
  }
  for (const { chainId, asset, localAsset } of config.crossChainAssets) {
    conversion.setCrossChainAsset(chainId, asset, localAsset);
  }

  const fallback = new ShareFallbackChain(
    { vaults, metadata, conversion, reports: stores.reports, sharePrices: stores.sharePrices },
    {
      localChainId,
      clock,
      sharePriceMaxAge: config.fallback.sharePriceMaxAge,
      staleSharePrice: config.fallback.staleSharePrice,
    },
  );
  const oracle = new VaultShareOracle({
    localChainId,
    resolver,
    conversion,
    metadata,
    fallback,
    reports: stores.reports,
    sharePrices: stores.sharePrices,
  });
  const collector = new ReportCollector(vaults, metadata, localChainId, clock);

  const node: OracleNode = {
    config,
    stores,
    resolver,
    metadata,
    conversion,
    fallback,
    oracle,
    collector,
    async close() {
      if (ownedRedis) await ownedRedis.quit();
    },
  };

  const messaging = config.messaging;
  if (messaging && !deps.transport) {
    logger.warn('Messaging is configured but no transport was supplied, messenger disabled');
  }
  if (messaging && deps.transport) {
    const endpoints = new EndpointDirectory(messaging.endpoints);
    endpoints.set(localChainId, messaging.endpointId);
    const exchanges = new ExchangeTracker(messaging.requestTimeout, clock);
    const messenger = new CrossChainMessenger({
      transport: deps.transport,
      oracle,
      collector,
      processed: stores.processed,
      endpoints,
      exchanges,
    });
    for (const { chainId, peer } of messaging.peers) {
      messenger.setPeer(endpoints.endpointOf(chainId), peer);
    }
    for (const { chainId, msgType, options } of messaging.enforcedOptions) {
      messenger.setEnforcedOptions(endpoints.endpointOf(chainId), msgType, options);
    }
    node.endpoints = endpoints;
    node.exchanges = exchanges;
    node.messenger = messenger;
  }

  logger.info(
    `Oracle node ready on chain ${localChainId} with ${config.adapters.length} adapter(s)${node.messenger ? ', messaging enabled' : ''}`,
  );
  return node;
}
