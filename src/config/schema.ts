// config/schema.ts
import { z } from 'zod';
import { getAddress, isAddress, isHex, size, type Hex } from 'viem';
import { ASSET_CATEGORIES } from '../types/oracle.ts';
import { durationSeconds } from './duration.ts';

// ------------------------------------------------------------
// PRIMITIVES
// ------------------------------------------------------------

// EVM address, checksummed
export const EvmAddress = z
  .string()
  .refine((s) => isAddress(s, { strict: false }), { message: 'Invalid EVM address' })
  .transform((s) => getAddress(s));

export const Bytes32 = z.custom<Hex>(
  (v) => typeof v === 'string' && isHex(v) && size(v) === 32,
  { message: 'Expected a 32-byte hex string' },
);

export const HexBytes = z.custom<Hex>((v) => typeof v === 'string' && isHex(v), {
  message: 'Expected a hex string',
});

const ChainId = z.number().int().positive();
const EndpointId = z.number().int().positive();

// ------------------------------------------------------------
// FEED SELECTORS
// ------------------------------------------------------------

export const PeggedFeed = z.object({
  kind: z.literal('pegged'),
  id: z.string().min(1).optional(),
  assets: z
    .array(z.object({ asset: EvmAddress, usdPegValue: z.number().positive() }))
    .min(1),
});

export const ChainlinkFeed = z.object({
  kind: z.literal('chainlink'),
  id: z.string().min(1).optional(),
  feeds: z
    .array(
      z.object({
        asset: EvmAddress,
        aggregator: EvmAddress,
        denomination: z.enum(['USD', 'ETH']).default('USD'),
        heartbeat: durationSeconds(1),
      }),
    )
    .min(1),
});

export const CoinGeckoFeed = z.object({
  kind: z.literal('coingecko'),
  id: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().optional(),
  ids: z.array(z.object({ asset: EvmAddress, coingeckoId: z.string().min(1) })).min(1),
});

// Feeds registered at runtime by the embedding application
export const CustomFeed = z.object({
  kind: z.literal('custom'),
  id: z.string().min(1).optional(),
  factory: z.string().min(1),
  params: z.unknown().optional(),
});

export const FeedSelector = z.discriminatedUnion('kind', [
  PeggedFeed,
  ChainlinkFeed,
  CoinGeckoFeed,
  CustomFeed,
]);

// ------------------------------------------------------------
// ORACLE CONFIG
// ------------------------------------------------------------

export const PricingConfig = z.object({
  stalenessThreshold: durationSeconds().default(24 * 60 * 60),
  ethUsdAsset: EvmAddress.optional(),
  sequencer: z
    .object({
      feed: EvmAddress,
      gracePeriod: durationSeconds().default(60 * 60),
    })
    .optional(),
});

export const AssetEntry = z.object({
  address: EvmAddress,
  category: z.enum(ASSET_CATEGORIES),
  // skips the on-chain decimals read when given
  decimals: z.number().int().min(0).max(255).optional(),
});

export const CrossChainAssetEntry = z.object({
  chainId: ChainId,
  asset: EvmAddress,
  localAsset: EvmAddress,
});

export const AdapterEntry = z.object({
  priority: z.number().int().nonnegative(),
  feed: FeedSelector,
});

export const FallbackConfig = z.object({
  sharePriceMaxAge: durationSeconds().default(24 * 60 * 60),
  staleSharePrice: z.enum(['reject', 'serve']).default('reject'),
});

export const ReportsConfig = z.object({
  historyDepth: z.number().int().positive().default(1),
});

export const MessagingConfig = z.object({
  endpointId: EndpointId,
  endpoints: z.array(z.object({ chainId: ChainId, endpointId: EndpointId })).default([]),
  peers: z.array(z.object({ chainId: ChainId, peer: Bytes32 })).default([]),
  enforcedOptions: z
    .array(
      z.object({
        chainId: ChainId,
        msgType: z.enum(['AB', 'ABA']),
        options: HexBytes,
      }),
    )
    .default([]),
  requestTimeout: durationSeconds(1).default(60 * 60),
});

export const OracleConfig = z.object({
  chainId: ChainId,
  rpcUrl: z.string().url().optional(),
  redisUrl: z.string().optional(),
  pricing: PricingConfig.prefault({}),
  assets: z.array(AssetEntry).default([]),
  crossChainAssets: z.array(CrossChainAssetEntry).default([]),
  adapters: z.array(AdapterEntry).default([]),
  fallback: FallbackConfig.prefault({}),
  reports: ReportsConfig.prefault({}),
  messaging: MessagingConfig.optional(),
});

export type OracleConfig = z.infer<typeof OracleConfig>;
export type OracleConfigInput = z.input<typeof OracleConfig>;
export type FeedSelectorConfig = z.infer<typeof FeedSelector>;
