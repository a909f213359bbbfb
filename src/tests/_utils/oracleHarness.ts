import { createMemoryStores } from '../../cache/memory.ts';
import { PriceResolver } from '../../engine/price-resolver.ts';
import { AssetMetadata } from '../../engine/asset-metadata.ts';
import { AssetConversionEngine } from '../../engine/asset-conversion.ts';
import { ShareFallbackChain, type StaleSharePricePolicy } from '../../engine/share-fallback.ts';
import { VaultShareOracle } from '../../engine/share-oracle.ts';
import { ReportCollector } from '../../engine/report-collector.ts';
import type { OracleStores } from '../../types/state.ts';
import { WAD } from '../../utils/fixed-point.ts';
import { ManualClock } from './clock.ts';
import { StaticAdapter } from './fakeAdapters.ts';
import { FakeTokens, FakeVaults } from './fakeChain.ts';
import { DAI, USDC, USDT_18, WETH } from './addresses.ts';

export const LOCAL_CHAIN = 1;
export const REMOTE_CHAIN = 137;

/**
 * Oracle stack over memory stores, stablecoins priced at 1 USD and WETH at 2000.
 */
export function buildOracle(
  opts: {
    localChainId?: number;
    clock?: ManualClock;
    stores?: OracleStores;
    staleSharePrice?: StaleSharePricePolicy;
  } = {},
) {
  const localChainId = opts.localChainId ?? LOCAL_CHAIN;
  const clock = opts.clock ?? new ManualClock();
  const stores = opts.stores ?? createMemoryStores();
  const prices = new StaticAdapter('static').set(USDC, WAD).set(DAI, WAD).set(USDT_18, WAD).set(WETH, 2000n * WAD);
  const tokens = new FakeTokens([
    [USDC, 6],
    [DAI, 18],
    [USDT_18, 18],
    [WETH, 18],
  ]);
  const vaults = new FakeVaults();

  const resolver = new PriceResolver(stores.prices, { clock: clock.clock });
  resolver.addAdapter(prices, 1);
  const metadata = new AssetMetadata(tokens);
  const conversion = new AssetConversionEngine(resolver, metadata, {
    localChainId,
    ethUsdAsset: WETH,
    clock: clock.clock,
  });
  for (const a of [USDC, DAI, USDT_18]) conversion.setAssetCategory(a, 'STABLE');
  conversion.setAssetCategory(WETH, 'ETH_LIKE');

  const fallback = new ShareFallbackChain(
    { vaults, metadata, conversion, reports: stores.reports, sharePrices: stores.sharePrices },
    { localChainId, clock: clock.clock, staleSharePrice: opts.staleSharePrice },
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
  const collector = new ReportCollector(vaults, metadata, localChainId, clock.clock);

  return { clock, stores, prices, tokens, vaults, resolver, metadata, conversion, fallback, oracle, collector };
}
