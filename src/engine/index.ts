// Engine module exports

export { PriceResolver, STALENESS_THRESHOLD } from './price-resolver.ts';
export type { PriceResolverOptions } from './price-resolver.ts';
export { AssetConversionEngine, convertAmount } from './asset-conversion.ts';
export type { AssetConversionOptions } from './asset-conversion.ts';
export { AssetMetadata } from './asset-metadata.ts';
export { ShareFallbackChain, SHARE_PRICE_MAX_AGE } from './share-fallback.ts';
export type { ShareFallbackDeps, ShareFallbackOptions, StaleSharePricePolicy } from './share-fallback.ts';
export { VaultShareOracle, MAX_REPORTS } from './share-oracle.ts';
export type { IngestionResult, ShareOracleDeps } from './share-oracle.ts';
export { ReportCollector } from './report-collector.ts';
