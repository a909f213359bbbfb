// Main project index - organized exports

// Wiring
export { createOracleNode, connectRedis } from './node.ts';
export type { OracleNode, OracleNodeDeps } from './node.ts';

// Engine
export * from './engine/index.ts';

// Feeds
export * from './feeds/index.ts';

// Messaging
export * from './messaging/index.ts';

// State
export * from './cache/index.ts';
export type {
  OracleStores,
  PriceStore,
  ProcessedMessageStore,
  ReportStore,
  SharePriceStore,
} from './types/state.ts';

// Chain access
export { ViemAggregatorReader, ViemTokenReader, ViemVaultReader } from './chain/viem.ts';
export type { ContractClient } from './chain/viem.ts';

// Config
export { loadConfig, resolveAndValidate } from './config/load.ts';
export { OracleConfig } from './config/schema.ts';
export type { OracleConfigInput } from './config/schema.ts';
export { EndpointDirectory } from './config/chains.ts';
export { parseHumanDuration } from './config/duration.ts';

// Types
export { ASSET_CATEGORIES, systemClock } from './types/oracle.ts';
export type {
  AssetAmount,
  AssetCategory,
  Clock,
  Conversion,
  Denomination,
  LatestPrice,
  SharePriceQuote,
  SharePriceSource,
  StoredPrice,
  StoredSharePrice,
  TokenReader,
  VaultReader,
  VaultReport,
} from './types/oracle.ts';
export { attempt, err, ok } from './types/result.ts';
export type { Result } from './types/result.ts';

// Errors
export { OracleError, isOracleError, describeError } from './errors.ts';
export type { ErrorCategory, OracleErrorCode } from './errors.ts';

// Utils
export { log, LogLevel } from './utils/logger.ts';
export type { Logger } from './utils/logger.ts';
export { WAD, WAD_DECIMALS, formatFixedPoint, mulDiv, scaleDecimals, toFixedPoint } from './utils/fixed-point.ts';
export { toAddress } from './utils/address.ts';
