export {
  MemoryPriceStore,
  MemoryReportStore,
  MemorySharePriceStore,
  MemoryProcessedMessageStore,
  createMemoryStores,
} from './memory.ts';
export {
  RedisPriceStore,
  RedisReportStore,
  RedisSharePriceStore,
  RedisProcessedMessageStore,
  createRedisStores,
} from './redis.ts';
export type { RedisCommands } from './redis.ts';
