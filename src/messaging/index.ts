export { CrossChainMessenger } from './messenger.ts';
export type { CrossChainMessengerDeps, ReceiveOutcome } from './messenger.ts';
export { decodeMessage, encodeMessage, messageTypeOf, MSG_TYPE } from './codec.ts';
export type { MessageTypeName, OracleMessage, ReportsMessage, RequestMessage } from './codec.ts';
export {
  addExecutorLzReceiveOption,
  buildReceiveOption,
  combineOptions,
  decodeOptions,
  executorReceiveTotals,
  isType3,
  newOptions,
} from './options.ts';
export type { ExecutorOption } from './options.ts';
export { ExchangeTracker, REQUEST_TIMEOUT } from './exchanges.ts';
export type { Exchange, PushExchange, RequestExchange } from './exchanges.ts';
export { addressToBytes32, bytes32ToAddress, computeGuid } from './transport.ts';
export type {
  InboundPacket,
  MessagingFee,
  MessagingReceipt,
  MessagingTransport,
  Origin,
} from './transport.ts';
