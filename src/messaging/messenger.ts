// Cross-chain report propagation
//
// Outbound: collect local reports (AB) or ask a peer for its reports (ABA).
// Inbound: authenticate the peer, claim the guid, then apply. A failure after
// the claim releases it so the same delivery can be retried.

import { isHex, size, type Address, type Hex } from 'viem';
import { match } from 'ts-pattern';
import type { EndpointDirectory } from '../config/chains.ts';
import type { ReportCollector } from '../engine/report-collector.ts';
import type { IngestionResult, VaultShareOracle } from '../engine/share-oracle.ts';
import { MAX_REPORTS } from '../engine/share-oracle.ts';
import type { ProcessedMessageStore } from '../types/state.ts';
import type { VaultReport } from '../types/oracle.ts';
import { OracleError, describeError } from '../errors.ts';
import { decodeMessage, encodeMessage, MSG_TYPE } from './codec.ts';
import type { MessageTypeName } from './codec.ts';
import { combineOptions, isType3 } from './options.ts';
import type { Exchange, ExchangeTracker } from './exchanges.ts';
import type { InboundPacket, MessagingFee, MessagingReceipt, MessagingTransport } from './transport.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('Messenger');

const ZERO_BYTES32: Hex = `0x${'0'.repeat(64)}`;

export type CrossChainMessengerDeps = {
  transport: MessagingTransport;
  oracle: VaultShareOracle;
  collector: ReportCollector;
  processed: ProcessedMessageStore;
  endpoints: EndpointDirectory;
  exchanges: ExchangeTracker;
};

export type ReceiveOutcome =
  | { type: 'AB'; originChainId: number; ingested: IngestionResult }
  | { type: 'ABA'; originChainId: number; response: MessagingReceipt };

type Prepared = { dstEid: number; message: Hex; options: Hex };

export class CrossChainMessenger {
  // eid -> lowercased bytes32 peer
  private peers = new Map<number, string>();
  private enforced = new Map<string, Hex>();

  constructor(private deps: CrossChainMessengerDeps) {}

  // --- peers and options ---

  setPeer(eid: number, peer: Hex): void {
    if (!isHex(peer) || size(peer) !== 32) {
      throw new OracleError('InvalidAddress', `peer for eid ${eid} must be 32 bytes`);
    }
    if (peer.toLowerCase() === ZERO_BYTES32) {
      this.peers.delete(eid);
      logger.info(`Cleared peer for eid ${eid}`);
      return;
    }
    this.peers.set(eid, peer.toLowerCase());
    logger.info(`Set peer for eid ${eid}: ${peer}`);
  }

  peerOf(eid: number): string | undefined {
    return this.peers.get(eid);
  }

  setEnforcedOptions(eid: number, msgType: MessageTypeName, options: Hex): void {
    if (options === '0x') {
      this.enforced.delete(enforcedKey(eid, msgType));
      return;
    }
    if (!isType3(options)) {
      throw new OracleError('InvalidOptions', `enforced options for eid ${eid} must be type 3`);
    }
    this.enforced.set(enforcedKey(eid, msgType), options);
  }

  combineOptions(eid: number, msgType: MessageTypeName, extra: Hex): Hex {
    return combineOptions(this.enforced.get(enforcedKey(eid, msgType)), extra);
  }

  // --- outbound ---

  async quoteSendReports(
    dstChainId: number,
    vaults: Address[],
    options: Hex,
    rewardsDelegate: Address,
  ): Promise<MessagingFee> {
    const prepared = await this.prepareReports(dstChainId, vaults, options, rewardsDelegate);
    return this.deps.transport.quote(prepared.dstEid, prepared.message, prepared.options);
  }

  async quoteRequestReports(
    dstChainId: number,
    vaults: Address[],
    options: Hex,
    returnOptions: Hex,
    rewardsDelegate: Address,
  ): Promise<MessagingFee> {
    const prepared = this.prepareRequest(dstChainId, vaults, options, returnOptions, rewardsDelegate);
    return this.deps.transport.quote(prepared.dstEid, prepared.message, prepared.options);
  }

  /**
   * Push fresh reports for local vaults to `dstChainId`. `value` is the native
   * amount the caller pays with and must cover the quoted fee.
   */
  async sendReports(
    dstChainId: number,
    vaults: Address[],
    options: Hex,
    rewardsDelegate: Address,
    value: bigint,
  ): Promise<MessagingReceipt> {
    const prepared = await this.prepareReports(dstChainId, vaults, options, rewardsDelegate);
    const receipt = await this.dispatch(prepared, value);
    this.deps.exchanges.recordPush(receipt.guid, prepared.dstEid, vaults);
    logger.info(`Sent ${vaults.length} report(s) to chain ${dstChainId} (guid ${receipt.guid})`);
    return receipt;
  }

  /**
   * Ask `dstChainId` for reports on its vaults. `returnOptions` route and pay
   * for the response; `value` must cover this request and what the response
   * will need.
   */
  async requestReports(
    dstChainId: number,
    vaults: Address[],
    options: Hex,
    returnOptions: Hex,
    rewardsDelegate: Address,
    value: bigint,
  ): Promise<MessagingReceipt> {
    const prepared = this.prepareRequest(dstChainId, vaults, options, returnOptions, rewardsDelegate);
    const receipt = await this.dispatch(prepared, value);
    this.deps.exchanges.recordRequest(receipt.guid, prepared.dstEid, vaults);
    logger.info(`Requested ${vaults.length} report(s) from chain ${dstChainId} (guid ${receipt.guid})`);
    return receipt;
  }

  private async prepareReports(
    dstChainId: number,
    vaults: Address[],
    options: Hex,
    rewardsDelegate: Address,
  ): Promise<Prepared> {
    const dstEid = this.routeTo(dstChainId, vaults);
    const reports = await this.deps.collector.collect(vaults, rewardsDelegate);
    return this.prepareReportsTo(dstEid, reports, options);
  }

  private prepareReportsTo(dstEid: number, reports: VaultReport[], options: Hex): Prepared {
    return {
      dstEid,
      message: encodeMessage({ type: 'AB', reports }),
      options: this.combineOptions(dstEid, 'AB', options),
    };
  }

  private prepareRequest(
    dstChainId: number,
    vaults: Address[],
    options: Hex,
    returnOptions: Hex,
    rewardsDelegate: Address,
  ): Prepared {
    const dstEid = this.routeTo(dstChainId, vaults);
    return {
      dstEid,
      message: encodeMessage({ type: 'ABA', vaults, rewardsDelegate, returnOptions }),
      options: this.combineOptions(dstEid, 'ABA', options),
    };
  }

  private routeTo(dstChainId: number, vaults: Address[]): number {
    if (vaults.length > MAX_REPORTS) {
      throw new OracleError('ExceedsMaxReports', `${vaults.length} vaults, at most ${MAX_REPORTS}`);
    }
    const dstEid = this.deps.endpoints.endpointOf(dstChainId);
    if (!this.peers.has(dstEid)) {
      throw new OracleError('PeerNotSet', `no peer for eid ${dstEid}`);
    }
    return dstEid;
  }

  // Quote, check the caller's value, then send
  private async dispatch(prepared: Prepared, value: bigint): Promise<MessagingReceipt> {
    const { transport } = this.deps;
    const fee = await transport.quote(prepared.dstEid, prepared.message, prepared.options);
    if (value < fee.nativeFee) {
      throw new OracleError('InsufficientFee', `fee is ${fee.nativeFee}, got ${value}`, {
        nativeFee: fee.nativeFee,
        value,
      });
    }
    return transport.send(prepared.dstEid, prepared.message, prepared.options, {
      nativeFee: value,
      tokenFee: 0n,
    });
  }

  // --- inbound ---

  async receive(packet: InboundPacket): Promise<ReceiveOutcome> {
    const { srcEid, sender } = packet.origin;
    const peer = this.peers.get(srcEid);
    if (!peer) {
      logger.warn(`Rejected ${packet.guid}: no peer for eid ${srcEid}`);
      throw new OracleError('PeerNotSet', `no peer for eid ${srcEid}`);
    }
    if (peer !== sender.toLowerCase()) {
      logger.warn(`Rejected ${packet.guid}: sender ${sender} is not the peer for eid ${srcEid}`);
      throw new OracleError('OnlyPeer', `sender ${sender} is not the peer for eid ${srcEid}`);
    }

    const guid: Hex = `0x${packet.guid.slice(2).toLowerCase()}`;
    if (!(await this.deps.processed.claim(guid))) {
      logger.warn(`Dropped ${packet.guid}: already processed`);
      throw new OracleError('MessageAlreadyProcessed', `message ${packet.guid} was already processed`);
    }

    try {
      return await this.apply(packet);
    } catch (error) {
      await this.deps.processed.release(guid);
      logger.warn(`Failed to apply ${packet.guid}: ${describeError(error)}`);
      throw error;
    }
  }

  private async apply(packet: InboundPacket): Promise<ReceiveOutcome> {
    const { srcEid } = packet.origin;
    const originChainId = this.deps.endpoints.chainOf(srcEid);
    const message = decodeMessage(packet.message);

    return match(message)
      .with({ type: 'AB' }, async (m): Promise<ReceiveOutcome> => {
        const ingested = await this.deps.oracle.updateSharePrices(originChainId, m.reports);
        this.deps.exchanges.matchResponse(
          srcEid,
          m.reports.map((r) => r.vaultAddress),
        );
        return { type: 'AB', originChainId, ingested };
      })
      .with({ type: 'ABA' }, async (m): Promise<ReceiveOutcome> => {
        if (m.vaults.length > MAX_REPORTS) {
          throw new OracleError('ExceedsMaxReports', `${m.vaults.length} vaults requested`);
        }
        const reports = await this.deps.collector.collect(m.vaults, m.rewardsDelegate);
        const prepared = this.prepareReportsTo(srcEid, reports, m.returnOptions);
        // the requester's forwarded value pays for the response
        const response = await this.dispatch(prepared, packet.value);
        this.deps.exchanges.recordPush(response.guid, srcEid, m.vaults);
        logger.info(`Answered request ${packet.guid} from chain ${originChainId} with ${reports.length} report(s)`);
        return { type: 'ABA', originChainId, response };
      })
      .exhaustive();
  }

  // --- exchange tracking ---

  acknowledge(guid: Hex): boolean {
    return this.deps.exchanges.acknowledge(guid);
  }

  sweep(): Exchange[] {
    return this.deps.exchanges.sweep();
  }
}

function enforcedKey(eid: number, msgType: MessageTypeName): string {
  return `${eid}:${MSG_TYPE[msgType]}`;
}
