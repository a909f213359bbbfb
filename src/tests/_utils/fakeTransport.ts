import type { Hex } from 'viem';
import type {
  InboundPacket,
  MessagingFee,
  MessagingReceipt,
  MessagingTransport,
} from '../../messaging/transport.ts';
import { computeGuid } from '../../messaging/transport.ts';
import { executorReceiveTotals } from '../../messaging/options.ts';

export type Receiver = { receive(packet: InboundPacket): Promise<unknown> };

export type SentPacket = {
  srcEid: number;
  dstEid: number;
  message: Hex;
  options: Hex;
  fee: MessagingFee;
  packet: InboundPacket;
};

// Fee = base fee + the native value the options ask the executor to forward
export const BASE_FEE = 1_000n;

/**
 * In-process network: every registered endpoint gets a transport, sends are
 * queued and only delivered when the test says so.
 */
export class LoopbackNetwork {
  private endpoints = new Map<number, { address: Hex; receiver?: Receiver; nonce: bigint }>();
  readonly queue: SentPacket[] = [];
  readonly sent: SentPacket[] = [];

  register(eid: number, address: Hex): void {
    this.endpoints.set(eid, { address, nonce: 0n });
  }

  attach(eid: number, receiver: Receiver): void {
    const endpoint = this.endpoints.get(eid);
    if (!endpoint) throw new Error(`endpoint ${eid} not registered`);
    endpoint.receiver = receiver;
  }

  transport(srcEid: number): MessagingTransport {
    return {
      quote: async (_dstEid, _message, options) => quoteFor(options),
      send: async (dstEid, message, options, fee) => this.send(srcEid, dstEid, message, options, fee),
    };
  }

  private send(srcEid: number, dstEid: number, message: Hex, options: Hex, fee: MessagingFee): MessagingReceipt {
    const src = this.endpoints.get(srcEid);
    const dst = this.endpoints.get(dstEid);
    if (!src || !dst) throw new Error(`no route ${srcEid} -> ${dstEid}`);

    src.nonce += 1n;
    const guid = computeGuid(src.nonce, srcEid, src.address, dstEid, dst.address);
    const packet: InboundPacket = {
      origin: { srcEid, sender: src.address, nonce: src.nonce },
      guid,
      message,
      value: options === '0x' ? 0n : executorReceiveTotals(options).value,
    };
    const entry = { srcEid, dstEid, message, options, fee, packet };
    this.queue.push(entry);
    this.sent.push(entry);
    return { guid, nonce: src.nonce, fee };
  }

  async deliverNext(): Promise<unknown> {
    const next = this.queue.shift();
    if (!next) throw new Error('nothing to deliver');
    const receiver = this.endpoints.get(next.dstEid)?.receiver;
    if (!receiver) throw new Error(`no receiver attached to ${next.dstEid}`);
    return receiver.receive(next.packet);
  }

  async deliverAll(): Promise<void> {
    while (this.queue.length > 0) await this.deliverNext();
  }
}

export function quoteFor(options: Hex): MessagingFee {
  const value = options === '0x' ? 0n : executorReceiveTotals(options).value;
  return { nativeFee: BASE_FEE + value, tokenFee: 0n };
}
