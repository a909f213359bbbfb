// Caller-side view of outbound exchanges
//
// push:    sent -> delivered | timed-out
// request: request-sent -> response-received | timed-out
//
// A timeout only means we stopped waiting; nothing is cancelled on the wire.

import type { Address, Hex } from 'viem';
import type { Clock } from '../types/oracle.ts';
import { systemClock } from '../types/oracle.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('Exchanges');

export const REQUEST_TIMEOUT = 60 * 60;

export type PushStatus = 'sent' | 'delivered' | 'timed-out';
export type RequestStatus = 'request-sent' | 'response-received' | 'timed-out';

type ExchangeBase = {
  guid: Hex;
  dstEid: number;
  vaults: Address[];
  sentAt: number;
  settledAt?: number;
};

export type PushExchange = ExchangeBase & { kind: 'push'; status: PushStatus };
export type RequestExchange = ExchangeBase & { kind: 'request'; status: RequestStatus };
export type Exchange = PushExchange | RequestExchange;

export class ExchangeTracker {
  private exchanges = new Map<Hex, Exchange>();
  private readonly clock: Clock;

  constructor(
    readonly timeout = REQUEST_TIMEOUT,
    clock?: Clock,
  ) {
    this.clock = clock ?? systemClock;
  }

  recordPush(guid: Hex, dstEid: number, vaults: Address[]): PushExchange {
    const exchange: PushExchange = {
      kind: 'push',
      status: 'sent',
      guid,
      dstEid,
      vaults: [...vaults],
      sentAt: this.clock(),
    };
    this.exchanges.set(guid, exchange);
    return exchange;
  }

  recordRequest(guid: Hex, dstEid: number, vaults: Address[]): RequestExchange {
    const exchange: RequestExchange = {
      kind: 'request',
      status: 'request-sent',
      guid,
      dstEid,
      vaults: [...vaults],
      sentAt: this.clock(),
    };
    this.exchanges.set(guid, exchange);
    return exchange;
  }

  get(guid: Hex): Exchange | undefined {
    return this.exchanges.get(guid);
  }

  list(): Exchange[] {
    return [...this.exchanges.values()];
  }

  pending(): Exchange[] {
    return this.list().filter((e) => e.status === 'sent' || e.status === 'request-sent');
  }

  // Transport confirmed delivery of a push
  acknowledge(guid: Hex): boolean {
    const exchange = this.exchanges.get(guid);
    if (!exchange || exchange.kind !== 'push' || exchange.status !== 'sent') return false;
    exchange.status = 'delivered';
    exchange.settledAt = this.clock();
    return true;
  }

  /**
   * Settle open requests to `srcEid` whose vaults are all covered by an
   * incoming batch of reports.
   */
  matchResponse(srcEid: number, reportedVaults: Address[]): RequestExchange[] {
    const covered = new Set(reportedVaults);
    const settled: RequestExchange[] = [];
    for (const exchange of this.exchanges.values()) {
      if (exchange.kind !== 'request' || exchange.status !== 'request-sent') continue;
      if (exchange.dstEid !== srcEid) continue;
      if (!exchange.vaults.every((v) => covered.has(v))) continue;
      exchange.status = 'response-received';
      exchange.settledAt = this.clock();
      settled.push(exchange);
    }
    if (settled.length > 0) logger.debug(`${settled.length} request(s) answered by eid ${srcEid}`);
    return settled;
  }

  sweep(): Exchange[] {
    const now = this.clock();
    const expired: Exchange[] = [];
    for (const exchange of this.exchanges.values()) {
      if (now - exchange.sentAt <= this.timeout) continue;
      if (exchange.kind === 'push' && exchange.status === 'sent') {
        exchange.status = 'timed-out';
      } else if (exchange.kind === 'request' && exchange.status === 'request-sent') {
        exchange.status = 'timed-out';
      } else {
        continue;
      }
      exchange.settledAt = now;
      expired.push(exchange);
    }
    if (expired.length > 0) logger.warn(`${expired.length} exchange(s) timed out`);
    return expired;
  }

  // Drop settled exchanges
  prune(): number {
    let removed = 0;
    for (const [guid, exchange] of this.exchanges) {
      if (exchange.settledAt !== undefined) {
        this.exchanges.delete(guid);
        removed++;
      }
    }
    return removed;
  }
}
