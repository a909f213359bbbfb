// config/chains.ts
import { OracleError } from '../errors.ts';

export type EndpointEntry = {
  chainId: number;
  endpointId: number;
};

// Chain id <-> messaging endpoint id, both directions
export class EndpointDirectory {
  private byChain = new Map<number, number>();
  private byEndpoint = new Map<number, number>();

  constructor(entries: EndpointEntry[] = []) {
    for (const entry of entries) this.set(entry.chainId, entry.endpointId);
  }

  set(chainId: number, endpointId: number): void {
    const owner = this.byEndpoint.get(endpointId);
    if (owner !== undefined && owner !== chainId) {
      throw new OracleError('InvalidChainId', `endpoint ${endpointId} already belongs to chain ${owner}`);
    }
    const previous = this.byChain.get(chainId);
    if (previous !== undefined) this.byEndpoint.delete(previous);
    this.byChain.set(chainId, endpointId);
    this.byEndpoint.set(endpointId, chainId);
  }

  endpointOf(chainId: number): number {
    const eid = this.byChain.get(chainId);
    if (eid === undefined) {
      throw new OracleError('UnknownEndpoint', `no endpoint configured for chain ${chainId}`);
    }
    return eid;
  }

  chainOf(endpointId: number): number {
    const chainId = this.byEndpoint.get(endpointId);
    if (chainId === undefined) {
      throw new OracleError('UnknownEndpoint', `no chain configured for endpoint ${endpointId}`);
    }
    return chainId;
  }

  entries(): EndpointEntry[] {
    return [...this.byChain].map(([chainId, endpointId]) => ({ chainId, endpointId }));
  }
}
