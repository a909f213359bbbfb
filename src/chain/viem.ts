// Contract readers over a viem public client

import { erc20Abi, getAddress, type Address, type PublicClient } from 'viem';
import type { TokenReader, VaultReader } from '../types/oracle.ts';
import type { AggregatorReader, RoundData } from '../feeds/interface.ts';
import { aggregatorAbi, vaultAbi } from './abi.ts';

export type ContractClient = Pick<PublicClient, 'readContract'>;

export class ViemVaultReader implements VaultReader {
  constructor(private client: ContractClient) {}

  async asset(vault: Address): Promise<Address> {
    const asset = await this.client.readContract({ address: vault, abi: vaultAbi, functionName: 'asset' });
    return getAddress(asset);
  }

  convertToAssets(vault: Address, shares: bigint): Promise<bigint> {
    return this.client.readContract({
      address: vault,
      abi: vaultAbi,
      functionName: 'convertToAssets',
      args: [shares],
    });
  }
}

export class ViemTokenReader implements TokenReader {
  constructor(private client: ContractClient) {}

  decimals(token: Address): Promise<number> {
    return this.client.readContract({ address: token, abi: erc20Abi, functionName: 'decimals' });
  }
}

export class ViemAggregatorReader implements AggregatorReader {
  constructor(private client: ContractClient) {}

  async latestRoundData(feed: Address): Promise<RoundData> {
    const [roundId, answer, startedAt, updatedAt, answeredInRound] = await this.client.readContract({
      address: feed,
      abi: aggregatorAbi,
      functionName: 'latestRoundData',
    });
    return { roundId, answer, startedAt, updatedAt, answeredInRound };
  }

  decimals(feed: Address): Promise<number> {
    return this.client.readContract({ address: feed, abi: aggregatorAbi, functionName: 'decimals' });
  }
}
