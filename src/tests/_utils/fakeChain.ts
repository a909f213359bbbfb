import type { Address } from 'viem';
import type { TokenReader, VaultReader } from '../../types/oracle.ts';
import type { AggregatorReader, RoundData } from '../../feeds/interface.ts';

type FakeVault = {
  asset: Address;
  // assets per share unit; convertToAssets scales it by shares / 10^assetDecimals
  sharePrice: bigint;
  assetDecimals: number;
  reverts?: boolean;
};

export class FakeVaults implements VaultReader {
  private vaults = new Map<Address, FakeVault>();
  calls = 0;

  set(vault: Address, value: FakeVault) {
    this.vaults.set(vault, value);
  }

  private get(vault: Address): FakeVault {
    this.calls++;
    const v = this.vaults.get(vault);
    if (!v) throw new Error(`execution reverted: no vault at ${vault}`);
    if (v.reverts) throw new Error(`execution reverted: ${vault}`);
    return v;
  }

  async asset(vault: Address): Promise<Address> {
    return this.get(vault).asset;
  }

  async convertToAssets(vault: Address, shares: bigint): Promise<bigint> {
    const v = this.get(vault);
    return (shares * v.sharePrice) / 10n ** BigInt(v.assetDecimals);
  }
}

export class FakeTokens implements TokenReader {
  private decimalsByToken = new Map<Address, number>();

  constructor(entries: [Address, number][] = []) {
    for (const [token, decimals] of entries) this.decimalsByToken.set(token, decimals);
  }

  set(token: Address, decimals: number) {
    this.decimalsByToken.set(token, decimals);
  }

  async decimals(token: Address): Promise<number> {
    const decimals = this.decimalsByToken.get(token);
    if (decimals === undefined) throw new Error(`execution reverted: decimals() on ${token}`);
    return decimals;
  }
}

export class FakeAggregators implements AggregatorReader {
  private rounds = new Map<Address, RoundData>();
  private decimalsByFeed = new Map<Address, number>();
  reads = 0;

  setRound(feed: Address, round: Partial<RoundData> & { answer: bigint }, decimals = 8) {
    this.rounds.set(feed, {
      roundId: 10n,
      startedAt: 0n,
      updatedAt: 0n,
      answeredInRound: 10n,
      ...round,
    });
    this.decimalsByFeed.set(feed, decimals);
  }

  async latestRoundData(feed: Address): Promise<RoundData> {
    this.reads++;
    const round = this.rounds.get(feed);
    if (!round) throw new Error(`execution reverted: ${feed}`);
    return round;
  }

  async decimals(feed: Address): Promise<number> {
    const decimals = this.decimalsByFeed.get(feed);
    if (decimals === undefined) throw new Error(`execution reverted: ${feed}`);
    return decimals;
  }
}
