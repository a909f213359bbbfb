import type { Address } from 'viem';
import type { Clock, VaultReader, VaultReport } from '../types/oracle.ts';
import { systemClock } from '../types/oracle.ts';
import type { AssetMetadata } from './asset-metadata.ts';
import { OracleError } from '../errors.ts';
import { pow10 } from '../utils/fixed-point.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('ReportCollector');

// Builds fresh reports for vaults living on this chain
export class ReportCollector {
  private readonly clock: Clock;

  constructor(
    private vaults: VaultReader,
    private metadata: AssetMetadata,
    private localChainId: number,
    clock?: Clock,
  ) {
    this.clock = clock ?? systemClock;
  }

  async collect(vaults: Address[], rewardsDelegate: Address): Promise<VaultReport[]> {
    const reports: VaultReport[] = [];
    for (const vault of vaults) {
      const asset = await this.vaults.asset(vault);
      const assetDecimals = await this.metadata.decimals(asset);
      const sharePrice = await this.vaults.convertToAssets(vault, pow10(assetDecimals));
      if (sharePrice <= 0n) {
        throw new OracleError('InvalidPrice', `vault ${vault} reports a zero share price`);
      }
      reports.push({
        sharePrice,
        lastUpdate: this.clock(),
        originChainId: this.localChainId,
        rewardsDelegate,
        vaultAddress: vault,
        asset,
        assetDecimals,
      });
    }
    logger.debug(`collected ${reports.length} report(s)`);
    return reports;
  }
}
