import type { Address } from 'viem';
import type { AggregatorReader } from './interface.ts';
import type { Clock } from '../types/oracle.ts';
import { OracleError, describeError } from '../errors.ts';

// Uptime feed convention: answer 0 = sequencer up, 1 = down; startedAt = last status change
export class SequencerMonitor {
  constructor(
    private feed: Address,
    private reader: AggregatorReader,
    private gracePeriod: number,
    private clock: Clock,
  ) {}

  async assertHealthy(): Promise<void> {
    let answer: bigint;
    let startedAt: bigint;
    try {
      ({ answer, startedAt } = await this.reader.latestRoundData(this.feed));
    } catch (error) {
      throw new OracleError('SequencerDown', `uptime feed unreadable: ${describeError(error)}`);
    }

    if (answer !== 0n) {
      throw new OracleError('SequencerDown', `sequencer reported down by ${this.feed}`);
    }
    if (startedAt === 0n) {
      throw new OracleError('SequencerDown', `uptime feed ${this.feed} has no round`);
    }
    const upFor = BigInt(this.clock()) - startedAt;
    if (upFor <= BigInt(this.gracePeriod)) {
      throw new OracleError(
        'GracePeriodNotOver',
        `sequencer up for ${upFor}s, grace period is ${this.gracePeriod}s`,
      );
    }
  }
}
