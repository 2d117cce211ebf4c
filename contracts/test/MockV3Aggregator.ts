import { IPriceFeed, RoundData } from '../interfaces/IPriceFeed';
import { JournaledValue } from '../state/JournaledMap';
import { Network } from '../state/Network';

/** AggregatorV3 price feed whose answer is set by hand. */
export class MockV3Aggregator implements IPriceFeed {
  readonly address: string;
  private readonly round: JournaledValue<RoundData>;

  constructor(
    private readonly network: Network,
    deployer: string,
    private readonly feedDecimals: number,
    initialAnswer: bigint,
    private readonly label: string = 'Mock / USD',
  ) {
    this.address = network.deploy(deployer);
    this.round = new JournaledValue<RoundData>(network, {
      roundId: 0n,
      answer: 0n,
      startedAt: 0n,
      updatedAt: 0n,
      answeredInRound: 0n,
    });
    this.updateAnswer(initialAnswer);
  }

  decimals(): number {
    return this.feedDecimals;
  }

  description(): string {
    return this.label;
  }

  latestRoundData(): RoundData {
    return { ...this.round.get() };
  }

  updateAnswer(answer: bigint): void {
    const now = BigInt(this.network.timestamp);
    const roundId = this.round.get().roundId + 1n;
    this.round.set({ roundId, answer, startedAt: now, updatedAt: now, answeredInRound: roundId });
  }

  updateRoundData(roundId: bigint, answer: bigint, timestamp: bigint, startedAt: bigint): void {
    this.round.set({ roundId, answer, startedAt, updatedAt: timestamp, answeredInRound: roundId });
  }
}
