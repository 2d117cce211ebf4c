export interface RoundData {
  roundId: bigint;
  answer: bigint;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
}

/** Read side of an AggregatorV3-style price feed. */
export interface IPriceFeed {
  readonly address: string;
  decimals(): number;
  description(): string;
  latestRoundData(): RoundData;
}
