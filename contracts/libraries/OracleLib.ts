import { InvalidPrice, StalePrice } from '../errors';
import { IPriceFeed, RoundData } from '../interfaces/IPriceFeed';

/**
 * Reads the latest round of a feed and refuses to use it when it is stale,
 * incomplete or not a positive price.
 */
export function staleCheckLatestRoundData(feed: IPriceFeed, now: bigint, timeout: bigint): RoundData {
  const round = feed.latestRoundData();

  if (round.updatedAt === 0n || round.answeredInRound < round.roundId) {
    throw new StalePrice(feed.address, round.updatedAt);
  }
  if (now - round.updatedAt > timeout) {
    throw new StalePrice(feed.address, round.updatedAt);
  }
  if (round.answer <= 0n) {
    throw new InvalidPrice(feed.address, round.answer);
  }

  return round;
}
