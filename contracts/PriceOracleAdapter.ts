import { ADDITIONAL_FEED_PRECISION, PRECISION } from './constants';
import { NotAllowedToken } from './errors';
import { IPriceFeed } from './interfaces/IPriceFeed';
import { MathUtil } from './libraries/MathUtil';
import { staleCheckLatestRoundData } from './libraries/OracleLib';
import { Network } from './state/Network';

/**
 * Converts between collateral amounts and 18-decimal USD values using the
 * feed registered for each collateral token.
 */
export class PriceOracleAdapter {
  constructor(
    private readonly network: Network,
    private readonly priceFeeds: ReadonlyMap<string, IPriceFeed>,
    readonly timeout: bigint,
  ) {}

  /** Feed answer scaled to 18 decimals. */
  getPrice(token: string): bigint {
    const { answer } = staleCheckLatestRoundData(this.feedOf(token), BigInt(this.network.timestamp), this.timeout);
    return MathUtil.mul(answer, ADDITIONAL_FEED_PRECISION);
  }

  getUsdValue(token: string, amount: bigint): bigint {
    return MathUtil.mulDiv(this.getPrice(token), amount, PRECISION);
  }

  getTokenAmountFromUsd(token: string, usdAmountInWei: bigint): bigint {
    return MathUtil.mulDiv(usdAmountInWei, PRECISION, this.getPrice(token));
  }

  feedOf(token: string): IPriceFeed {
    const feed = this.priceFeeds.get(token);
    if (!feed) throw new NotAllowedToken(token);
    return feed;
  }
}
