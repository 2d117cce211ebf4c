import { DEFAULT_PRICE_TIMEOUT } from '../../../contracts/constants';

export interface CollateralConfig {
  name: string;
  symbol: string;
  decimals: number;
  /** USD price, as written to the feed */
  price: string;
  priceFeedDecimals: number;
  /** Amount handed to each signer by the local faucet */
  faucetAmount: string;
}

export interface DeploymentConfig {
  priceTimeoutSeconds: bigint;
  collaterals: CollateralConfig[];
}

// Local network defaults: wETH at 2'000 USD and wBTC at 1'000 USD, 8-decimal feeds
export const defaultConfig: DeploymentConfig = {
  priceTimeoutSeconds: DEFAULT_PRICE_TIMEOUT,
  collaterals: [
    {
      name: 'Wrapped Ether',
      symbol: 'WETH',
      decimals: 18,
      price: '2000',
      priceFeedDecimals: 8,
      faucetAmount: '1000',
    },
    {
      name: 'Wrapped Bitcoin',
      symbol: 'WBTC',
      decimals: 18,
      price: '1000',
      priceFeedDecimals: 8,
      faucetAmount: '1000',
    },
  ],
};

/**
 * Apply environment overrides to the defaults:
 * PRICE_FEED_TIMEOUT_SECONDS, and <SYMBOL>_USD_PRICE per collateral.
 */
export function loadDeploymentConfig(env: NodeJS.ProcessEnv = process.env): DeploymentConfig {
  const timeout = env.PRICE_FEED_TIMEOUT_SECONDS;
  if (timeout !== undefined && !/^\d+$/.test(timeout)) {
    throw new Error(`PRICE_FEED_TIMEOUT_SECONDS must be a whole number of seconds, got '${timeout}'`);
  }

  return {
    priceTimeoutSeconds: timeout !== undefined ? BigInt(timeout) : defaultConfig.priceTimeoutSeconds,
    collaterals: defaultConfig.collaterals.map((collateral) => {
      const price = env[`${collateral.symbol}_USD_PRICE`];
      if (price === undefined) return collateral;
      if (!/^\d+(\.\d+)?$/.test(price) || Number(price) <= 0) {
        throw new Error(`${collateral.symbol}_USD_PRICE must be a positive number, got '${price}'`);
      }
      return { ...collateral, price };
    }),
  };
}
