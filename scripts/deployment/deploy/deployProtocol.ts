import { parseUnits } from 'ethers';
import { DecentralizedStableCoin } from '../../../contracts/DecentralizedStableCoin';
import { DSCEngine } from '../../../contracts/DSCEngine';
import { Network } from '../../../contracts/state/Network';
import { MockV3Aggregator } from '../../../contracts/test/MockV3Aggregator';
import { TestToken } from '../../../contracts/test/TestToken';
import { CollateralConfig, DeploymentConfig } from '../config/deploymentConfig';

export interface DeployedCollateral {
  config: CollateralConfig;
  token: TestToken;
  priceFeed: MockV3Aggregator;
}

export interface DeployedProtocol {
  network: Network;
  deployer: string;
  dsc: DecentralizedStableCoin;
  engine: DSCEngine;
  collaterals: DeployedCollateral[];
}

export interface DeployOptions {
  network?: Network;
  /** Accounts that receive each collateral's faucet amount */
  faucetRecipients?: readonly string[];
}

/**
 * Deploys collateral tokens with their feeds, the stable coin and the engine,
 * then hands ownership of the stable coin to the engine.
 */
export function deployProtocol(config: DeploymentConfig, options: DeployOptions = {}): DeployedProtocol {
  const network = options.network ?? new Network();
  const [deployer] = network.getSigners(1);

  const collaterals = config.collaterals.map((collateral) => {
    const token = new TestToken(network, deployer, collateral.name, collateral.symbol, collateral.decimals);
    const priceFeed = new MockV3Aggregator(
      network,
      deployer,
      collateral.priceFeedDecimals,
      parseUnits(collateral.price, collateral.priceFeedDecimals),
      `${collateral.symbol} / USD`,
    );
    return { config: collateral, token, priceFeed };
  });

  const dsc = new DecentralizedStableCoin(network, deployer);
  const engine = new DSCEngine(
    network,
    deployer,
    collaterals.map((c) => c.token),
    collaterals.map((c) => c.priceFeed),
    dsc,
    { priceTimeout: config.priceTimeoutSeconds },
  );
  dsc.transferOwnership(deployer, engine.address);

  for (const recipient of options.faucetRecipients ?? []) {
    for (const { config: collateral, token } of collaterals) {
      token.mint(recipient, parseUnits(collateral.faucetAmount, collateral.decimals));
    }
  }

  return { network, deployer, dsc, engine, collaterals };
}
