import { config } from 'dotenv';
import { formatUnits, parseUnits } from 'ethers';
import { LiquidationResult } from '../contracts/LiquidationEngine';
import { DatabaseClient } from './monitoring/database/client';
import { EventPersistence } from './monitoring/database/eventPersistence';
import { StatePersistence } from './monitoring/database/statePersistence';
import { collectEvents, SystemEventsData } from './monitoring/events';
import { getPositions, printPositions } from './monitoring/positions';
import { PositionState } from './monitoring/types';
import { loadDeploymentConfig } from './deployment/config/deploymentConfig';
import { DeployedProtocol, deployProtocol } from './deployment/deploy/deployProtocol';
import { formatHealthFactor } from './utils/math';
import { colors } from './utils/table';

config();

export interface LiquidationScenario {
  user: string;
  liquidator: string;
  before: PositionState[];
  after: PositionState[];
  result: LiquidationResult;
  events: SystemEventsData;
}

/**
 * A user borrows right at the limit, the collateral price falls to 55% and a
 * second account covers the whole debt in exchange for the user's collateral.
 */
export function runLiquidationScenario(protocol: DeployedProtocol): LiquidationScenario {
  const { network, engine, dsc, collaterals } = protocol;
  const [{ config: collateral, token, priceFeed }] = collaterals;
  const [, user, liquidator] = network.getSigners(3);
  const tokens = collaterals.map((c) => c.token);
  const collector = collectEvents(engine);

  try {
    const userDeposit = parseUnits('10', collateral.decimals);
    const liquidatorDeposit = parseUnits('20', collateral.decimals);
    const debt = engine.getUsdValue(token.address, userDeposit) / 2n;

    token.mint(user, userDeposit);
    token.connect(user).approve(engine.address, userDeposit);
    engine.connect(user).depositCollateralAndMintDsc(token.address, userDeposit, debt);

    token.mint(liquidator, liquidatorDeposit);
    token.connect(liquidator).approve(engine.address, liquidatorDeposit);
    engine.connect(liquidator).depositCollateralAndMintDsc(token.address, liquidatorDeposit, debt);

    const { answer } = priceFeed.latestRoundData();
    priceFeed.updateAnswer((answer * 55n) / 100n);
    const before = getPositions(engine, tokens);

    dsc.connect(liquidator).approve(engine.address, debt);
    const result = engine.connect(liquidator).liquidate(token.address, user, debt);

    return { user, liquidator, before, after: getPositions(engine, tokens), result, events: collector.drain() };
  } finally {
    collector.stop();
  }
}

async function persist(scenario: LiquidationScenario): Promise<void> {
  const db = DatabaseClient.getInstance();
  try {
    await db.initializeSchema();
    await new EventPersistence(db).persistAllEvents(scenario.events);
    await new StatePersistence(db).persistPositionStates(scenario.after);
  } finally {
    await db.close();
  }
}

async function main() {
  const deploymentConfig = loadDeploymentConfig();
  const protocol = deployProtocol(deploymentConfig);
  const [{ config: collateral }] = protocol.collaterals;

  console.log(`${colors.bold}Liquidation simulation${colors.reset}`);
  console.log(`> Engine: ${protocol.engine.address}`);
  console.log(`> Collateral: ${collateral.symbol} at ${collateral.price} USD`);
  console.log(`> Price timeout: ${deploymentConfig.priceTimeoutSeconds}s\n`);

  const scenario = runLiquidationScenario(protocol);

  console.log(`${colors.yellow}Before liquidation${colors.reset}`);
  printPositions(scenario.before);
  console.log(`\n${colors.green}After liquidation${colors.reset}`);
  printPositions(scenario.after);

  const { result } = scenario;
  console.log(`\n> Collateral seized: ${formatUnits(result.totalCollateralToRedeem, collateral.decimals)} ${collateral.symbol}`);
  console.log(`> Bonus: ${formatUnits(result.bonusCollateral, collateral.decimals)} ${collateral.symbol}`);
  console.log(
    `> Health factor: ${formatHealthFactor(result.startingUserHealthFactor)} -> ${formatHealthFactor(result.endingUserHealthFactor)}`,
  );

  if (process.env.DATABASE_URL || process.env.DB_HOST) {
    await persist(scenario);
  } else {
    console.log(`\n${colors.dim}DATABASE_URL not set, skipping persistence${colors.reset}`);
  }
}

if (require.main === module) {
  main()
    .then(() => process.exit(0))
    .catch((error) => {
      console.error(`${colors.red}Simulation failed:${colors.reset}`, error);
      process.exit(1);
    });
}
