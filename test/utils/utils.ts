import { parseUnits } from "ethers";
import { Network, NetworkOptions } from "../../contracts/state/Network";
import { TestToken } from "../../contracts/test/TestToken";
import { defaultConfig, DeploymentConfig } from "../../scripts/deployment/config/deploymentConfig";
import { deployProtocol } from "../../scripts/deployment/deploy/deployProtocol";
import { QueryResult, QueryResultRow } from "pg";
import { Queryable } from "../../scripts/monitoring/database/client";

export const START_TIMESTAMP = 1_700_000_000;

/** 8-decimal feed answer for a USD price */
export const feedPrice = (usd: number | string) => parseUnits(usd.toString(), 8);

export function deployEngineFixture(config: DeploymentConfig = defaultConfig, networkOptions: NetworkOptions = {}) {
  const network = new Network({ timestamp: START_TIMESTAMP, ...networkOptions });
  const protocol = deployProtocol(config, { network });
  const [, alice, bob, carol] = network.getSigners(4);
  const [weth, wbtc] = protocol.collaterals;

  return {
    ...protocol,
    alice,
    bob,
    carol,
    weth: weth.token,
    wethUsdPriceFeed: weth.priceFeed,
    wbtc: wbtc.token,
    wbtcUsdPriceFeed: wbtc.priceFeed,
  };
}

export type EngineFixture = ReturnType<typeof deployEngineFixture>;

/** Mint `amount` to `owner` and approve `spender` for it. */
export function fundAndApprove(token: TestToken, owner: string, spender: string, amount: bigint) {
  token.mint(owner, amount);
  token.connect(owner).approve(spender, amount);
}

/** Records every statement instead of talking to Postgres. */
export class FakeQueryable implements Queryable {
  readonly queries: { text: string; params: unknown[] }[] = [];

  async query<T extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []): Promise<QueryResult<T>> {
    this.queries.push({ text, params });
    const rowCount = (text.match(/\(\$/g) ?? []).length;
    return { command: "INSERT", rowCount, oid: 0, fields: [], rows: [] };
  }
}
