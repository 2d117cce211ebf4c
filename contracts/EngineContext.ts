import { EngineEventArgs, EngineEventName } from './events';
import { IERC20 } from './interfaces/IERC20';
import { IStableCoin } from './interfaces/IStableCoin';
import { CollateralLedger } from './ledger/CollateralLedger';
import { DebtLedger } from './ledger/DebtLedger';
import { PriceOracleAdapter } from './PriceOracleAdapter';
import { SolvencyCalculator } from './SolvencyCalculator';

/** State and collaborators shared by the position and liquidation engines. */
export interface EngineContext {
  /** Address holding collateral and stable units in custody */
  address: string;
  dsc: IStableCoin;
  collateralTokens: ReadonlyMap<string, IERC20>;
  collateral: CollateralLedger;
  debt: DebtLedger;
  oracle: PriceOracleAdapter;
  solvency: SolvencyCalculator;
  emit<E extends EngineEventName>(event: E, args: EngineEventArgs<E>): void;
}
