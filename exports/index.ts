// engine
export * from "../contracts/DSCEngine";
export * from "../contracts/DecentralizedStableCoin";
export * from "../contracts/PositionEngine";
export * from "../contracts/LiquidationEngine";
export * from "../contracts/SolvencyCalculator";
export * from "../contracts/PriceOracleAdapter";
export * from "../contracts/ledger/CollateralLedger";
export * from "../contracts/ledger/DebtLedger";

// constants, errors and events
export * from "../contracts/constants";
export * from "../contracts/errors";
export * from "../contracts/events";

// collaborator interfaces
export * from "../contracts/interfaces/IERC20";
export * from "../contracts/interfaces/IPriceFeed";
export * from "../contracts/interfaces/IStableCoin";

// chain substrate
export * from "../contracts/state/Network";
export { MathUtil } from "../contracts/libraries/MathUtil";
export { staleCheckLatestRoundData } from "../contracts/libraries/OracleLib";
export { ERC20 } from "../contracts/token/ERC20";

// local deployment
export * from "../contracts/test/TestToken";
export * from "../contracts/test/MockV3Aggregator";
