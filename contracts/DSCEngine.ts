import { EventEmitter } from 'events';
import {
  ADDITIONAL_FEED_PRECISION,
  DEFAULT_PRICE_TIMEOUT,
  LIQUIDATION_BONUS,
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MIN_HEALTH_FACTOR,
  PRECISION,
} from './constants';
import { EngineContext } from './EngineContext';
import { InvalidAddress, TokenAddressesAndPriceFeedAddressesMustBeSameLength } from './errors';
import { EngineEventArgs, EngineEventName, EngineEvents } from './events';
import { IERC20 } from './interfaces/IERC20';
import { IPriceFeed } from './interfaces/IPriceFeed';
import { IStableCoin } from './interfaces/IStableCoin';
import { CollateralLedger } from './ledger/CollateralLedger';
import { DebtLedger } from './ledger/DebtLedger';
import { LiquidationEngine, LiquidationResult } from './LiquidationEngine';
import { PositionEngine } from './PositionEngine';
import { PriceOracleAdapter } from './PriceOracleAdapter';
import { AccountInformation, SolvencyCalculator } from './SolvencyCalculator';
import { Network } from './state/Network';
import { ReentrancyGuard } from './state/ReentrancyGuard';
import { checksumIfAddress, normalizeAddress, ZeroAddress } from './state/address';

export interface DSCEngineOptions {
  /** Maximum age of a price round in seconds (default 3 hours) */
  priceTimeout?: bigint;
}

/** Operations an account performs on its own behalf. */
export interface DSCEngineCaller {
  depositCollateral(tokenCollateralAddress: string, amountCollateral: bigint): void;
  mintDsc(amountDscToMint: bigint): void;
  depositCollateralAndMintDsc(tokenCollateralAddress: string, amountCollateral: bigint, amountDscToMint: bigint): void;
  redeemCollateral(tokenCollateralAddress: string, amountCollateral: bigint): void;
  burnDsc(amount: bigint): void;
  redeemCollateralForDsc(tokenCollateralAddress: string, amountCollateral: bigint, amountDscToBurn: bigint): void;
  liquidate(collateral: string, user: string, debtToCover: bigint): LiquidationResult;
}

/**
 * Over-collateralized stable-unit engine.
 *
 * Accounts deposit registered collateral and mint stable units against it.
 * Collateral counts at LIQUIDATION_THRESHOLD percent of its USD value, so
 * an account must hold twice its debt in collateral value to stay at a
 * health factor of 1e18. Below that, anyone may liquidate it.
 *
 * The collateral set is fixed at construction. Every state-changing call is
 * one network transaction behind a reentrancy guard: it either completes,
 * token transfers included, or has no effect at all.
 */
export class DSCEngine {
  readonly address: string;

  private readonly collateralTokenAddresses: readonly string[];
  private readonly collateralTokens: ReadonlyMap<string, IERC20>;
  private readonly priceFeeds: ReadonlyMap<string, IPriceFeed>;
  private readonly collateral: CollateralLedger;
  private readonly debt: DebtLedger;
  private readonly oracle: PriceOracleAdapter;
  private readonly solvency: SolvencyCalculator;
  private readonly positions: PositionEngine;
  private readonly liquidations: LiquidationEngine;
  private readonly guard = new ReentrancyGuard();
  private readonly events = new EventEmitter();

  constructor(
    private readonly network: Network,
    deployer: string,
    tokens: readonly IERC20[],
    priceFeeds: readonly IPriceFeed[],
    private readonly dsc: IStableCoin,
    options: DSCEngineOptions = {},
  ) {
    if (tokens.length !== priceFeeds.length) {
      throw new TokenAddressesAndPriceFeedAddressesMustBeSameLength(tokens.length, priceFeeds.length);
    }

    const tokenMap = new Map<string, IERC20>();
    const feedMap = new Map<string, IPriceFeed>();
    tokens.forEach((token, index) => {
      const address = normalizeAddress(token.address);
      if (address === ZeroAddress || tokenMap.has(address)) throw new InvalidAddress(address);
      tokenMap.set(address, token);
      feedMap.set(address, priceFeeds[index]);
    });

    this.address = network.deploy(deployer);
    this.collateralTokenAddresses = Object.freeze(Array.from(tokenMap.keys()));
    this.collateralTokens = tokenMap;
    this.priceFeeds = feedMap;

    this.collateral = new CollateralLedger(network, this.collateralTokenAddresses);
    this.debt = new DebtLedger(network);
    this.oracle = new PriceOracleAdapter(network, feedMap, options.priceTimeout ?? DEFAULT_PRICE_TIMEOUT);
    this.solvency = new SolvencyCalculator(this.collateralTokenAddresses, this.collateral, this.debt, this.oracle);

    const ctx: EngineContext = {
      address: this.address,
      dsc,
      collateralTokens: tokenMap,
      collateral: this.collateral,
      debt: this.debt,
      oracle: this.oracle,
      solvency: this.solvency,
      emit: <E extends EngineEventName>(event: E, args: EngineEventArgs<E>) => this.emit(event, args),
    };
    this.positions = new PositionEngine(ctx);
    this.liquidations = new LiquidationEngine(ctx, this.positions);
  }

  connect(caller: string): DSCEngineCaller {
    const sender = normalizeAddress(caller);
    return {
      depositCollateral: (token, amountCollateral) =>
        this.execute(() => this.positions.depositCollateral(sender, checksumIfAddress(token), amountCollateral)),

      mintDsc: (amountDscToMint) => this.execute(() => this.positions.mintDsc(sender, amountDscToMint)),

      depositCollateralAndMintDsc: (token, amountCollateral, amountDscToMint) =>
        this.execute(() => {
          this.positions.depositCollateral(sender, checksumIfAddress(token), amountCollateral);
          this.positions.mintDsc(sender, amountDscToMint);
        }),

      redeemCollateral: (token, amountCollateral) =>
        this.execute(() => this.positions.redeemCollateral(sender, checksumIfAddress(token), amountCollateral)),

      burnDsc: (amount) => this.execute(() => this.positions.burnDsc(sender, amount)),

      // burn first: the redeem's solvency check has to see the reduced debt
      redeemCollateralForDsc: (token, amountCollateral, amountDscToBurn) =>
        this.execute(() => {
          this.positions.burnDsc(sender, amountDscToBurn);
          this.positions.redeemCollateral(sender, checksumIfAddress(token), amountCollateral);
        }),

      liquidate: (collateral, user, debtToCover) =>
        this.execute(() =>
          this.liquidations.liquidate(sender, checksumIfAddress(collateral), normalizeAddress(user), debtToCover),
        ),
    };
  }

  // ***** EVENTS *****

  on<E extends EngineEventName>(event: E, listener: (log: EngineEvents[E]) => void): this {
    this.events.on(event, listener);
    return this;
  }

  off<E extends EngineEventName>(event: E, listener: (log: EngineEvents[E]) => void): this {
    this.events.off(event, listener);
    return this;
  }

  // ***** VIEWS *****

  calculateHealthFactor(totalDscMinted: bigint, collateralValueInUsd: bigint): bigint {
    return SolvencyCalculator.calculateHealthFactor(totalDscMinted, collateralValueInUsd);
  }

  getHealthFactor(user: string): bigint {
    return this.solvency.healthFactor(normalizeAddress(user));
  }

  getAccountInformation(user: string): AccountInformation {
    return this.solvency.getAccountInformation(normalizeAddress(user));
  }

  getAccountCollateralValue(user: string): bigint {
    return this.solvency.getAccountCollateralValue(normalizeAddress(user));
  }

  getUsdValue(token: string, amount: bigint): bigint {
    return this.oracle.getUsdValue(checksumIfAddress(token), amount);
  }

  getTokenAmountFromUsd(token: string, usdAmountInWei: bigint): bigint {
    return this.oracle.getTokenAmountFromUsd(checksumIfAddress(token), usdAmountInWei);
  }

  getCollateralBalanceOfUser(user: string, token: string): bigint {
    return this.collateral.balanceOf(normalizeAddress(user), checksumIfAddress(token));
  }

  getCollateralTokens(): readonly string[] {
    return this.collateralTokenAddresses;
  }

  getCollateralTokenPriceFeed(token: string): string | undefined {
    return this.priceFeeds.get(checksumIfAddress(token))?.address;
  }

  getTotalCollateralDeposited(token: string): bigint {
    return this.collateral.totalDeposited(checksumIfAddress(token));
  }

  getTotalDscMinted(): bigint {
    return this.debt.totalDebt();
  }

  /** Accounts that have deposited collateral or minted, in first-seen order. */
  getAccounts(): string[] {
    return Array.from(new Set([...this.collateral.accounts(), ...this.debt.accounts()]));
  }

  getDsc(): string {
    return this.dsc.address;
  }

  getPriceTimeout(): bigint {
    return this.oracle.timeout;
  }

  getPrecision(): bigint {
    return PRECISION;
  }

  getAdditionalFeedPrecision(): bigint {
    return ADDITIONAL_FEED_PRECISION;
  }

  getLiquidationThreshold(): bigint {
    return LIQUIDATION_THRESHOLD;
  }

  getLiquidationBonus(): bigint {
    return LIQUIDATION_BONUS;
  }

  getLiquidationPrecision(): bigint {
    return LIQUIDATION_PRECISION;
  }

  getMinHealthFactor(): bigint {
    return MIN_HEALTH_FACTOR;
  }

  // ***** INTERNALS *****

  private execute<T>(fn: () => T): T {
    return this.network.transaction(() => this.guard.nonReentrant(fn));
  }

  private emit<E extends EngineEventName>(event: E, args: EngineEventArgs<E>): void {
    this.network.log((meta) => this.events.emit(event, { ...args, ...meta }));
  }
}
