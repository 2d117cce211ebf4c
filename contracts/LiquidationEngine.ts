import { LIQUIDATION_BONUS, LIQUIDATION_PRECISION, MIN_HEALTH_FACTOR } from './constants';
import { ExternalTransferUnderfunded, HealthFactorNotImproved, HealthFactorOk, NotAllowedToken } from './errors';
import { EngineContext } from './EngineContext';
import { MathUtil } from './libraries/MathUtil';
import { PositionEngine, requireMoreThanZero } from './PositionEngine';

export interface LiquidationResult {
  tokenAmountFromDebtCovered: bigint;
  bonusCollateral: bigint;
  totalCollateralToRedeem: bigint;
  startingUserHealthFactor: bigint;
  endingUserHealthFactor: bigint;
}

/**
 * Third-party repair of an undercollateralized account: the liquidator burns
 * part of the account's debt with their own stable units and receives the
 * equivalent collateral plus LIQUIDATION_BONUS percent.
 *
 * If the account no longer holds enough collateral to pay the bonus the
 * liquidation fails as a whole and the position stays open.
 */
export class LiquidationEngine {
  constructor(
    private readonly ctx: EngineContext,
    private readonly positions: PositionEngine,
  ) {}

  liquidate(liquidator: string, collateral: string, user: string, debtToCover: bigint): LiquidationResult {
    requireMoreThanZero(debtToCover);
    if (!this.ctx.collateralTokens.has(collateral)) throw new NotAllowedToken(collateral);

    const startingUserHealthFactor = this.ctx.solvency.healthFactor(user);
    if (startingUserHealthFactor >= MIN_HEALTH_FACTOR) throw new HealthFactorOk(startingUserHealthFactor);

    const tokenAmountFromDebtCovered = this.ctx.oracle.getTokenAmountFromUsd(collateral, debtToCover);
    const bonusCollateral = MathUtil.mulDiv(tokenAmountFromDebtCovered, LIQUIDATION_BONUS, LIQUIDATION_PRECISION);
    const totalCollateralToRedeem = MathUtil.add(tokenAmountFromDebtCovered, bonusCollateral);

    const available = this.ctx.collateral.balanceOf(user, collateral);
    if (totalCollateralToRedeem > available) {
      throw new ExternalTransferUnderfunded(totalCollateralToRedeem, available);
    }

    this.positions.moveCollateralOut(collateral, totalCollateralToRedeem, user, liquidator);
    this.positions.repayDebt(debtToCover, user, liquidator);

    const endingUserHealthFactor = this.ctx.solvency.healthFactor(user);
    if (endingUserHealthFactor <= startingUserHealthFactor) {
      throw new HealthFactorNotImproved(startingUserHealthFactor, endingUserHealthFactor);
    }
    this.positions.revertIfHealthFactorIsBroken(liquidator);

    return {
      tokenAmountFromDebtCovered,
      bonusCollateral,
      totalCollateralToRedeem,
      startingUserHealthFactor,
      endingUserHealthFactor,
    };
  }
}
