import { MIN_HEALTH_FACTOR } from './constants';
import {
  BreaksHealthFactor,
  BurnExceedsDebt,
  MintFailed,
  NeedsMoreThanZero,
  NotAllowedToken,
  TransferFailed,
} from './errors';
import { EngineContext } from './EngineContext';
import { IERC20 } from './interfaces/IERC20';

/**
 * Account-initiated movements of collateral and debt. Every operation leaves
 * the acting account at or above the minimum health factor or throws; the
 * caller runs it inside a network transaction so a throw undoes everything.
 */
export class PositionEngine {
  constructor(private readonly ctx: EngineContext) {}

  depositCollateral(user: string, token: string, amountCollateral: bigint): void {
    requireMoreThanZero(amountCollateral);
    const collateralToken = this.allowedToken(token);

    this.ctx.collateral.deposit(user, token, amountCollateral);
    this.ctx.emit('CollateralDeposited', { user, token, amount: amountCollateral });

    const success = collateralToken.connect(this.ctx.address).transferFrom(user, this.ctx.address, amountCollateral);
    if (!success) throw new TransferFailed(token);
  }

  redeemCollateral(user: string, token: string, amountCollateral: bigint): void {
    requireMoreThanZero(amountCollateral);
    this.allowedToken(token);
    this.moveCollateralOut(token, amountCollateral, user, user);
    this.revertIfHealthFactorIsBroken(user);
  }

  mintDsc(user: string, amountDscToMint: bigint): void {
    requireMoreThanZero(amountDscToMint);
    this.ctx.debt.increase(user, amountDscToMint);
    this.revertIfHealthFactorIsBroken(user);

    const minted = this.ctx.dsc.connect(this.ctx.address).mint(user, amountDscToMint);
    if (!minted) throw new MintFailed();
  }

  burnDsc(user: string, amount: bigint): void {
    requireMoreThanZero(amount);
    const debt = this.ctx.debt.debtOf(user);
    if (amount > debt) throw new BurnExceedsDebt(amount, debt);
    this.repayDebt(amount, user, user);
    this.revertIfHealthFactorIsBroken(user);
  }

  /** Ledger decrease, log, then payout; no solvency check. */
  moveCollateralOut(token: string, amountCollateral: bigint, from: string, to: string): void {
    const collateralToken = this.allowedToken(token);

    this.ctx.collateral.withdraw(from, token, amountCollateral);
    this.ctx.emit('CollateralRedeemed', { redeemedFrom: from, redeemedTo: to, token, amount: amountCollateral });

    const success = collateralToken.connect(this.ctx.address).transfer(to, amountCollateral);
    if (!success) throw new TransferFailed(token);
  }

  /** Reduces `onBehalfOf`'s debt and destroys the same amount pulled from `dscFrom`. */
  repayDebt(amountDscToBurn: bigint, onBehalfOf: string, dscFrom: string): void {
    this.ctx.debt.decrease(onBehalfOf, amountDscToBurn);

    const dsc = this.ctx.dsc.connect(this.ctx.address);
    const success = dsc.transferFrom(dscFrom, this.ctx.address, amountDscToBurn);
    if (!success) throw new TransferFailed(this.ctx.dsc.address);
    dsc.burn(amountDscToBurn);
  }

  revertIfHealthFactorIsBroken(user: string): void {
    const healthFactor = this.ctx.solvency.healthFactor(user);
    if (healthFactor < MIN_HEALTH_FACTOR) throw new BreaksHealthFactor(healthFactor);
  }

  private allowedToken(token: string): IERC20 {
    const collateralToken = this.ctx.collateralTokens.get(token);
    if (!collateralToken) throw new NotAllowedToken(token);
    return collateralToken;
  }
}

export function requireMoreThanZero(amount: bigint): void {
  if (amount <= 0n) throw new NeedsMoreThanZero();
}
