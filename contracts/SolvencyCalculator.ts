import { LIQUIDATION_PRECISION, LIQUIDATION_THRESHOLD, PRECISION } from './constants';
import { MathUtil } from './libraries/MathUtil';
import { CollateralLedger } from './ledger/CollateralLedger';
import { DebtLedger } from './ledger/DebtLedger';
import { PriceOracleAdapter } from './PriceOracleAdapter';

export interface AccountInformation {
  totalDscMinted: bigint;
  collateralValueInUsd: bigint;
}

/**
 * Health factor = (collateral value * threshold / precision) * 1e18 / debt.
 * At or above 1e18 the account is solvent; with no debt it is MaxUint256.
 */
export class SolvencyCalculator {
  constructor(
    private readonly tokens: readonly string[],
    private readonly collateral: CollateralLedger,
    private readonly debt: DebtLedger,
    private readonly oracle: PriceOracleAdapter,
  ) {}

  static calculateHealthFactor(totalDscMinted: bigint, collateralValueInUsd: bigint): bigint {
    if (totalDscMinted === 0n) return MathUtil.MAX_UINT256;
    const collateralAdjustedForThreshold = MathUtil.mulDiv(
      collateralValueInUsd,
      LIQUIDATION_THRESHOLD,
      LIQUIDATION_PRECISION,
    );
    return MathUtil.mulDiv(collateralAdjustedForThreshold, PRECISION, totalDscMinted);
  }

  getAccountCollateralValue(user: string): bigint {
    let totalCollateralValueInUsd = 0n;
    for (const token of this.tokens) {
      const amount = this.collateral.balanceOf(user, token);
      // an empty balance contributes nothing, so its feed is not read
      if (amount === 0n) continue;
      totalCollateralValueInUsd = MathUtil.add(totalCollateralValueInUsd, this.oracle.getUsdValue(token, amount));
    }
    return totalCollateralValueInUsd;
  }

  getAccountInformation(user: string): AccountInformation {
    return {
      totalDscMinted: this.debt.debtOf(user),
      collateralValueInUsd: this.getAccountCollateralValue(user),
    };
  }

  healthFactor(user: string): bigint {
    const { totalDscMinted, collateralValueInUsd } = this.getAccountInformation(user);
    return SolvencyCalculator.calculateHealthFactor(totalDscMinted, collateralValueInUsd);
  }
}
