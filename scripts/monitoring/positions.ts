import { DSCEngine } from '../../contracts/DSCEngine';
import { IERC20 } from '../../contracts/interfaces/IERC20';
import { formatHealthFactor } from '../utils/math';
import monitorConfig from '../utils/monitorConfig';
import { colors, createTable, formatAddress, formatCurrencyFromWei, healthStatusColor } from '../utils/table';
import { CollateralHolding, HealthStatus, PositionState, RiskLevel } from './types';

/**
 * Snapshot of every account known to the engine
 * @param engine Engine to read from
 * @param tokens Collateral tokens, used for symbols and decimals
 * @returns One PositionState per account, liquidatable accounts first
 */
export function getPositions(engine: DSCEngine, tokens: readonly IERC20[]): PositionState[] {
  const byAddress = new Map(tokens.map((token) => [token.address, token]));

  const positions = engine.getAccounts().map((owner): PositionState => {
    const collateral: CollateralHolding[] = engine.getCollateralTokens().map((token) => {
      const amount = engine.getCollateralBalanceOfUser(owner, token);
      const erc20 = byAddress.get(token);
      return {
        token,
        symbol: erc20?.symbol ?? formatAddress(token),
        decimals: erc20?.decimals() ?? 18,
        amount,
        valueInUsd: amount === 0n ? 0n : engine.getUsdValue(token, amount),
      };
    });
    const { totalDscMinted, collateralValueInUsd } = engine.getAccountInformation(owner);
    const healthFactor = engine.calculateHealthFactor(totalDscMinted, collateralValueInUsd);
    const utilization = getUtilization(
      totalDscMinted,
      (collateralValueInUsd * engine.getLiquidationThreshold()) / engine.getLiquidationPrecision(),
    );
    const status = getHealthStatus(totalDscMinted, collateralValueInUsd, healthFactor);

    return {
      owner,
      collateral,
      collateralValueInUsd,
      debt: totalDscMinted,
      healthFactor,
      utilization,
      status,
      riskLevel: getRiskLevel(status, utilization),
      liquidatable: healthFactor < engine.getMinHealthFactor(),
    };
  });

  return positions.sort(compareByHealthFactor);
}

export function getHealthStatus(debt: bigint, collateralValueInUsd: bigint, healthFactor: bigint): HealthStatus {
  if (debt === 0n && collateralValueInUsd === 0n) return HealthStatus.CLOSED;
  if (healthFactor < monitorConfig.thresholds.healthFactorCritical) return HealthStatus.CRITICAL;
  if (healthFactor < monitorConfig.thresholds.healthFactorWarning) return HealthStatus.WARNING;
  return HealthStatus.HEALTHY;
}

export function getRiskLevel(status: HealthStatus, utilization: number): RiskLevel {
  if (status === HealthStatus.CRITICAL || utilization >= monitorConfig.riskLevels.highUtilization) {
    return RiskLevel.HIGH;
  }
  if (status === HealthStatus.WARNING || utilization >= monitorConfig.riskLevels.mediumUtilization) {
    return RiskLevel.MEDIUM;
  }
  return RiskLevel.LOW;
}

/** Percentage with three decimals; 100 means the account sits exactly on the liquidation line. */
export function getUtilization(debt: bigint, adjustedCollateralValue: bigint): number {
  if (debt === 0n) return 0;
  if (adjustedCollateralValue === 0n) return Infinity;
  return Number((debt * 100_000n) / adjustedCollateralValue) / 1000;
}

function compareByHealthFactor(a: PositionState, b: PositionState): number {
  if (a.healthFactor === b.healthFactor) return 0;
  return a.healthFactor < b.healthFactor ? -1 : 1;
}

export function formatHolding(holding: CollateralHolding): string {
  return `${formatCurrencyFromWei(holding.amount, 4, holding.decimals)} ${holding.symbol}`;
}

export function printPositions(positions: PositionState[]): void {
  console.log(`${colors.bold}Positions (${positions.length})${colors.reset}\n`);

  createTable<PositionState>()
    .setColumns([
      { header: 'Owner', width: 14, format: (row) => formatAddress(row.owner) },
      {
        header: 'Collateral',
        width: 28,
        format: (row) =>
          row.collateral
            .filter((holding) => holding.amount > 0n)
            .map(formatHolding)
            .join(', ') || '-',
      },
      { header: 'Value (USD)', width: 16, align: 'right', format: (row) => formatCurrencyFromWei(row.collateralValueInUsd) },
      { header: 'Debt', width: 16, align: 'right', format: (row) => formatCurrencyFromWei(row.debt) },
      {
        header: 'Health',
        width: 10,
        align: 'right',
        format: (row) => `${healthStatusColor(row.status)}${formatHealthFactor(row.healthFactor)}${colors.reset}`,
      },
      { header: 'Status', width: 10, format: (row) => row.status },
      { header: 'Risk', width: 8, format: (row) => row.riskLevel },
    ])
    .setData(positions.slice(0, monitorConfig.displayLimits.positions))
    .setShouldDimRow((row) => row.status === HealthStatus.CLOSED)
    .print();
}
