export enum HealthStatus {
  HEALTHY = 'HEALTHY',
  WARNING = 'WARNING',
  CRITICAL = 'CRITICAL',
  CLOSED = 'CLOSED',
}

export enum RiskLevel {
  HIGH = 'HIGH',
  MEDIUM = 'MEDIUM',
  LOW = 'LOW',
}

export interface CollateralHolding {
  token: string;
  symbol: string;
  decimals: number;
  amount: bigint;
  valueInUsd: bigint;
}

export interface PositionState {
  owner: string;
  collateral: CollateralHolding[];
  collateralValueInUsd: bigint;
  debt: bigint;
  healthFactor: bigint;
  /** debt as a percentage of threshold-adjusted collateral value */
  utilization: number;
  status: HealthStatus;
  riskLevel: RiskLevel;
  liquidatable: boolean;
}
