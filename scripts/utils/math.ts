import { formatUnits, MaxUint256, parseUnits } from 'ethers';

export const DECIMALS = 18n;

export function floatToDec18(value: number | string): bigint {
  return parseUnits(typeof value === 'number' ? value.toString() : value, Number(DECIMALS));
}

/** Health factor as a decimal string, '∞' for accounts without debt. */
export function formatHealthFactor(healthFactor: bigint, precision: number = 2): string {
  if (healthFactor === MaxUint256) return '∞';
  return Number(formatUnits(healthFactor, Number(DECIMALS))).toFixed(precision);
}
