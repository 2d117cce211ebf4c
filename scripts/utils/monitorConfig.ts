import { floatToDec18 } from './math';

/**
 * Thresholds used when classifying positions in monitoring output.
 * Health factors are 18-decimal fixed point, 1e18 being the liquidation line.
 */
export const monitorConfig = {
  thresholds: {
    healthFactorCritical: floatToDec18(1), // liquidatable below this
    healthFactorWarning: floatToDec18(1.25),
  },

  riskLevels: {
    // share of collateral value (after threshold) consumed by debt, in %
    highUtilization: 90,
    mediumUtilization: 70,
  },

  displayLimits: {
    positions: 20,
  },
};

export default monitorConfig;
