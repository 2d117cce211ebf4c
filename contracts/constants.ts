/** Fixed-point one (18 decimals). */
export const PRECISION = 10n ** 18n;

/** Scales 8-decimal feed answers to 18 decimals. */
export const ADDITIONAL_FEED_PRECISION = 10n ** 10n;

/** 50%: collateral counts at half its value when computing the health factor. */
export const LIQUIDATION_THRESHOLD = 50n;
export const LIQUIDATION_PRECISION = 100n;

/** 10% of the covered collateral goes to the liquidator on top. */
export const LIQUIDATION_BONUS = 10n;

export const MIN_HEALTH_FACTOR = 10n ** 18n;

/** Default maximum age of a price-feed round, in seconds. */
export const DEFAULT_PRICE_TIMEOUT = 3n * 60n * 60n;
