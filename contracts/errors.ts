/**
 * Custom errors raised by the engine and its collaborators.
 *
 * Every error carries its own class name in `name` so callers can match on
 * either the class (`instanceof`) or the name (logs, persisted failures).
 */
export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// ***** ENGINE *****

export class NeedsMoreThanZero extends EngineError {
  constructor() {
    super('Amount must be more than zero');
  }
}

export class NotAllowedToken extends EngineError {
  constructor(readonly token: string) {
    super(`Token ${token} is not an allowed collateral`);
  }
}

export class TokenAddressesAndPriceFeedAddressesMustBeSameLength extends EngineError {
  constructor(
    readonly tokens: number,
    readonly priceFeeds: number,
  ) {
    super(`Got ${tokens} token addresses but ${priceFeeds} price feed addresses`);
  }
}

export class InsufficientCollateral extends EngineError {
  constructor(
    readonly requested: bigint,
    readonly available: bigint,
  ) {
    super(`Requested ${requested} collateral but only ${available} is deposited`);
  }
}

export class DebtUnderflow extends EngineError {
  constructor(
    readonly requested: bigint,
    readonly available: bigint,
  ) {
    super(`Cannot reduce debt by ${requested}, outstanding debt is ${available}`);
  }
}

export class BurnExceedsDebt extends EngineError {
  constructor(
    readonly amount: bigint,
    readonly debt: bigint,
  ) {
    super(`Burn amount ${amount} exceeds minted debt ${debt}`);
  }
}

export class BreaksHealthFactor extends EngineError {
  constructor(readonly healthFactor: bigint) {
    super(`Health factor ${healthFactor} is below the minimum`);
  }
}

export class HealthFactorOk extends EngineError {
  constructor(readonly healthFactor: bigint) {
    super(`Health factor ${healthFactor} is not liquidatable`);
  }
}

export class HealthFactorNotImproved extends EngineError {
  constructor(
    readonly before: bigint,
    readonly after: bigint,
  ) {
    super(`Health factor did not improve (${before} -> ${after})`);
  }
}

export class MintFailed extends EngineError {
  constructor() {
    super('Stable coin mint failed');
  }
}

export class TransferFailed extends EngineError {
  constructor(readonly token: string) {
    super(`Transfer of ${token} failed`);
  }
}

export class ExternalTransferUnderfunded extends EngineError {
  constructor(
    readonly requested: bigint,
    readonly available: bigint,
  ) {
    super(`Liquidation payout ${requested} exceeds remaining collateral ${available}`);
  }
}

export class ReentrancyGuardReentrantCall extends EngineError {
  constructor() {
    super('Reentrant call');
  }
}

export class InvalidAddress extends EngineError {
  constructor(readonly address: string) {
    super(`Invalid address: ${address}`);
  }
}

// ***** ORACLE *****

export class StalePrice extends EngineError {
  constructor(
    readonly feed: string,
    readonly updatedAt: bigint,
  ) {
    super(`Price feed ${feed} is stale (last update ${updatedAt})`);
  }
}

export class InvalidPrice extends EngineError {
  constructor(
    readonly feed: string,
    readonly answer: bigint,
  ) {
    super(`Price feed ${feed} returned non-positive answer ${answer}`);
  }
}

// ***** ARITHMETIC *****

export class ArithmeticOverflow extends EngineError {
  constructor() {
    super('Arithmetic overflow');
  }
}

export class ArithmeticUnderflow extends EngineError {
  constructor() {
    super('Arithmetic underflow');
  }
}

export class DivisionByZero extends EngineError {
  constructor() {
    super('Division by zero');
  }
}

// ***** TOKENS *****

export class ERC20InsufficientBalance extends EngineError {
  constructor(
    readonly sender: string,
    readonly balance: bigint,
    readonly needed: bigint,
  ) {
    super(`${sender} has balance ${balance}, needs ${needed}`);
  }
}

export class ERC20InsufficientAllowance extends EngineError {
  constructor(
    readonly spender: string,
    readonly allowance: bigint,
    readonly needed: bigint,
  ) {
    super(`${spender} has allowance ${allowance}, needs ${needed}`);
  }
}

export class ERC20InvalidSender extends EngineError {
  constructor(readonly sender: string) {
    super(`Invalid sender ${sender}`);
  }
}

export class ERC20InvalidReceiver extends EngineError {
  constructor(readonly receiver: string) {
    super(`Invalid receiver ${receiver}`);
  }
}

export class OwnableUnauthorizedAccount extends EngineError {
  constructor(readonly account: string) {
    super(`Account ${account} is not the owner`);
  }
}

export class MustBeMoreThanZero extends EngineError {
  constructor() {
    super('Amount must be more than zero');
  }
}

export class BurnAmountExceedsBalance extends EngineError {
  constructor(
    readonly amount: bigint,
    readonly balance: bigint,
  ) {
    super(`Burn amount ${amount} exceeds balance ${balance}`);
  }
}

export class NotZeroAddress extends EngineError {
  constructor() {
    super('Cannot mint to the zero address');
  }
}

export class OwnableInvalidOwner extends EngineError {
  constructor(readonly owner: string) {
    super(`Invalid owner ${owner}`);
  }
}
