import { InsufficientCollateral, NeedsMoreThanZero, NotAllowedToken } from '../errors';
import { MathUtil } from '../libraries/MathUtil';
import { Journal, JournaledMap } from '../state/JournaledMap';

/**
 * Deposited amount per (account, collateral token). No solvency awareness:
 * callers decide whether a movement is allowed.
 */
export class CollateralLedger {
  private readonly deposits = new Map<string, JournaledMap<string, bigint>>();

  constructor(journal: Journal, tokens: readonly string[]) {
    for (const token of tokens) {
      this.deposits.set(token, new JournaledMap<string, bigint>(journal, 0n));
    }
  }

  balanceOf(account: string, token: string): bigint {
    return this.positions(token).get(account);
  }

  deposit(account: string, token: string, amount: bigint): void {
    if (amount <= 0n) throw new NeedsMoreThanZero();
    const positions = this.positions(token);
    positions.set(account, MathUtil.add(positions.get(account), amount));
  }

  withdraw(account: string, token: string, amount: bigint): void {
    if (amount <= 0n) throw new NeedsMoreThanZero();
    const positions = this.positions(token);
    const available = positions.get(account);
    if (amount > available) throw new InsufficientCollateral(amount, available);
    positions.set(account, available - amount);
  }

  totalDeposited(token: string): bigint {
    return this.positions(token)
      .values()
      .reduce((sum, amount) => MathUtil.add(sum, amount), 0n);
  }

  /** Every account with an entry for any token. */
  accounts(): string[] {
    const seen = new Set<string>();
    for (const positions of this.deposits.values()) {
      positions.keys().forEach((account) => seen.add(account));
    }
    return Array.from(seen);
  }

  private positions(token: string): JournaledMap<string, bigint> {
    const positions = this.deposits.get(token);
    if (!positions) throw new NotAllowedToken(token);
    return positions;
  }
}
