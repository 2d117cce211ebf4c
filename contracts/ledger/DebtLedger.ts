import { DebtUnderflow, NeedsMoreThanZero } from '../errors';
import { MathUtil } from '../libraries/MathUtil';
import { Journal, JournaledMap } from '../state/JournaledMap';

/** Minted stable-unit amount per account. */
export class DebtLedger {
  private readonly minted: JournaledMap<string, bigint>;

  constructor(journal: Journal) {
    this.minted = new JournaledMap<string, bigint>(journal, 0n);
  }

  debtOf(account: string): bigint {
    return this.minted.get(account);
  }

  increase(account: string, amount: bigint): void {
    if (amount <= 0n) throw new NeedsMoreThanZero();
    this.minted.set(account, MathUtil.add(this.minted.get(account), amount));
  }

  decrease(account: string, amount: bigint): void {
    const available = this.minted.get(account);
    if (amount > available) throw new DebtUnderflow(amount, available);
    this.minted.set(account, available - amount);
  }

  totalDebt(): bigint {
    return this.minted.values().reduce((sum, amount) => MathUtil.add(sum, amount), 0n);
  }

  accounts(): string[] {
    return this.minted.keys();
  }
}
