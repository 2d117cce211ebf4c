import { IERC20, IERC20Caller } from '../interfaces/IERC20';
import {
  ERC20InsufficientAllowance,
  ERC20InsufficientBalance,
  ERC20InvalidReceiver,
  ERC20InvalidSender,
} from '../errors';
import { MathUtil } from '../libraries/MathUtil';
import { JournaledMap, JournaledValue } from '../state/JournaledMap';
import { Network } from '../state/Network';
import { normalizeAddress, ZeroAddress } from '../state/address';

/**
 * Fungible token kept on the network journal. Balance changes made inside a
 * failed transaction are rolled back with it.
 */
export class ERC20 implements IERC20 {
  readonly address: string;
  private readonly balances: JournaledMap<string, bigint>;
  private readonly allowances: JournaledMap<string, bigint>;
  private readonly supply: JournaledValue<bigint>;

  constructor(
    protected readonly network: Network,
    deployer: string,
    readonly name: string,
    readonly symbol: string,
    private readonly tokenDecimals: number = 18,
  ) {
    this.address = network.deploy(deployer);
    this.balances = new JournaledMap(network, 0n);
    this.allowances = new JournaledMap(network, 0n);
    this.supply = new JournaledValue(network, 0n);
  }

  decimals(): number {
    return this.tokenDecimals;
  }

  totalSupply(): bigint {
    return this.supply.get();
  }

  balanceOf(account: string): bigint {
    return this.balances.get(normalizeAddress(account));
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(allowanceKey(normalizeAddress(owner), normalizeAddress(spender)));
  }

  connect(caller: string): IERC20Caller {
    const sender = normalizeAddress(caller);
    return {
      transfer: (to, value) => this.transfer(sender, to, value),
      transferFrom: (from, to, value) => this.transferFrom(sender, from, to, value),
      approve: (spender, value) => this.approve(sender, spender, value),
    };
  }

  transfer(sender: string, to: string, value: bigint): boolean {
    return this.network.transaction(() => {
      this._transfer(sender, to, value);
      return true;
    });
  }

  transferFrom(spender: string, from: string, to: string, value: bigint): boolean {
    return this.network.transaction(() => {
      this._spendAllowance(from, spender, value);
      this._transfer(from, to, value);
      return true;
    });
  }

  approve(owner: string, spender: string, value: bigint): boolean {
    return this.network.transaction(() => {
      this.allowances.set(allowanceKey(normalizeAddress(owner), normalizeAddress(spender)), MathUtil.check(value));
      return true;
    });
  }

  // ***** INTERNALS *****

  protected _transfer(from: string, to: string, value: bigint): void {
    const sender = normalizeAddress(from);
    const receiver = normalizeAddress(to);
    if (sender === ZeroAddress) throw new ERC20InvalidSender(sender);
    if (receiver === ZeroAddress) throw new ERC20InvalidReceiver(receiver);
    this.move(sender, receiver, value);
  }

  protected _mint(to: string, value: bigint): void {
    const receiver = normalizeAddress(to);
    if (receiver === ZeroAddress) throw new ERC20InvalidReceiver(receiver);
    this.supply.set(MathUtil.add(this.supply.get(), value));
    this.balances.set(receiver, MathUtil.add(this.balances.get(receiver), value));
  }

  protected _burn(from: string, value: bigint): void {
    const sender = normalizeAddress(from);
    if (sender === ZeroAddress) throw new ERC20InvalidSender(sender);
    const balance = this.balances.get(sender);
    if (balance < value) throw new ERC20InsufficientBalance(sender, balance, value);
    this.balances.set(sender, balance - value);
    this.supply.set(MathUtil.sub(this.supply.get(), value));
  }

  protected _spendAllowance(owner: string, spender: string, value: bigint): void {
    const key = allowanceKey(normalizeAddress(owner), normalizeAddress(spender));
    const current = this.allowances.get(key);
    if (current === MathUtil.MAX_UINT256) return;
    if (current < value) throw new ERC20InsufficientAllowance(normalizeAddress(spender), current, value);
    this.allowances.set(key, current - value);
  }

  private move(from: string, to: string, value: bigint): void {
    MathUtil.check(value);
    const balance = this.balances.get(from);
    if (balance < value) throw new ERC20InsufficientBalance(from, balance, value);
    this.balances.set(from, balance - value);
    this.balances.set(to, MathUtil.add(this.balances.get(to), value));
  }
}

function allowanceKey(owner: string, spender: string): string {
  return `${owner}:${spender}`;
}
