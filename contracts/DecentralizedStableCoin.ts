import {
  BurnAmountExceedsBalance,
  MustBeMoreThanZero,
  NotZeroAddress,
} from './errors';
import { IStableCoin, IStableCoinCaller } from './interfaces/IStableCoin';
import { Network } from './state/Network';
import { normalizeAddress, ZeroAddress } from './state/address';
import { ERC20 } from './token/ERC20';
import { Ownable } from './token/Ownable';

/**
 * The stable unit. Plain ERC20 with owner-only mint and burn; the engine
 * becomes the owner at deployment and is then the only issuer.
 */
export class DecentralizedStableCoin extends ERC20 implements IStableCoin {
  private readonly ownable: Ownable;

  constructor(network: Network, deployer: string) {
    super(network, deployer, 'DecentralizedStableCoin', 'DSC', 18);
    this.ownable = new Ownable(network, deployer);
  }

  owner(): string {
    return this.ownable.owner();
  }

  transferOwnership(caller: string, newOwner: string): void {
    this.ownable.transferOwnership(caller, newOwner);
  }

  connect(caller: string): IStableCoinCaller {
    const sender = normalizeAddress(caller);
    return {
      ...super.connect(sender),
      mint: (to, amount) => this.mint(sender, to, amount),
      burn: (amount) => this.burn(sender, amount),
    };
  }

  mint(caller: string, to: string, amount: bigint): boolean {
    return this.network.transaction(() => {
      this.ownable.checkOwner(caller);
      if (normalizeAddress(to) === ZeroAddress) throw new NotZeroAddress();
      if (amount <= 0n) throw new MustBeMoreThanZero();
      this._mint(to, amount);
      return true;
    });
  }

  burn(caller: string, amount: bigint): void {
    this.network.transaction(() => {
      this.ownable.checkOwner(caller);
      const balance = this.balanceOf(caller);
      if (amount <= 0n) throw new MustBeMoreThanZero();
      if (balance < amount) throw new BurnAmountExceedsBalance(amount, balance);
      this._burn(caller, amount);
    });
  }
}
