import { IERC20, IERC20Caller } from './IERC20';

export interface IStableCoinCaller extends IERC20Caller {
  mint(to: string, amount: bigint): boolean;
  burn(amount: bigint): void;
}

/** The unit-pegged token the engine mints and burns. */
export interface IStableCoin extends IERC20 {
  owner(): string;
  connect(caller: string): IStableCoinCaller;
}
