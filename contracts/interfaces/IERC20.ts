/** Calls that act on behalf of the connected account. */
export interface IERC20Caller {
  transfer(to: string, value: bigint): boolean;
  transferFrom(from: string, to: string, value: bigint): boolean;
  approve(spender: string, value: bigint): boolean;
}

export interface IERC20 {
  readonly address: string;
  readonly name: string;
  readonly symbol: string;
  decimals(): number;
  totalSupply(): bigint;
  balanceOf(account: string): bigint;
  allowance(owner: string, spender: string): bigint;
  connect(caller: string): IERC20Caller;
}
