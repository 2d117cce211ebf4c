import { MaxUint256 } from 'ethers';
import { ArithmeticOverflow, ArithmeticUnderflow, DivisionByZero } from '../errors';

/**
 * Checked uint256 arithmetic. Results outside `0 .. 2^256-1` throw instead of
 * wrapping, division truncates toward zero.
 */
export const MathUtil = {
  MAX_UINT256: MaxUint256,

  check(value: bigint): bigint {
    if (value < 0n) throw new ArithmeticUnderflow();
    if (value > MaxUint256) throw new ArithmeticOverflow();
    return value;
  },

  add(a: bigint, b: bigint): bigint {
    return MathUtil.check(a + b);
  },

  sub(a: bigint, b: bigint): bigint {
    return MathUtil.check(a - b);
  },

  mul(a: bigint, b: bigint): bigint {
    return MathUtil.check(a * b);
  },

  div(a: bigint, b: bigint): bigint {
    if (b === 0n) throw new DivisionByZero();
    return MathUtil.check(a / b);
  },

  /** a * b / c with the intermediate product range-checked as well */
  mulDiv(a: bigint, b: bigint, c: bigint): bigint {
    return MathUtil.div(MathUtil.mul(a, b), c);
  },
};
