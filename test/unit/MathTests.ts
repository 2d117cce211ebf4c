import { expect } from "chai";
import { MaxUint256 } from "ethers";
import { ArithmeticOverflow, ArithmeticUnderflow, DivisionByZero } from "../../contracts/errors";
import { MathUtil } from "../../contracts/libraries/MathUtil";
import { floatToDec18, formatHealthFactor } from "../../scripts/utils/math";

describe("Math Tests", () => {
  describe("checked arithmetic", () => {
    it("add", () => {
      expect(MathUtil.add(2n, 3n)).to.equal(5n);
      expect(() => MathUtil.add(MaxUint256, 1n)).to.throw(ArithmeticOverflow);
    });

    it("sub", () => {
      expect(MathUtil.sub(5n, 3n)).to.equal(2n);
      expect(() => MathUtil.sub(3n, 5n)).to.throw(ArithmeticUnderflow);
    });

    it("mul", () => {
      expect(MathUtil.mul(4n, 5n)).to.equal(20n);
      expect(() => MathUtil.mul(MaxUint256, 2n)).to.throw(ArithmeticOverflow);
    });

    it("div truncates", () => {
      expect(MathUtil.div(7n, 2n)).to.equal(3n);
      expect(() => MathUtil.div(1n, 0n)).to.throw(DivisionByZero);
    });

    it("mulDiv checks the intermediate product", () => {
      expect(MathUtil.mulDiv(10n, 3n, 4n)).to.equal(7n);
      expect(() => MathUtil.mulDiv(MaxUint256, 2n, 2n)).to.throw(ArithmeticOverflow);
    });

    it("check rejects values outside uint256", () => {
      expect(MathUtil.check(MaxUint256)).to.equal(MaxUint256);
      expect(() => MathUtil.check(-1n)).to.throw(ArithmeticUnderflow);
    });
  });

  describe("decimal helpers", () => {
    it("floatToDec18", () => {
      expect(floatToDec18(1.5)).to.equal(1_500_000_000_000_000_000n);
      expect(floatToDec18("0.1")).to.equal(100_000_000_000_000_000n);
    });

    it("formatHealthFactor", () => {
      expect(formatHealthFactor(MaxUint256)).to.equal("∞");
      expect(formatHealthFactor(550_000_000_000_000_000n)).to.equal("0.55");
      expect(formatHealthFactor(1_234_600_000_000_000_000n, 3)).to.equal("1.235");
    });
  });
});
