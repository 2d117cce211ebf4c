import { expect } from "chai";
import { parseEther, ZeroAddress } from "ethers";
import { DecentralizedStableCoin } from "../../contracts/DecentralizedStableCoin";
import {
  BurnAmountExceedsBalance,
  ERC20InsufficientAllowance,
  ERC20InsufficientBalance,
  MustBeMoreThanZero,
  NotZeroAddress,
  OwnableInvalidOwner,
  OwnableUnauthorizedAccount,
} from "../../contracts/errors";
import { Network } from "../../contracts/state/Network";
import { START_TIMESTAMP } from "../utils/utils";

describe("DecentralizedStableCoin Tests", () => {
  let network: Network;
  let dsc: DecentralizedStableCoin;
  let owner: string;
  let alice: string;
  let bob: string;

  beforeEach(() => {
    network = new Network({ timestamp: START_TIMESTAMP });
    [owner, alice, bob] = network.getSigners(3);
    dsc = new DecentralizedStableCoin(network, owner);
  });

  it("metadata", () => {
    expect(dsc.name).to.equal("DecentralizedStableCoin");
    expect(dsc.symbol).to.equal("DSC");
    expect(dsc.decimals()).to.equal(18);
    expect(dsc.owner()).to.equal(owner);
  });

  describe("mint", () => {
    it("owner mints", () => {
      expect(dsc.connect(owner).mint(alice, parseEther("100"))).to.equal(true);
      expect(dsc.balanceOf(alice)).to.equal(parseEther("100"));
      expect(dsc.totalSupply()).to.equal(parseEther("100"));
    });

    it("only the owner", () => {
      expect(() => dsc.connect(alice).mint(alice, 1n)).to.throw(OwnableUnauthorizedAccount);
    });

    it("rejects the zero address and zero amounts", () => {
      expect(() => dsc.connect(owner).mint(ZeroAddress, 1n)).to.throw(NotZeroAddress);
      expect(() => dsc.connect(owner).mint(alice, 0n)).to.throw(MustBeMoreThanZero);
    });
  });

  describe("burn", () => {
    beforeEach(() => {
      dsc.connect(owner).mint(owner, parseEther("10"));
    });

    it("owner burns its own balance", () => {
      dsc.connect(owner).burn(parseEther("4"));
      expect(dsc.balanceOf(owner)).to.equal(parseEther("6"));
      expect(dsc.totalSupply()).to.equal(parseEther("6"));
    });

    it("rejects zero and more than the balance", () => {
      expect(() => dsc.connect(owner).burn(0n)).to.throw(MustBeMoreThanZero);
      expect(() => dsc.connect(owner).burn(parseEther("11"))).to.throw(BurnAmountExceedsBalance);
    });

    it("only the owner", () => {
      expect(() => dsc.connect(alice).burn(1n)).to.throw(OwnableUnauthorizedAccount);
    });
  });

  describe("ownership", () => {
    it("transfers to a new owner", () => {
      dsc.transferOwnership(owner, alice);
      expect(dsc.owner()).to.equal(alice);
      expect(() => dsc.connect(owner).mint(owner, 1n)).to.throw(OwnableUnauthorizedAccount);
    });

    it("rejects the zero address", () => {
      expect(() => dsc.transferOwnership(owner, ZeroAddress)).to.throw(OwnableInvalidOwner);
    });
  });

  describe("ERC20", () => {
    beforeEach(() => {
      dsc.connect(owner).mint(alice, parseEther("10"));
    });

    it("transfer", () => {
      dsc.connect(alice).transfer(bob, parseEther("3"));
      expect(dsc.balanceOf(alice)).to.equal(parseEther("7"));
      expect(dsc.balanceOf(bob)).to.equal(parseEther("3"));
    });

    it("transferFrom spends the allowance", () => {
      dsc.connect(alice).approve(bob, parseEther("5"));
      dsc.connect(bob).transferFrom(alice, bob, parseEther("2"));
      expect(dsc.allowance(alice, bob)).to.equal(parseEther("3"));
      expect(() => dsc.connect(bob).transferFrom(alice, bob, parseEther("4"))).to.throw(ERC20InsufficientAllowance);
    });

    it("rejects transfers above the balance", () => {
      expect(() => dsc.connect(alice).transfer(bob, parseEther("11"))).to.throw(ERC20InsufficientBalance);
      expect(dsc.balanceOf(alice)).to.equal(parseEther("10"));
    });
  });
});
