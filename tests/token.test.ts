import type { PublicKey } from "@solana/web3.js";
import { expect } from "chai";
import {
  GuardedToken,
  MAX_UINT256,
  TokenErrorCode,
  ZERO_ADDRESS,
  type TokenEvent,
} from "../sdk/core/src";
import { ONE_TOKEN, deploy, expectTokenError, newAccount, silentLogger } from "./helpers";

describe("Guarded Token", () => {
  let deployer: PublicKey;
  let alice: PublicKey;
  let bob: PublicKey;
  let token: GuardedToken;

  beforeEach(() => {
    deployer = newAccount();
    alice = newAccount();
    bob = newAccount();
    token = deploy(deployer, { name: "AdwaitToken", symbol: "ADW", initialSupply: 1_000_000n * ONE_TOKEN });
  });

  describe("construction", () => {
    it("credits the initial supply to the deployer and grants it every role", () => {
      expect(token.balanceOf(deployer)).to.equal(1_000_000n * ONE_TOKEN);
      expect(token.totalSupply()).to.equal(1_000_000n * ONE_TOKEN);
      expect(token.isAdmin(deployer)).to.equal(true);
      expect(token.isMinter(deployer)).to.equal(true);
      expect(token.owner.equals(deployer)).to.equal(true);
      expect(token.isPaused()).to.equal(false);
      expect(token.name).to.equal("AdwaitToken");
      expect(token.symbol).to.equal("ADW");
      expect(token.decimals).to.equal(18);
    });

    it("emits an initialization and a mint notification", () => {
      expect(token.events.map((e) => e.type)).to.deep.equal(["TokenInitialized", "TokensMinted"]);
      const minted = token.events[1];
      if (minted?.type !== "TokensMinted") throw new Error("expected TokensMinted");
      expect(minted.recipient.equals(deployer)).to.equal(true);
      expect(minted.amount).to.equal(1_000_000n * ONE_TOKEN);
      expect(minted.seq).to.equal(1);
      expect(minted.timestamp).to.equal(1_700_000_000_000);
    });

    it("emits no mint notification for an empty initial supply", () => {
      const empty = deploy(deployer);
      expect(empty.events.map((e) => e.type)).to.deep.equal(["TokenInitialized"]);
      expect(empty.totalSupply()).to.equal(0n);
    });

    it("rejects the zero address as deployer", () => {
      expectTokenError(() => deploy(ZERO_ADDRESS), TokenErrorCode.InvalidOwner);
    });

    it("rejects an initial supply above the cap", () => {
      expectTokenError(
        () => deploy(deployer, { initialSupply: 101n, maxSupply: 100n }),
        TokenErrorCode.SupplyCapExceeded
      );
    });
  });

  describe("transfer", () => {
    it("moves balance between accounts", () => {
      token.transfer(deployer, alice, 250n);
      expect(token.balanceOf(alice)).to.equal(250n);
      expect(token.balanceOf(deployer)).to.equal(1_000_000n * ONE_TOKEN - 250n);
      expect(token.totalSupply()).to.equal(1_000_000n * ONE_TOKEN);
    });

    it("fails with InsufficientBalance and leaves both balances untouched", () => {
      token.transfer(deployer, alice, 100n);
      const err = expectTokenError(() => token.transfer(alice, bob, 200n), TokenErrorCode.InsufficientBalance);
      expect(err.message).to.equal("Transfer amount exceeds balance: balance 100, needed 200");
      expect(token.balanceOf(alice)).to.equal(100n);
      expect(token.balanceOf(bob)).to.equal(0n);
    });

    it("rejects the zero address as recipient", () => {
      expectTokenError(() => token.transfer(deployer, ZERO_ADDRESS, 1n), TokenErrorCode.InvalidRecipient);
    });

    it("rejects the zero address as sender", () => {
      expectTokenError(() => token.transfer(ZERO_ADDRESS, alice, 0n), TokenErrorCode.InvalidSender);
    });

    it("accepts a zero amount without changing balances", () => {
      token.transfer(alice, bob, 0n);
      expect(token.balanceOf(alice)).to.equal(0n);
      expect(token.balanceOf(bob)).to.equal(0n);
      expect(token.events.at(-1)?.type).to.equal("Transfer");
    });

    it("rejects negative amounts", () => {
      expectTokenError(() => token.transfer(deployer, alice, -1n), TokenErrorCode.InvalidAmount);
    });
  });

  describe("allowances", () => {
    it("approve overwrites the allowance", () => {
      token.approve(deployer, alice, 500n);
      token.approve(deployer, alice, 300n);
      expect(token.allowance(deployer, alice)).to.equal(300n);
    });

    it("transferFrom spends the allowance together with the balance", () => {
      token.approve(deployer, alice, 500n);
      token.transferFrom(alice, deployer, bob, 200n);
      expect(token.allowance(deployer, alice)).to.equal(300n);
      expect(token.balanceOf(bob)).to.equal(200n);
      expect(token.events.slice(-2).map((e) => e.type)).to.deep.equal(["Transfer", "Approval"]);
    });

    it("fails with InsufficientAllowance and moves nothing", () => {
      token.approve(deployer, alice, 50n);
      expectTokenError(() => token.transferFrom(alice, deployer, bob, 51n), TokenErrorCode.InsufficientAllowance);
      expect(token.allowance(deployer, alice)).to.equal(50n);
      expect(token.balanceOf(bob)).to.equal(0n);
    });

    it("keeps the allowance when the owner's balance is short", () => {
      token.approve(alice, bob, 1_000n);
      token.transfer(deployer, alice, 10n);
      expectTokenError(() => token.transferFrom(bob, alice, bob, 11n), TokenErrorCode.InsufficientBalance);
      expect(token.allowance(alice, bob)).to.equal(1_000n);
      expect(token.balanceOf(alice)).to.equal(10n);
    });

    it("does not decrement an unlimited allowance", () => {
      token.approve(deployer, alice, MAX_UINT256);
      token.transferFrom(alice, deployer, bob, 5n);
      expect(token.allowance(deployer, alice)).to.equal(MAX_UINT256);
      expect(token.events.at(-1)?.type).to.equal("Transfer");
    });

    it("transferFrom checks addresses before the allowance", () => {
      expectTokenError(() => token.transferFrom(alice, deployer, ZERO_ADDRESS, 1n), TokenErrorCode.InvalidRecipient);
      expectTokenError(() => token.transferFrom(alice, ZERO_ADDRESS, bob, 1n), TokenErrorCode.InvalidSender);
      expect(token.balanceOf(deployer)).to.equal(1_000_000n * ONE_TOKEN);
    });

    it("rejects the zero address as spender", () => {
      expectTokenError(() => token.approve(deployer, ZERO_ADDRESS, 1n), TokenErrorCode.InvalidSpender);
    });

    it("increases and decreases allowances", () => {
      token.increaseAllowance(deployer, alice, 40n);
      token.increaseAllowance(deployer, alice, 2n);
      expect(token.allowance(deployer, alice)).to.equal(42n);
      token.decreaseAllowance(deployer, alice, 12n);
      expect(token.allowance(deployer, alice)).to.equal(30n);
      expectTokenError(() => token.decreaseAllowance(deployer, alice, 31n), TokenErrorCode.InsufficientAllowance);
      expect(token.allowance(deployer, alice)).to.equal(30n);
    });
  });

  describe("notifications", () => {
    it("delivers committed events to subscribers in order", () => {
      const seen: TokenEvent[] = [];
      token.onEvent((event) => seen.push(event));
      token.transfer(deployer, alice, 7n);
      token.approve(alice, bob, 3n);

      expect(seen.map((e) => e.type)).to.deep.equal(["Transfer", "Approval"]);
      expect(seen.map((e) => e.seq)).to.deep.equal([2, 3]);
      expect(seen.every((e) => e.token.equals(token.address))).to.equal(true);
    });

    it("sends nothing for a failed operation", () => {
      const seen: TokenEvent[] = [];
      token.onEvent((event) => seen.push(event));
      expectTokenError(() => token.transfer(alice, bob, 1n), TokenErrorCode.InsufficientBalance);
      expect(seen).to.have.length(0);
    });

    it("stops delivering after the listener is removed", () => {
      const seen: TokenEvent[] = [];
      const id = token.onEvent((event) => seen.push(event));
      token.transfer(deployer, alice, 1n);
      token.removeEventListener(id);
      token.transfer(deployer, alice, 1n);
      expect(seen).to.have.length(1);
    });

    it("keeps only the most recent events up to the history limit", () => {
      const small = GuardedToken.create(deployer, { name: "H", symbol: "H", decimals: 0, initialSupply: 10n }, {
        logger: silentLogger,
        historyLimit: 3,
      });
      for (let i = 0; i < 5; i++) small.approve(deployer, alice, BigInt(i));

      expect(small.events.map((e) => e.seq)).to.deep.equal([4, 5, 6]);
      expect(small.snapshot().nextSeq).to.equal(7);
    });

    it("keeps no history with a limit of zero", () => {
      const seen: TokenEvent[] = [];
      const quiet = GuardedToken.create(deployer, { name: "Z", symbol: "Z", decimals: 0, initialSupply: 0n }, {
        logger: silentLogger,
        historyLimit: 0,
      });
      quiet.onEvent((event) => seen.push(event));
      quiet.approve(deployer, alice, 1n);
      expect(quiet.events).to.have.length(0);
      expect(seen.map((e) => e.type)).to.deep.equal(["Approval"]);
    });

    it("keeps the change when a listener throws", () => {
      const quiet = GuardedToken.create(deployer, { name: "Q", symbol: "Q", decimals: 0, initialSupply: 10n }, {
        logger: silentLogger,
      });
      quiet.onEvent(() => {
        throw new Error("listener failure");
      });
      quiet.transfer(deployer, alice, 4n);
      expect(quiet.balanceOf(alice)).to.equal(4n);
    });
  });

  it("reports status", () => {
    token.transfer(deployer, alice, 1n);
    const status = token.status();
    expect(status.holders).to.equal(2);
    expect(status.maxSupply).to.equal(null);
    expect(status.admins.map((k) => k.toBase58())).to.deep.equal([deployer.toBase58()]);
    expect(status.minters.map((k) => k.toBase58())).to.deep.equal([deployer.toBase58()]);
  });
});
