import { PublicKey } from "@solana/web3.js";
import { TokenError, TokenErrorCode } from "./errors";
import { MAX_UINT256, ZERO_ADDRESS } from "./types";

export function assertAmount(amount: bigint): void {
  if (amount < 0n) throw new TokenError(TokenErrorCode.InvalidAmount, amount.toString());
  if (amount > MAX_UINT256) throw new TokenError(TokenErrorCode.Overflow);
}

/**
 * Balances, allowances and total supply.
 *
 * Every mutator checks all of its preconditions before the first write, so a
 * thrown error never leaves a half-applied move behind. Invariant:
 * `totalSupply` equals the sum of all balances.
 */
export class BalanceLedger {
  private balances = new Map<string, bigint>();
  private allowances = new Map<string, Map<string, bigint>>();
  private supply = 0n;

  constructor(private readonly maxSupply: bigint | null = null) {}

  get totalSupply(): bigint {
    return this.supply;
  }

  get cap(): bigint | null {
    return this.maxSupply;
  }

  balanceOf(account: PublicKey): bigint {
    return this.balances.get(account.toBase58()) ?? 0n;
  }

  allowance(owner: PublicKey, spender: PublicKey): bigint {
    return this.allowances.get(owner.toBase58())?.get(spender.toBase58()) ?? 0n;
  }

  /** Accounts with a non-zero balance. */
  holders(): Array<[PublicKey, bigint]> {
    return [...this.balances]
      .filter(([, amount]) => amount > 0n)
      .map(([key, amount]) => [new PublicKey(key), amount]);
  }

  allowanceEntries(): Array<[PublicKey, PublicKey, bigint]> {
    const entries: Array<[PublicKey, PublicKey, bigint]> = [];
    for (const [owner, spenders] of this.allowances) {
      for (const [spender, amount] of spenders) {
        if (amount > 0n) entries.push([new PublicKey(owner), new PublicKey(spender), amount]);
      }
    }
    return entries;
  }

  transfer(from: PublicKey, to: PublicKey, amount: bigint): void {
    this.checkTransfer(from, to, amount);
    this.move(from, to, amount);
  }

  private checkTransfer(from: PublicKey, to: PublicKey, amount: bigint): void {
    assertAmount(amount);
    this.checkAddresses(from, to);
    this.checkBalance(from, amount);
  }

  private checkAddresses(from: PublicKey, to: PublicKey): void {
    if (from.equals(ZERO_ADDRESS)) throw new TokenError(TokenErrorCode.InvalidSender);
    if (to.equals(ZERO_ADDRESS)) throw new TokenError(TokenErrorCode.InvalidRecipient);
  }

  private checkBalance(from: PublicKey, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new TokenError(
        TokenErrorCode.InsufficientBalance,
        `balance ${balance.toString()}, needed ${amount.toString()}`
      );
    }
  }

  approve(owner: PublicKey, spender: PublicKey, amount: bigint): void {
    assertAmount(amount);
    if (owner.equals(ZERO_ADDRESS)) throw new TokenError(TokenErrorCode.InvalidSender);
    if (spender.equals(ZERO_ADDRESS)) throw new TokenError(TokenErrorCode.InvalidSpender);
    this.setAllowance(owner, spender, amount);
  }

  /**
   * Moves `amount` from `from` to `to` on behalf of `spender`, consuming
   * allowance. Checks addresses, then allowance, then balance. Returns the
   * allowance left afterwards.
   */
  transferFrom(spender: PublicKey, from: PublicKey, to: PublicKey, amount: bigint): bigint {
    assertAmount(amount);
    this.checkAddresses(from, to);
    this.checkAllowance(from, spender, amount);
    this.checkBalance(from, amount);
    const remaining = this.spendAllowance(from, spender, amount);
    this.move(from, to, amount);
    return remaining;
  }

  /**
   * Consumes `amount` of the allowance `owner` gave `spender` and returns
   * what is left. An allowance of MAX_UINT256 is unlimited and not
   * decremented.
   */
  spendAllowance(owner: PublicKey, spender: PublicKey, amount: bigint): bigint {
    const remaining = this.checkAllowance(owner, spender, amount);
    if (remaining !== MAX_UINT256) this.setAllowance(owner, spender, remaining);
    return remaining;
  }

  /** Returns the allowance left after spending `amount`. */
  private checkAllowance(owner: PublicKey, spender: PublicKey, amount: bigint): bigint {
    assertAmount(amount);
    const current = this.allowance(owner, spender);
    if (current === MAX_UINT256) return current;
    if (current < amount) {
      throw new TokenError(
        TokenErrorCode.InsufficientAllowance,
        `allowance ${current.toString()}, needed ${amount.toString()}`
      );
    }
    return current - amount;
  }

  /** Returns the total supply after the mint. */
  private checkMint(to: PublicKey, amount: bigint): bigint {
    assertAmount(amount);
    if (to.equals(ZERO_ADDRESS)) throw new TokenError(TokenErrorCode.InvalidRecipient);
    const next = this.supply + amount;
    if (next > MAX_UINT256) throw new TokenError(TokenErrorCode.Overflow);
    if (this.maxSupply !== null && next > this.maxSupply) {
      throw new TokenError(
        TokenErrorCode.SupplyCapExceeded,
        `cap ${this.maxSupply.toString()}, requested supply ${next.toString()}`
      );
    }
    return next;
  }

  mint(to: PublicKey, amount: bigint): void {
    this.supply = this.checkMint(to, amount);
    this.credit(to, amount);
  }

  /** Overwrites a balance and shifts total supply by the difference. Used by restore. */
  setBalance(account: PublicKey, amount: bigint): void {
    assertAmount(amount);
    const key = account.toBase58();
    const previous = this.balances.get(key) ?? 0n;
    this.balances.set(key, amount);
    this.supply += amount - previous;
  }

  private setAllowance(owner: PublicKey, spender: PublicKey, amount: bigint): void {
    const ownerKey = owner.toBase58();
    let spenders = this.allowances.get(ownerKey);
    if (!spenders) {
      spenders = new Map();
      this.allowances.set(ownerKey, spenders);
    }
    spenders.set(spender.toBase58(), amount);
  }

  private move(from: PublicKey, to: PublicKey, amount: bigint): void {
    const fromKey = from.toBase58();
    this.balances.set(fromKey, (this.balances.get(fromKey) ?? 0n) - amount);
    this.credit(to, amount);
  }

  private credit(to: PublicKey, amount: bigint): void {
    const key = to.toBase58();
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }
}
