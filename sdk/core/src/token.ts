import { Keypair, PublicKey } from "@solana/web3.js";
import pino, { type Logger } from "pino";
import { AccessRegistry } from "./access";
import { TokenError, TokenErrorCode } from "./errors";
import { BalanceLedger, assertAmount } from "./ledger";
import { PauseGate } from "./pause";
import { parseSnapshot, type TokenSnapshot } from "./snapshot";
import {
  Role,
  ZERO_ADDRESS,
  type TokenConfig,
  type TokenEvent,
  type TokenEventInput,
  type TokenEventListener,
  type TokenStatus,
} from "./types";

export interface TokenOptions {
  /** Token id. A fresh random key when omitted. */
  address?: PublicKey;
  logger?: Logger;
  /** Clock used to timestamp events. */
  now?: () => number;
  /** How many recent events `events` keeps. Defaults to 1000. */
  historyLimit?: number;
}

const DEFAULT_HISTORY_LIMIT = 1000;

const defaultLogger = pino({ name: "guarded-token", level: process.env.LOG_LEVEL || "info" });

/**
 * Fungible token ledger guarded by roles, a pause switch and an owner slot.
 *
 * Operations are synchronous and run to completion on the event loop, so
 * no two can interleave. Each one checks every guard before it writes and
 * emits its notification only after the state change is committed.
 */
export class GuardedToken {
  readonly address: PublicKey;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;

  private readonly access: AccessRegistry;
  private readonly gate: PauseGate;
  private readonly ledger: BalanceLedger;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly historyLimit: number;

  private readonly log: TokenEvent[] = [];
  private readonly listeners = new Map<number, TokenEventListener>();
  private nextListenerId = 0;
  private nextSeq = 0;

  private constructor(
    config: Omit<TokenConfig, "initialSupply">,
    owner: PublicKey,
    options: TokenOptions
  ) {
    this.address = options.address ?? Keypair.generate().publicKey;
    this.name = config.name;
    this.symbol = config.symbol;
    this.decimals = config.decimals;
    this.access = new AccessRegistry(owner);
    this.gate = new PauseGate();
    this.ledger = new BalanceLedger(config.maxSupply ?? null);
    this.logger = (options.logger ?? defaultLogger).child({ token: this.address.toBase58() });
    this.now = options.now ?? Date.now;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    if (!Number.isInteger(this.historyLimit) || this.historyLimit < 0) {
      throw new Error(`Invalid history limit: ${this.historyLimit}`);
    }
  }

  /**
   * Construct a token. The deployer becomes owner, admin and minter and
   * receives the initial supply.
   */
  static create(deployer: PublicKey, config: TokenConfig, options: TokenOptions = {}): GuardedToken {
    if (deployer.equals(ZERO_ADDRESS)) throw new TokenError(TokenErrorCode.InvalidOwner);
    if (!Number.isInteger(config.decimals) || config.decimals < 0 || config.decimals > 255) {
      throw new Error(`Invalid decimals: ${config.decimals}`);
    }
    assertAmount(config.initialSupply);

    const token = new GuardedToken(config, deployer, options);
    token.access.addMember(Role.Admin, deployer);
    token.access.addMember(Role.Minter, deployer);
    if (config.initialSupply > 0n) token.ledger.mint(deployer, config.initialSupply);

    token.emit({
      type: "TokenInitialized",
      deployer,
      name: config.name,
      symbol: config.symbol,
      decimals: config.decimals,
    });
    if (config.initialSupply > 0n) {
      token.emit({
        type: "TokensMinted",
        minter: deployer,
        recipient: deployer,
        amount: config.initialSupply,
        totalSupply: token.ledger.totalSupply,
      });
    }
    token.logger.info({ deployer: deployer.toBase58(), symbol: config.symbol }, "token created");
    return token;
  }

  /** Rebuild a token from `snapshot()` output. The event log starts empty. */
  static restore(data: unknown, options: Omit<TokenOptions, "address"> = {}): GuardedToken {
    const snapshot = parseSnapshot(data);
    const owner = new PublicKey(snapshot.owner);
    if (owner.equals(ZERO_ADDRESS)) throw new Error("Invalid token snapshot: owner is the zero address");

    const token = new GuardedToken(
      {
        name: snapshot.name,
        symbol: snapshot.symbol,
        decimals: snapshot.decimals,
        maxSupply: snapshot.maxSupply === null ? undefined : BigInt(snapshot.maxSupply),
      },
      owner,
      { ...options, address: new PublicKey(snapshot.address) }
    );

    for (const key of snapshot.roles[Role.Admin]) token.access.addMember(Role.Admin, new PublicKey(key));
    for (const key of snapshot.roles[Role.Minter]) token.access.addMember(Role.Minter, new PublicKey(key));
    for (const [key, amount] of Object.entries(snapshot.balances)) {
      token.ledger.setBalance(new PublicKey(key), BigInt(amount));
    }
    for (const [holder, spenders] of Object.entries(snapshot.allowances)) {
      for (const [spender, amount] of Object.entries(spenders)) {
        token.ledger.approve(new PublicKey(holder), new PublicKey(spender), BigInt(amount));
      }
    }
    if (snapshot.paused) token.gate.pause();
    token.nextSeq = snapshot.nextSeq;

    const supply = token.ledger.totalSupply;
    if (supply !== BigInt(snapshot.totalSupply)) {
      throw new Error(
        `Invalid token snapshot: balances sum to ${supply.toString()}, total supply is ${snapshot.totalSupply}`
      );
    }
    if (token.ledger.cap !== null && supply > token.ledger.cap) {
      throw new Error("Invalid token snapshot: total supply exceeds the supply cap");
    }
    return token;
  }

  // ── Reads ────────────────────────────────────────────────────────────

  balanceOf(account: PublicKey): bigint {
    return this.ledger.balanceOf(account);
  }

  totalSupply(): bigint {
    return this.ledger.totalSupply;
  }

  allowance(owner: PublicKey, spender: PublicKey): bigint {
    return this.ledger.allowance(owner, spender);
  }

  get maxSupply(): bigint | null {
    return this.ledger.cap;
  }

  get owner(): PublicKey {
    return this.access.owner;
  }

  hasRole(role: Role, account: PublicKey): boolean {
    return this.access.hasRole(role, account);
  }

  isAdmin(account: PublicKey): boolean {
    return this.access.isAdmin(account);
  }

  isMinter(account: PublicKey): boolean {
    return this.access.isMinter(account);
  }

  getRoleMembers(role: Role): PublicKey[] {
    return this.access.getRoleMembers(role);
  }

  isPaused(): boolean {
    return this.gate.isPaused();
  }

  status(): TokenStatus {
    return {
      address: this.address,
      name: this.name,
      symbol: this.symbol,
      decimals: this.decimals,
      totalSupply: this.ledger.totalSupply,
      maxSupply: this.ledger.cap,
      paused: this.gate.isPaused(),
      owner: this.access.owner,
      admins: this.access.getRoleMembers(Role.Admin),
      minters: this.access.getRoleMembers(Role.Minter),
      holders: this.ledger.holders().length,
    };
  }

  // ── Balance operations ───────────────────────────────────────────────

  transfer(caller: PublicKey, to: PublicKey, amount: bigint): void {
    this.gate.assertNotPaused();
    this.ledger.transfer(caller, to, amount);
    this.emit({ type: "Transfer", from: caller, to, amount });
  }

  approve(caller: PublicKey, spender: PublicKey, amount: bigint): void {
    this.ledger.approve(caller, spender, amount);
    this.emit({ type: "Approval", owner: caller, spender, amount });
  }

  increaseAllowance(caller: PublicKey, spender: PublicKey, delta: bigint): void {
    if (delta < 0n) throw new TokenError(TokenErrorCode.InvalidAmount, delta.toString());
    this.approve(caller, spender, this.ledger.allowance(caller, spender) + delta);
  }

  decreaseAllowance(caller: PublicKey, spender: PublicKey, delta: bigint): void {
    if (delta < 0n) throw new TokenError(TokenErrorCode.InvalidAmount, delta.toString());
    const current = this.ledger.allowance(caller, spender);
    if (current < delta) {
      throw new TokenError(
        TokenErrorCode.InsufficientAllowance,
        `allowance ${current.toString()}, decrease ${delta.toString()}`
      );
    }
    this.approve(caller, spender, current - delta);
  }

  /** Spend `caller`'s allowance over `from`'s balance. */
  transferFrom(caller: PublicKey, from: PublicKey, to: PublicKey, amount: bigint): void {
    this.gate.assertNotPaused();
    const before = this.ledger.allowance(from, caller);
    const remaining = this.ledger.transferFrom(caller, from, to, amount);
    this.emit({ type: "Transfer", from, to, amount });
    if (remaining !== before) {
      this.emit({ type: "Approval", owner: from, spender: caller, amount: remaining });
    }
  }

  mint(caller: PublicKey, to: PublicKey, amount: bigint): void {
    this.access.requireRole(Role.Minter, caller);
    this.gate.assertNotPaused();
    this.ledger.mint(to, amount);
    this.emit({
      type: "TokensMinted",
      minter: caller,
      recipient: to,
      amount,
      totalSupply: this.ledger.totalSupply,
    });
  }

  // ── Pause ────────────────────────────────────────────────────────────

  pause(caller: PublicKey): void {
    this.access.requireRole(Role.Admin, caller);
    this.gate.pause();
    this.emit({ type: "TokenPaused", pausedBy: caller });
    this.logger.warn({ by: caller.toBase58() }, "token paused");
  }

  unpause(caller: PublicKey): void {
    this.access.requireRole(Role.Admin, caller);
    this.gate.unpause();
    this.emit({ type: "TokenUnpaused", unpausedBy: caller });
    this.logger.info({ by: caller.toBase58() }, "token unpaused");
  }

  // ── Roles and ownership ──────────────────────────────────────────────

  grantRole(caller: PublicKey, role: Role, account: PublicKey): void {
    if (this.access.grantRole(caller, role, account)) {
      this.emit({ type: "RoleGranted", role, account, sender: caller });
    }
  }

  revokeRole(caller: PublicKey, role: Role, account: PublicKey): void {
    if (this.access.revokeRole(caller, role, account)) {
      this.emit({ type: "RoleRevoked", role, account, sender: caller });
    }
  }

  /** Drop one of the caller's own roles. The last admin may renounce. */
  renounceRole(caller: PublicKey, role: Role): void {
    if (this.access.renounceRole(caller, role)) {
      this.emit({ type: "RoleRevoked", role, account: caller, sender: caller });
    }
  }

  grantMinterRole(caller: PublicKey, account: PublicKey): void {
    this.grantRole(caller, Role.Minter, account);
  }

  revokeMinterRole(caller: PublicKey, account: PublicKey): void {
    this.revokeRole(caller, Role.Minter, account);
  }

  transferOwnership(caller: PublicKey, newOwner: PublicKey): void {
    const previousOwner = this.access.transferOwnership(caller, newOwner);
    this.emit({ type: "OwnershipTransferred", previousOwner, newOwner });
  }

  // ── Events ───────────────────────────────────────────────────────────

  /** Subscribe to committed changes. Returns an id for `removeEventListener`. */
  onEvent(listener: TokenEventListener): number {
    const id = this.nextListenerId++;
    this.listeners.set(id, listener);
    return id;
  }

  removeEventListener(id: number): void {
    this.listeners.delete(id);
  }

  /**
   * The most recent events emitted since this instance was created or
   * restored, oldest first, at most `historyLimit` of them.
   */
  get events(): readonly TokenEvent[] {
    return this.log;
  }

  private emit(input: TokenEventInput): void {
    const event: TokenEvent = { ...input, token: this.address, seq: this.nextSeq++, timestamp: this.now() };
    this.log.push(event);
    if (this.log.length > this.historyLimit) this.log.splice(0, this.log.length - this.historyLimit);
    for (const [id, listener] of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error({ err, listener: id, event: event.type }, "event listener failed");
      }
    }
  }

  // ── Persistence ──────────────────────────────────────────────────────

  snapshot(): TokenSnapshot {
    const balances: Record<string, string> = {};
    for (const [account, amount] of this.ledger.holders()) balances[account.toBase58()] = amount.toString();

    const allowances: Record<string, Record<string, string>> = {};
    for (const [owner, spender, amount] of this.ledger.allowanceEntries()) {
      const key = owner.toBase58();
      allowances[key] = { ...allowances[key], [spender.toBase58()]: amount.toString() };
    }

    return {
      version: 1,
      address: this.address.toBase58(),
      name: this.name,
      symbol: this.symbol,
      decimals: this.decimals,
      maxSupply: this.ledger.cap === null ? null : this.ledger.cap.toString(),
      totalSupply: this.ledger.totalSupply.toString(),
      paused: this.gate.isPaused(),
      owner: this.access.owner.toBase58(),
      roles: {
        [Role.Admin]: this.access.getRoleMembers(Role.Admin).map((key) => key.toBase58()),
        [Role.Minter]: this.access.getRoleMembers(Role.Minter).map((key) => key.toBase58()),
      },
      balances,
      allowances,
      nextSeq: this.nextSeq,
    };
  }
}
