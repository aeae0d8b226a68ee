import { PublicKey } from "@solana/web3.js";
import { TokenError, TokenErrorCode } from "./errors";
import { ALL_ROLES, Role, ZERO_ADDRESS } from "./types";

/**
 * Role sets plus the single ownership slot.
 *
 * The admin role administers every role, itself included. Ownership is a
 * separate channel: the owner can only hand the slot on, and holding it
 * grants nothing else.
 */
export class AccessRegistry {
  private members = new Map<Role, Set<string>>();
  private ownerKey: string;

  constructor(owner: PublicKey) {
    for (const role of ALL_ROLES) this.members.set(role, new Set());
    this.ownerKey = owner.toBase58();
  }

  get owner(): PublicKey {
    return new PublicKey(this.ownerKey);
  }

  hasRole(role: Role, account: PublicKey): boolean {
    return this.roleSet(role).has(account.toBase58());
  }

  isAdmin(account: PublicKey): boolean {
    return this.hasRole(Role.Admin, account);
  }

  isMinter(account: PublicKey): boolean {
    return this.hasRole(Role.Minter, account);
  }

  getRoleMembers(role: Role): PublicKey[] {
    return [...this.roleSet(role)].map((key) => new PublicKey(key));
  }

  requireRole(role: Role, account: PublicKey): void {
    if (!this.hasRole(role, account)) {
      throw new TokenError(TokenErrorCode.Unauthorized, `${account.toBase58()} is missing role "${role}"`);
    }
  }

  requireOwner(account: PublicKey): void {
    if (account.toBase58() !== this.ownerKey) {
      throw new TokenError(TokenErrorCode.Unauthorized, `${account.toBase58()} is not the owner`);
    }
  }

  /** Returns false when the account already held the role. */
  grantRole(caller: PublicKey, role: Role, account: PublicKey): boolean {
    this.requireRole(Role.Admin, caller);
    return this.addMember(role, account);
  }

  /** Returns false when the account did not hold the role. */
  revokeRole(caller: PublicKey, role: Role, account: PublicKey): boolean {
    this.requireRole(Role.Admin, caller);
    return this.roleSet(role).delete(account.toBase58());
  }

  renounceRole(account: PublicKey, role: Role): boolean {
    return this.roleSet(role).delete(account.toBase58());
  }

  /** Returns the previous owner. */
  transferOwnership(caller: PublicKey, newOwner: PublicKey): PublicKey {
    this.requireOwner(caller);
    if (newOwner.equals(ZERO_ADDRESS)) {
      throw new TokenError(TokenErrorCode.InvalidOwner);
    }
    const previous = this.owner;
    this.ownerKey = newOwner.toBase58();
    return previous;
  }

  /** Unchecked insert, used at construction and when restoring a snapshot. */
  addMember(role: Role, account: PublicKey): boolean {
    const set = this.roleSet(role);
    const key = account.toBase58();
    if (set.has(key)) return false;
    set.add(key);
    return true;
  }

  private roleSet(role: Role): Set<string> {
    const set = this.members.get(role);
    if (!set) throw new Error(`Unknown role: ${String(role)}`);
    return set;
  }
}
