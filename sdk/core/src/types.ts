import { PublicKey } from "@solana/web3.js";

// ── Constants ────────────────────────────────────────────────────────

/** The zero/burn identity. Never a valid sender, recipient or owner. */
export const ZERO_ADDRESS = PublicKey.default;

/** Largest amount representable in a 256-bit unsigned word. */
export const MAX_UINT256 = (1n << 256n) - 1n;

export const DEFAULT_DECIMALS = 18;

// ── Roles ────────────────────────────────────────────────────────────

export enum Role {
  Admin = "admin",
  Minter = "minter",
}

export const ALL_ROLES: readonly Role[] = [Role.Admin, Role.Minter];

// ── Initialization Config ───────────────────────────────────────────

export interface TokenConfig {
  name: string;
  symbol: string;
  decimals: number;
  /** Base units credited to the deployer at construction. */
  initialSupply: bigint;
  /** Optional hard cap on total supply. */
  maxSupply?: bigint;
}

// ── Read models ──────────────────────────────────────────────────────

export interface TokenStatus {
  address: PublicKey;
  name: string;
  symbol: string;
  decimals: number;
  totalSupply: bigint;
  maxSupply: bigint | null;
  paused: boolean;
  owner: PublicKey;
  admins: PublicKey[];
  minters: PublicKey[];
  holders: number;
}

// ── Event Types ─────────────────────────────────────────────────────

interface EventBase {
  token: PublicKey;
  seq: number;
  timestamp: number;
}

export type TokenEvent =
  | (EventBase & { type: "TokenInitialized"; deployer: PublicKey; name: string; symbol: string; decimals: number })
  | (EventBase & { type: "Transfer"; from: PublicKey; to: PublicKey; amount: bigint })
  | (EventBase & { type: "Approval"; owner: PublicKey; spender: PublicKey; amount: bigint })
  | (EventBase & { type: "TokensMinted"; minter: PublicKey; recipient: PublicKey; amount: bigint; totalSupply: bigint })
  | (EventBase & { type: "TokenPaused"; pausedBy: PublicKey })
  | (EventBase & { type: "TokenUnpaused"; unpausedBy: PublicKey })
  | (EventBase & { type: "RoleGranted"; role: Role; account: PublicKey; sender: PublicKey })
  | (EventBase & { type: "RoleRevoked"; role: Role; account: PublicKey; sender: PublicKey })
  | (EventBase & { type: "OwnershipTransferred"; previousOwner: PublicKey; newOwner: PublicKey });

export type TokenEventType = TokenEvent["type"];

/** Event payload before the token stamps it with id, sequence and time. */
export type TokenEventInput = TokenEvent extends infer E
  ? E extends unknown
    ? Omit<E, keyof EventBase>
    : never
  : never;

export type TokenEventListener = (event: TokenEvent) => void;

export const EVENT_TYPES: readonly TokenEventType[] = [
  "TokenInitialized",
  "Transfer",
  "Approval",
  "TokensMinted",
  "TokenPaused",
  "TokenUnpaused",
  "RoleGranted",
  "RoleRevoked",
  "OwnershipTransferred",
];
