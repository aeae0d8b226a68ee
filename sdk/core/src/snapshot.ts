import { PublicKey } from "@solana/web3.js";
import { z } from "zod";
import { Role } from "./types";

const base58Key = z.string().refine((value) => {
  try {
    new PublicKey(value);
    return true;
  } catch {
    return false;
  }
}, "Invalid public key");

const amount = z.string().regex(/^\d+$/, "Amount must be a non-negative integer string");

/**
 * JSON form of a token's full state. Amounts are decimal strings and
 * accounts are base58 keys so the snapshot survives `JSON.stringify`.
 */
export const TokenSnapshotSchema = z.object({
  version: z.literal(1),
  address: base58Key,
  name: z.string().min(1),
  symbol: z.string().min(1),
  decimals: z.number().int().min(0).max(255),
  maxSupply: amount.nullable(),
  totalSupply: amount,
  paused: z.boolean(),
  owner: base58Key,
  roles: z.object({
    [Role.Admin]: z.array(base58Key),
    [Role.Minter]: z.array(base58Key),
  }),
  balances: z.record(base58Key, amount),
  allowances: z.record(base58Key, z.record(base58Key, amount)),
  nextSeq: z.number().int().min(0),
});

export type TokenSnapshot = z.infer<typeof TokenSnapshotSchema>;

export function parseSnapshot(data: unknown): TokenSnapshot {
  const result = TokenSnapshotSchema.safeParse(data);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new Error(`Invalid token snapshot: ${errors}`);
  }
  return result.data;
}
