import { PublicKey } from "@solana/web3.js";
import { z } from "zod";
import { Role } from "../../sdk/core/src";

export const publicKey = z.string().transform((value, ctx) => {
  try {
    return new PublicKey(value);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid public key" });
    return z.NEVER;
  }
});

/** Base units as a decimal string; JSON numbers cannot carry 256-bit amounts. */
export const amount = z
  .string()
  .regex(/^\d+$/, "Amount must be a non-negative integer string")
  .transform((value) => BigInt(value));

export const CreateTokenSchema = z.object({
  deployer: publicKey,
  name: z.string().min(1, "Token name is required").max(64),
  symbol: z.string().min(1, "Token symbol is required").max(16),
  decimals: z.number().int().min(0).max(255).optional().default(18),
  initialSupply: amount.optional().default("0"),
  maxSupply: amount.optional(),
});

export const CallerSchema = z.object({ caller: publicKey });

export const TransferSchema = CallerSchema.extend({ to: publicKey, amount });

export const ApproveSchema = CallerSchema.extend({ spender: publicKey, amount });

export const TransferFromSchema = CallerSchema.extend({ from: publicKey, to: publicKey, amount });

export const MintSchema = CallerSchema.extend({ to: publicKey, amount });

export const RoleChangeSchema = CallerSchema.extend({
  account: publicKey,
  role: z.nativeEnum(Role).optional().default(Role.Minter),
});

export const OwnershipSchema = CallerSchema.extend({ newOwner: publicKey });

export const WebhookSchema = z.object({
  url: z.string().url(),
  events: z.array(z.string().min(1)).min(1, "At least one event is required"),
  secret: z.string().optional(),
});
