import { PublicKey } from "@solana/web3.js";
import type { TokenEvent } from "./types";

/**
 * Convert a decimal string ("1.5") into base units for the given decimals.
 * Rejects negative values, malformed input and excess fractional digits.
 */
export function parseUnits(value: string, decimals: number): bigint {
  const trimmed = value.trim();
  const match = /^(\d+)(?:\.(\d*))?$/.exec(trimmed);
  if (!match) throw new Error(`Invalid amount: "${value}"`);
  const whole = match[1] ?? "0";
  const fraction = match[2] ?? "";
  if (fraction.length > decimals) {
    throw new Error(`Amount "${value}" has more than ${decimals} decimal places`);
  }
  return BigInt(whole + fraction.padEnd(decimals, "0"));
}

/** Render base units as a decimal string, trimming trailing zeros. */
export function formatUnits(amount: bigint, decimals: number): string {
  const negative = amount < 0n;
  const digits = (negative ? -amount : amount).toString().padStart(decimals + 1, "0");
  const whole = digits.slice(0, digits.length - decimals);
  const fraction = digits.slice(digits.length - decimals).replace(/0+$/, "");
  const text = fraction ? `${whole}.${fraction}` : whole;
  return negative ? `-${text}` : text;
}

/** Flatten an event into JSON-safe fields: keys as base58, amounts as strings. */
export function serializeEvent(event: TokenEvent): Record<string, string | number | boolean> {
  const fields: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(event)) {
    if (value instanceof PublicKey) fields[key] = value.toBase58();
    else if (typeof value === "bigint") fields[key] = value.toString();
    else if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") fields[key] = value;
  }
  return fields;
}
