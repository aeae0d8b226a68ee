import { DEFAULT_DECIMALS, type TokenConfig } from "./types";

/**
 * Standard token: 18 decimals, no initial supply, uncapped.
 * Override only the fields you care about.
 */
export function standardPreset(overrides: Partial<TokenConfig> = {}): TokenConfig {
  return {
    name: "Guarded Token",
    symbol: "GRD",
    decimals: DEFAULT_DECIMALS,
    initialSupply: 0n,
    ...overrides,
  };
}

/**
 * Capped token: like the standard preset, but minting stops once total
 * supply reaches `maxSupply`.
 */
export function cappedPreset(maxSupply: bigint, overrides: Partial<TokenConfig> = {}): TokenConfig {
  return standardPreset({ ...overrides, maxSupply });
}
