/**
 * Example 2: Minter Role Management
 * ==================================
 *
 * WHAT:  Grant the minter role to an operator, mint, then revoke it.
 * WHEN:  Delegating issuance to a separate key instead of the deployer.
 *
 * Admins manage every role. A revoked minter fails with Unauthorized
 * (error 6000) and nothing changes.
 *
 * Run: npx tsx examples/2-minter-roles.ts
 */

import { Keypair } from "@solana/web3.js";
import { GuardedToken, cappedPreset, isTokenError, parseUnits } from "../sdk/core/src";

function main() {
  const admin = Keypair.generate().publicKey;
  const operator = Keypair.generate().publicKey;
  const treasury = Keypair.generate().publicKey;

  const token = GuardedToken.create(admin, cappedPreset(parseUnits("5000", 6), { symbol: "OPS", decimals: 6 }));

  // Log every notification as it commits
  token.onEvent((event) => console.log(`  [${event.seq}] ${event.type}`));

  // ── Step 1: Grant and use the minter role ────────────────────────────
  token.grantMinterRole(admin, operator);
  token.mint(operator, treasury, parseUnits("1000", 6));
  console.log("Treasury balance:", token.balanceOf(treasury).toString());

  // ── Step 2: Revoke it ────────────────────────────────────────────────
  token.revokeMinterRole(admin, operator);
  try {
    token.mint(operator, treasury, 1n);
  } catch (err) {
    if (!isTokenError(err)) throw err;
    console.log(`Revoked minter rejected: ${err.code} (${err.hex})`);
  }

  // ── Step 3: The supply cap still applies to admins ───────────────────
  try {
    token.mint(admin, treasury, parseUnits("4001", 6));
  } catch (err) {
    if (!isTokenError(err)) throw err;
    console.log(`Cap enforced: ${err.message}`);
  }
}

main();
