/**
 * Example 3: Emergency Pause and Ownership Transfer
 * ==================================================
 *
 * WHAT:  Halt transfers and minting, resume them, and hand the owner slot
 *        to a new account.
 * WHEN:  Incident response, or rotating the key recorded as owner.
 *
 * IMPORTANT:
 *   - Pausing twice fails with AlreadyPaused; unpausing an active token
 *     fails with NotPaused.
 *   - Ownership is a single slot. It carries no admin or minter authority,
 *     so transfer roles separately.
 *
 * Run: npx tsx examples/3-pause-and-ownership.ts
 */

import { Keypair } from "@solana/web3.js";
import { GuardedToken, Role, isTokenError, standardPreset } from "../sdk/core/src";

function main() {
  const admin = Keypair.generate().publicKey;
  const holder = Keypair.generate().publicKey;
  const successor = Keypair.generate().publicKey;

  const token = GuardedToken.create(admin, standardPreset({ symbol: "HALT", decimals: 0, initialSupply: 1_000n }));

  // ── Step 1: Pause ────────────────────────────────────────────────────
  token.pause(admin);
  try {
    token.transfer(admin, holder, 10n);
  } catch (err) {
    if (!isTokenError(err)) throw err;
    console.log(`Transfer while paused: ${err.code} (${err.number})`);
  }

  // ── Step 2: Resume ───────────────────────────────────────────────────
  token.unpause(admin);
  token.transfer(admin, holder, 10n);
  console.log("Holder balance after unpause:", token.balanceOf(holder).toString());

  // ── Step 3: Hand over ownership and the admin role ───────────────────
  token.transferOwnership(admin, successor);
  token.grantRole(admin, Role.Admin, successor);
  token.renounceRole(admin, Role.Admin);

  const status = token.status();
  console.log("\nOwner: ", status.owner.toBase58());
  console.log("Admins:", status.admins.map((key) => key.toBase58()).join(", "));
}

main();
