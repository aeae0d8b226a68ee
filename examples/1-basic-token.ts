/**
 * Example 1: Create a Token and Move Balances
 * ============================================
 *
 * WHAT:  Construct a token, transfer to a holder, and spend through an allowance.
 * WHEN:  The starting point for any integration: one deployer, a few holders.
 *
 * Run: npx tsx examples/1-basic-token.ts
 */

import { Keypair } from "@solana/web3.js";
import { GuardedToken, formatUnits, parseUnits, standardPreset } from "../sdk/core/src";

function main() {
  // ── Step 1: Construct the token ──────────────────────────────────────
  // The deployer receives the whole initial supply and becomes owner,
  // admin and minter.
  const deployer = Keypair.generate().publicKey;
  const token = GuardedToken.create(
    deployer,
    standardPreset({
      name: "AdwaitToken",
      symbol: "ADW",
      initialSupply: parseUnits("1000000", 18),
    })
  );

  console.log("Token created!");
  console.log("  Address:", token.address.toBase58());
  console.log("  Supply: ", formatUnits(token.totalSupply(), token.decimals), token.symbol);

  // ── Step 2: Transfer to a holder ─────────────────────────────────────
  const alice = Keypair.generate().publicKey;
  token.transfer(deployer, alice, parseUnits("250", 18));
  console.log("\nAlice balance:", formatUnits(token.balanceOf(alice), token.decimals));

  // ── Step 3: Delegate spending ────────────────────────────────────────
  // Alice lets Bob move up to 100 ADW on her behalf. Each transferFrom
  // spends both Alice's balance and Bob's allowance.
  const bob = Keypair.generate().publicKey;
  token.approve(alice, bob, parseUnits("100", 18));
  token.transferFrom(bob, alice, bob, parseUnits("40", 18));

  console.log("Bob balance:        ", formatUnits(token.balanceOf(bob), token.decimals));
  console.log("Remaining allowance:", formatUnits(token.allowance(alice, bob), token.decimals));
}

main();
