import { PublicKey } from "@solana/web3.js";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { loadKeypair, runTokenCommand, updateToken, type GlobalArgs } from "../config";

export const command = "ownership";
export const describe = "Transfer ownership to a new account (current owner only)";

interface OwnershipArgs extends GlobalArgs {
  to: string;
}

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("to", { type: "string", demandOption: true, description: "New owner public key" });
}

export async function handler(argv: ArgumentsCamelCase<OwnershipArgs>) {
  const owner = loadKeypair(argv.keypair);
  const newOwner = new PublicKey(argv.to);

  await runTokenCommand(async () => {
    await updateToken(argv.state, (token) => token.transferOwnership(owner.publicKey, newOwner));

    console.log(`\nOwnership transferred`);
    console.log(`  Previous: ${owner.publicKey.toBase58()}`);
    console.log(`  New:      ${newOwner.toBase58()}`);
  });
}
