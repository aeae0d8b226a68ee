import { PublicKey } from "@solana/web3.js";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { amountArg, loadKeypair, runTokenCommand, updateToken, type GlobalArgs } from "../config";

export const command = "approve";
export const describe = "Set a spender's allowance over the keypair's balance";

interface ApproveArgs extends GlobalArgs {
  spender: string;
  amount: string;
}

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("spender", { type: "string", demandOption: true, description: "Spender public key" })
    .option("amount", { type: "string", demandOption: true, description: "Allowance (token units)" });
}

export async function handler(argv: ArgumentsCamelCase<ApproveArgs>) {
  const owner = loadKeypair(argv.keypair);
  const spender = new PublicKey(argv.spender);

  await runTokenCommand(async () => {
    const token = await updateToken(argv.state, (t) => t.approve(owner.publicKey, spender, amountArg(t, argv.amount)));

    console.log(`\nAllowance set to ${argv.amount} ${token.symbol}`);
    console.log(`  Owner:   ${owner.publicKey.toBase58()}`);
    console.log(`  Spender: ${spender.toBase58()}`);
  });
}
