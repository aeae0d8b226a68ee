import { PublicKey } from "@solana/web3.js";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { amountArg, loadKeypair, runTokenCommand, updateToken, type GlobalArgs } from "../config";

export const command = "transfer";
export const describe = "Transfer tokens from the keypair to a recipient";

interface TransferArgs extends GlobalArgs {
  to: string;
  amount: string;
}

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("to", { type: "string", demandOption: true, description: "Recipient public key" })
    .option("amount", { type: "string", demandOption: true, description: "Amount (token units)" });
}

export async function handler(argv: ArgumentsCamelCase<TransferArgs>) {
  const sender = loadKeypair(argv.keypair);
  const to = new PublicKey(argv.to);

  await runTokenCommand(async () => {
    const token = await updateToken(argv.state, (t) => t.transfer(sender.publicKey, to, amountArg(t, argv.amount)));

    console.log(`\nTransferred ${argv.amount} ${token.symbol}`);
    console.log(`  From: ${sender.publicKey.toBase58()}`);
    console.log(`  To:   ${to.toBase58()}`);
  });
}
