import { PublicKey } from "@solana/web3.js";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { formatUnits } from "../../../core/src";
import { amountArg, loadKeypair, runTokenCommand, updateToken, type GlobalArgs } from "../config";

export const command = "transfer-from";
export const describe = "Spend an allowance: move tokens from an owner to a recipient";

interface TransferFromArgs extends GlobalArgs {
  from: string;
  to: string;
  amount: string;
}

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("from", { type: "string", demandOption: true, description: "Owner public key" })
    .option("to", { type: "string", demandOption: true, description: "Recipient public key" })
    .option("amount", { type: "string", demandOption: true, description: "Amount (token units)" });
}

export async function handler(argv: ArgumentsCamelCase<TransferFromArgs>) {
  const spender = loadKeypair(argv.keypair);
  const from = new PublicKey(argv.from);
  const to = new PublicKey(argv.to);

  await runTokenCommand(async () => {
    const token = await updateToken(argv.state, (t) =>
      t.transferFrom(spender.publicKey, from, to, amountArg(t, argv.amount))
    );

    const remaining = token.allowance(from, spender.publicKey);
    console.log(`\nTransferred ${argv.amount} ${token.symbol} on behalf of ${from.toBase58()}`);
    console.log(`  To:        ${to.toBase58()}`);
    console.log(`  Allowance: ${formatUnits(remaining, token.decimals)} remaining`);
  });
}
