import { PublicKey } from "@solana/web3.js";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { formatUnits } from "../../../core/src";
import { amountArg, loadKeypair, runTokenCommand, updateToken, type GlobalArgs } from "../config";

export const command = "mint";
export const describe = "Mint tokens to a recipient (minter role)";

interface MintArgs extends GlobalArgs {
  to: string;
  amount: string;
}

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("to", { type: "string", demandOption: true, description: "Recipient public key" })
    .option("amount", { type: "string", demandOption: true, description: "Amount (token units)" });
}

export async function handler(argv: ArgumentsCamelCase<MintArgs>) {
  const minter = loadKeypair(argv.keypair);
  const to = new PublicKey(argv.to);

  await runTokenCommand(async () => {
    const token = await updateToken(argv.state, (t) => t.mint(minter.publicKey, to, amountArg(t, argv.amount)));

    console.log(`\nTokens minted!`);
    console.log(`  Amount: ${argv.amount}`);
    console.log(`  To:     ${to.toBase58()}`);
    console.log(`  Supply: ${formatUnits(token.totalSupply(), token.decimals)}`);
  });
}
