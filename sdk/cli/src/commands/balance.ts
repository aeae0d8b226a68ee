import { PublicKey } from "@solana/web3.js";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { formatUnits } from "../../../core/src";
import { loadKeypair, loadToken, type GlobalArgs } from "../config";

export const command = "balance";
export const describe = "Show the balance of an account (defaults to the keypair)";

interface BalanceArgs extends GlobalArgs {
  account: string | undefined;
}

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("account", { type: "string", description: "Account public key" });
}

export function handler(argv: ArgumentsCamelCase<BalanceArgs>) {
  const token = loadToken(argv.state);
  const account = argv.account === undefined ? loadKeypair(argv.keypair).publicKey : new PublicKey(argv.account);

  console.log(`${account.toBase58()}: ${formatUnits(token.balanceOf(account), token.decimals)} ${token.symbol}`);
}
