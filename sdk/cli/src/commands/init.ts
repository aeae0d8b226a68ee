import * as fs from "fs";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { GuardedToken, formatUnits, parseUnits, standardPreset } from "../../../core/src";
import { loadKeypair, logger, runTokenCommand, saveToken, withStateLock, type GlobalArgs } from "../config";

export const command = "init";
export const describe = "Construct a new token; the keypair becomes owner, admin and minter";

interface InitArgs extends GlobalArgs {
  name: string;
  symbol: string;
  decimals: number;
  supply: string;
  cap: string | undefined;
}

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("name", { type: "string", demandOption: true, description: "Token name" })
    .option("symbol", { type: "string", demandOption: true, description: "Token symbol" })
    .option("decimals", { type: "number", default: 18, description: "Token decimals" })
    .option("supply", { type: "string", default: "0", description: "Initial supply credited to the deployer (token units)" })
    .option("cap", { type: "string", description: "Maximum total supply (token units)" });
}

export async function handler(argv: ArgumentsCamelCase<InitArgs>) {
  const deployer = loadKeypair(argv.keypair);

  await runTokenCommand(() =>
    withStateLock(argv.state, () => {
      if (fs.existsSync(argv.state)) {
        console.error(`Token state already exists at ${argv.state}; refusing to overwrite.`);
        process.exitCode = 1;
        return;
      }

      const token = GuardedToken.create(
        deployer.publicKey,
        standardPreset({
          name: argv.name,
          symbol: argv.symbol,
          decimals: argv.decimals,
          initialSupply: parseUnits(argv.supply, argv.decimals),
          maxSupply: argv.cap === undefined ? undefined : parseUnits(argv.cap, argv.decimals),
        }),
        { logger }
      );
      saveToken(argv.state, token);

      console.log(`\nToken initialized!`);
      console.log(`  Name:     ${token.name} (${token.symbol})`);
      console.log(`  Address:  ${token.address.toBase58()}`);
      console.log(`  Owner:    ${deployer.publicKey.toBase58()}`);
      console.log(`  Supply:   ${formatUnits(token.totalSupply(), token.decimals)}`);
      console.log(`  State:    ${argv.state}`);
    })
  );
}
