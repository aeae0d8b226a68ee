import type { ArgumentsCamelCase, Argv } from "yargs";
import { loadKeypair, runTokenCommand, updateToken, type GlobalArgs } from "../config";

export const command = "pause";
export const describe = "Pause or unpause the token (admin role)";

interface PauseArgs extends GlobalArgs {
  unpause: boolean;
}

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("unpause", { type: "boolean", default: false, description: "Unpause instead of pause" });
}

export async function handler(argv: ArgumentsCamelCase<PauseArgs>) {
  const admin = loadKeypair(argv.keypair);

  await runTokenCommand(async () => {
    const token = await updateToken(argv.state, (t) => {
      if (argv.unpause) t.unpause(admin.publicKey);
      else t.pause(admin.publicKey);
    });

    console.log(`\nToken ${argv.unpause ? "unpaused" : "paused"}!`);
    console.log(`  Address: ${token.address.toBase58()}`);
  });
}
