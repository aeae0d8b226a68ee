import { PublicKey } from "@solana/web3.js";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { Role } from "../../../core/src";
import { loadKeypair, runTokenCommand, updateToken, type GlobalArgs } from "../config";

export const command = "roles";
export const describe = "Grant or revoke a role (admin role)";

interface RolesArgs extends GlobalArgs {
  account: string;
  role: Role;
  revoke: boolean;
}

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("account", { type: "string", demandOption: true, description: "Account public key" })
    .option("role", { choices: [Role.Minter, Role.Admin] as const, default: Role.Minter, description: "Role to change" })
    .option("revoke", { type: "boolean", default: false, description: "Revoke instead of grant" });
}

export async function handler(argv: ArgumentsCamelCase<RolesArgs>) {
  const admin = loadKeypair(argv.keypair);
  const account = new PublicKey(argv.account);

  await runTokenCommand(async () => {
    const token = await updateToken(argv.state, (t) => {
      if (argv.revoke) t.revokeRole(admin.publicKey, argv.role, account);
      else t.grantRole(admin.publicKey, argv.role, account);
    });

    console.log(`\nRole "${argv.role}" ${argv.revoke ? "revoked from" : "granted to"} ${account.toBase58()}`);
    console.log(`  Admin:  ${token.isAdmin(account)}`);
    console.log(`  Minter: ${token.isMinter(account)}`);
  });
}
