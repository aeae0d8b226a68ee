import type { ArgumentsCamelCase, Argv } from "yargs";
import { formatUnits } from "../../../core/src";
import { loadToken, type GlobalArgs } from "../config";

export const command = "status";
export const describe = "Display token metadata, supply, pause state and role holders";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs;
}

export function handler(argv: ArgumentsCamelCase<GlobalArgs>) {
  const token = loadToken(argv.state);
  const status = token.status();

  console.log(`\n=== ${status.name} (${status.symbol}) ===`);
  console.log(`  Address:    ${status.address.toBase58()}`);
  console.log(`  Owner:      ${status.owner.toBase58()}`);
  console.log(`  Decimals:   ${status.decimals}`);
  console.log(`  Paused:     ${status.paused}`);
  console.log(`  Supply:     ${formatUnits(status.totalSupply, status.decimals)}`);
  console.log(`  Cap:        ${status.maxSupply === null ? "(none)" : formatUnits(status.maxSupply, status.decimals)}`);
  console.log(`  Holders:    ${status.holders}`);
  console.log(`  Admins:     ${status.admins.map((key) => key.toBase58()).join(", ") || "(none)"}`);
  console.log(`  Minters:    ${status.minters.map((key) => key.toBase58()).join(", ") || "(none)"}`);
}
