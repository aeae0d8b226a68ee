#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { globalOptions, logger } from "./config";

import * as init from "./commands/init";
import * as transfer from "./commands/transfer";
import * as approve from "./commands/approve";
import * as transferFrom from "./commands/transfer-from";
import * as mint from "./commands/mint";
import * as pause from "./commands/pause";
import * as roles from "./commands/roles";
import * as ownership from "./commands/ownership";
import * as status from "./commands/status";
import * as balance from "./commands/balance";

yargs(hideBin(process.argv))
  .scriptName("guarded-token")
  .usage("$0 <command> [options]")
  .option("keypair", globalOptions.keypair)
  .option("state", globalOptions.state)
  .command(init)
  .command(transfer)
  .command(approve)
  .command(transferFrom)
  .command(mint)
  .command(pause)
  .command(roles)
  .command(ownership)
  .command(status)
  .command(balance)
  .demandCommand(1, "Specify a command to run")
  .strict()
  .help()
  .parseAsync()
  .catch((err: unknown) => {
    logger.error({ err }, "command failed");
    process.exitCode = 1;
  });
