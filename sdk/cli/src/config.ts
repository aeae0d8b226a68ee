import { Keypair } from "@solana/web3.js";
import * as fs from "fs";
import * as path from "path";
import pino from "pino";
import { setTimeout as delay } from "timers/promises";
import { GuardedToken, isTokenError, parseUnits } from "../../core/src";

const DEFAULT_KEYPAIR_PATH = path.join(
  process.env.HOME || "~",
  ".config",
  "solana",
  "id.json"
);

export const DEFAULT_STATE_PATH = "token-state.json";

export const logger = pino({ name: "guarded-token-cli", level: process.env.LOG_LEVEL || "warn" });

export interface GlobalArgs {
  keypair: string;
  state: string;
}

export function loadKeypair(keypairPath?: string): Keypair {
  const resolved = keypairPath || DEFAULT_KEYPAIR_PATH;
  const expanded = resolved.replace(/^~/, process.env.HOME || "~");
  const raw = fs.readFileSync(expanded, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed) || !parsed.every((n) => typeof n === "number")) {
    throw new Error(`Keypair file ${expanded} must contain a JSON array of numbers`);
  }
  return Keypair.fromSecretKey(Uint8Array.from(parsed));
}

export function loadToken(statePath: string): GuardedToken {
  if (!fs.existsSync(statePath)) {
    throw new Error(`No token state at ${statePath}. Run \`guarded-token init\` first.`);
  }
  const data: unknown = JSON.parse(fs.readFileSync(statePath, "utf-8"));
  return GuardedToken.restore(data, { logger });
}

/** Writes to a temp file beside the state file, then renames it into place. */
export function saveToken(statePath: string, token: GuardedToken): void {
  fs.mkdirSync(path.dirname(path.resolve(statePath)), { recursive: true });
  const tmpPath = `${statePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmpPath, JSON.stringify(token.snapshot(), null, 2) + "\n");
  fs.renameSync(tmpPath, statePath);
}

const LOCK_TIMEOUT_MS = 10_000;
const LOCK_RETRY_MS = 25;

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Run `body` while holding `<statePath>.lock`, created exclusively.
 * Concurrent commands on the same state file wait their turn.
 */
export async function withStateLock<T>(statePath: string, body: () => T): Promise<T> {
  const lockPath = `${statePath}.lock`;
  fs.mkdirSync(path.dirname(path.resolve(statePath)), { recursive: true });

  const deadline = Date.now() + LOCK_TIMEOUT_MS;
  for (;;) {
    try {
      fs.writeFileSync(lockPath, String(process.pid), { flag: "wx" });
      break;
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "EEXIST") throw err;
      if (Date.now() >= deadline) {
        throw new Error(`Timed out waiting for ${lockPath}; remove it if no other command is running.`);
      }
      await delay(LOCK_RETRY_MS);
    }
  }

  try {
    return body();
  } finally {
    fs.rmSync(lockPath, { force: true });
  }
}

/**
 * Load the token, apply `change` and save it, all under the state lock.
 * Nothing is written when `change` throws.
 */
export function updateToken(statePath: string, change: (token: GuardedToken) => void): Promise<GuardedToken> {
  return withStateLock(statePath, () => {
    const token = loadToken(statePath);
    change(token);
    saveToken(statePath, token);
    return token;
  });
}

/** Parse a decimal token amount ("1.5") into the token's base units. */
export function amountArg(token: GuardedToken, value: string): bigint {
  return parseUnits(value, token.decimals);
}

/**
 * Run a command body, reporting token errors as `Error <number> (<code>)`
 * with exit code 1. Anything else propagates to yargs.
 */
export async function runTokenCommand(body: () => void | Promise<void>): Promise<void> {
  try {
    await body();
  } catch (err) {
    if (isTokenError(err)) {
      console.error(`Error ${err.number} (${err.code}): ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

export const globalOptions = {
  keypair: { alias: "k" as const, type: "string" as const, description: "Path to the acting keypair file", default: DEFAULT_KEYPAIR_PATH },
  state: { alias: "s" as const, type: "string" as const, description: "Path to the token state file", default: DEFAULT_STATE_PATH },
};
