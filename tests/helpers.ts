import { Keypair, PublicKey } from "@solana/web3.js";
import { expect } from "chai";
import pino from "pino";
import { GuardedToken, TokenError, TokenErrorCode, standardPreset, type TokenConfig } from "../sdk/core/src";

export const silentLogger = pino({ level: "silent" });

export const ONE_TOKEN = 10n ** 18n;

export function newAccount(): PublicKey {
  return Keypair.generate().publicKey;
}

export function deploy(deployer: PublicKey, overrides: Partial<TokenConfig> = {}): GuardedToken {
  return GuardedToken.create(deployer, standardPreset(overrides), { logger: silentLogger, now: () => 1_700_000_000_000 });
}

/** Assert `fn` throws a TokenError with the given code and return it. */
export function expectTokenError(fn: () => unknown, code: TokenErrorCode): TokenError {
  try {
    fn();
  } catch (err) {
    expect(err).to.be.instanceOf(TokenError);
    if (!(err instanceof TokenError)) throw err;
    expect(err.code).to.equal(code);
    return err;
  }
  expect.fail(`Expected TokenError ${code}`);
}

export function sumBalances(token: GuardedToken, accounts: PublicKey[]): bigint {
  return accounts.reduce((sum, account) => sum + token.balanceOf(account), 0n);
}
