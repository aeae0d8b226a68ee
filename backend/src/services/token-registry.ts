import { PublicKey } from "@solana/web3.js";
import type { Logger } from "pino";
import { GuardedToken, type TokenConfig } from "../../../sdk/core/src";
import { HttpError } from "../middleware/errors";
import type { EventRecorder } from "./event-recorder";

/**
 * In-memory home for the tokens this backend hosts, keyed by address.
 * Every token is attached to the recorder as soon as it exists.
 */
export class TokenRegistry {
  private tokens = new Map<string, GuardedToken>();

  constructor(
    private logger: Logger,
    private recorder: EventRecorder,
  ) {}

  create(deployer: PublicKey, config: TokenConfig): GuardedToken {
    const token = GuardedToken.create(deployer, config, { logger: this.logger });
    this.add(token);
    return token;
  }

  add(token: GuardedToken): void {
    this.tokens.set(token.address.toBase58(), token);
    this.recorder.attach(token);
  }

  get(address: string): GuardedToken {
    const token = this.tokens.get(address);
    if (!token) throw new HttpError(404, "Token not found");
    return token;
  }

  list(): GuardedToken[] {
    return [...this.tokens.values()];
  }

  close(): void {
    this.recorder.stop();
    this.tokens.clear();
  }
}
