import { TokenError, TokenErrorCode } from "./errors";

export type PauseState = "Active" | "Paused";

/**
 * Global halt for balance-moving operations. Toggles are strict:
 * pausing a paused token or unpausing an active one fails.
 */
export class PauseGate {
  private paused: boolean;

  constructor(paused = false) {
    this.paused = paused;
  }

  get state(): PauseState {
    return this.paused ? "Paused" : "Active";
  }

  isPaused(): boolean {
    return this.paused;
  }

  pause(): void {
    if (this.paused) throw new TokenError(TokenErrorCode.AlreadyPaused);
    this.paused = true;
  }

  unpause(): void {
    if (!this.paused) throw new TokenError(TokenErrorCode.NotPaused);
    this.paused = false;
  }

  assertNotPaused(): void {
    if (this.paused) throw new TokenError(TokenErrorCode.Paused);
  }
}
