/**
 * Error codes raised by the token. Numbers start at 6000 and follow
 * declaration order, so `TokenErrorCode.Paused` is 6001 (0x1771).
 */
export enum TokenErrorCode {
  Unauthorized = "Unauthorized",
  Paused = "Paused",
  AlreadyPaused = "AlreadyPaused",
  NotPaused = "NotPaused",
  InsufficientBalance = "InsufficientBalance",
  InsufficientAllowance = "InsufficientAllowance",
  InvalidRecipient = "InvalidRecipient",
  InvalidSender = "InvalidSender",
  InvalidSpender = "InvalidSpender",
  InvalidOwner = "InvalidOwner",
  Overflow = "Overflow",
  InvalidAmount = "InvalidAmount",
  SupplyCapExceeded = "SupplyCapExceeded",
}

const ERROR_MESSAGES: Record<TokenErrorCode, string> = {
  [TokenErrorCode.Unauthorized]: "Caller lacks the required role",
  [TokenErrorCode.Paused]: "Token is paused",
  [TokenErrorCode.AlreadyPaused]: "Token is already paused",
  [TokenErrorCode.NotPaused]: "Token is not paused",
  [TokenErrorCode.InsufficientBalance]: "Transfer amount exceeds balance",
  [TokenErrorCode.InsufficientAllowance]: "Transfer amount exceeds allowance",
  [TokenErrorCode.InvalidRecipient]: "Recipient is the zero address",
  [TokenErrorCode.InvalidSender]: "Sender is the zero address",
  [TokenErrorCode.InvalidSpender]: "Spender is the zero address",
  [TokenErrorCode.InvalidOwner]: "Owner is the zero address",
  [TokenErrorCode.Overflow]: "Amount exceeds the representable supply",
  [TokenErrorCode.InvalidAmount]: "Amount must be a non-negative integer",
  [TokenErrorCode.SupplyCapExceeded]: "Mint would exceed the supply cap",
};

const ERROR_BASE = 6000;
const CODES = Object.values(TokenErrorCode);

export class TokenError extends Error {
  readonly code: TokenErrorCode;
  readonly number: number;

  constructor(code: TokenErrorCode, detail?: string) {
    const message = detail ? `${ERROR_MESSAGES[code]}: ${detail}` : ERROR_MESSAGES[code];
    super(message);
    this.name = "TokenError";
    this.code = code;
    this.number = ERROR_BASE + CODES.indexOf(code);
  }

  /** Hex form of the error number, e.g. `0x1770`. */
  get hex(): string {
    return `0x${this.number.toString(16)}`;
  }
}

export function isTokenError(err: unknown, code?: TokenErrorCode): err is TokenError {
  return err instanceof TokenError && (code === undefined || err.code === code);
}
