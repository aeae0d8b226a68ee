export * from "./types";
export * from "./errors";
export * from "./presets";
export * from "./utils";
export * from "./snapshot";
export { GuardedToken, type TokenOptions } from "./token";
export { AccessRegistry } from "./access";
export { PauseGate, type PauseState } from "./pause";
export { BalanceLedger } from "./ledger";
