import { Router } from "express";
import { serializeEvent, type GuardedToken, type TokenEvent } from "../../../sdk/core/src";
import type { TokenRegistry } from "../services/token-registry";
import {
  ApproveSchema,
  CallerSchema,
  CreateTokenSchema,
  MintSchema,
  OwnershipSchema,
  RoleChangeSchema,
  TransferFromSchema,
  TransferSchema,
  publicKey,
} from "../validation";
import { statusJson } from "./status";

/** Run an operation and return the events it emitted. */
function emitted(token: GuardedToken, operation: () => void) {
  const events: TokenEvent[] = [];
  const id = token.onEvent((event) => events.push(event));
  try {
    operation();
  } finally {
    token.removeEventListener(id);
  }
  return { events: events.map(serializeEvent) };
}

export function tokensRouter(registry: TokenRegistry): Router {
  const router = Router();

  router.get("/tokens", (_req, res) => {
    res.json({ tokens: registry.list().map(statusJson) });
  });

  router.post("/tokens", (req, res) => {
    const body = CreateTokenSchema.parse(req.body);
    const token = registry.create(body.deployer, {
      name: body.name,
      symbol: body.symbol,
      decimals: body.decimals,
      initialSupply: body.initialSupply,
      maxSupply: body.maxSupply,
    });
    res.status(201).json(statusJson(token));
  });

  // ── Reads ────────────────────────────────────────────────────────────

  router.get("/tokens/:address/balances/:account", (req, res) => {
    const token = registry.get(req.params.address);
    const account = publicKey.parse(req.params.account);
    res.json({ account: account.toBase58(), balance: token.balanceOf(account).toString() });
  });

  router.get("/tokens/:address/allowances/:owner/:spender", (req, res) => {
    const token = registry.get(req.params.address);
    const owner = publicKey.parse(req.params.owner);
    const spender = publicKey.parse(req.params.spender);
    res.json({
      owner: owner.toBase58(),
      spender: spender.toBase58(),
      allowance: token.allowance(owner, spender).toString(),
    });
  });

  router.get("/tokens/:address/roles/:account", (req, res) => {
    const token = registry.get(req.params.address);
    const account = publicKey.parse(req.params.account);
    res.json({
      account: account.toBase58(),
      admin: token.isAdmin(account),
      minter: token.isMinter(account),
      owner: token.owner.equals(account),
    });
  });

  // ── Operations ───────────────────────────────────────────────────────

  router.post("/tokens/:address/transfer", (req, res) => {
    const token = registry.get(req.params.address);
    const { caller, to, amount } = TransferSchema.parse(req.body);
    res.json(emitted(token, () => token.transfer(caller, to, amount)));
  });

  router.post("/tokens/:address/approve", (req, res) => {
    const token = registry.get(req.params.address);
    const { caller, spender, amount } = ApproveSchema.parse(req.body);
    res.json(emitted(token, () => token.approve(caller, spender, amount)));
  });

  router.post("/tokens/:address/transfer-from", (req, res) => {
    const token = registry.get(req.params.address);
    const { caller, from, to, amount } = TransferFromSchema.parse(req.body);
    res.json(emitted(token, () => token.transferFrom(caller, from, to, amount)));
  });

  router.post("/tokens/:address/mint", (req, res) => {
    const token = registry.get(req.params.address);
    const { caller, to, amount } = MintSchema.parse(req.body);
    res.json(emitted(token, () => token.mint(caller, to, amount)));
  });

  router.post("/tokens/:address/pause", (req, res) => {
    const token = registry.get(req.params.address);
    const { caller } = CallerSchema.parse(req.body);
    res.json(emitted(token, () => token.pause(caller)));
  });

  router.post("/tokens/:address/unpause", (req, res) => {
    const token = registry.get(req.params.address);
    const { caller } = CallerSchema.parse(req.body);
    res.json(emitted(token, () => token.unpause(caller)));
  });

  router.post("/tokens/:address/roles/grant", (req, res) => {
    const token = registry.get(req.params.address);
    const { caller, role, account } = RoleChangeSchema.parse(req.body);
    res.json(emitted(token, () => token.grantRole(caller, role, account)));
  });

  router.post("/tokens/:address/roles/revoke", (req, res) => {
    const token = registry.get(req.params.address);
    const { caller, role, account } = RoleChangeSchema.parse(req.body);
    res.json(emitted(token, () => token.revokeRole(caller, role, account)));
  });

  router.post("/tokens/:address/ownership", (req, res) => {
    const token = registry.get(req.params.address);
    const { caller, newOwner } = OwnershipSchema.parse(req.body);
    res.json(emitted(token, () => token.transferOwnership(caller, newOwner)));
  });

  return router;
}
