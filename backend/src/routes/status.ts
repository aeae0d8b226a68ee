import { Router } from "express";
import type { GuardedToken } from "../../../sdk/core/src";
import type { TokenRegistry } from "../services/token-registry";

export function statusJson(token: GuardedToken) {
  const status = token.status();
  return {
    address: status.address.toBase58(),
    name: status.name,
    symbol: status.symbol,
    decimals: status.decimals,
    totalSupply: status.totalSupply.toString(),
    maxSupply: status.maxSupply === null ? null : status.maxSupply.toString(),
    paused: status.paused,
    owner: status.owner.toBase58(),
    admins: status.admins.map((key) => key.toBase58()),
    minters: status.minters.map((key) => key.toBase58()),
    holders: status.holders,
  };
}

export function statusRouter(registry: TokenRegistry): Router {
  const router = Router();

  router.get("/status/:address", (req, res) => {
    res.json(statusJson(registry.get(req.params.address)));
  });

  return router;
}
