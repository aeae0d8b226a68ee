import type { Request, Response, NextFunction } from "express";

export function apiKeyAuth(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    // Health endpoint is always public
    if (req.path === "/health") return next();

    const key = req.headers["x-api-key"];
    if (typeof key !== "string" || key !== apiKey) {
      res.status(401).json({ error: "Invalid or missing API key" });
      return;
    }
    next();
  };
}
