import { Router } from "express";
import { getEvents, getOperations } from "../db/schema";

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function eventsRouter(): Router {
  const router = Router();

  router.get("/events", (req, res) => {
    const { token, limit, offset } = req.query;
    const events = getEvents(queryString(token), Number(limit) || 50, Number(offset) || 0).map((row) => {
      const data: unknown = JSON.parse(row.data);
      return { ...row, data };
    });
    res.json({ events, count: events.length });
  });

  router.get("/operations", (req, res) => {
    const { token, limit, offset } = req.query;
    const operations = getOperations(queryString(token), Number(limit) || 50, Number(offset) || 0);
    res.json({ operations, count: operations.length });
  });

  return router;
}
