import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import type { Logger } from "pino";
import { apiKeyAuth } from "./middleware/auth";
import { errorHandler } from "./middleware/errors";
import { eventsRouter } from "./routes/events";
import { statusRouter } from "./routes/status";
import { tokensRouter } from "./routes/tokens";
import { webhooksRouter } from "./routes/webhooks";
import type { TokenRegistry } from "./services/token-registry";
import type { WebhookService } from "./services/webhook";

export interface AppDeps {
  registry: TokenRegistry;
  webhookService: WebhookService;
  logger: Logger;
  apiKey: string;
}

export function createApp({ registry, webhookService, logger, apiKey }: AppDeps): Express {
  const app = express();
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(apiKeyAuth(apiKey));

  // Health endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", tokens: registry.list().length, uptime: process.uptime() });
  });

  // Routes
  app.use("/api", statusRouter(registry));
  app.use("/api", tokensRouter(registry));
  app.use("/api", eventsRouter());
  app.use("/api", webhooksRouter(webhookService));

  app.use(errorHandler(logger));
  return app;
}
