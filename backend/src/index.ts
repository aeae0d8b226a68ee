import pino from "pino";
import { getDb, closeDb } from "./db/schema";
import { createApp } from "./app";
import { EventRecorder } from "./services/event-recorder";
import { TokenRegistry } from "./services/token-registry";
import { WebhookService } from "./services/webhook";

const PORT = Number(process.env.PORT) || 3001;
const API_KEY = process.env.API_KEY || "dev-api-key";
const LOG_LEVEL = process.env.LOG_LEVEL || "info";

const logger = pino(
  process.env.NODE_ENV === "production"
    ? { level: LOG_LEVEL }
    : { level: LOG_LEVEL, transport: { target: "pino-pretty" } }
);

// Initialize DB
getDb();
logger.info("SQLite database initialized");

// Services
const webhookService = new WebhookService(logger);
const recorder = new EventRecorder(logger, webhookService);
const registry = new TokenRegistry(logger, recorder);

const app = createApp({ registry, webhookService, logger, apiKey: API_KEY });

const server = app.listen(PORT, () => {
  logger.info(`Guarded token backend running on port ${PORT}`);
});

// Graceful shutdown
process.on("SIGTERM", () => {
  registry.close();
  server.close(() => {
    closeDb();
    process.exit(0);
  });
});
