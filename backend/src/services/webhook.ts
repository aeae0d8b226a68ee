import type { Logger } from "pino";
import { getDb } from "../db/schema";

interface WebhookConfig {
  id: number;
  url: string;
  events: string;
  active: number;
  secret: string | null;
}

export type WebhookSummary = Omit<WebhookConfig, "secret">;

export class WebhookService {
  constructor(private logger: Logger) {}

  async dispatch(eventType: string, payload: object): Promise<void> {
    const db = getDb();
    const webhooks = db.prepare<[], WebhookConfig>(`SELECT * FROM webhooks WHERE active = 1`).all();

    for (const webhook of webhooks) {
      const subscribedEvents = webhook.events.split(",").map((e) => e.trim());
      if (!subscribedEvents.includes("*") && !subscribedEvents.includes(eventType)) continue;

      try {
        const response = await fetch(webhook.url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            ...(webhook.secret ? { "X-Webhook-Secret": webhook.secret } : {}),
          },
          body: JSON.stringify({ event: eventType, data: payload, timestamp: Date.now() }),
        });

        if (!response.ok) {
          this.logger.error({ webhook: webhook.id, status: response.status }, "webhook delivery failed");
        } else {
          this.logger.info({ webhook: webhook.id, event: eventType }, "webhook delivered");
        }
      } catch (err) {
        this.logger.error({ err, webhook: webhook.id }, "webhook delivery error");
      }
    }
  }

  register(url: string, events: string[], secret?: string): number {
    const db = getDb();
    const result = db.prepare(
      `INSERT INTO webhooks (url, events, secret) VALUES (?, ?, ?)`
    ).run(url, events.join(","), secret ?? null);
    return Number(result.lastInsertRowid);
  }

  list(): WebhookSummary[] {
    const db = getDb();
    return db.prepare<[], WebhookSummary>(`SELECT id, url, events, active FROM webhooks`).all();
  }

  /** Returns false when no webhook had that id. */
  remove(id: number): boolean {
    const db = getDb();
    return db.prepare(`DELETE FROM webhooks WHERE id = ?`).run(id).changes > 0;
  }
}
