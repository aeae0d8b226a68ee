import { Router } from "express";
import type { WebhookService } from "../services/webhook";
import { WebhookSchema } from "../validation";

export function webhooksRouter(webhookService: WebhookService): Router {
  const router = Router();

  router.get("/webhooks", (_req, res) => {
    res.json({ webhooks: webhookService.list() });
  });

  router.post("/webhooks", (req, res) => {
    const { url, events, secret } = WebhookSchema.parse(req.body);
    const id = webhookService.register(url, events, secret);
    res.status(201).json({ id, url, events });
  });

  router.delete("/webhooks/:id", (req, res) => {
    res.json({ deleted: webhookService.remove(Number(req.params.id)) });
  });

  return router;
}
