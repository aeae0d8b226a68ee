import type { Logger } from "pino";
import { serializeEvent, type GuardedToken, type TokenEvent } from "../../../sdk/core/src";
import { insertEvent, insertOperation } from "../db/schema";
import type { WebhookService } from "./webhook";

// ── Operation mapping ─────────────────────────────────────────────────

interface OperationRecord {
  operation: string;
  actor: string;
  amount?: string;
  target?: string;
}

function toOperation(e: TokenEvent): OperationRecord {
  switch (e.type) {
    case "TokenInitialized":
      return { operation: "initialize", actor: e.deployer.toBase58() };
    case "Transfer":
      return { operation: "transfer", actor: e.from.toBase58(), amount: e.amount.toString(), target: e.to.toBase58() };
    case "Approval":
      return { operation: "approve", actor: e.owner.toBase58(), amount: e.amount.toString(), target: e.spender.toBase58() };
    case "TokensMinted":
      return { operation: "mint", actor: e.minter.toBase58(), amount: e.amount.toString(), target: e.recipient.toBase58() };
    case "TokenPaused":
      return { operation: "pause", actor: e.pausedBy.toBase58() };
    case "TokenUnpaused":
      return { operation: "unpause", actor: e.unpausedBy.toBase58() };
    case "RoleGranted":
      return { operation: `grant_${e.role}`, actor: e.sender.toBase58(), target: e.account.toBase58() };
    case "RoleRevoked":
      return { operation: `revoke_${e.role}`, actor: e.sender.toBase58(), target: e.account.toBase58() };
    case "OwnershipTransferred":
      return { operation: "transfer_ownership", actor: e.previousOwner.toBase58(), target: e.newOwner.toBase58() };
  }
}

// ── EventRecorder class ───────────────────────────────────────────────

/**
 * Persists token notifications to the events and operations tables and
 * forwards them to registered webhooks.
 */
export class EventRecorder {
  private subscriptions = new Map<GuardedToken, number>();

  constructor(
    private logger: Logger,
    private webhookService?: WebhookService,
  ) {}

  /** Record everything the token has emitted so far, then follow it. */
  attach(token: GuardedToken): void {
    if (this.subscriptions.has(token)) return;
    for (const event of token.events) this.record(event);
    const id = token.onEvent((event) => this.record(event));
    this.subscriptions.set(token, id);
    this.logger.info({ token: token.address.toBase58() }, "recording token events");
  }

  detach(token: GuardedToken): void {
    const id = this.subscriptions.get(token);
    if (id === undefined) return;
    token.removeEventListener(id);
    this.subscriptions.delete(token);
  }

  stop(): void {
    for (const token of [...this.subscriptions.keys()]) this.detach(token);
    this.logger.info("Event recorder stopped");
  }

  private record(event: TokenEvent): void {
    const address = event.token.toBase58();
    const eventId = `${address}:${event.seq}`;
    const fields = serializeEvent(event);

    insertEvent(event.type, address, fields, eventId, event.seq, event.timestamp);

    const op = toOperation(event);
    insertOperation(op.operation, address, op.actor, eventId, op.amount, op.target);

    this.logger.debug({ event: event.type, eventId }, "event recorded");

    if (this.webhookService) {
      this.webhookService
        .dispatch(event.type, fields)
        .catch((err: unknown) => this.logger.error({ err }, "webhook dispatch error"));
    }
  }
}
