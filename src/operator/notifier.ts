import type { EventStore, StoredEvent } from "../events/store.js";
import type { Logger } from "../logging/logger.js";

export type SendText = (text: string) => Promise<void>;

export interface NotifierDeps {
  events: EventStore;
  send: SendText;
  logger: Logger;
  pollIntervalMs: number;
}

const PREVIEW = 200;

function str(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  return typeof value === "string" ? value : "?";
}

function num(payload: Record<string, unknown>, key: string): number {
  const value = payload[key];
  return typeof value === "number" ? value : 0;
}

function list(payload: Record<string, unknown>, key: string): string[] {
  const value = payload[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

/** One human-readable message per event. Unknown types fall back to their JSON payload. */
export function formatEvent(event: Pick<StoredEvent, "type" | "payload">): string {
  const p = event.payload;
  switch (event.type) {
    case "post_created":
      return `New post in ${str(p, "channel")}: ${str(p, "title")}`;
    case "comment_created":
      return `Commented on '${str(p, "postTitle")}'\n${str(p, "content").slice(0, PREVIEW)}`;
    case "reply_sent":
      return `Replied to ${str(p, "to")}\n${str(p, "content").slice(0, PREVIEW)}`;
    case "upvoted":
      return `Upvoted '${str(p, "title") || str(p, "postId")}'`;
    case "dm_approved":
      return `New DM conversation with ${str(p, "otherParty")}`;
    case "dm_replied":
      return `DM reply to ${str(p, "otherParty")}\n${str(p, "content").slice(0, PREVIEW)}`;
    case "dm_needs_human":
      return (
        `DM from ${str(p, "otherParty")} needs your attention (${num(p, "unreadCount")} unread).\n` +
        `Use /dm_reply ${str(p, "conversationId")} <message>`
      );
    case "reflection_done": {
      const changes = list(p, "changes");
      const version = p["newVersion"];
      return (
        `Reflection complete: ${num(p, "accepted")} accepted, ${num(p, "rejected")} rejected.\n` +
        (changes.length > 0 ? `Changed: ${changes.join(", ")}` : "No changes applied.") +
        (typeof version === "number" ? `\nStrategy now v${version}` : "")
      );
    }
    case "stability_alert":
      return (
        `Stability alert: ${num(p, "overall").toFixed(2)} ` +
        `(skip rate ${num(p, "skipRate").toFixed(2)}, quality ${num(p, "qualityTrend").toFixed(2)})`
      );
    case "task_result":
      return `Task #${num(p, "taskId")} (${str(p, "type")}):\n${str(p, "result").slice(0, 500)}`;
    case "task_failed":
      return `Task #${num(p, "taskId")} (${str(p, "type")}) failed: ${str(p, "error")}`;
    case "heartbeat_skip":
      return `Heartbeat skipped (${str(p, "reason")})`;
    case "action_blocked":
      return `Blocked ${str(p, "action")}: ${str(p, "reason")}`;
    case "heartbeat_report":
      return `Heartbeat #${num(p, "count")}: ${str(p, "action")} in ${(num(p, "durationMs") / 1000).toFixed(1)}s`;
    default:
      return `[${event.type}] ${JSON.stringify(p).slice(0, 300)}`;
  }
}

/** Relays stored agent events to the operator, marking each consumed once sent. */
export class Notifier {
  private readonly events: EventStore;
  private readonly send: SendText;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private busy = false;

  constructor(deps: NotifierDeps) {
    this.events = deps.events;
    this.send = deps.send;
    this.logger = deps.logger;
    this.pollIntervalMs = deps.pollIntervalMs;
  }

  start(): void {
    this.timer = setInterval(() => {
      this.deliverPending().catch((err) => {
        this.logger.error({ err }, "Notifier poll error");
      });
    }, this.pollIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Sends pending events oldest first. Stops at the first failed send so the
   * remaining events keep their order for the next poll.
   */
  async deliverPending(): Promise<number> {
    if (this.busy) return 0;
    this.busy = true;
    let delivered = 0;
    try {
      for (const event of this.events.pending()) {
        try {
          await this.send(formatEvent(event));
        } catch (err) {
          this.logger.error({ err, eventId: event.id }, "Event delivery failed");
          break;
        }
        this.events.markConsumed(event.id);
        delivered++;
      }
    } finally {
      this.busy = false;
    }
    return delivered;
  }
}
