import type { Logger } from "../logging/logger.js";
import type { StrategyStore } from "../reflection/store.js";
import type { StabilityIndex } from "../safety/stability.js";
import type { SocialStore } from "../social/store.js";
import type { ContentService } from "../social/types.js";
import type { AuditLog } from "../store/audit.js";
import { STATE_KEYS, type StateStore } from "../store/state.js";
import type { TaskStore } from "../tasks/store.js";

export interface OperatorCommandsDeps {
  state: StateStore;
  social: SocialStore;
  tasks: TaskStore;
  strategies: StrategyStore;
  stability: StabilityIndex;
  audit: AuditLog;
  client: Pick<ContentService, "dmSend">;
  logger: Logger;
}

export const HELP_TEXT = [
  "Commands:",
  "/status - agent state and stats",
  "/pause - stop autonomous activity",
  "/resume - resume autonomous activity",
  "/ask <question> - queue a question",
  "/reflect - queue a reflection cycle",
  "/heartbeat - queue a manual heartbeat",
  "/dm_reply <conversation_id> <message> - answer an escalated DM",
  "/strategy - show the active strategy",
].join("\n");

function formatTime(ms: number | null): string {
  return ms === null ? "never" : new Date(ms).toISOString();
}

/**
 * Operator command handlers. Each returns the text to send back; the chat
 * front-end only parses arguments and relays replies.
 */
export class OperatorCommands {
  private readonly state: StateStore;
  private readonly social: SocialStore;
  private readonly tasks: TaskStore;
  private readonly strategies: StrategyStore;
  private readonly stability: StabilityIndex;
  private readonly audit: AuditLog;
  private readonly client: Pick<ContentService, "dmSend">;
  private readonly logger: Logger;

  constructor(deps: OperatorCommandsDeps) {
    this.state = deps.state;
    this.social = deps.social;
    this.tasks = deps.tasks;
    this.strategies = deps.strategies;
    this.stability = deps.stability;
    this.audit = deps.audit;
    this.client = deps.client;
    this.logger = deps.logger;
  }

  help(): string {
    return HELP_TEXT;
  }

  status(): string {
    const stats = this.social.getStats();
    const stability = this.stability.compute();
    const lastHeartbeat = this.state.get(STATE_KEYS.lastHeartbeatAt);
    return [
      `Agent: ${this.state.get(STATE_KEYS.agentName) ?? "(unregistered)"}`,
      `State: ${this.state.isPaused() ? "PAUSED" : "active"}`,
      `Heartbeats: ${this.state.getNumber(STATE_KEYS.heartbeatCount)}`,
      `Last heartbeat: ${formatTime(lastHeartbeat === null ? null : Number(lastHeartbeat))}`,
      `Strategy: v${this.strategies.latest().version}`,
      `Stability: ${stability.overall.toFixed(2)}${stability.alert ? " (ALERT)" : ""}`,
      `Posts: ${stats.totalPosts}`,
      `Comments today: ${stats.commentsToday}`,
      `Seen posts: ${stats.seenPosts}`,
      `Unreplied comments: ${stats.unrepliedComments}`,
      `Pending tasks: ${stats.pendingTasks}`,
    ].join("\n");
  }

  pause(): string {
    if (this.state.isPaused()) return "Already paused.";
    this.state.setPaused(true);
    this.audit.record("operator", { command: "pause" });
    this.logger.info("Agent paused by operator");
    return "Paused. Heartbeats will skip until /resume.";
  }

  resume(): string {
    if (!this.state.isPaused()) return "Already running.";
    this.state.setPaused(false);
    this.audit.record("operator", { command: "resume" });
    this.logger.info("Agent resumed by operator");
    return "Resumed.";
  }

  ask(question: string): string {
    const text = question.trim();
    if (!text) return "Usage: /ask <question>";
    const id = this.tasks.enqueue("ask", { question: text });
    return `Queued task #${id}: ${text}`;
  }

  reflect(): string {
    const id = this.tasks.enqueue("reflect");
    return `Queued reflection as task #${id}.`;
  }

  heartbeat(): string {
    const id = this.tasks.enqueue("heartbeat");
    return `Queued heartbeat as task #${id}.`;
  }

  async dmReply(args: string): Promise<string> {
    const match = /^(\S+)\s+([\s\S]+)$/.exec(args.trim());
    const conversationId = match?.[1];
    const message = match?.[2]?.trim();
    if (!conversationId || !message) return "Usage: /dm_reply <conversation_id> <message>";

    const conversation = this.social.getConversation(conversationId);
    if (!conversation) return `Unknown conversation ${conversationId}.`;

    await this.client.dmSend(conversationId, message);
    this.social.setNeedsHuman(conversationId, false);
    this.audit.record("operator", { command: "dm_reply", conversationId, otherParty: conversation.otherParty });
    this.logger.info({ conversationId }, "Operator replied to DM");
    return `Sent to ${conversation.otherParty}.`;
  }

  strategy(): string {
    const { version, parentVersion, trigger, document } = this.strategies.latest();
    return [
      `Strategy v${version} (${trigger}${parentVersion !== null ? `, from v${parentVersion}` : ""})`,
      `Mission: ${document.goals.mission}`,
      `Objectives: ${document.goals.current_objectives.join("; ") || "(none)"}`,
      `Interests: ${document.interests.primary.join(", ") || "(none)"}`,
      `Exploring: ${document.interests.exploring.join(", ") || "(none)"}`,
      `Tone: ${document.engagement.style.tone}, length: ${document.engagement.style.length}`,
      `Channels: ${document.channels.active.join(", ")}`,
    ].join("\n");
  }
}
