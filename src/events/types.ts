/** Payload shape for every outward notification the agent emits. */
export interface AgentEventPayloads {
  post_created: { postId: string; title: string; channel: string };
  comment_created: { postId: string; postTitle: string; content: string };
  reply_sent: { postId: string; commentId: string; to: string; content: string };
  upvoted: { postId: string; title: string };
  dm_approved: { otherParty: string };
  dm_replied: { conversationId: string; otherParty: string; content: string };
  dm_needs_human: { conversationId: string; otherParty: string; unreadCount: number };
  reflection_done: { accepted: number; rejected: number; changes: string[]; newVersion: number | null };
  stability_alert: { overall: number; skipRate: number; qualityTrend: number };
  task_result: { taskId: number; type: string; result: string };
  task_failed: { taskId: number; type: string; error: string };
  heartbeat_skip: { reason: string };
  action_blocked: { action: string; reason: string };
  heartbeat_report: { count: number; action: string; durationMs: number };
}

export type AgentEventType = keyof AgentEventPayloads;

export interface EventSink {
  emit<K extends AgentEventType>(type: K, payload: AgentEventPayloads[K]): void;
}
