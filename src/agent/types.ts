export type ActionKind = "post" | "comment" | "upvote" | "skip";

export type ActionDecision =
  | { action: "post"; topic?: string; reason: string }
  | { action: "comment"; postId: string; reason: string }
  | { action: "upvote"; postId: string; reason: string }
  | { action: "skip"; reason: string };

export interface PostDraft {
  channel: string;
  title: string;
  content: string;
}

export interface DmReplyDraft {
  content: string;
  needsHumanInput: boolean;
}

export interface IdentityDraft {
  name: string;
  description: string;
}

export function describeAction(decision: ActionDecision): string {
  switch (decision.action) {
    case "post":
      return decision.topic ? `post about "${decision.topic}"` : "post";
    case "comment":
      return `comment on post ${decision.postId}`;
    case "upvote":
      return `upvote post ${decision.postId}`;
    case "skip":
      return "skip";
  }
}
