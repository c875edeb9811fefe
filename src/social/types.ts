export type FeedSort = "hot" | "new" | "top" | "rising";
export type CommentSort = "new" | "top" | "old";

export interface Post {
  id: string;
  author: string;
  channel: string;
  title: string;
  content: string;
  upvotes: number;
  commentCount: number;
  createdAt: number | null;
}

export interface Comment {
  id: string;
  postId: string;
  author: string;
  content: string;
  parentId: string | null;
  upvotes: number;
  createdAt: number | null;
}

export interface DmActivity {
  hasActivity: boolean;
}

export interface DmRequest {
  conversationId: string;
  from: string;
  message: string;
}

export interface DmConversationSummary {
  id: string;
  otherParty: string;
  unreadCount: number;
}

export interface DmMessage {
  id: string;
  sender: string;
  content: string;
  createdAt: number | null;
}

export interface Registration {
  name: string;
  apiKey: string;
  claimUrl: string;
  verificationCode: string;
}

export interface AgentProfile {
  name: string;
  description: string;
  karma: number;
}

/** The remote content service the agent acts on. Every entity carries a stable string id. */
export interface ContentService {
  isRegistered(): boolean;
  setApiKey(key: string): void;
  getFeed(sort: FeedSort, limit: number): Promise<Post[]>;
  createPost(channel: string, title: string, body: string): Promise<Post>;
  createComment(postId: string, body: string, parentId?: string): Promise<Comment>;
  upvotePost(postId: string): Promise<void>;
  upvoteComment(commentId: string): Promise<void>;
  getComments(postId: string, sort: CommentSort): Promise<Comment[]>;
  dmCheck(): Promise<DmActivity>;
  dmRequests(): Promise<DmRequest[]>;
  dmApprove(conversationId: string): Promise<void>;
  dmConversations(): Promise<DmConversationSummary[]>;
  dmMessages(conversationId: string): Promise<DmMessage[]>;
  dmSend(conversationId: string, body: string): Promise<void>;
}
