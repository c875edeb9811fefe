import type { Logger } from "../logging/logger.js";
import { DailyLimitError } from "./errors.js";

export interface CooldownConfig {
  readonly postCooldownSec: number;
  readonly commentCooldownSec: number;
  readonly maxCommentsPerDay: number;
}

const DAY_MS = 86_400_000;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Spaces out posts and comments and enforces the rolling daily comment quota. */
export class CooldownTracker {
  private lastPostAt = 0;
  private lastCommentAt = 0;
  private commentsToday = 0;
  private dayStartedAt = Date.now();

  constructor(
    private readonly config: CooldownConfig,
    private readonly logger: Logger,
    private readonly wait: Sleep = sleep,
  ) {}

  async beforePost(): Promise<void> {
    const remaining = this.config.postCooldownSec * 1000 - (Date.now() - this.lastPostAt);
    if (remaining > 0) {
      this.logger.info({ waitMs: remaining }, "Post cooldown, waiting");
      await this.wait(remaining);
    }
    this.lastPostAt = Date.now();
  }

  async beforeComment(): Promise<void> {
    this.resetDayIfNeeded();
    if (this.commentsToday >= this.config.maxCommentsPerDay) {
      throw new DailyLimitError("comment", this.config.maxCommentsPerDay);
    }
    const remaining = this.config.commentCooldownSec * 1000 - (Date.now() - this.lastCommentAt);
    if (remaining > 0) {
      this.logger.debug({ waitMs: remaining }, "Comment cooldown, waiting");
      await this.wait(remaining);
    }
    this.lastCommentAt = Date.now();
    this.commentsToday++;
  }

  commentsRemaining(): number {
    this.resetDayIfNeeded();
    return Math.max(0, this.config.maxCommentsPerDay - this.commentsToday);
  }

  private resetDayIfNeeded(): void {
    const now = Date.now();
    if (now - this.dayStartedAt >= DAY_MS) {
      this.commentsToday = 0;
      this.dayStartedAt = now;
    }
  }
}
