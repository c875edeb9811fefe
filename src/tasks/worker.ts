import type { Brain } from "../agent/brain.js";
import type { EventSink } from "../events/types.js";
import type { HeartbeatScheduler } from "../heartbeat/scheduler.js";
import type { Logger } from "../logging/logger.js";
import type { Task, TaskStore } from "./store.js";

export interface TaskWorkerDeps {
  tasks: TaskStore;
  brain: Pick<Brain, "answerQuestion">;
  scheduler: Pick<HeartbeatScheduler, "reflectNow" | "tick">;
  events: EventSink;
  logger: Logger;
  pollIntervalMs: number;
}

const BATCH_SIZE = 10;

/** Thrown by a handler to leave its task pending for the next poll. */
class TaskDeferred extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = "TaskDeferred";
  }
}

/** Drains operator-queued tasks in FIFO order. */
export class TaskWorker {
  private readonly tasks: TaskStore;
  private readonly brain: Pick<Brain, "answerQuestion">;
  private readonly scheduler: Pick<HeartbeatScheduler, "reflectNow" | "tick">;
  private readonly events: EventSink;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;

  private timer: ReturnType<typeof setInterval> | null = null;
  private batch: Promise<number> | null = null;

  constructor(deps: TaskWorkerDeps) {
    this.tasks = deps.tasks;
    this.brain = deps.brain;
    this.scheduler = deps.scheduler;
    this.events = deps.events;
    this.logger = deps.logger;
    this.pollIntervalMs = deps.pollIntervalMs;
  }

  start(): void {
    this.timer = setInterval(() => {
      this.processPending().catch((err) => {
        this.logger.error({ err }, "Task worker poll error");
      });
    }, this.pollIntervalMs);
    this.timer.unref();
    this.logger.info({ pollIntervalMs: this.pollIntervalMs }, "Task worker started");
  }

  /** Stops polling and waits for the batch in progress, if any. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.batch) {
      await this.batch.catch((err: unknown) => {
        this.logger.error({ err }, "Task batch failed during shutdown");
      });
    }
    this.logger.info("Task worker stopped");
  }

  /**
   * Processes one batch. Returns how many tasks reached a terminal state.
   * A deferred task ends the batch so nothing queued after it runs first.
   */
  processPending(): Promise<number> {
    if (this.batch) return Promise.resolve(0);
    const batch = this.drain();
    this.batch = batch;
    return batch.finally(() => {
      this.batch = null;
    });
  }

  private async drain(): Promise<number> {
    let finished = 0;
    for (const task of this.tasks.pending(BATCH_SIZE)) {
      if ((await this.process(task)) === "deferred") break;
      finished++;
    }
    return finished;
  }

  private async process(task: Task): Promise<"done" | "deferred"> {
    this.logger.info({ taskId: task.id, type: task.type }, "Processing task");
    try {
      const result = await this.handle(task);
      this.tasks.complete(task.id, result);
      this.events.emit("task_result", { taskId: task.id, type: task.type, result });
    } catch (err) {
      if (err instanceof TaskDeferred) {
        this.logger.info({ taskId: task.id, reason: err.message }, "Task deferred");
        return "deferred";
      }
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ err, taskId: task.id }, "Task failed");
      this.tasks.fail(task.id, message);
      this.events.emit("task_failed", { taskId: task.id, type: task.type, error: message });
    }
    return "done";
  }

  private async handle(task: Task): Promise<string> {
    switch (task.type) {
      case "ask": {
        const question = task.payload["question"];
        if (typeof question !== "string" || question.trim().length === 0) {
          throw new Error("ask task has no question");
        }
        return this.brain.answerQuestion(question);
      }
      case "reflect": {
        const result = await this.scheduler.reflectNow("operator");
        if (!result) throw new TaskDeferred("heartbeat running");
        return (
          `Reflection: ${result.accepted} accepted, ${result.rejected} rejected` +
          (result.newVersion !== null ? `, strategy now v${result.newVersion}` : ", strategy unchanged")
        );
      }
      case "heartbeat": {
        const report = await this.scheduler.tick({ reschedule: false });
        if (report.status === "skipped") return `Heartbeat skipped: ${report.reason}`;
        return `Heartbeat #${report.count}: ${report.action}, ${report.replies} replies`;
      }
    }
  }
}
