import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { EventStore } from "../../src/events/store.js";
import { TaskStore } from "../../src/tasks/store.js";
import { makeTempDb, type TempDb } from "../helpers/fixtures.js";

describe("EventStore", () => {
  let tmp: TempDb;
  let events: EventStore;

  beforeEach(() => {
    tmp = makeTempDb();
    events = new EventStore(tmp.db);
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("returns pending events oldest first with their payloads", () => {
    events.emit("heartbeat_skip", { reason: "paused" });
    events.emit("action_blocked", { action: "post", reason: "spam" });
    const pending = events.pending();
    expect(pending.map((e) => e.type)).toEqual(["heartbeat_skip", "action_blocked"]);
    expect(pending[1]?.payload).toEqual({ action: "post", reason: "spam" });
  });

  it("hides consumed events", () => {
    events.emit("heartbeat_skip", { reason: "paused" });
    const [first] = events.pending();
    if (!first) throw new Error("expected an event");
    events.markConsumed(first.id);
    expect(events.pending()).toEqual([]);
  });
});

describe("TaskStore", () => {
  let tmp: TempDb;
  let tasks: TaskStore;

  beforeEach(() => {
    tmp = makeTempDb();
    tasks = new TaskStore(tmp.db);
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("queues tasks in FIFO order", () => {
    const a = tasks.enqueue("ask", { question: "one" });
    const b = tasks.enqueue("reflect");
    expect(tasks.pending().map((t) => t.id)).toEqual([a, b]);
    expect(tasks.get(a)?.payload).toEqual({ question: "one" });
  });

  it("transitions to a terminal state exactly once", () => {
    const id = tasks.enqueue("heartbeat");
    expect(tasks.complete(id, "done")).toBe(true);
    expect(tasks.fail(id, "late failure")).toBe(false);
    const task = tasks.get(id);
    expect(task?.status).toBe("done");
    expect(task?.result).toBe("done");
    expect(task?.completedAt).not.toBeNull();
    expect(tasks.pending()).toEqual([]);
  });
});
