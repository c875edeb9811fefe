import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { IdentityDraft } from "../../src/agent/types.js";
import { NameTakenError } from "../../src/social/errors.js";
import {
  MAX_REGISTRATION_ATTEMPTS,
  registerAgent,
  type IdentitySource,
} from "../../src/social/registration.js";
import { STATE_KEYS, StateStore } from "../../src/store/state.js";
import { FakeContentService, makeTempDb, silentLogger, type TempDb } from "../helpers/fixtures.js";

class ListIdentities implements IdentitySource {
  readonly requests: string[][] = [];
  constructor(private readonly drafts: Array<IdentityDraft | null>) {}

  async generateIdentity(takenNames: string[]): Promise<IdentityDraft | null> {
    this.requests.push([...takenNames]);
    return this.drafts.shift() ?? null;
  }
}

describe("registerAgent", () => {
  let tmp: TempDb;
  let state: StateStore;
  let client: FakeContentService;

  beforeEach(() => {
    tmp = makeTempDb();
    state = new StateStore(tmp.db);
    client = new FakeContentService();
    client.registered = false;
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("persists name and key on success", async () => {
    client.registrations.push({
      name: "tide",
      apiKey: "test-key",
      claimUrl: "http://claim.test",
      verificationCode: "reef-1",
    });

    const registration = await registerAgent(
      { client, brain: new ListIdentities([]), state, logger: silentLogger() },
      { name: "tide", description: "An agent" },
    );

    expect(registration.verificationCode).toBe("reef-1");
    expect(state.get(STATE_KEYS.agentName)).toBe("tide");
    expect(state.get(STATE_KEYS.apiKey)).toBe("test-key");
    expect(client.apiKey).toBe("test-key");
    expect(client.isRegistered()).toBe(true);
  });

  it("generates a new identity when the name is taken", async () => {
    client.registrations.push(new NameTakenError("tide"));
    const brain = new ListIdentities([{ name: "tide_two", description: "Second try" }]);

    await registerAgent({ client, brain, state, logger: silentLogger() }, { name: "tide", description: "An agent" });

    expect(brain.requests).toEqual([["tide"]]);
    expect(client.registerCalls).toEqual([
      { name: "tide", description: "An agent" },
      { name: "tide_two", description: "Second try" },
    ]);
    expect(state.get(STATE_KEYS.agentName)).toBe("tide_two");
  });

  it("falls back to a numbered name when no identity can be generated", async () => {
    client.registrations.push(new NameTakenError("tide"));

    await registerAgent(
      { client, brain: new ListIdentities([]), state, logger: silentLogger() },
      { name: "tide", description: "An agent" },
    );

    expect(client.registerCalls[1]).toEqual({ name: "tide_2", description: "An agent" });
  });

  it("gives up after the maximum number of attempts", async () => {
    for (let i = 0; i < MAX_REGISTRATION_ATTEMPTS; i++) {
      client.registrations.push(new NameTakenError(`name${i}`));
    }

    await expect(
      registerAgent(
        { client, brain: new ListIdentities([]), state, logger: silentLogger() },
        { name: "tide", description: "An agent" },
      ),
    ).rejects.toThrow("Registration failed after 5 attempts: name0, name1, name2, name3, name4 taken");
    expect(client.registerCalls).toHaveLength(5);
    expect(state.get(STATE_KEYS.apiKey)).toBeNull();
  });

  it("rethrows errors other than a taken name", async () => {
    client.registrations.push(new Error("network down"));
    await expect(
      registerAgent(
        { client, brain: new ListIdentities([]), state, logger: silentLogger() },
        { name: "tide", description: "An agent" },
      ),
    ).rejects.toThrow("network down");
    expect(client.registerCalls).toHaveLength(1);
  });
});
