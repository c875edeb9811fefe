import type { Logger } from "../logging/logger.js";
import type { IdentityDraft } from "../agent/types.js";
import { STATE_KEYS, type StateStore } from "../store/state.js";
import { NameTakenError } from "./errors.js";
import type { Registration } from "./types.js";

export interface Registrar {
  register(name: string, description: string): Promise<Registration>;
  setApiKey(key: string): void;
}

export interface IdentitySource {
  generateIdentity(takenNames: string[]): Promise<IdentityDraft | null>;
}

export interface RegisterAgentDeps {
  client: Registrar;
  brain: IdentitySource;
  state: StateStore;
  logger: Logger;
}

export const MAX_REGISTRATION_ATTEMPTS = 5;

/**
 * Registers with the platform, inventing a fresh identity whenever the
 * requested name is taken. Name and key are persisted on success.
 */
export async function registerAgent(
  deps: RegisterAgentDeps,
  initial: IdentityDraft,
): Promise<Registration> {
  const { client, brain, state, logger } = deps;
  const taken: string[] = [];
  let identity = initial;

  for (let attempt = 1; attempt <= MAX_REGISTRATION_ATTEMPTS; attempt++) {
    try {
      const registration = await client.register(identity.name, identity.description);
      state.set(STATE_KEYS.agentName, registration.name || identity.name);
      state.set(STATE_KEYS.apiKey, registration.apiKey);
      client.setApiKey(registration.apiKey);
      logger.info({ name: identity.name, attempt }, "Agent registered");
      return registration;
    } catch (err) {
      if (!(err instanceof NameTakenError)) throw err;
      taken.push(err.rejectedName);
      logger.warn({ name: err.rejectedName, attempt }, "Name taken, generating another");
      if (attempt === MAX_REGISTRATION_ATTEMPTS) break;
      const next = await brain.generateIdentity(taken);
      if (next) identity = next;
      else identity = { ...identity, name: `${initial.name}_${attempt + 1}` };
    }
  }

  throw new Error(`Registration failed after ${MAX_REGISTRATION_ATTEMPTS} attempts: ${taken.join(", ")} taken`);
}
