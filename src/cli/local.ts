import { ensureDir, getStateDir } from "../config/paths.js";
import { MemoryStore } from "../memory/store.js";
import { StrategyStore } from "../reflection/store.js";
import { StabilityIndex } from "../safety/stability.js";
import { SocialStore } from "../social/store.js";
import { AuditLog } from "../store/audit.js";
import { AgentDB } from "../store/db.js";
import { StateStore } from "../store/state.js";

/** Stores the offline commands read and write. No network clients are built. */
export interface LocalStores {
  db: AgentDB;
  state: StateStore;
  social: SocialStore;
  strategies: StrategyStore;
  stability: StabilityIndex;
  audit: AuditLog;
}

export function openLocalStores(stateDir: string = getStateDir()): LocalStores {
  const db = new AgentDB(ensureDir(stateDir));
  const state = new StateStore(db);
  state.initDefaults();
  const strategies = new StrategyStore(db);
  strategies.ensureDefault();
  return {
    db,
    state,
    social: new SocialStore(db),
    strategies,
    stability: new StabilityIndex(new MemoryStore(db)),
    audit: new AuditLog(db),
  };
}

/** Opens the stores, runs `fn` and always closes the database. */
export async function withLocalStores<T>(fn: (stores: LocalStores) => T | Promise<T>): Promise<T> {
  const stores = openLocalStores();
  try {
    return await fn(stores);
  } finally {
    stores.db.close();
  }
}
