import { Brain } from "../agent/brain.js";
import type { AgentConfig } from "../config/types.js";
import { ConsolidationEngine } from "../consolidation/engine.js";
import { EventStore } from "../events/store.js";
import { AutonomousPhase } from "../heartbeat/autonomous.js";
import { Obligations } from "../heartbeat/obligations.js";
import { HeartbeatScheduler } from "../heartbeat/scheduler.js";
import type { Logger } from "../logging/logger.js";
import { CoreMemory } from "../memory/core.js";
import { EpisodicMemory } from "../memory/episodic.js";
import { MemoryStore } from "../memory/store.js";
import { OperatorCommands } from "../operator/commands.js";
import { ChatOracle } from "../oracle/client.js";
import type { Oracle, UsageReport } from "../oracle/types.js";
import { ReflectionEngine } from "../reflection/engine.js";
import { StrategyStore } from "../reflection/store.js";
import { ActiveStrategy } from "../reflection/strategy.js";
import { ActionShield } from "../safety/shield.js";
import { StabilityIndex } from "../safety/stability.js";
import { PlatformClient } from "../social/client.js";
import type { Registrar } from "../social/registration.js";
import { SocialStore } from "../social/store.js";
import type { ContentService } from "../social/types.js";
import { AuditLog } from "../store/audit.js";
import { AgentDB } from "../store/db.js";
import { STATE_KEYS, StateStore } from "../store/state.js";
import { TaskStore } from "../tasks/store.js";
import { TaskWorker } from "../tasks/worker.js";

export type AgentClient = ContentService & Registrar;

export interface BuildAgentOptions {
  config: AgentConfig;
  logger: Logger;
  stateDir: string;
  /** Replaces the HTTP oracle. */
  oracle?: Oracle;
  /** Replaces the HTTP platform client. */
  client?: AgentClient;
  /** Source for heartbeat jitter. */
  random?: () => number;
}

export interface Agent {
  config: AgentConfig;
  logger: Logger;
  db: AgentDB;
  state: StateStore;
  store: MemoryStore;
  memory: EpisodicMemory;
  core: CoreMemory;
  social: SocialStore;
  strategies: StrategyStore;
  active: ActiveStrategy;
  audit: AuditLog;
  events: EventStore;
  tasks: TaskStore;
  oracle: Oracle;
  client: AgentClient;
  brain: Brain;
  shield: ActionShield;
  stability: StabilityIndex;
  reflection: ReflectionEngine;
  consolidation: ConsolidationEngine;
  scheduler: HeartbeatScheduler;
  worker: TaskWorker;
  commands: OperatorCommands;
  usage: () => UsageReport;
  agentName: () => string;
}

export const DEFAULT_AGENT_NAME = "tidepool-agent";

/**
 * Opens the store and wires every component around it. Nothing starts
 * running here; timers and servers belong to `startAgent`.
 */
export function buildAgent(options: BuildAgentOptions): Agent {
  const { config, logger, stateDir } = options;

  const db = new AgentDB(stateDir);
  const state = new StateStore(db);
  state.initDefaults();

  const agentName = (): string =>
    state.get(STATE_KEYS.agentName) ?? config.identity.name ?? DEFAULT_AGENT_NAME;

  const store = new MemoryStore(db);
  const social = new SocialStore(db);
  const strategies = new StrategyStore(db);
  const active = new ActiveStrategy(strategies.ensureDefault());
  const audit = new AuditLog(db);
  const events = new EventStore(db);
  const tasks = new TaskStore(db);

  let oracle: Oracle;
  let usage: () => UsageReport;
  if (options.oracle) {
    oracle = options.oracle;
    usage = () => ({});
  } else {
    const chat = new ChatOracle({ config: config.oracle, logger });
    oracle = chat;
    usage = () => chat.usageReport();
  }

  const client: AgentClient =
    options.client ??
    new PlatformClient({ config: config.platform, logger, apiKey: state.get(STATE_KEYS.apiKey) });

  const memory = new EpisodicMemory({ store, oracle, logger });
  const core = new CoreMemory(store);
  const { goals } = active.get().document;
  core.init(agentName(), config.identity, goals.mission, goals.current_objectives);

  const brain = new Brain({
    oracle,
    strategy: active,
    core,
    memory,
    identity: config.identity,
    constitution: config.constitution,
    logger,
    agentName,
  });
  const shield = new ActionShield({
    oracle,
    logger,
    constitution: config.constitution,
    failMode: config.safety.failMode,
  });
  const stability = new StabilityIndex(store);
  const reflection = new ReflectionEngine({
    memory,
    store,
    social,
    strategies,
    audit,
    oracle,
    constitution: config.constitution,
    config: config.reflection,
    logger,
  });
  const consolidation = new ConsolidationEngine({
    store,
    core,
    oracle,
    events,
    config: config.consolidation,
    logger,
  });

  const obligations = new Obligations({
    client,
    social,
    brain,
    memory,
    events,
    heartbeat: config.heartbeat,
    reflection: config.reflection,
    logger,
    agentName,
  });
  const autonomous = new AutonomousPhase({
    client,
    social,
    brain,
    shield,
    memory,
    audit,
    events,
    config: config.heartbeat,
    logger,
  });
  const scheduler = new HeartbeatScheduler({
    state,
    client,
    obligations,
    autonomous,
    stability,
    reflection,
    consolidation,
    strategies,
    active,
    events,
    config: config.heartbeat,
    consolidationSchedule: config.consolidation.schedule,
    logger,
    random: options.random,
  });
  const worker = new TaskWorker({
    tasks,
    brain,
    scheduler,
    events,
    logger,
    pollIntervalMs: config.worker.pollIntervalMs,
  });
  const commands = new OperatorCommands({
    state,
    social,
    tasks,
    strategies,
    stability,
    audit,
    client,
    logger,
  });

  return {
    config,
    logger,
    db,
    state,
    store,
    memory,
    core,
    social,
    strategies,
    active,
    audit,
    events,
    tasks,
    oracle,
    client,
    brain,
    shield,
    stability,
    reflection,
    consolidation,
    scheduler,
    worker,
    commands,
    usage,
    agentName,
  };
}
