import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import { createLogger } from "../logging/logger.js";
import { OperatorBot } from "../operator/bot.js";
import { Notifier } from "../operator/notifier.js";
import { STATE_KEYS } from "../store/state.js";
import { buildAgent, type Agent } from "./agent.js";
import { HealthServer } from "./health.js";

export interface AgentContext {
  agent: Agent;
  healthServer: HealthServer | null;
  bot: OperatorBot | null;
  notifier: Notifier | null;
  shutdown: () => Promise<void>;
}

const SHUTDOWN_TIMEOUT_MS = 15_000;

export async function startAgent(configPath?: string): Promise<AgentContext> {
  // 1. Load config
  const config = loadConfig(configPath);

  // 2. Create logger
  const logger = createLogger(config.logging);
  logger.info("Starting tidepool agent...");

  // 3. Ensure state directory
  const stateDir = ensureDir(getStateDir());

  // 4. Open the store and wire components
  const agent = buildAgent({ config, logger, stateDir });

  // 5. Clear flags left behind by a crashed process
  agent.state.release(STATE_KEYS.heartbeatRunning);
  agent.state.release(STATE_KEYS.consolidationRunning);

  if (!agent.client.isRegistered()) {
    logger.warn("Not registered with the platform; heartbeats will skip until `tidepool register` runs");
  }

  // 6. Start health server
  let healthServer: HealthServer | null = null;
  if (config.gateway.enabled) {
    healthServer = new HealthServer({
      state: agent.state,
      strategies: agent.strategies,
      stability: agent.stability,
      isRegistered: () => agent.client.isRegistered() || agent.state.isRegistered(),
      usage: agent.usage,
      port: config.gateway.port,
      hostname: config.gateway.hostname,
    });
    await healthServer.start();
    logger.info({ port: config.gateway.port }, "Health server started");
  }

  // 7. Start operator bot and notifier
  let bot: OperatorBot | null = null;
  let notifier: Notifier | null = null;
  const { token, ownerId } = config.operator;
  if (config.operator.enabled && token && ownerId !== undefined) {
    const operatorBot = new OperatorBot({ token, ownerId, commands: agent.commands, logger });
    try {
      await operatorBot.start();
      bot = operatorBot;
      notifier = new Notifier({
        events: agent.events,
        send: (text) => operatorBot.send(text),
        logger,
        pollIntervalMs: config.operator.pollIntervalMs,
      });
      notifier.start();
    } catch (err) {
      logger.error({ err }, "Failed to start operator bot");
    }
  } else if (config.operator.enabled) {
    logger.warn("Operator channel enabled without token or ownerId, skipping");
  }

  // 8. Start task worker and scheduler
  agent.worker.start();
  agent.scheduler.start();

  // 9. Graceful shutdown (use 'once' to avoid handler accumulation)
  let shutdownInProgress = false;
  const shutdown = async (): Promise<void> => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    // The worker can start manual ticks, so it goes first; both wait for work in flight.
    await agent.worker.stop();
    await agent.scheduler.stop();
    notifier?.stop();
    if (bot) {
      try {
        await bot.stop();
      } catch (err) {
        logger.error({ err }, "Error stopping operator bot");
      }
    }
    await healthServer?.stop();
    agent.db.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = (): void => {
    shutdown().catch((err) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info({ agent: agent.agentName() }, "tidepool agent started");
  return { agent, healthServer, bot, notifier, shutdown };
}
