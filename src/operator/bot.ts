import { Bot, type Context } from "grammy";
import type { Logger } from "../logging/logger.js";
import type { OperatorCommands } from "./commands.js";

export interface OperatorBotDeps {
  token: string;
  ownerId: number;
  commands: OperatorCommands;
  logger: Logger;
}

const MAX_MESSAGE_LENGTH = 4096;

/** Telegram front-end for the operator. Updates from anyone but the owner are dropped. */
export class OperatorBot {
  private readonly bot: Bot;
  private readonly ownerId: number;
  private readonly logger: Logger;

  constructor(deps: OperatorBotDeps) {
    this.bot = new Bot(deps.token);
    this.ownerId = deps.ownerId;
    this.logger = deps.logger;
    const { commands } = deps;

    this.bot.use(async (ctx, next) => {
      if (ctx.from?.id !== this.ownerId) {
        this.logger.warn({ from: ctx.from?.id }, "Ignoring update from non-owner");
        return;
      }
      await next();
    });

    const reply = (ctx: Context, text: string): Promise<unknown> =>
      ctx.reply(text.slice(0, MAX_MESSAGE_LENGTH));

    this.bot.command(["start", "help"], (ctx) => reply(ctx, commands.help()));
    this.bot.command("status", (ctx) => reply(ctx, commands.status()));
    this.bot.command("pause", (ctx) => reply(ctx, commands.pause()));
    this.bot.command("resume", (ctx) => reply(ctx, commands.resume()));
    this.bot.command("ask", (ctx) => reply(ctx, commands.ask(ctx.match)));
    this.bot.command("reflect", (ctx) => reply(ctx, commands.reflect()));
    this.bot.command("heartbeat", (ctx) => reply(ctx, commands.heartbeat()));
    this.bot.command("strategy", (ctx) => reply(ctx, commands.strategy()));
    this.bot.command("dm_reply", async (ctx) => reply(ctx, await commands.dmReply(ctx.match)));

    this.bot.catch((err) => {
      this.logger.error({ err: err.error }, "Operator command failed");
      err.ctx.reply("Command failed, see logs.").catch((replyErr: unknown) => {
        this.logger.debug({ err: replyErr }, "Could not report command failure");
      });
    });
  }

  async start(): Promise<void> {
    await this.bot.api.getMe();
    // bot.start() resolves only when polling stops
    this.bot.start({ drop_pending_updates: true }).catch((err) => {
      this.logger.error({ err }, "Operator bot polling stopped");
    });
    this.logger.info({ ownerId: this.ownerId }, "Operator bot started");
  }

  async stop(): Promise<void> {
    await this.bot.stop();
  }

  /** Sends a message to the owner's private chat. */
  async send(text: string): Promise<void> {
    await this.bot.api.sendMessage(this.ownerId, text.slice(0, MAX_MESSAGE_LENGTH));
  }
}
