import { Telegraf } from "telegraf";
import type { TravelGateway } from "@wayfarer/core";
import type { Logger } from "@wayfarer/types";
import { ChatSessions } from "./chat-sessions.js";
import { HELP_TEXT, formatMode, formatSessionSummary } from "./replies.js";

/** Telegram front end. One active travel session per chat. */
export function createBot(token: string, gateway: TravelGateway, log: Logger): Telegraf {
  const bot = new Telegraf(token);
  const chats = new ChatSessions();

  bot.start(async (ctx) => {
    const state = chats.startNew(ctx.chat.id);
    await ctx.reply(`${HELP_TEXT}\n\n${formatMode(state)}`);
  });

  bot.help((ctx) => ctx.reply(HELP_TEXT));

  bot.command("new", async (ctx) => {
    await ctx.reply(formatMode(chats.startNew(ctx.chat.id)));
  });

  bot.command("followup", async (ctx) => {
    await ctx.reply(formatMode(chats.toggleFollowup(ctx.chat.id)));
  });

  bot.command("load", async (ctx) => {
    const sessionId = ctx.payload.trim();
    if (!sessionId) {
      await ctx.reply("Usage: /load <session id>");
      return;
    }
    const lookup = gateway.getSession(sessionId);
    if (!lookup.ok) {
      await ctx.reply(lookup.error.message);
      return;
    }
    await ctx.reply(formatMode(chats.load(ctx.chat.id, sessionId)));
  });

  bot.command("session", async (ctx) => {
    const lookup = gateway.getSession(chats.current(ctx.chat.id).sessionId);
    await ctx.reply(lookup.ok ? formatSessionSummary(lookup.session) : lookup.error.message);
  });

  bot.command("clear", async (ctx) => {
    const { sessionId } = chats.current(ctx.chat.id);
    const deleted = gateway.deleteSession(sessionId);
    chats.forget(ctx.chat.id);
    await ctx.reply(deleted ? `Session ${sessionId} deleted.` : `Session ${sessionId} had nothing stored.`);
  });

  bot.on("text", async (ctx) => {
    const state = chats.current(ctx.chat.id);
    log.info("Message received", { chatId: ctx.chat.id, sessionId: state.sessionId, followup: state.followup });

    await ctx.sendChatAction("typing");
    const response = await gateway.handleMessage({
      sessionId: state.sessionId,
      message: ctx.message.text,
      isFollowup: state.followup,
    });
    await ctx.reply(response.response);
  });

  bot.catch((err, ctx) => {
    log.error("Bot update failed", {
      updateId: ctx.update.update_id,
      error: err instanceof Error ? err.message : String(err),
    });
  });

  return bot;
}
