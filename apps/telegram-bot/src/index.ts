import { TravelGateway, createLogger, loadAppConfig } from "@wayfarer/core";
import { createBot } from "./bot.js";

const config = loadAppConfig(process.env.WAYFARER_CONFIG ?? "wayfarer.config.yaml");
const log = createLogger("telegram", config.logLevel);

const token = config.telegram.botToken;
if (!token) {
  log.error("BOT_TOKEN is missing");
  process.exit(1);
}

const gateway = new TravelGateway({ config, logger: log.child("gateway") });
await gateway.start();

const bot = createBot(token, gateway, log);

async function shutdown(signal: string): Promise<void> {
  log.info("Shutting down", { signal });
  bot.stop(signal);
  await gateway.stop();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
      process.exitCode = 1;
    });
  });
}

log.info("Telegram bot ready");
await bot.launch();
