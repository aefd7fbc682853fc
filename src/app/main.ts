import "dotenv/config";
import chalk from "chalk";
import { createPolymarketOrderClient } from "../clob/polymarket-order-client";
import { loadEnv } from "../config/env";
import { describeTradingConfig, loadMarketMap, loadTradingConfig } from "../config/loadConfig";
import { ConfigurationError, ExchangeUnavailableError } from "../errors/app.errors";
import { JsonlEventLogger, sessionLogPath } from "../infra/persistence/event-log";
import { toError } from "../lib/error-handling";
import { ConsoleLogger } from "../utils/logger.util";
import { TradingBot } from "./bot";
import { KeyCommandRouter, attachKeyboard } from "./keyboard";

const logger = new ConsoleLogger();

async function main(): Promise<void> {
  console.log(chalk.cyan("Initializing trading bot..."));

  const env = loadEnv();
  const config = loadTradingConfig();
  const market = await loadMarketMap();

  console.log(`  Market: ${market.eventTitle}`);
  for (const line of describeTradingConfig(config)) {
    console.log(`  ${line}`);
  }

  const client = await createPolymarketOrderClient({
    privateKey: env.privateKey,
    rpcUrl: env.rpcUrl,
    host: env.clobHost,
    apiKey: env.polymarketApiKey,
    apiSecret: env.polymarketApiSecret,
    apiPassphrase: env.polymarketApiPassphrase,
    signatureType: env.signatureType,
    funderAddress: env.funderAddress,
    logger,
  });

  const events = new JsonlEventLogger(sessionLogPath(process.cwd()), logger);
  logger.info(`[Bot] Session log: ${events.filePath}`);

  const bot = new TradingBot({ config, market, client, events, logger });
  console.log(chalk.green("Initialization complete."));

  let detachKeyboard: (() => void) | null = null;
  let shuttingDown = false;

  const shutdown = (reason: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.debug(`[Shutdown] ${reason}`);
    detachKeyboard?.();
    bot
      .stop()
      .then(() => {
        for (const line of bot.sessionSummary()) console.log(line);
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error("[Shutdown] Cleanup failed", toError(err));
        process.exit(1);
      });
  };

  const router = new KeyCommandRouter({
    enterManual: (direction) => bot.run(() => bot.enterManual(direction), `Buy ${direction}`),
    toggleAutoSignals: () => bot.toggleAutoSignals(),
    showExitMenu: () => bot.showExitMenu(),
    exitPosition: (positionId) => bot.exitPosition(positionId),
    showStatus: () => bot.run(() => bot.showStatus(), "Status"),
    quit: () => shutdown("quit key"),
    print: (line) => console.log(line),
  });

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await bot.start();
  detachKeyboard = attachKeyboard(router);
}

process.on("unhandledRejection", (reason) => {
  logger.error("[UnhandledRejection] Unhandled promise rejection", toError(reason));
});

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(chalk.red(`Configuration error: ${err.message}`));
  } else if (err instanceof ExchangeUnavailableError) {
    console.error(chalk.red(`Exchange unavailable (${err.endpoint}): ${err.message}`));
  } else {
    logger.error("Fatal error in main()", toError(err));
  }
  process.exit(1);
});
