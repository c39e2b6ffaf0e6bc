import { ConfigError, describeError } from "@quakewatch/core";
import { describeConfig, loadConfig, type AppConfig } from "./config.js";
import { startHealthServer, type HealthServer } from "./health.js";
import { init } from "./index.js";
import { createFileLogger } from "./logger.js";

function readConfig(): AppConfig | null {
  try {
    return loadConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    for (const issue of err.issues) console.error(`quakewatch: ${issue}`);
    console.error("quakewatch: configuration invalid, exiting");
    return null;
  }
}

async function main(): Promise<number> {
  const config = readConfig();
  if (!config) return 1;

  const logger = createFileLogger({
    logDir: config.logDir,
    maxSizeBytes: config.maxLogSizeBytes,
    backupCount: config.logBackupCount,
  });

  const supervisor = init({ config, logger });
  logger.info(`quakewatch: started (${describeConfig(config)})`);

  let health: HealthServer;
  try {
    health = await startHealthServer(config.healthPort);
  } catch (err) {
    supervisor.stop();
    throw err;
  }
  logger.info(`quakewatch: health endpoint on :${health.port}/health`);

  const stop = (signal: NodeJS.Signals) => {
    logger.info(`quakewatch: received ${signal}, shutting down`);
    supervisor.stop();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  process.on("SIGUSR1", () => {
    logger.info(`quakewatch: monitoring ${supervisor.toggle()}`);
  });
  process.on("SIGUSR2", () => {
    supervisor.triggerTest();
  });

  await supervisor.waitForStop();
  for (const feed of supervisor.getStatus().connectors) {
    const last = feed.lastMessageAt === null ? "never" : new Date(feed.lastMessageAt).toISOString();
    logger.info(`quakewatch: ${feed.name}: ${feed.messages} message(s), last at ${last}`);
  }
  await health.close();
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`quakewatch: fatal: ${describeError(err)}`);
    process.exitCode = 1;
  },
);
