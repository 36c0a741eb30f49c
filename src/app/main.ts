#!/usr/bin/env node
import { pathToFileURL } from "node:url";

import { BotConfig } from "../config/bot-config.js";
import { getConfigPath } from "../config/paths.js";
import { errorMessage } from "../errors.js";
import { IrcRoomMonitor } from "../rooms/irc/monitor.js";
import { MatrixIrcTransport, type IrcTransport } from "../rooms/irc/transport.js";
import { createDispatcher, createGoplayRuntime } from "../runtime.js";
import { CONSOLE_LOGGER } from "./logging.js";

export interface RunGoplayMainOptions {
  env?: NodeJS.ProcessEnv;
  /** Override the IRC connection (for tests). */
  createTransport?: (config: BotConfig) => IrcTransport;
  /** Receives the `stop` hook; defaults to SIGINT/SIGTERM. */
  onStopSignal?: (stop: () => void) => void;
}

export async function runGoplayMain(options: RunGoplayMainOptions = {}): Promise<void> {
  const configPath = getConfigPath(options.env ?? process.env);
  const config = BotConfig.load(configPath);

  const runtime = createGoplayRuntime({ config });
  const logger = runtime.logger.getLogger("goplay.app.main");
  logger.info("Starting goplay bot", `config=${configPath}`);

  const transport = options.createTransport?.(config)
    ?? new MatrixIrcTransport(config.getIrcConfig(), runtime.logger.getLogger("goplay.rooms.irc.transport"));

  const monitor = new IrcRoomMonitor({
    transport,
    dispatcher: createDispatcher(runtime, transport),
    logger: runtime.logger.getLogger("goplay.rooms.irc.monitor"),
  });

  const registerStop = options.onStopSignal ?? registerSignalHandlers;
  registerStop(() => {
    logger.info("Stop requested; finishing in-flight commands");
    monitor.stop();
  });

  await monitor.run();
}

function registerSignalHandlers(stop: () => void): void {
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
}

if (isExecutedAsMain()) {
  try {
    await runGoplayMain();
  } catch (error) {
    CONSOLE_LOGGER.error(`Fatal: ${errorMessage(error)}`);
    process.exit(1);
  }
}

function isExecutedAsMain(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  return import.meta.url === pathToFileURL(entry).href;
}
