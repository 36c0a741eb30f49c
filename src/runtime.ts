import { RuntimeLogWriter } from "./app/logging.js";
import { BotConfig } from "./config/bot-config.js";
import { PlaygroundApi } from "./playground/api.js";
import { ExecutionClient } from "./playground/execution.js";
import { SnippetLocator } from "./playground/locator.js";
import { PlaygroundFormatter, SnippetTransformer } from "./playground/transformer.js";
import { CommandDispatcher } from "./rooms/command/dispatcher.js";
import { createBuiltinRegistry } from "./rooms/command/handlers.js";
import type { CommandRegistry } from "./rooms/command/registry.js";
import type { IrcTransport } from "./rooms/irc/transport.js";

export interface GoplayRuntime {
  config: BotConfig;
  logger: RuntimeLogWriter;
  registry: CommandRegistry;
}

export interface CreateGoplayRuntimeOptions {
  config: BotConfig;
  /** Override logger (for tests). */
  logger?: RuntimeLogWriter;
  fetchImpl?: typeof fetch;
}

/** Build everything except the IRC connection; the registry is complete on return. */
export function createGoplayRuntime(options: CreateGoplayRuntimeOptions): GoplayRuntime {
  const { config } = options;
  const logging = config.getLoggingConfig();
  const runtimeLogger = options.logger ?? new RuntimeLogWriter({ logDir: logging.logDir, debug: logging.debug });

  const playgroundConfig = config.getPlaygroundConfig();
  const playground = new PlaygroundApi({
    baseUrl: playgroundConfig.baseUrl,
    timeoutMs: playgroundConfig.timeoutMs,
    fetchImpl: options.fetchImpl,
  });

  const registry = createBuiltinRegistry({
    transformer: new SnippetTransformer(new PlaygroundFormatter(playground)),
    executor: new ExecutionClient(playground, runtimeLogger.getLogger("goplay.playground.execution")),
    locator: new SnippetLocator(playground),
    logger: runtimeLogger.getLogger("goplay.rooms.command.handlers"),
  });

  runtimeLogger.getLogger("goplay.runtime").info(
    "Command registry ready",
    `commands=${registry.names().join(",")}`,
    `playground=${playground.baseUrl}`,
  );

  return { config, logger: runtimeLogger, registry };
}

export function createDispatcher(runtime: GoplayRuntime, transport: Pick<IrcTransport, "currentNick" | "sendLine">): CommandDispatcher {
  return new CommandDispatcher({
    registry: runtime.registry,
    commandPrefix: runtime.config.getCommandPrefix(),
    transport,
    logger: runtime.logger.getLogger("goplay.rooms.command.dispatcher"),
  });
}
