/**
 * Built-in commands: `eval`, `playrun`, `play` and `help`.
 *
 * Every handler sends exactly one reply and returns right after it, including
 * on failure paths.
 */

import { CONSOLE_LOGGER, type Logger } from "../../app/logging.js";
import { errorMessage } from "../../errors.js";
import type { ExecutionClient, ExecutionOutcome } from "../../playground/execution.js";
import type { SnippetLocator } from "../../playground/locator.js";
import { renderCompileErrors, renderRun, withShareLink } from "../../playground/render.js";
import type { SnippetTransformer } from "../../playground/transformer.js";
import type { ReplyContext, ReplySender } from "../message.js";
import { CommandRegistry, type Command, type CommandHandler } from "./registry.js";

export interface BuiltinCommandDeps {
  transformer: Pick<SnippetTransformer, "transform">;
  executor: Pick<ExecutionClient, "run">;
  locator: Pick<SnippetLocator, "locate">;
  logger?: Logger;
}

const EMPTY_REFERENCE_MESSAGE = "Cannot parse an empty link / URL";

export function createBuiltinCommands(deps: BuiltinCommandDeps): Command[] {
  const logger = deps.logger ?? CONSOLE_LOGGER;

  const evalCommand: CommandHandler = async ({ argumentText, replyContext }, send) => {
    if (argumentText.trim() === "") {
      await send(replyContext, "Cannot eval empty code");
      return;
    }

    let outcome: ExecutionOutcome;
    try {
      const source = await deps.transformer.transform(argumentText, { wrapBody: true });
      outcome = await deps.executor.run(source, { requestShareLink: true });
    } catch (error) {
      logger.warn("Error while sending request", error);
      await send(replyContext, "Error occurred: %s", errorMessage(error));
      return;
    }

    const { result, shareLink } = outcome;
    if (result.compileErrors) {
      logger.info("Compile failed", result.compileErrors.trim());
      await send(replyContext, renderCompileErrors(result.compileErrors));
      return;
    }

    logger.info(`Completed successfully: ${shareLink ?? "(no share link)"}`);
    await send(replyContext, withShareLink(renderRun(result), shareLink));
  };

  const playRunCommand: CommandHandler = async ({ argumentText, replyContext }, send) => {
    const outcome = await locateAndRun(argumentText, replyContext, send);
    if (!outcome) {
      return;
    }

    await send(
      replyContext,
      renderRun(outcome.result, { compileErrorLabel: "Compile failed! ", outputLabel: "Complete: " }),
    );
  };

  const playCommand: CommandHandler = async ({ argumentText, replyContext }, send) => {
    const outcome = await locateAndRun(argumentText, replyContext, send);
    if (!outcome) {
      return;
    }

    const { compileErrors, vetErrors } = outcome.result;
    const errors = compileErrors || vetErrors;
    if (errors) {
      await send(replyContext, renderCompileErrors(errors, "Errors: "));
      return;
    }

    await send(replyContext, "No errors in file");
  };

  /** Fetch the referenced snippet and run it as-is; replies and returns null on failure. */
  async function locateAndRun(
    reference: string,
    replyContext: ReplyContext,
    send: ReplySender,
  ): Promise<ExecutionOutcome | null> {
    const trimmed = reference.trim();
    if (!trimmed) {
      await send(replyContext, EMPTY_REFERENCE_MESSAGE);
      return null;
    }

    let source: string;
    try {
      source = await deps.locator.locate(trimmed);
    } catch (error) {
      logger.warn("Unable to get snippet", error);
      await send(replyContext, "Unable to get snippet: %s", errorMessage(error));
      return null;
    }

    try {
      return await deps.executor.run(source);
    } catch (error) {
      logger.warn("Unable to start compile", error);
      await send(replyContext, "Unable to start compile: %s", errorMessage(error));
      return null;
    }
  }

  const helpCommand: CommandHandler = async ({ argumentText, replyContext, registry, commandPrefix }, send) => {
    await send(replyContext, describeHelp(registry, commandPrefix, argumentText.trim()));
  };

  return [
    {
      name: "eval",
      concurrency: "concurrent",
      handler: evalCommand,
      help: "Evaluates the given go string. Imports are automatically resolved (stdlib only)",
    },
    {
      name: "playrun",
      concurrency: "concurrent",
      handler: playRunCommand,
      help: "Runs the given play link, returning errors and output (if any)",
    },
    {
      name: "play",
      concurrency: "concurrent",
      handler: playCommand,
      help: "Lists any errors the given play link may have",
    },
    {
      name: "help",
      concurrency: "sequential",
      handler: helpCommand,
      help: "This output.",
    },
  ];
}

export function describeHelp(registry: CommandRegistry, commandPrefix: string, commandName: string): string {
  if (!commandName) {
    return `Available Commands (use ${commandPrefix}help $cmd for more info): ${registry.names().join(", ")}`;
  }

  const command = registry.get(commandName);
  if (!command) {
    return `Unknown command ${JSON.stringify(commandName)}`;
  }

  return `Help for ${JSON.stringify(command.name)}: ${command.help}`;
}

export function createBuiltinRegistry(deps: BuiltinCommandDeps): CommandRegistry {
  return new CommandRegistry(createBuiltinCommands(deps));
}
