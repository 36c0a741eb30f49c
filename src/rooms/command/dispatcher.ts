/**
 * Command dispatcher: turns inbound IRC lines into command invocations.
 *
 * A line is addressed to the bot when it starts with the command prefix
 * (`~eval ...`) or with the bot's current nick (`goplay eval ...`). Anything
 * else is ordinary channel traffic and is dropped without a reply.
 *
 * Sequential commands are awaited before `dispatch` returns. Concurrent ones
 * are started and tracked only so shutdown can let them settle; the number
 * outstanding is not bounded.
 */

import { CONSOLE_LOGGER, type RuntimeLogger } from "../../app/logging.js";
import { errorMessage } from "../../errors.js";
import { escapeRegExp } from "../../utils/index.js";
import { splitNickUserHost, type IrcTransport } from "../irc/transport.js";
import { formatReply, type InboundLine, type ReplyContext, type ReplySender } from "../message.js";
import type { Command, CommandInvocation, CommandRegistry } from "./registry.js";

export interface ParsedCommand {
  commandName: string;
  argumentText: string;
}

export type DispatchOutcome = "ignored" | "completed" | "started";

export interface CommandDispatcherOptions {
  registry: CommandRegistry;
  commandPrefix: string;
  transport: Pick<IrcTransport, "currentNick" | "sendLine">;
  logger?: RuntimeLogger;
}

/**
 * Parse a line against the prefix and mention grammar, or return null when
 * the line is not addressed to `mynick`.
 */
export function parseCommandLine(text: string, commandPrefix: string, mynick: string): ParsedCommand | null {
  if (commandPrefix && text.startsWith(commandPrefix)) {
    return splitCommand(text.slice(commandPrefix.length));
  }

  if (mynick) {
    const mention = text.match(new RegExp(`^${escapeRegExp(mynick)}[:,]?\\s+([\\s\\S]*)$`));
    if (mention) {
      return splitCommand(mention[1]);
    }
  }

  return null;
}

function splitCommand(rest: string): ParsedCommand {
  const whitespace = rest.search(/\s/);
  if (whitespace < 0) {
    return { commandName: rest, argumentText: "" };
  }

  return {
    commandName: rest.slice(0, whitespace),
    argumentText: rest.slice(whitespace).replace(/^\s+/, ""),
  };
}

export class CommandDispatcher {
  private readonly registry: CommandRegistry;
  private readonly commandPrefix: string;
  private readonly transport: Pick<IrcTransport, "currentNick" | "sendLine">;
  private readonly logger: RuntimeLogger;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: CommandDispatcherOptions) {
    this.registry = options.registry;
    this.commandPrefix = options.commandPrefix;
    this.transport = options.transport;
    this.logger = options.logger ?? CONSOLE_LOGGER;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  async dispatch(line: InboundLine): Promise<DispatchOutcome> {
    const mynick = this.transport.currentNick();
    const parsed = parseCommandLine(line.text, this.commandPrefix, mynick);
    if (!parsed) {
      return "ignored";
    }

    const command = this.registry.get(parsed.commandName);
    if (!command) {
      this.logger.debug("Ignoring unknown command", `command=${parsed.commandName}`, `target=${line.target}`);
      return "ignored";
    }

    const senderNick = splitNickUserHost(line.sender).nick;
    const isPrivate = line.target === mynick;
    const invocation: CommandInvocation = {
      commandName: command.name,
      argumentText: parsed.argumentText,
      replyContext: {
        replyTarget: isPrivate ? senderNick : line.target,
        senderNick,
        isPrivate,
      },
      commandPrefix: this.commandPrefix,
      registry: this.registry,
    };

    this.logger.info(
      `Running command ${command.name} for user ${line.sender} in channel ${line.target} with args ${JSON.stringify(parsed.argumentText)}`,
    );

    const task = this.runHandler(command, invocation);
    if (command.concurrency === "sequential") {
      await task;
      return "completed";
    }

    const tracked: Promise<void> = task.finally(() => {
      this.inFlight.delete(tracked);
    });
    this.inFlight.add(tracked);
    return "started";
  }

  /** Wait for every concurrent invocation started so far to settle. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private readonly send: ReplySender = async (context: ReplyContext, template: string, ...args: unknown[]) => {
    const text = formatReply(template, args);
    const line = context.isPrivate ? text : `(${context.senderNick}) ${text}`;
    await this.transport.sendLine(context.replyTarget, line);
  };

  private async runHandler(command: Command, invocation: CommandInvocation): Promise<void> {
    const { replyContext } = invocation;
    try {
      await this.logger.withInvocationContext(
        { target: replyContext.replyTarget, nick: replyContext.senderNick },
        async () => await command.handler(invocation, this.send),
      );
    } catch (error) {
      this.logger.error(`Command ${command.name} failed`, error);
      try {
        await this.send(replyContext, "Error occurred: %s", errorMessage(error));
      } catch (replyError) {
        this.logger.warn(`Could not report failure of command ${command.name}`, replyError);
      }
    }
  }
}
