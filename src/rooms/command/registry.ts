import type { ReplyContext, ReplySender } from "../message.js";

/**
 * `sequential` handlers are awaited before the next inbound line is read;
 * `concurrent` ones are started and left running.
 */
export type ConcurrencyPolicy = "sequential" | "concurrent";

export interface CommandInvocation {
  commandName: string;
  argumentText: string;
  replyContext: ReplyContext;
  commandPrefix: string;
  registry: CommandRegistry;
}

export type CommandHandler = (invocation: CommandInvocation, send: ReplySender) => Promise<void>;

export interface Command {
  readonly name: string;
  readonly help: string;
  readonly concurrency: ConcurrencyPolicy;
  readonly handler: CommandHandler;
}

export class CommandRegistry {
  private readonly commands: ReadonlyMap<string, Command>;

  constructor(commands: Iterable<Command>) {
    const byName = new Map<string, Command>();
    for (const command of commands) {
      if (!command.name || /\s/.test(command.name)) {
        throw new Error(`Invalid command name '${command.name}'`);
      }
      if (byName.has(command.name)) {
        throw new Error(`Duplicate command '${command.name}'`);
      }
      byName.set(command.name, Object.freeze({ ...command }));
    }
    this.commands = byName;
  }

  get(name: string): Command | undefined {
    return this.commands.get(name);
  }

  /** Command names in registration order. */
  names(): string[] {
    return [...this.commands.keys()];
  }

  get size(): number {
    return this.commands.size;
  }
}
