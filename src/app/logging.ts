import { AsyncLocalStorage } from "node:async_hooks";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { inspect } from "node:util";

type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export interface InvocationLogContext {
  target: string;
  nick: string;
}

/** The part of a logger that components log through. */
export interface Logger {
  debug(message: string, ...data: unknown[]): void;
  info(message: string, ...data: unknown[]): void;
  warn(message: string, ...data: unknown[]): void;
  error(message: string, ...data: unknown[]): void;
}

export interface RuntimeLogger extends Logger {
  withInvocationContext<T>(context: InvocationLogContext, run: () => Promise<T> | T): Promise<T>;
}

export interface RuntimeLogWriterOptions {
  /** Directory for `<date>/system.log` files; stdout only when omitted. */
  logDir?: string;
  /** Echo DEBUG lines to stdout. */
  debug?: boolean;
  nowProvider?: () => Date;
  stdout?: Pick<NodeJS.WriteStream, "write">;
}

const invocationContextStorage = new AsyncLocalStorage<InvocationLogContext>();

export class RuntimeLogWriter {
  private readonly nowProvider: () => Date;
  private readonly stdout: Pick<NodeJS.WriteStream, "write">;

  constructor(private readonly options: RuntimeLogWriterOptions = {}) {
    this.nowProvider = options.nowProvider ?? (() => new Date());
    this.stdout = options.stdout ?? process.stdout;
  }

  getLogger(name: string): RuntimeLogger {
    return new StructuredRuntimeLogger(name, this);
  }

  write(level: LogLevel, loggerName: string, message: string, data: unknown[]): void {
    const now = this.nowProvider();
    const context = invocationContextStorage.getStore();
    const contextTag = context ? `[${context.target} ${context.nick}] ` : "";
    const renderedMessage = renderMessage(message, data);
    const line = `${formatTimestamp(now)} - ${loggerName} - ${level} - ${contextTag}${renderedMessage}\n`;

    if (level !== "DEBUG" || this.options.debug) {
      this.stdout.write(line);
    }

    const path = this.getSystemLogPath(now);
    if (path) {
      mkdirSync(dirname(path), { recursive: true });
      appendFileSync(path, line, { encoding: "utf-8" });
    }
  }

  async withInvocationContext<T>(context: InvocationLogContext, run: () => Promise<T> | T): Promise<T> {
    return await invocationContextStorage.run(context, async () => await run());
  }

  getSystemLogPath(now: Date = this.nowProvider()): string | null {
    if (!this.options.logDir) {
      return null;
    }
    const date = now.toISOString().slice(0, 10);
    return join(this.options.logDir, date, "system.log");
  }
}

class StructuredRuntimeLogger implements RuntimeLogger {
  constructor(
    private readonly name: string,
    private readonly writer: RuntimeLogWriter,
  ) {}

  debug(message: string, ...data: unknown[]): void {
    this.writer.write("DEBUG", this.name, message, data);
  }

  info(message: string, ...data: unknown[]): void {
    this.writer.write("INFO", this.name, message, data);
  }

  warn(message: string, ...data: unknown[]): void {
    this.writer.write("WARNING", this.name, message, data);
  }

  error(message: string, ...data: unknown[]): void {
    this.writer.write("ERROR", this.name, message, data);
  }

  async withInvocationContext<T>(context: InvocationLogContext, run: () => Promise<T> | T): Promise<T> {
    return await this.writer.withInvocationContext(context, run);
  }
}

export function createConsoleLogger(name: string): RuntimeLogger {
  return {
    debug: (message: string, ...data: unknown[]) => {
      console.debug(`${name} - ${message}`, ...data);
    },
    info: (message: string, ...data: unknown[]) => {
      console.info(`${name} - ${message}`, ...data);
    },
    warn: (message: string, ...data: unknown[]) => {
      console.warn(`${name} - ${message}`, ...data);
    },
    error: (message: string, ...data: unknown[]) => {
      console.error(`${name} - ${message}`, ...data);
    },
    withInvocationContext: async <T>(_context: InvocationLogContext, run: () => Promise<T> | T): Promise<T> => {
      return await run();
    },
  };
}

export const CONSOLE_LOGGER: RuntimeLogger = createConsoleLogger("goplay");

function renderMessage(message: string, data: unknown[]): string {
  if (data.length === 0) {
    return message;
  }

  return `${message} ${data.map((value) => serializeLogValue(value)).join(" ")}`;
}

function serializeLogValue(value: unknown): string {
  if (value instanceof Error) {
    return value.stack ?? `${value.name}: ${value.message}`;
  }

  if (typeof value === "string") {
    return value;
  }

  return inspect(value, {
    depth: 8,
    breakLength: Infinity,
    compact: true,
  });
}

function formatTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = pad(date.getMonth() + 1, 2);
  const day = pad(date.getDate(), 2);
  const hour = pad(date.getHours(), 2);
  const minute = pad(date.getMinutes(), 2);
  const second = pad(date.getSeconds(), 2);
  const millis = pad(date.getMilliseconds(), 3);
  return `${year}-${month}-${day} ${hour}:${minute}:${second},${millis}`;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}
