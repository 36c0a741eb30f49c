import { readFileSync } from "node:fs";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError, errorMessage } from "../errors.js";
import { resolveConfigRelativePath } from "./paths.js";

// ── snake_case → camelCase recursive key transform ─────────────────────

function camelCaseKey(key: string): string {
  return key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
}

function camelCaseKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(camelCaseKeys);
  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [camelCaseKey(k), camelCaseKeys(v)]),
    );
  }
  return value;
}

// ── Settings schema (camelCase) ────────────────────────────────────────

const PlaygroundSettingsSchema = Type.Object({
  baseUrl: Type.Optional(Type.String({ minLength: 1 })),
  timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
});

const BotSettingsSchema = Type.Object({
  nick: Type.String({ minLength: 1 }),
  user: Type.Optional(Type.String()),
  realName: Type.Optional(Type.String()),
  saslUser: Type.Optional(Type.String()),
  saslPassword: Type.Optional(Type.String()),
  server: Type.String({ minLength: 1 }),
  useTls: Type.Optional(Type.Boolean()),
  commandPrefix: Type.String({ minLength: 1 }),
  joinChannels: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  debug: Type.Optional(Type.Boolean()),
  playground: Type.Optional(PlaygroundSettingsSchema),
  logDir: Type.Optional(Type.String({ minLength: 1 })),
});

type BotSettings = Static<typeof BotSettingsSchema>;

// ── Resolved views ─────────────────────────────────────────────────────

export interface IrcConnectionConfig {
  host: string;
  port: number;
  tls: boolean;
  nick: string;
  user: string;
  realName: string;
  sasl: { user: string; password: string } | null;
  channels: readonly string[];
  debug: boolean;
}

export interface PlaygroundConfig {
  baseUrl: string;
  timeoutMs: number;
}

export interface LoggingConfig {
  logDir?: string;
  debug: boolean;
}

export const DEFAULT_PLAYGROUND_URL = "https://play.golang.org";
export const DEFAULT_PLAYGROUND_TIMEOUT_MS = 30_000;

const DEFAULT_TLS_PORT = 6697;
const DEFAULT_PLAIN_PORT = 6667;

// ── BotConfig ──────────────────────────────────────────────────────────

export class BotConfig {
  private readonly data: Readonly<BotSettings>;

  private constructor(
    data: BotSettings,
    private readonly sourcePath: string | null,
  ) {
    this.data = Object.freeze(data);
  }

  static load(path: string): BotConfig {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new ConfigError(`Could not read config file at ${path}: ${errorMessage(error)}`, { cause: error });
    }
    return new BotConfig(parseSettings(raw, path), path);
  }

  /** Build from an already-parsed object with snake_case keys (tests, embedding). */
  static fromObject(raw: Record<string, unknown>): BotConfig {
    return new BotConfig(parseSettings(raw, "<in-memory>"), null);
  }

  getCommandPrefix(): string {
    return this.data.commandPrefix;
  }

  getIrcConfig(): IrcConnectionConfig {
    const tls = this.data.useTls ?? false;
    const { host, port } = parseServerAddress(this.data.server, tls ? DEFAULT_TLS_PORT : DEFAULT_PLAIN_PORT);
    const saslUser = this.data.saslUser ?? "";
    const saslPassword = this.data.saslPassword ?? "";

    return {
      host,
      port,
      tls,
      nick: this.data.nick,
      user: this.data.user || this.data.nick,
      realName: this.data.realName || this.data.nick,
      sasl: saslUser && saslPassword ? { user: saslUser, password: saslPassword } : null,
      channels: [...(this.data.joinChannels ?? [])],
      debug: this.data.debug ?? false,
    };
  }

  getPlaygroundConfig(): PlaygroundConfig {
    const playground = this.data.playground ?? {};
    return {
      baseUrl: (playground.baseUrl ?? DEFAULT_PLAYGROUND_URL).replace(/\/+$/, ""),
      timeoutMs: playground.timeoutMs ?? DEFAULT_PLAYGROUND_TIMEOUT_MS,
    };
  }

  getLoggingConfig(): LoggingConfig {
    const logDir = this.data.logDir;
    return {
      logDir: logDir && this.sourcePath ? resolveConfigRelativePath(logDir, this.sourcePath) : logDir,
      debug: this.data.debug ?? false,
    };
  }
}

function parseSettings(raw: unknown, origin: string): BotSettings {
  const settings = camelCaseKeys(raw);
  if (Value.Check(BotSettingsSchema, settings)) {
    return settings;
  }

  const first = Value.Errors(BotSettingsSchema, settings).First();
  const where = first?.path ? ` at ${first.path}` : "";
  throw new ConfigError(`Invalid config (${origin})${where}: ${first?.message ?? "unknown error"}`);
}

export function parseServerAddress(server: string, defaultPort: number): { host: string; port: number } {
  const match = server.trim().match(/^(?<host>[^:\s]+)(?::(?<port>\d+))?$/);
  if (!match?.groups) {
    throw new ConfigError(`Invalid server address '${server}', expected host[:port]`);
  }

  const port = match.groups.port ? Number(match.groups.port) : defaultPort;
  if (port < 1 || port > 65_535) {
    throw new ConfigError(`Invalid server port in '${server}'`);
  }

  return { host: match.groups.host, port };
}
