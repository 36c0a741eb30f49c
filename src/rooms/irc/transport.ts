import { Client } from "matrix-org-irc";

import { CONSOLE_LOGGER, type Logger } from "../../app/logging.js";
import type { IrcConnectionConfig } from "../../config/bot-config.js";
import type { InboundLine } from "../message.js";

/** What the command core needs from an IRC connection. */
export interface IrcTransport {
  /** Resolves once the server has registered us; rejects if the client gives up first. */
  connect(): Promise<void>;
  disconnect(reason?: string): Promise<void>;
  onMessage(listener: (line: InboundLine) => void): void;
  /** Called when the connection is gone for good. */
  onClose(listener: () => void): void;
  /** Sends exactly one PRIVMSG line; newlines are folded and overlong text is trimmed. */
  sendLine(target: string, text: string): Promise<void>;
  currentNick(): string;
}

export interface NickUserHost {
  nick: string;
  user: string;
  host: string;
}

export function splitNickUserHost(prefix: string): NickUserHost {
  const bang = prefix.indexOf("!");
  const at = prefix.indexOf("@", bang + 1);

  if (bang < 0) {
    return at < 0
      ? { nick: prefix, user: "", host: "" }
      : { nick: prefix.slice(0, at), user: "", host: prefix.slice(at + 1) };
  }

  if (at < 0) {
    return { nick: prefix.slice(0, bang), user: prefix.slice(bang + 1), host: "" };
  }

  return {
    nick: prefix.slice(0, bang),
    user: prefix.slice(bang + 1, at),
    host: prefix.slice(at + 1),
  };
}

export function calculateIrcMaxPayload(target: string, safetyMargin = 60): number {
  const targetBytes = Buffer.byteLength(target, "utf-8");
  return Math.max(1, 512 - 12 - targetBytes - safetyMargin);
}

export function trimToPayloadWithEllipsis(message: string, maxPayload: number): string {
  if (Buffer.byteLength(message, "utf-8") <= maxPayload) {
    return message;
  }

  const ellipsis = "...";
  const effectivePayload = maxPayload - Buffer.byteLength(ellipsis, "utf-8");

  const chars = Array.from(message);
  let bytes = 0;
  let end = 0;
  for (let i = 0; i < chars.length; i += 1) {
    const nextBytes = bytes + Buffer.byteLength(chars[i], "utf-8");
    if (nextBytes > effectivePayload) {
      break;
    }
    bytes = nextBytes;
    end = i + 1;
  }

  return `${chars.slice(0, end).join("")}${ellipsis}`;
}

/** Fold a reply into a single IRC line that fits the target's payload budget. */
export function toSingleIrcLine(target: string, text: string): string {
  const folded = text.replace(/\r?\n/g, "; ").trim();
  return trimToPayloadWithEllipsis(folded || text.trim(), calculateIrcMaxPayload(target));
}

/**
 * Build the `matrix-org-irc` client for a connection config. The client
 * authenticates SASL PLAIN as its user name, so the SASL account takes that
 * slot when configured.
 */
export function createIrcClient(config: IrcConnectionConfig): Client {
  return new Client(config.host, config.nick, {
    port: config.port,
    secure: config.tls,
    userName: config.sasl?.user ?? config.user,
    realName: config.realName,
    sasl: config.sasl !== null,
    password: config.sasl?.password,
    channels: [...config.channels],
    autoConnect: false,
    retryCount: 5,
    retryDelay: 2_000,
    stripColors: false,
    debug: config.debug,
  });
}

export class MatrixIrcTransport implements IrcTransport {
  private readonly client: Client;

  constructor(
    config: IrcConnectionConfig,
    private readonly logger: Logger = CONSOLE_LOGGER,
    client?: Client,
  ) {
    this.client = client ?? createIrcClient(config);

    // Error numerics (401, 404, ...) are emitted as "error".
    this.client.on("error", (message) => {
      this.logger.warn("IRC server error", message.command, message.args);
    });
    this.client.on("netError", (error) => {
      this.logger.warn("IRC network error", error);
    });
    this.client.on("registered", () => {
      this.logger.info("Registered with IRC server", `nick=${this.client.nick}`);
    });
  }

  async connect(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        reject(new Error("IRC connection aborted after exhausting retries"));
      };

      this.client.once("abort", onAbort);
      this.client.connect(() => {
        this.client.removeListener("abort", onAbort);
        resolve();
      });
    });
  }

  async disconnect(reason = "Shutting down"): Promise<void> {
    await new Promise<void>((resolve) => {
      this.client.disconnect(reason, () => resolve());
    });
  }

  onMessage(listener: (line: InboundLine) => void): void {
    this.client.on("message", (from, to, text, message) => {
      listener({ target: to, sender: message.prefix ?? from, text });
    });
  }

  onClose(listener: () => void): void {
    this.client.on("abort", () => listener());
  }

  async sendLine(target: string, text: string): Promise<void> {
    await this.client.say(target, toSingleIrcLine(target, text));
  }

  currentNick(): string {
    return this.client.nick;
  }
}
