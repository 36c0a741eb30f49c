import { CONSOLE_LOGGER, type Logger } from "../../app/logging.js";
import { AsyncQueue } from "../../utils/async-queue.js";
import type { DispatchOutcome } from "../command/dispatcher.js";
import type { InboundLine } from "../message.js";
import type { IrcTransport } from "./transport.js";

interface DispatcherLike {
  dispatch(line: InboundLine): Promise<DispatchOutcome>;
  drain(): Promise<void>;
}

export interface IrcRoomMonitorOptions {
  transport: IrcTransport;
  dispatcher: DispatcherLike;
  logger?: Logger;
}

/**
 * Reads inbound lines in arrival order and hands each to the dispatcher.
 * A sequential command holds the loop until it returns; concurrent ones do
 * not.
 */
export class IrcRoomMonitor {
  private readonly transport: IrcTransport;
  private readonly dispatcher: DispatcherLike;
  private readonly logger: Logger;
  private readonly inbound = new AsyncQueue<InboundLine>();

  constructor(options: IrcRoomMonitorOptions) {
    this.transport = options.transport;
    this.dispatcher = options.dispatcher;
    this.logger = options.logger ?? CONSOLE_LOGGER;

    this.transport.onMessage((line) => {
      this.inbound.push(line);
    });
    this.transport.onClose(() => {
      this.logger.warn("IRC connection closed.");
      this.inbound.close();
    });
  }

  /** Connect and process lines until `stop()` or the connection is lost. */
  async run(): Promise<void> {
    this.logger.info("Connecting....");
    await this.transport.connect();
    this.logger.info("Connected!");

    while (true) {
      const line = await this.inbound.shift();
      if (line === null) {
        break;
      }

      try {
        await this.dispatcher.dispatch(line);
      } catch (error) {
        this.logger.error("IRC monitor failed to process line; continuing", error);
      }
    }

    await this.dispatcher.drain();
    await this.transport.disconnect();
    this.logger.info("IRC monitor stopped.");
  }

  stop(): void {
    this.inbound.close();
  }
}
