import { describe, expect, it, vi } from "vitest";

import type { DispatchOutcome } from "../src/rooms/command/dispatcher.js";
import { IrcRoomMonitor } from "../src/rooms/irc/monitor.js";
import type { InboundLine } from "../src/rooms/message.js";
import { FakeTransport, createDeferred, createTestLogWriter } from "./test-helpers.js";

function line(text: string): InboundLine {
  return { target: "#go", sender: "alice!a@host", text };
}

function createMonitor(dispatch: (line: InboundLine) => Promise<DispatchOutcome>, lines: string[] = []) {
  const transport = new FakeTransport();
  const dispatcher = {
    dispatch: vi.fn(dispatch),
    drain: vi.fn(async () => {}),
  };
  const monitor = new IrcRoomMonitor({
    transport,
    dispatcher,
    logger: createTestLogWriter(lines).getLogger("goplay.rooms.irc.monitor"),
  });
  return { transport, dispatcher, monitor };
}

function dispatchedTexts(dispatch: { mock: { calls: Array<[InboundLine]> } }): string[] {
  return dispatch.mock.calls.map(([inbound]) => inbound.text);
}

describe("IrcRoomMonitor", () => {
  it("dispatches lines in arrival order and shuts down cleanly", async () => {
    const { transport, dispatcher, monitor } = createMonitor(async () => "ignored");

    transport.emit(line("~one"));
    transport.emit(line("~two"));
    transport.emit(line("~three"));
    monitor.stop();
    await monitor.run();

    expect(dispatchedTexts(dispatcher.dispatch)).toEqual(["~one", "~two", "~three"]);
    expect(dispatcher.drain).toHaveBeenCalledTimes(1);
    expect(transport.disconnectCalls).toBe(1);
  });

  it("does not read the next line while a dispatch is pending", async () => {
    const gate = createDeferred<DispatchOutcome>();
    const { transport, dispatcher, monitor } = createMonitor(async (inbound) => {
      if (inbound.text === "~slow") {
        return await gate.promise;
      }
      return "completed";
    });

    const running = monitor.run();
    await vi.waitFor(() => expect(transport.connected).toBe(true));
    transport.emit(line("~slow"));
    transport.emit(line("~next"));

    await vi.waitFor(() => expect(dispatcher.dispatch).toHaveBeenCalledTimes(1));
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(dispatchedTexts(dispatcher.dispatch)).toEqual(["~slow"]);

    gate.resolve("completed");
    await vi.waitFor(() => expect(dispatcher.dispatch).toHaveBeenCalledTimes(2));
    expect(dispatchedTexts(dispatcher.dispatch)).toEqual(["~slow", "~next"]);

    monitor.stop();
    await running;
  });

  it("keeps processing after a dispatch failure", async () => {
    const lines: string[] = [];
    const { transport, dispatcher, monitor } = createMonitor(async (inbound) => {
      if (inbound.text === "~bad") {
        throw new Error("dispatch exploded");
      }
      return "completed";
    }, lines);

    transport.emit(line("~bad"));
    transport.emit(line("~good"));
    monitor.stop();
    await monitor.run();

    expect(dispatchedTexts(dispatcher.dispatch)).toEqual(["~bad", "~good"]);
    expect(lines.some((entry) =>
      entry.includes(" - ERROR - IRC monitor failed to process line; continuing Error: dispatch exploded"))).toBe(true);
  });

  it("stops when the connection closes", async () => {
    const lines: string[] = [];
    const { transport, dispatcher, monitor } = createMonitor(async () => "ignored", lines);

    const running = monitor.run();
    await vi.waitFor(() => expect(transport.connected).toBe(true));
    transport.close();
    await running;

    expect(dispatcher.drain).toHaveBeenCalledTimes(1);
    expect(transport.disconnectCalls).toBe(1);
    expect(lines.map((entry) => entry.replace(/^.* - INFO - |^.* - WARNING - /, ""))).toEqual([
      "Connecting....\n",
      "Connected!\n",
      "IRC connection closed.\n",
      "IRC monitor stopped.\n",
    ]);
  });
});
