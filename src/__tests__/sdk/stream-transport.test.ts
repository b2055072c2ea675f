import { describe, expect, it } from "vitest";
import { StreamTransport } from "../../sdk/adapters/stream.js";
import { MAX_LINE_LENGTH } from "../../sdk/codec/stream.js";
import { ConnectionError } from "../../sdk/errors.js";
import { createStreamServer, drain, take, until } from "../helpers/fake-server.js";

describe("StreamTransport", () => {
  it("writes one CRLF line per frame", async () => {
    const { client, received } = createStreamServer();
    const transport = new StreamTransport(client);

    const report = await transport.sendAuthenticate("bob", "Bob", "test-secret");
    await transport.sendJoin("general", "Bob");
    await transport.sendChatMessage("Bob", "hi all");
    await until(() => received.length === 3);

    expect(report).toEqual({ messageId: null, confirmed: true, transmissions: 1, aborted: false });
    expect(received).toEqual(["AUTH bob AS Bob USING test-secret", "JOIN general AS Bob", "MSG FROM Bob IS hi all"]);
  });

  it("decodes lines split across chunks", async () => {
    const { client, server } = createStreamServer();
    const transport = new StreamTransport(client);

    await server.send("MSG FROM Ann IS hel");
    await server.send("lo\r\nREPLY OK IS Joined\r\n");

    expect(await take(transport.inbound(), 2)).toEqual([
      { type: "message", message: { kind: "chat", sender: "Ann", content: "hello" } },
      { type: "message", message: { kind: "reply", success: true, content: "Joined" } },
    ]);
  });

  it("surfaces malformed lines", async () => {
    const { client, send } = createStreamServer();
    const transport = new StreamTransport(client);
    await send("HELLO there");
    expect(await take(transport.inbound(), 1)).toEqual([{ type: "malformed", reason: 'unrecognized frame "HELLO"' }]);
  });

  it("reports a line that never ends as malformed", async () => {
    const { client, server } = createStreamServer();
    const transport = new StreamTransport(client);
    await server.send("MSG FROM Ann IS " + "x".repeat(MAX_LINE_LENGTH));

    expect(await take(transport.inbound(), 1)).toEqual([
      { type: "malformed", reason: `line longer than ${MAX_LINE_LENGTH} characters` },
    ]);
  });

  it("turns a server close into a single connection fault", async () => {
    const { client, server } = createStreamServer();
    const transport = new StreamTransport(client);
    await server.close();

    const events = await drain(transport.inbound());
    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event?.type).toBe("fault");
    if (event?.type === "fault") {
      expect(event.error).toBeInstanceOf(ConnectionError);
      expect(event.error.message).toBe("Connection closed by server");
    }
  });

  it("reports the socket error as the fault reason", async () => {
    const { client } = createStreamServer();
    const transport = new StreamTransport(client);
    client.fail(new Error("read ECONNRESET"));
    const events = await drain(transport.inbound());
    expect(events).toEqual([{ type: "fault", error: expect.objectContaining({ message: "read ECONNRESET" }) }]);
  });

  it("ends quietly on disconnect", async () => {
    const { client } = createStreamServer();
    const transport = new StreamTransport(client);
    await transport.disconnect();
    expect(await drain(transport.inbound())).toEqual([]);
    await expect(transport.sendFarewell("Bob")).rejects.toThrow("Client is closed");
  });
});
