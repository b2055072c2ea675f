import { describe, expect, it } from "vitest";
import { DatagramTransport } from "../../sdk/adapters/datagram.js";
import { decodeDatagram, encodeDatagram } from "../../sdk/codec/datagram.js";
import { sameAddress, type SendReport } from "../../sdk/protocol.js";
import { createDatagramServer, drain, take, until } from "../helpers/fake-server.js";

type Server = ReturnType<typeof createDatagramServer>;

function makeTransport(server: Server, confirmTimeoutMs = 20): DatagramTransport {
  return new DatagramTransport(server.client, {
    server: server.serverAddress,
    confirmTimeoutMs,
    maxRetries: 3,
  });
}

/** Identifiers of the confirms the client sent. */
function confirmsFromClient(server: Server): number[] {
  return server.network
    .between(server.clientAddress, server.serverAddress)
    .map((p) => decodeDatagram(p.data))
    .flatMap((r) => (r.ok && r.frame.type === "confirm" ? [r.frame.messageId] : []));
}

describe("DatagramTransport outbound", () => {
  it("delivers N messages with N acknowledgments and no retransmissions", async () => {
    const server = createDatagramServer();
    const transport = makeTransport(server);

    const reports: SendReport[] = [];
    for (let i = 0; i < 5; i++) reports.push(await transport.sendChatMessage("Bob", `message ${i}`));

    expect(reports.map((r) => r.messageId)).toEqual([0, 1, 2, 3, 4]);
    expect(reports.every((r) => r.confirmed && r.transmissions === 1)).toBe(true);
    expect(server.received.filter((f) => f.type === "msg")).toHaveLength(5);
    expect(server.network.between(server.serverAddress, server.clientAddress)).toHaveLength(5);
  });

  it("retransmits identical bytes once when the first copy is lost", async () => {
    let lost = false;
    const server = createDatagramServer({
      drop: (p) => {
        if (lost || p.from.port !== 50000) return false;
        lost = true;
        return true;
      },
    });
    const transport = makeTransport(server);

    const report = await transport.sendChatMessage("Bob", "hello");
    const sent = server.network.between(server.clientAddress, server.serverAddress);

    expect(report).toEqual({ messageId: 0, confirmed: true, transmissions: 2, aborted: false });
    expect(sent).toHaveLength(2);
    expect(sent[1]?.data).toEqual(sent[0]?.data);
    expect(server.received.filter((f) => f.type === "msg")).toHaveLength(1);
  });

  it("continues unconfirmed when the server never acknowledges", async () => {
    const server = createDatagramServer({ confirm: false });
    const transport = new DatagramTransport(server.client, {
      server: server.serverAddress,
      confirmTimeoutMs: 5,
      maxRetries: 1,
    });
    const report = await transport.sendFarewell("Bob");
    expect(report).toEqual({ messageId: 0, confirmed: false, transmissions: 3, aborted: false });
  });
});

describe("DatagramTransport inbound", () => {
  it("acknowledges and surfaces a chat message", async () => {
    const server = createDatagramServer();
    const transport = makeTransport(server);
    await server.sendFrame({ type: "msg", messageId: 0x200, displayName: "Ann", content: "hi" });

    expect(await take(transport.inbound(), 1)).toEqual([
      { type: "message", message: { kind: "chat", sender: "Ann", content: "hi" } },
    ]);
    expect(confirmsFromClient(server)).toEqual([0x200]);
  });

  it("acknowledges duplicates but surfaces them once", async () => {
    const server = createDatagramServer();
    const transport = makeTransport(server);
    const frame = { type: "msg", messageId: 0x201, displayName: "Ann", content: "once" } as const;
    await server.sendFrame(frame);
    await server.sendFrame(frame);
    await server.sendFrame({ type: "bye", messageId: 0x202, displayName: "Server" });

    const events = await take(transport.inbound(), 2);
    expect(events.map((e) => (e.type === "message" ? e.message.kind : e.type))).toEqual(["chat", "farewell"]);
    expect(confirmsFromClient(server)).toEqual([0x201, 0x201, 0x202]);
  });

  it("surfaces a retransmitted reply once", async () => {
    const server = createDatagramServer();
    const transport = makeTransport(server);
    transport.expectReply(true);
    const reply = { type: "reply", messageId: 0x203, success: true, refMessageId: 0, content: "ok" } as const;
    await server.sendFrame(reply);
    await server.sendFrame(reply);
    await server.sendFrame({ type: "msg", messageId: 0x207, displayName: "Ann", content: "next" });

    expect(await take(transport.inbound(), 2)).toEqual([
      { type: "message", message: { kind: "reply", success: true, content: "ok" } },
      { type: "message", message: { kind: "chat", sender: "Ann", content: "next" } },
    ]);
    expect(confirmsFromClient(server)).toEqual([0x203, 0x203, 0x207]);
  });

  it("admits a seen reply identifier again for a new request", async () => {
    const server = createDatagramServer();
    const transport = makeTransport(server);
    const reply = { type: "reply", messageId: 0x208, success: false, refMessageId: 0, content: "no" } as const;
    transport.expectReply(true);
    await server.sendFrame(reply);
    await take(transport.inbound(), 1);

    transport.expectReply(true);
    await server.sendFrame(reply);
    expect(await take(transport.inbound(), 1)).toEqual([
      { type: "message", message: { kind: "reply", success: false, content: "no" } },
    ]);
  });

  it("acknowledges keepalives without surfacing them", async () => {
    const server = createDatagramServer();
    const transport = makeTransport(server);
    await server.sendFrame({ type: "ping", messageId: 0x204 });
    await server.sendFrame({ type: "msg", messageId: 0x205, displayName: "Ann", content: "after" });

    const [event] = await take(transport.inbound(), 1);
    expect(event).toEqual({ type: "message", message: { kind: "chat", sender: "Ann", content: "after" } });
    expect(confirmsFromClient(server)).toEqual([0x204, 0x205]);
  });

  it("acknowledges a frame it cannot decode, then reports it", async () => {
    const server = createDatagramServer();
    const transport = makeTransport(server);
    await server.server.send(new Uint8Array([0x42, 0x02, 0x06]), server.clientAddress);

    expect(await take(transport.inbound(), 1)).toEqual([{ type: "malformed", reason: "unknown frame type 0x42" }]);
    expect(confirmsFromClient(server)).toEqual([0x206]);
  });

  it("ends quietly on disconnect", async () => {
    const server = createDatagramServer();
    const transport = makeTransport(server);
    await transport.disconnect();
    expect(await drain(transport.inbound())).toEqual([]);
  });
});

describe("DatagramTransport addressing", () => {
  it("learns the server address from a confirm", async () => {
    const server = createDatagramServer();
    const transport = makeTransport(server);
    const moved = { address: "127.0.0.1", port: 40001 };
    const dynamic = server.network.bind(moved);

    await dynamic.send(encodeDatagram({ type: "confirm", messageId: 7 }), server.clientAddress);
    await until(() => sameAddress(transport.peer, moved));

    expect(transport.peer).toEqual(moved);
  });

  it("follows the server to a new port until authenticated", async () => {
    const server = createDatagramServer();
    const transport = makeTransport(server);
    const moved = { address: "127.0.0.1", port: 40000 };
    const dynamic = server.network.bind(moved);
    const heard: number[] = [];
    dynamic.onMessage(({ data }) => {
      const decoded = decodeDatagram(data);
      if (decoded.ok && decoded.frame.type !== "confirm") {
        heard.push(decoded.frame.messageId);
        void dynamic.send(encodeDatagram({ type: "confirm", messageId: decoded.frame.messageId }), server.clientAddress);
      }
    });

    await dynamic.send(
      encodeDatagram({ type: "reply", messageId: 0x300, success: true, refMessageId: 0, content: "ok" }),
      server.clientAddress,
    );
    await until(() => sameAddress(transport.peer, moved));

    transport.markAuthenticated();
    await server.server.send(
      encodeDatagram({ type: "msg", messageId: 0x301, displayName: "Ann", content: "hi" }),
      server.clientAddress,
    );
    await take(transport.inbound(), 2);

    expect(transport.peer).toEqual(moved);
    const report = await transport.sendJoin("general", "Bob");
    expect(report.confirmed).toBe(true);
    expect(heard).toEqual([0]);
  });
});
