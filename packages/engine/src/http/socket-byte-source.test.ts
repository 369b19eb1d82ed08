import { describe, expect, it } from "vitest";
import { InMemoryTcpSocket } from "../testing/in-memory-socket-factory.js";
import { fromString } from "../utils/buffer.js";
import { readRequest } from "./message-reader.js";
import { SocketByteSource } from "./socket-byte-source.js";

function connectedSource(idleTimeoutMs?: number) {
  const [client, server] = InMemoryTcpSocket.createPair();
  const source = new SocketByteSource(server, { idleTimeoutMs });
  return { client, server, source };
}

describe("SocketByteSource", () => {
  it("hands out bytes across chunk boundaries", async () => {
    const { client, source } = connectedSource();
    client.send(fromString("ab"));
    client.send(fromString("c"));

    const bytes = [
      await source.readByte(),
      await source.readByte(),
      await source.readByte(),
    ];
    expect(String.fromCharCode(...bytes)).toBe("abc");
    expect(source.buffered).toBe(0);
  });

  it("waits for data that arrives later", async () => {
    const { client, source } = connectedSource();
    const pending = source.readByte();
    setTimeout(() => client.send(fromString("z")), 5);

    expect(await pending).toBe("z".charCodeAt(0));
  });

  it("drains buffered bytes before reporting end of stream", async () => {
    const { client, source } = connectedSource();
    client.send(fromString("xy"));
    client.close();

    expect(await source.readByte()).toBe("x".charCodeAt(0));
    expect(await source.readByte()).toBe("y".charCodeAt(0));
    await expect(source.readByte()).rejects.toMatchObject({
      code: "END_OF_STREAM",
    });
  });

  it("reports a transport error as IO_ERROR with the cause", async () => {
    const { server, source } = connectedSource();
    const failure = new Error("connection reset");
    server.fail(failure);

    await expect(source.readByte()).rejects.toMatchObject({
      code: "IO_ERROR",
      cause: failure,
    });
  });

  it("times out when no byte arrives in time", async () => {
    const { source } = connectedSource(20);
    await expect(source.readByte()).rejects.toMatchObject({ code: "TIMEOUT" });
  });

  it("restarts the idle timer for every byte", async () => {
    const { client, source } = connectedSource(50);
    client.send(fromString("a"));
    expect(await source.readByte()).toBe("a".charCodeAt(0));

    setTimeout(() => client.send(fromString("b")), 20);
    expect(await source.readByte()).toBe("b".charCodeAt(0));
  });

  it("feeds a request split over several chunks", async () => {
    const { client, source } = connectedSource(1000);
    client.send(fromString("GET /split HT"));
    setTimeout(() => client.send(fromString("TP/1.1\r\nHost: a\r\n\r\n")), 5);

    const req = await readRequest(source);
    expect(req.resource).toBe("/split");
    expect(req.headers.get("Host")).toEqual({ kind: "single", value: "a" });
  });
});
