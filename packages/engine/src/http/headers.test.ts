import { describe, expect, it } from "vitest";
import { BufferByteSource } from "./byte-source.js";
import { readHeaders } from "./headers.js";

describe("readHeaders", () => {
  it("reads headers in arrival order up to the blank line", async () => {
    const source = new BufferByteSource(
      "Host: example.com\r\nAccept: text/html, application/json\r\n\r\nbody",
    );
    const headers = await readHeaders(source);

    expect([...headers.keys()]).toEqual(["Host", "Accept"]);
    expect(headers.get("Host")).toEqual({ kind: "single", value: "example.com" });
    expect(headers.get("Accept")).toEqual({
      kind: "multi",
      values: ["text/html", "application/json"],
    });
    expect(source.remaining).toBe(4);
  });

  it("returns an empty map for an immediate blank line", async () => {
    const headers = await readHeaders(new BufferByteSource("\r\n"));
    expect(headers.size).toBe(0);
  });

  it("keeps header name case as received", async () => {
    const headers = await readHeaders(
      new BufferByteSource("x-Custom-ID: 7\r\n\r\n"),
    );
    expect(headers.has("x-Custom-ID")).toBe(true);
    expect(headers.has("X-Custom-Id")).toBe(false);
  });

  it("overwrites repeated names by default", async () => {
    const headers = await readHeaders(
      new BufferByteSource("Accept: a\r\nAccept: b\r\n\r\n"),
    );
    expect(headers.get("Accept")).toEqual({ kind: "single", value: "b" });
  });

  it("combines repeated names when asked to", async () => {
    const headers = await readHeaders(
      new BufferByteSource("Accept: a\r\nAccept: b, c\r\n\r\n"),
      { duplicateHeaders: "combine" },
    );
    expect(headers.get("Accept")).toEqual({
      kind: "multi",
      values: ["a", "b", "c"],
    });
  });

  it("maps token failures to MALFORMED_HEADER_LINE", async () => {
    for (const raw of [
      "NoColon\r\n\r\n",
      "Key: value \r\n\r\n",
      "Key:\r\n\r\n",
      ": value\r\n\r\n",
      "Key: \"open\r\n\r\n",
    ]) {
      await expect(
        readHeaders(new BufferByteSource(raw)),
      ).rejects.toMatchObject({ code: "MALFORMED_HEADER_LINE" });
    }
  });

  it("fails when the stream ends before the blank line", async () => {
    await expect(
      readHeaders(new BufferByteSource("Host: a\r\n")),
    ).rejects.toMatchObject({ code: "MALFORMED_HEADER_LINE" });
  });

  it("limits the number of header lines", async () => {
    const raw = "A: 1\r\nB: 2\r\nC: 3\r\n\r\n";
    await expect(
      readHeaders(new BufferByteSource(raw), { maxHeaderCount: 2 }),
    ).rejects.toMatchObject({ code: "MALFORMED_HEADER_LINE" });

    const headers = await readHeaders(new BufferByteSource(raw), {
      maxHeaderCount: 3,
    });
    expect(headers.size).toBe(3);
  });

  it("applies the token length limit to names and values", async () => {
    await expect(
      readHeaders(new BufferByteSource("Long: abcdef\r\n\r\n"), {
        maxTokenLength: 5,
      }),
    ).rejects.toMatchObject({ code: "MALFORMED_HEADER_LINE" });
    await expect(
      readHeaders(new BufferByteSource("LongName: a\r\n\r\n"), {
        maxTokenLength: 5,
      }),
    ).rejects.toMatchObject({ code: "MALFORMED_HEADER_LINE" });
  });
});
