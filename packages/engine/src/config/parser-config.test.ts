import { describe, expect, it } from "vitest";
import { defaultParserConfig, resolveParserConfig } from "./parser-config.js";
import { defaultConfig } from "./server-config.js";

describe("resolveParserConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveParserConfig()).toEqual({
      maxTokenLength: 4096,
      maxHeaderCount: 256,
      maxBodySize: 10 * 1024 * 1024,
      transferEncodingWindow: 4096,
      duplicateHeaders: "overwrite",
    });
  });

  it("replaces only the given fields", () => {
    const config = resolveParserConfig({
      maxTokenLength: 16,
      duplicateHeaders: "combine",
    });

    expect(config.maxTokenLength).toBe(16);
    expect(config.duplicateHeaders).toBe("combine");
    expect(config.maxHeaderCount).toBe(defaultParserConfig().maxHeaderCount);
  });

  it("hands out independent objects", () => {
    const a = defaultParserConfig();
    a.maxBodySize = 1;
    expect(defaultParserConfig().maxBodySize).toBe(10 * 1024 * 1024);
  });
});

describe("defaultConfig", () => {
  it("binds to loopback with the default parser limits", () => {
    const config = defaultConfig();
    expect(config.host).toBe("127.0.0.1");
    expect(config.port).toBe(8080);
    expect(config.idleTimeoutMs).toBe(5000);
    expect(config.parser).toEqual(defaultParserConfig());
  });
});
