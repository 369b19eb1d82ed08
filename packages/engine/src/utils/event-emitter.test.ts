import { describe, expect, it, vi } from "vitest";
import { EventEmitter } from "./event-emitter.js";

type TestEvents = {
  tick: [count: number];
  done: [];
};

describe("EventEmitter", () => {
  it("passes arguments to every listener", () => {
    const emitter = new EventEmitter<TestEvents>();
    const first = vi.fn();
    const second = vi.fn();
    emitter.on("tick", first).on("tick", second);

    expect(emitter.emit("tick", 3)).toBe(true);
    expect(first).toHaveBeenCalledWith(3);
    expect(second).toHaveBeenCalledWith(3);
  });

  it("reports when nobody listened", () => {
    expect(new EventEmitter<TestEvents>().emit("done")).toBe(false);
  });

  it("runs once listeners a single time", () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.once("done", listener);

    emitter.emit("done");
    emitter.emit("done");

    expect(listener).toHaveBeenCalledTimes(1);
    expect(emitter.listenerCount("done")).toBe(0);
  });

  it("removes listeners", () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.on("tick", listener);
    emitter.off("tick", listener);
    emitter.on("done", vi.fn());
    emitter.removeAllListeners("done");

    emitter.emit("tick", 1);
    expect(listener).not.toHaveBeenCalled();
    expect(emitter.listenerCount("done")).toBe(0);
  });
});
