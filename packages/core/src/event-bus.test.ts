import { describe, expect, it } from "vitest";
import type { EventName, StateChangeEvent } from "@conductor/sdk";
import { TypedEventBus } from "./event-bus";

const change: StateChangeEvent = { runId: "run-1", from: "idle", to: "analyzing" };

describe("TypedEventBus", () => {
  it("delivers payloads to handlers in subscription order", async () => {
    const bus = new TypedEventBus();
    const seen: string[] = [];
    bus.on("orchestrator:state", (event) => {
      seen.push(`first:${event.to}`);
    });
    bus.on("orchestrator:state", async (event) => {
      seen.push(`second:${event.to}`);
    });

    await bus.emit("orchestrator:state", change);

    expect(seen).toEqual(["first:analyzing", "second:analyzing"]);
  });

  it("keeps delivering after a handler throws", async () => {
    const bus = new TypedEventBus();
    const seen: string[] = [];
    bus.on("orchestrator:state", () => {
      throw new Error("handler broke");
    });
    bus.on("orchestrator:state", (event) => {
      seen.push(event.runId);
    });

    await expect(bus.emit("orchestrator:state", change)).resolves.toBeUndefined();
    expect(seen).toEqual(["run-1"]);
  });

  it("stops delivering after off", async () => {
    const bus = new TypedEventBus();
    let calls = 0;
    const handler = () => {
      calls++;
    };
    bus.on("runtime:ready", handler);
    await bus.emit("runtime:ready", {});
    bus.off("runtime:ready", handler);
    await bus.emit("runtime:ready", {});

    expect(calls).toBe(1);
    expect(bus.listenerCount("runtime:ready")).toBe(0);
  });

  it("passes every event to wildcard handlers", async () => {
    const bus = new TypedEventBus();
    const names: EventName[] = [];
    bus.onAny((event) => {
      names.push(event);
    });

    await bus.emit("runtime:ready", {});
    await bus.emit("orchestrator:state", change);

    expect(names).toEqual(["runtime:ready", "orchestrator:state"]);
    expect(bus.listenerCount("runtime:shutdown")).toBe(1);
  });

  it("drops every subscription on removeAll", async () => {
    const bus = new TypedEventBus();
    let calls = 0;
    bus.on("runtime:shutdown", () => {
      calls++;
    });
    bus.onAny(() => {
      calls++;
    });

    bus.removeAll();
    await bus.emit("runtime:shutdown", {});

    expect(calls).toBe(0);
  });
});
