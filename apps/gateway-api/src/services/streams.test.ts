import { describe, expect, it } from "vitest";
import type { LiveEvent } from "@cellgate/shared";
import { StreamManager } from "./streams";

const log = (message: string): LiveEvent => ({
  type: "log",
  level: "info",
  message,
  ts: "2026-03-01T08:00:00.000Z",
});

describe("StreamManager", () => {
  it("replays events since Last-Event-ID", () => {
    const manager = new StreamManager();
    const events: number[] = [];
    manager.publish("live", log("first"));
    manager.publish("live", log("second"));

    manager.subscribe("live", 1, (evt) => events.push(evt.id));

    expect(events).toEqual([2]);
  });

  it("emits stream_reset when history is unavailable", () => {
    const manager = new StreamManager();
    const types: string[] = [];
    manager.publish("live", log("only"));

    manager.subscribe("live", 999, (evt) => types.push(evt.type));

    expect(types).toEqual(["stream_reset"]);
  });

  it("drops events beyond the buffer bounds", () => {
    let clock = 0;
    const manager = new StreamManager({ maxEvents: 2, maxAgeMs: 1000 }, () => clock);
    const ids: number[] = [];
    manager.publish("live", log("a"));
    manager.publish("live", log("b"));
    manager.publish("live", log("c"));

    manager.subscribe("live", 1, (evt) => ids.push(evt.id));
    // id 1 was evicted, so the subscriber gets a reset (id 4) instead of a replay
    expect(ids).toEqual([4]);

    clock = 5000;
    manager.publish("live", log("d"));
    const late: number[] = [];
    manager.subscribe("live", 4, (evt) => late.push(evt.id));
    expect(late).toEqual([6]);
  });

  it("stops delivering after unsubscribe", () => {
    const manager = new StreamManager();
    const seen: string[] = [];
    const subscription = manager.subscribe("live", null, (evt) => seen.push(evt.type));
    manager.publish("live", log("one"));
    subscription.unsubscribe();
    manager.publish("live", log("two"));

    expect(seen).toEqual(["log"]);
    expect(manager.listenerCount("live")).toBe(0);
  });
});
