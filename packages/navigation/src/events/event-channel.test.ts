import { describe, it, expect } from "vitest";
import { EventChannel } from "./event-channel.js";

describe("EventChannel", () => {
  it("delivers events in push order", () => {
    const seen: number[] = [];
    const channel = new EventChannel<number>((n) => seen.push(n));
    channel.push(1);
    channel.push(2);
    channel.push(3);
    expect(seen).toEqual([1, 2, 3]);
    expect(channel.deliveredCount).toBe(3);
    expect(channel.pending).toBe(0);
  });

  it("queues pushes made by the consumer instead of re-entering it", () => {
    const log: string[] = [];
    let depth = 0;
    const channel: EventChannel<string> = new EventChannel<string>((event) => {
      depth++;
      log.push(`${event}@${depth}`);
      if (event === "first") {
        channel.push("nested");
        log.push(`pending=${channel.pending}`);
      }
      depth--;
    });

    channel.push("first");
    channel.push("second");
    expect(log).toEqual(["first@1", "pending=1", "nested@1", "second@1"]);
  });

  it("recovers after a consumer throws", () => {
    const seen: string[] = [];
    const channel = new EventChannel<string>((event) => {
      if (event === "bad") throw new Error("boom");
      seen.push(event);
    });
    expect(() => channel.push("bad")).toThrow("boom");
    channel.push("good");
    expect(seen).toEqual(["good"]);
  });

  it("delivers events queued behind a failing one before rethrowing", () => {
    const seen: string[] = [];
    const channel: EventChannel<string> = new EventChannel<string>((event) => {
      if (event === "first") {
        channel.push("bad");
        channel.push("after");
      }
      if (event === "bad") throw new Error("boom");
      seen.push(event);
    });

    expect(() => channel.push("first")).toThrow("boom");
    expect(seen).toEqual(["first", "after"]);
    expect(channel.pending).toBe(0);
    expect(channel.deliveredCount).toBe(2);
  });
});
