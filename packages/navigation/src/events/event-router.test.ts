import { describe, it, expect } from "vitest";
import type { NavigationEvent } from "@waymark/types";
import { EventRouter, type EventRouterOptions } from "./event-router.js";

const options: EventRouterOptions = {
  debounceMs: 2000,
  maxSpeedMetersPerSecond: 3,
  idleScanMs: 60_000,
  minMovementMeters: 10,
};

function setup(overrides: Partial<EventRouterOptions> = {}) {
  const events: NavigationEvent[] = [];
  const clock = { now: 0 };
  const router = new EventRouter((e) => events.push(e), { ...options, clock: () => clock.now, ...overrides });
  return { router, events, clock };
}

/** ~1.11 m of latitude per 0.00001 degrees */
const LAT_PER_METER = 0.001 / 111.19;

describe("EventRouter", () => {
  describe("scans", () => {
    it("debounces a code that stays in view", () => {
      const { router, events } = setup();
      expect(router.reportScan("A4", 0)).toBe(true);
      expect(router.reportScan("A4", 500)).toBe(false);
      expect(router.reportScan("A4", 1500)).toBe(false);
      // window slid to 1500, so 3600 is past it
      expect(router.reportScan("A4", 3600)).toBe(true);
      expect(events).toEqual([
        { type: "waypoint-scanned", waypointId: "A4" },
        { type: "waypoint-scanned", waypointId: "A4" },
      ]);
      expect(router.stats()).toMatchObject({ forwarded: 2, duplicateScans: 2 });
    });

    it("keeps extending the window while the camera keeps firing", () => {
      const { router } = setup();
      router.reportScan("A4", 0);
      expect(router.reportScan("A4", 1900)).toBe(false);
      expect(router.reportScan("A4", 3800)).toBe(false);
      expect(router.reportScan("A4", 5800)).toBe(true);
    });

    it("forwards a different code immediately", () => {
      const { router, events } = setup();
      router.reportScan("A4", 0);
      router.reportScan("B2", 10);
      expect(events.map((e) => e.type === "waypoint-scanned" && e.waypointId)).toEqual(["A4", "B2"]);
    });

    it("normalizes case and whitespace", () => {
      const { router, events } = setup();
      router.reportScan("  a7 ", 0);
      expect(events).toEqual([{ type: "waypoint-scanned", waypointId: "A7" }]);
      expect(router.reportScan("A7", 100)).toBe(false);
    });

    it("drops scans older than the last accepted one", () => {
      const { router, events } = setup();
      router.reportScan("A1", 5000);
      expect(router.reportScan("A2", 4000)).toBe(false);
      expect(events).toHaveLength(1);
      expect(router.stats().outOfOrder).toBe(1);
    });
  });

  describe("positions", () => {
    it("drops out-of-range coordinates", () => {
      const { router, events } = setup();
      expect(router.reportPosition(91, 0, 0)).toBe(false);
      expect(router.reportPosition(0, 181, 0)).toBe(false);
      expect(router.reportPosition(Number.NaN, 0, 0)).toBe(false);
      expect(events).toHaveLength(0);
      expect(router.stats().invalidPositions).toBe(3);
    });

    it("drops samples that are not newer than the last", () => {
      const { router } = setup();
      expect(router.reportPosition(0, 0, 1000)).toBe(true);
      expect(router.reportPosition(0, 0, 1000)).toBe(false);
      expect(router.reportPosition(0, 0, 900)).toBe(false);
      expect(router.stats().outOfOrder).toBe(2);
    });

    it("drops jumps faster than walking speed", () => {
      const { router, events } = setup();
      router.reportPosition(0, 0, 0);
      // ~50 m in 1 s
      expect(router.reportPosition(50 * LAT_PER_METER, 0, 1000)).toBe(false);
      // ~2 m in 1 s
      expect(router.reportPosition(2 * LAT_PER_METER, 0, 1000)).toBe(true);
      expect(events).toHaveLength(2);
      expect(router.stats().implausiblePositions).toBe(1);
    });

    it("forwards accepted samples with their timestamp", () => {
      const { router, events } = setup();
      router.reportPosition(10, 20, 42);
      expect(events).toEqual([{ type: "position-sample", coordinate: { lat: 10, lng: 20 }, timestamp: 42 }]);
    });

    it("carries altitude when the receiver reports one", () => {
      const { router, events } = setup();
      router.reportPosition(10, 20, 42, 118.5);
      expect(events).toEqual([
        { type: "position-sample", coordinate: { lat: 10, lng: 20 }, timestamp: 42, altitude: 118.5 },
      ]);
      expect(router.reportPosition(10, 20, 50, Number.POSITIVE_INFINITY)).toBe(false);
      expect(router.stats().invalidPositions).toBe(1);
    });
  });

  describe("idle timeout", () => {
    it("raises a timeout only when the walker moved without scanning", () => {
      const { router, events } = setup();
      router.reportScan("A1", 0);
      expect(router.checkIdle(70_000)).toBe(false);

      router.reportPosition(0, 0, 1000);
      router.reportPosition(15 * LAT_PER_METER, 0, 11_000);
      expect(router.checkIdle(59_999)).toBe(false);
      expect(router.checkIdle(60_000)).toBe(true);
      expect(events.at(-1)).toEqual({ type: "timeout" });

      // new window starts at the timeout
      expect(router.checkIdle(61_000)).toBe(false);
      expect(router.stats().timeouts).toBe(1);
    });

    it("does nothing before the first scan", () => {
      const { router } = setup();
      router.reportPosition(0, 0, 0);
      router.reportPosition(20 * LAT_PER_METER, 0, 10_000);
      expect(router.checkIdle(1_000_000)).toBe(false);
    });

    it("restarts the window on an accepted scan", () => {
      const { router, clock } = setup();
      router.reportScan("A1", 0);
      router.reportPosition(0, 0, 1000);
      router.reportPosition(15 * LAT_PER_METER, 0, 11_000);
      clock.now = 50_000;
      router.reportScan("A2", 50_000);
      expect(router.checkIdle(60_000)).toBe(false);
      expect(router.checkIdle(110_000)).toBe(false);
    });

    it("measures the idle window on its own clock, not sensor time", () => {
      const { router, clock } = setup();
      clock.now = 1_700_000_000_000;
      router.reportScan("A1", 5000);
      router.reportPosition(0, 0, 6000);
      router.reportPosition(10 * LAT_PER_METER, 0, 12_000);
      router.reportPosition(20 * LAT_PER_METER, 0, 16_000);

      // 11 s of sensor time, a few ms of receipt time
      expect(router.checkIdle(clock.now + 11_000)).toBe(false);
      clock.now += 60_000;
      expect(router.checkIdle()).toBe(true);
    });
  });

  it("forwards destination and cancel in arrival order", () => {
    const { router, events } = setup();
    router.reportScan("A1", 0);
    router.reportDestination(" a3");
    router.reportCancel();
    expect(events.map((e) => e.type)).toEqual(["waypoint-scanned", "destination-chosen", "cancel"]);
    expect(events[1]).toEqual({ type: "destination-chosen", waypointId: "A3" });
    expect(router.stats().forwarded).toBe(3);
  });
});
