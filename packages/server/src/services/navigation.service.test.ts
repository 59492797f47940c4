import { describe, it, expect } from "vitest";
import {
  SessionRegistry,
  UnknownWaypointError,
  WaypointGraph,
  getHardcodedDefaults,
} from "@waymark/navigation";
import {
  DeviceNotFoundError,
  NavigationService,
  UnrecognizedDestinationError,
} from "./navigation.service.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function makeRegistry(): SessionRegistry {
  const graph = WaypointGraph.load({
    name: "clinic",
    waypoints: [
      { id: "A1", label: "Reception" },
      { id: "A2", label: "Corridor" },
      { id: "A3", label: "Pharmacy" },
    ],
    edges: [
      { from: "A1", to: "A2", cost: 2 },
      { from: "A2", to: "A3", cost: 3 },
    ],
  });
  return new SessionRegistry({
    graph,
    config: getHardcodedDefaults(),
    autoStart: false,
    voiceFor: () => ({ speak: () => undefined }),
  });
}

describe("NavigationService", () => {
  it("reports health with session and waypoint counts", () => {
    const registry = makeRegistry();
    const service = new NavigationService(registry);
    registry.get("device-1");
    expect(service.health()).toMatchObject({
      status: "ok",
      sessions: 1,
      waypoints: 3,
      topology: "clinic",
    });
  });

  it("looks up waypoints case-insensitively", () => {
    const service = new NavigationService(makeRegistry());
    expect(service.getWaypoint(" a3 ")).toEqual({ id: "A3", label: "Pharmacy" });
    expect(() => service.getWaypoint("B9")).toThrow(UnknownWaypointError);
    expect(service.listWaypoints().waypoints.map((w) => w.id)).toEqual(["A1", "A2", "A3"]);
  });

  it("drives a trip through scans and a spoken destination", () => {
    const service = new NavigationService(makeRegistry());

    expect(service.reportScan("device-1", { waypointId: "A1", timestamp: 0 })).toEqual({
      accepted: true,
      state: "awaiting-destination",
    });
    expect(service.chooseDestination("device-1", { spoken: "a three" })).toEqual({
      accepted: true,
      state: "navigating",
    });
    expect(service.getSession("device-1").route).toEqual(["A1", "A2", "A3"]);

    service.reportScan("device-1", { waypointId: "A2", timestamp: 10_000 });
    service.reportScan("device-1", { waypointId: "A3", timestamp: 20_000 });
    expect(service.getSession("device-1").state).toBe("arrived");

    expect(service.recentGuidance("device-1", 1).messages.map((m) => m.text)).toEqual([
      "You have arrived at Pharmacy.",
    ]);
  });

  it("marks debounced scans as not accepted", () => {
    const service = new NavigationService(makeRegistry());
    service.reportScan("device-1", { waypointId: "A1", timestamp: 0 });
    expect(service.reportScan("device-1", { waypointId: "A1", timestamp: 100 })).toEqual({
      accepted: false,
      state: "awaiting-destination",
    });
    expect(service.diagnostics("device-1").router.duplicateScans).toBe(1);
  });

  it("marks events the session ignored as not accepted", () => {
    const service = new NavigationService(makeRegistry());
    expect(service.chooseDestination("device-1", { waypointId: "A3" })).toEqual({
      accepted: false,
      state: "idle",
    });
  });

  it("rejects speech that is not a waypoint code", () => {
    const service = new NavigationService(makeRegistry());
    expect(() => service.chooseDestination("device-1", { spoken: "the cafeteria" })).toThrow(
      UnrecognizedDestinationError,
    );
    try {
      service.chooseDestination("device-1", { spoken: "the cafeteria" });
    } catch (err) {
      expect(err).toBeInstanceOf(UnrecognizedDestinationError);
      if (err instanceof UnrecognizedDestinationError) expect(err.status).toBe(422);
    }
  });

  it("keeps devices apart", () => {
    const service = new NavigationService(makeRegistry());
    service.reportScan("device-1", { waypointId: "A1", timestamp: 0 });
    service.cancel("device-2");
    expect(service.getSession("device-1").state).toBe("awaiting-destination");
    expect(service.getSession("device-2").state).toBe("aborted");
  });

  it("counts dropped positions in diagnostics", () => {
    const service = new NavigationService(makeRegistry());
    expect(service.reportPosition("device-1", { lat: 95, lng: 0, timestamp: 0 })).toEqual({
      accepted: false,
      state: "idle",
    });
    expect(service.diagnostics("device-1")).toEqual({
      deviceId: "device-1",
      router: {
        forwarded: 0,
        duplicateScans: 0,
        outOfOrder: 0,
        invalidPositions: 1,
        implausiblePositions: 0,
        timeouts: 0,
      },
      speech: { pending: 0, failures: 0 },
    });
  });

  it("does not create sessions when reading unknown devices", () => {
    const registry = makeRegistry();
    const service = new NavigationService(registry);
    for (let i = 0; i < 5; i++) {
      expect(() => service.getSession(`ghost-${i}`)).toThrow(DeviceNotFoundError);
      expect(() => service.recentGuidance(`ghost-${i}`)).toThrow(DeviceNotFoundError);
      expect(() => service.diagnostics(`ghost-${i}`)).toThrow(DeviceNotFoundError);
    }
    expect(registry.size).toBe(0);
  });

  it("removes a device's session", () => {
    const registry = makeRegistry();
    const service = new NavigationService(registry);
    service.reportScan("device-1", { waypointId: "A1", timestamp: 0 });
    expect(registry.size).toBe(1);

    service.removeDevice("device-1");
    expect(registry.size).toBe(0);
    expect(() => service.getSession("device-1")).toThrow(DeviceNotFoundError);
    expect(() => service.removeDevice("device-1")).toThrow(DeviceNotFoundError);
  });

  it("passes reported altitude through to the session", () => {
    const service = new NavigationService(makeRegistry());
    service.reportPosition("device-1", { lat: 52.1, lng: 4.3, timestamp: 0, altitude: 12 });
    expect(service.getSession("device-1")).toMatchObject({
      lastAltitude: 12,
      gpsStatus: "fix-acquired",
    });
  });
});
