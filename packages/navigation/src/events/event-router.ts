/**
 * Event router - normalizes raw adapter callbacks into session events.
 *
 * - Scans: monotonic timestamps, same-code debounce (the window slides while
 *   a still-visible code keeps re-triggering the camera)
 * - Positions: range checks, monotonic timestamps, maximum walking speed
 * - Idle: a timeout once no scan arrived for `idleScanMs` while GPS moved
 *
 * Sensor timestamps only order events of the same source. The idle window is
 * measured on the router's own clock (receipt time), the one `checkIdle`
 * is called with.
 *
 * Rejections are counted, never forwarded. Everything accepted goes to the
 * sink in arrival order.
 */

import type { Coordinate, NavigationEvent, PositionFix, RouterStats } from "@waymark/types";
import type { Clock } from "./idle-watchdog.js";
import { haversineDistance, isValidCoordinate } from "../graph/geo.js";

export interface EventRouterOptions {
  debounceMs: number;
  maxSpeedMetersPerSecond: number;
  idleScanMs: number;
  minMovementMeters: number;
  /** Receipt clock for the idle window (default Date.now) */
  clock?: Clock;
}

export class EventRouter {
  private readonly sink: (event: NavigationEvent) => void;
  private readonly options: EventRouterOptions;
  private readonly clock: Clock;
  private readonly counters: RouterStats = {
    forwarded: 0,
    duplicateScans: 0,
    outOfOrder: 0,
    invalidPositions: 0,
    implausiblePositions: 0,
    timeouts: 0,
  };

  private lastScan: { waypointId: string; timestamp: number } | null = null;
  private lastFix: PositionFix | null = null;
  /** Start of the current idle window (last scan or last timeout) */
  private idleSince: number | null = null;
  private movedSinceIdle = 0;

  constructor(sink: (event: NavigationEvent) => void, options: EventRouterOptions) {
    this.sink = sink;
    this.options = options;
    this.clock = options.clock ?? Date.now;
  }

  /** A QR code was decoded. Returns false if the scan was dropped. */
  reportScan(waypointId: string, timestamp: number): boolean {
    const code = waypointId.trim().toUpperCase();
    const last = this.lastScan;

    if (last && timestamp < last.timestamp) {
      this.counters.outOfOrder++;
      console.warn(`[router] Dropped out-of-order scan ${code} (${timestamp} < ${last.timestamp})`);
      return false;
    }
    if (last && last.waypointId === code && timestamp - last.timestamp < this.options.debounceMs) {
      this.counters.duplicateScans++;
      last.timestamp = timestamp;
      return false;
    }

    this.lastScan = { waypointId: code, timestamp };
    this.idleSince = this.clock();
    this.movedSinceIdle = 0;
    this.forward({ type: "waypoint-scanned", waypointId: code });
    return true;
  }

  /** A GPS fix was parsed. Returns false if the sample was dropped as noise. */
  reportPosition(lat: number, lng: number, timestamp: number, altitude?: number): boolean {
    const coordinate: Coordinate = { lat, lng };
    if (
      !isValidCoordinate(coordinate) ||
      !Number.isFinite(timestamp) ||
      (altitude !== undefined && !Number.isFinite(altitude))
    ) {
      this.counters.invalidPositions++;
      return false;
    }

    const last = this.lastFix;
    if (last) {
      if (timestamp <= last.timestamp) {
        this.counters.outOfOrder++;
        return false;
      }
      const meters = haversineDistance(last.coordinate, coordinate);
      const speed = meters / ((timestamp - last.timestamp) / 1000);
      if (speed > this.options.maxSpeedMetersPerSecond) {
        this.counters.implausiblePositions++;
        console.warn(`[router] Dropped implausible GPS jump of ${meters.toFixed(1)}m (${speed.toFixed(1)} m/s)`);
        return false;
      }
      this.movedSinceIdle += meters;
    }

    this.lastFix = altitude === undefined ? { coordinate, timestamp } : { coordinate, timestamp, altitude };
    this.forward(
      altitude === undefined
        ? { type: "position-sample", coordinate, timestamp }
        : { type: "position-sample", coordinate, timestamp, altitude },
    );
    return true;
  }

  /** A recognized destination code from the voice command adapter */
  reportDestination(waypointId: string): void {
    this.forward({ type: "destination-chosen", waypointId: waypointId.trim().toUpperCase() });
  }

  reportCancel(): void {
    this.forward({ type: "cancel" });
  }

  /**
   * Forward a timeout if no scan arrived for `idleScanMs` while the walker
   * kept moving. At most one timeout per idle window. `now` is on the
   * router's clock.
   */
  checkIdle(now: number = this.clock()): boolean {
    if (this.idleSince === null) return false;
    if (now - this.idleSince < this.options.idleScanMs) return false;
    if (this.movedSinceIdle < this.options.minMovementMeters) return false;

    this.idleSince = now;
    this.movedSinceIdle = 0;
    this.counters.timeouts++;
    this.forward({ type: "timeout" });
    return true;
  }

  stats(): RouterStats {
    return { ...this.counters };
  }

  private forward(event: NavigationEvent): void {
    this.counters.forwarded++;
    this.sink(event);
  }
}
