/**
 * Navigation service - the HTTP-facing side of the session registry.
 *
 * Ingestion resolves (or lazily creates) the device's runtime, feeds it one
 * adapter event and reports the session state once the event drained. Reads
 * never create a session; an unseen device is a DeviceNotFoundError.
 */

import type { WaypointId } from "@waymark/types";
import {
  parseDestinationCode,
  type NavigationRuntime,
  type SessionRegistry,
} from "@waymark/navigation";
import type {
  DestinationRequest,
  PositionRequest,
  ScanRequest,
} from "../models/requests.js";
import type {
  DiagnosticsResponse,
  GuidanceListResponse,
  HealthResponse,
  IngestResponse,
  SessionResponse,
  WaypointListResponse,
  WaypointResponse,
} from "../models/responses.js";

const DEFAULT_GUIDANCE_LIMIT = 20;

export class NavigationService {
  private readonly registry: SessionRegistry;

  constructor(registry: SessionRegistry) {
    this.registry = registry;
  }

  health(): HealthResponse {
    return {
      status: "ok",
      uptime: process.uptime(),
      sessions: this.registry.size,
      waypoints: this.registry.graph.size,
      topology: this.registry.graph.name,
    };
  }

  listWaypoints(): WaypointListResponse {
    return {
      topology: this.registry.graph.name,
      waypoints: this.registry.graph.waypoints(),
    };
  }

  /** Throws UnknownWaypointError for codes not in the topology */
  getWaypoint(id: string): WaypointResponse {
    return this.registry.graph.get(id.trim().toUpperCase());
  }

  reportScan(deviceId: string, req: ScanRequest): IngestResponse {
    const runtime = this.registry.get(deviceId);
    const accepted = runtime.reportScan(req.waypointId, req.timestamp);
    return this.ingested(runtime, accepted && this.applied(runtime));
  }

  reportPosition(deviceId: string, req: PositionRequest): IngestResponse {
    const runtime = this.registry.get(deviceId);
    const accepted = runtime.reportPosition(req.lat, req.lng, req.timestamp, req.altitude);
    return this.ingested(runtime, accepted);
  }

  /**
   * Choose a destination by code or by recognized speech. Speech that is
   * not a waypoint code throws UnrecognizedDestinationError.
   */
  chooseDestination(deviceId: string, req: DestinationRequest): IngestResponse {
    const waypointId = "spoken" in req ? this.parseSpoken(req.spoken) : req.waypointId;
    const runtime = this.registry.get(deviceId);
    runtime.chooseDestination(waypointId);
    return this.ingested(runtime, this.applied(runtime));
  }

  cancel(deviceId: string): IngestResponse {
    const runtime = this.registry.get(deviceId);
    runtime.cancel();
    return this.ingested(runtime, this.applied(runtime));
  }

  getSession(deviceId: string): SessionResponse {
    return this.existing(deviceId).snapshot();
  }

  recentGuidance(deviceId: string, limit: number = DEFAULT_GUIDANCE_LIMIT): GuidanceListResponse {
    return {
      deviceId,
      messages: this.existing(deviceId).speech.recent(limit),
    };
  }

  /** Stop the device's watchdog and forget its session */
  removeDevice(deviceId: string): void {
    if (!this.registry.remove(deviceId)) {
      throw new DeviceNotFoundError(deviceId);
    }
  }

  diagnostics(deviceId: string): DiagnosticsResponse {
    const runtime = this.existing(deviceId);
    return {
      deviceId,
      router: runtime.stats(),
      speech: {
        pending: runtime.speech.pending,
        failures: runtime.speech.failures,
      },
    };
  }

  private existing(deviceId: string): NavigationRuntime {
    const runtime = this.registry.find(deviceId);
    if (!runtime) throw new DeviceNotFoundError(deviceId);
    return runtime;
  }

  private parseSpoken(spoken: string): WaypointId {
    const waypointId = parseDestinationCode(spoken);
    if (!waypointId) {
      throw new UnrecognizedDestinationError(spoken);
    }
    console.log(`[navigation] Heard "${spoken}" as ${waypointId}`);
    return waypointId;
  }

  /** Whether the last consumed event changed the session or produced guidance */
  private applied(runtime: NavigationRuntime): boolean {
    const outcome = runtime.lastOutcome?.outcome;
    return outcome === "applied" || outcome === "rejected" || outcome === "noted";
  }

  private ingested(runtime: NavigationRuntime, accepted: boolean): IngestResponse {
    return { accepted, state: runtime.snapshot().state };
  }
}

export class UnrecognizedDestinationError extends Error {
  readonly status = 422;

  constructor(spoken: string) {
    super(`Could not understand "${spoken}" as a destination code. Please say it again, for example "A 7".`);
    this.name = "UnrecognizedDestinationError";
  }
}

export class DeviceNotFoundError extends Error {
  readonly status = 404;

  constructor(deviceId: string) {
    super(`No session for device ${deviceId}`);
    this.name = "DeviceNotFoundError";
  }
}
