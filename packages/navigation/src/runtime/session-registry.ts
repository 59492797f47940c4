import type { SessionSnapshot } from "@waymark/types";
import type { NavigationConfig } from "../config/navigation-config.js";
import type { Clock } from "../events/idle-watchdog.js";
import type { WaypointGraph } from "../graph/waypoint-graph.js";
import { ConsoleVoiceOutput, type VoiceOutput } from "../voice/voice-output.js";
import { NavigationRuntime } from "./navigation-runtime.js";

export interface SessionRegistryOptions {
  graph: WaypointGraph;
  config: NavigationConfig;
  /** Voice output per device (default: console) */
  voiceFor?: (deviceId: string) => VoiceOutput;
  clock?: Clock;
  /** Start each runtime's idle watchdog on creation (default true) */
  autoStart?: boolean;
}

/**
 * Device id -> navigation runtime. All runtimes share the one graph.
 */
export class SessionRegistry {
  readonly graph: WaypointGraph;
  private readonly options: SessionRegistryOptions;
  private readonly runtimes = new Map<string, NavigationRuntime>();

  constructor(options: SessionRegistryOptions) {
    this.graph = options.graph;
    this.options = options;
  }

  /** Runtime for a device, created on first use */
  get(deviceId: string): NavigationRuntime {
    const existing = this.runtimes.get(deviceId);
    if (existing) return existing;

    const runtime = new NavigationRuntime({
      deviceId,
      graph: this.graph,
      config: this.options.config,
      voice: this.options.voiceFor?.(deviceId) ?? new ConsoleVoiceOutput(),
      clock: this.options.clock,
    });
    if (this.options.autoStart ?? true) runtime.start();
    this.runtimes.set(deviceId, runtime);
    console.log(`[registry] Created session for device ${deviceId} (${this.runtimes.size} active)`);
    return runtime;
  }

  find(deviceId: string): NavigationRuntime | undefined {
    return this.runtimes.get(deviceId);
  }

  snapshots(): SessionSnapshot[] {
    return [...this.runtimes.values()].map((r) => r.snapshot());
  }

  remove(deviceId: string): boolean {
    const runtime = this.runtimes.get(deviceId);
    if (!runtime) return false;
    runtime.dispose();
    this.runtimes.delete(deviceId);
    console.log(`[registry] Removed session for device ${deviceId}`);
    return true;
  }

  disposeAll(): void {
    for (const runtime of this.runtimes.values()) runtime.dispose();
    this.runtimes.clear();
  }

  get size(): number {
    return this.runtimes.size;
  }
}
