/**
 * One device's navigation pipeline:
 *
 *   adapters -> EventRouter -> EventChannel -> NavigationSession
 *            -> GuidanceEmitter -> SpeechQueue -> VoiceOutput
 *
 * plus an IdleWatchdog feeding timeouts into the same router.
 */

import type { NavigationEvent, RouterStats, SessionSnapshot } from "@waymark/types";
import type { NavigationConfig } from "../config/navigation-config.js";
import { EventChannel } from "../events/event-channel.js";
import { EventRouter } from "../events/event-router.js";
import { IdleWatchdog, type Clock } from "../events/idle-watchdog.js";
import type { WaypointGraph } from "../graph/waypoint-graph.js";
import { GuidanceEmitter } from "../guidance/guidance-emitter.js";
import { NavigationSession } from "../session/navigation-session.js";
import type { HandleResult } from "../session/types.js";
import { SpeechQueue } from "../voice/speech-queue.js";
import { ConsoleVoiceOutput, type VoiceOutput } from "../voice/voice-output.js";

export interface NavigationRuntimeOptions {
  deviceId: string;
  graph: WaypointGraph;
  config: NavigationConfig;
  voice?: VoiceOutput;
  clock?: Clock;
}

export class NavigationRuntime {
  readonly deviceId: string;
  readonly session: NavigationSession;
  readonly router: EventRouter;
  readonly speech: SpeechQueue;
  private readonly channel: EventChannel<NavigationEvent>;
  private readonly watchdog: IdleWatchdog;
  private readonly clock: Clock;
  private lastResult: HandleResult | null = null;

  constructor(options: NavigationRuntimeOptions) {
    const { deviceId, graph, config } = options;
    this.deviceId = deviceId;
    this.clock = options.clock ?? Date.now;

    this.speech = new SpeechQueue(options.voice ?? new ConsoleVoiceOutput(), config.speechHistoryLimit);
    this.session = new NavigationSession({
      deviceId,
      graph,
      approachStepMeters: config.approachStepMeters,
      observers: [new GuidanceEmitter(graph, this.speech)],
    });
    this.channel = new EventChannel((event) => {
      this.lastResult = this.session.handle(event);
    });
    this.router = new EventRouter((event) => this.channel.push(event), {
      debounceMs: config.debounceMs,
      maxSpeedMetersPerSecond: config.maxSpeedMetersPerSecond,
      idleScanMs: config.idleScanMs,
      minMovementMeters: config.minMovementMeters,
      clock: this.clock,
    });
    this.watchdog = new IdleWatchdog(this.router, this.clock, config.watchdogIntervalMs);
  }

  reportScan(waypointId: string, timestamp: number = this.clock()): boolean {
    return this.router.reportScan(waypointId, timestamp);
  }

  reportPosition(lat: number, lng: number, timestamp: number = this.clock(), altitude?: number): boolean {
    return this.router.reportPosition(lat, lng, timestamp, altitude);
  }

  chooseDestination(waypointId: string): void {
    this.router.reportDestination(waypointId);
  }

  cancel(): void {
    this.router.reportCancel();
  }

  snapshot(): SessionSnapshot {
    return this.session.snapshot();
  }

  stats(): RouterStats {
    return this.router.stats();
  }

  /** Result of the most recently consumed event, if any */
  get lastOutcome(): HandleResult | null {
    return this.lastResult;
  }

  start(): void {
    this.watchdog.start();
  }

  dispose(): void {
    this.watchdog.stop();
  }

  get watching(): boolean {
    return this.watchdog.running;
  }
}
