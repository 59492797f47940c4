/**
 * Guidance emitter - turns session updates into spoken instructions.
 *
 * Exactly one message per update, handed to the speech sink without waiting
 * for it to be spoken.
 */

import type { GuidanceKind, GuidanceMessage, SessionStatus, WaypointId } from "@waymark/types";
import type { WaypointGraph } from "../graph/waypoint-graph.js";
import type { SessionObserver, TransitionContext, UpdateCause } from "../session/types.js";
import type { SpeechSink } from "../voice/speech-queue.js";
import { approxMeters, proceedInstruction } from "./phrases.js";

export class GuidanceEmitter implements SessionObserver {
  private readonly graph: WaypointGraph;
  private readonly sink: SpeechSink;
  private readonly now: () => Date;

  constructor(graph: WaypointGraph, sink: SpeechSink, now: () => Date = () => new Date()) {
    this.graph = graph;
    this.sink = sink;
    this.now = now;
  }

  onTransition(_from: SessionStatus, _to: SessionStatus, context: TransitionContext): void {
    this.sink.enqueue(this.compose(context.cause));
  }

  /** Build the message for one update without enqueueing it */
  compose(cause: UpdateCause): GuidanceMessage {
    const label = (id: WaypointId) => this.graph.label(id);

    switch (cause.kind) {
      case "origin-scanned":
        return this.message(
          "prompt-destination",
          `Starting location detected: ${label(cause.waypointId)}. Please say your destination code.`,
          cause.waypointId,
        );
      case "route-computed":
      case "rerouted": {
        const { waypoints, legs } = cause.route;
        const destination = waypoints[waypoints.length - 1] ?? null;
        const next = waypoints[1] ?? destination;
        const lead = cause.kind === "route-computed" ? "Route found" : "New route";
        const target = destination ? label(destination) : "your destination";
        const step = next ? ` ${proceedInstruction(label(next), legs[0]?.hint)}` : "";
        return this.message("proceed", `${lead} to ${target}.${step}`, next);
      }
      case "advanced":
        return this.message(
          "proceed",
          `You are at ${label(cause.waypointId)}. ${proceedInstruction(label(cause.next), cause.hint)}`,
          cause.next,
        );
      case "deviated":
        return this.message(
          "off-route",
          `Off route at ${label(cause.waypointId)}. Please scan the nearest code to recalculate.`,
          cause.waypointId,
        );
      case "arrived":
        return this.message("arrived", `You have arrived at ${label(cause.waypointId)}.`, cause.waypointId);
      case "aborted":
        if (cause.reason === "cancelled") {
          return this.message("aborted", "Navigation cancelled.", cause.waypointId);
        }
        return this.message(
          "aborted",
          `No path from ${cause.waypointId ? label(cause.waypointId) : "here"} to ${
            cause.destination ? label(cause.destination) : "the destination"
          }. Navigation ended.`,
          cause.waypointId,
        );
      case "destination-rejected":
        return this.message(
          "error",
          cause.reason === "no-path"
            ? `No path found to ${label(cause.destination)}. Please choose another destination.`
            : `You are already at ${label(cause.destination)}. Please choose another destination.`,
          cause.destination,
        );
      case "approaching":
        return this.message(
          "progress",
          `Getting closer to ${label(cause.waypointId)}, ${approxMeters(cause.distanceMeters)}.`,
          cause.waypointId,
        );
      case "reprompt":
        return this.message(
          "reprompt",
          cause.expected
            ? `Please scan the nearest code. Next expected: ${label(cause.expected)}.`
            : "Please scan the nearest code.",
          cause.expected,
        );
    }
  }

  private message(kind: GuidanceKind, text: string, waypointId: WaypointId | null): GuidanceMessage {
    return { kind, text, waypointId, at: this.now().toISOString() };
  }
}
