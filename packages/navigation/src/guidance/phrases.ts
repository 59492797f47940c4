import type { TurnHint } from "@waymark/types";

const HINT_PHRASES: Record<TurnHint, string> = {
  straight: "Continue straight",
  left: "Turn left",
  right: "Turn right",
  around: "Turn around",
  "stairs-up": "Take the stairs up",
  "stairs-down": "Take the stairs down",
  lift: "Take the lift",
};

/** "Turn left, then proceed to Stairs." or "Proceed to Stairs." */
export function proceedInstruction(label: string, hint?: TurnHint): string {
  return hint ? `${HINT_PHRASES[hint]}, then proceed to ${label}.` : `Proceed to ${label}.`;
}

export function approxMeters(distanceMeters: number): string {
  return distanceMeters === 1 ? "about 1 meter" : `about ${distanceMeters} meters`;
}
