/**
 * Spoken destination codes.
 *
 * Speech recognizers return things like "a 7", "B-12", "bee twelve" or
 * "code a10". This maps such phrases onto waypoint ids; anything else is
 * null and the voice adapter asks again.
 */

import type { WaypointId, WaypointSeries } from "@waymark/types";
import { isWaypointId } from "../domain/waypoint-id.js";

const SERIES_WORDS: Record<string, WaypointSeries> = {
  A: "A",
  AY: "A",
  EH: "A",
  HEY: "A",
  B: "B",
  BE: "B",
  BEE: "B",
};

const NUMBER_WORDS: Record<string, number> = {
  ONE: 1, TWO: 2, THREE: 3, FOUR: 4, FIVE: 5, SIX: 6, SEVEN: 7, EIGHT: 8,
  NINE: 9, TEN: 10, ELEVEN: 11, TWELVE: 12, THIRTEEN: 13, FOURTEEN: 14,
  FIFTEEN: 15, SIXTEEN: 16, SEVENTEEN: 17, EIGHTEEN: 18, NINETEEN: 19, TWENTY: 20,
};

const FILLER_WORDS = new Set(["CODE", "NUMBER", "DESTINATION", "PLEASE"]);

/** Parse recognized speech into a waypoint id, or null if it is not one */
export function parseDestinationCode(spoken: string): WaypointId | null {
  const tokens = spoken
    .toUpperCase()
    .replace(/[-_.,]/g, " ")
    // split glued forms like "A10" into "A 10"
    .replace(/\b([AB])(\d+)\b/g, "$1 $2")
    .split(/\s+/)
    .filter((t) => t.length > 0 && !FILLER_WORDS.has(t));

  if (tokens.length !== 2) return null;
  const [seriesToken, indexToken] = tokens;
  if (seriesToken === undefined || indexToken === undefined) return null;

  const series = SERIES_WORDS[seriesToken];
  if (!series) return null;

  const index = /^\d+$/.test(indexToken) ? Number(indexToken) : NUMBER_WORDS[indexToken];
  if (index === undefined) return null;

  const id = `${series}${index}`;
  return isWaypointId(id) ? id : null;
}
