/**
 * Topology descriptions: schema validation and file loading.
 *
 * A topology is the static waypoint/edge list of one installation. It is
 * read once at startup; anything malformed is an InvalidTopologyError.
 */

import { readFileSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import { z } from "zod";

import type { Topology } from "@waymark/types";
import { InvalidTopologyError } from "../domain/errors.js";
import { findConfigsRoot } from "../config/configs-root.js";

const turnHintSchema = z.enum([
  "straight",
  "left",
  "right",
  "around",
  "stairs-up",
  "stairs-down",
  "lift",
]);

const waypointCodeSchema = z
  .string()
  .regex(/^[AB][1-9]\d*$/, "must be a series tag A or B followed by a positive index");

const coordinateSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

export const topologySchema = z.object({
  name: z.string().optional(),
  waypoints: z
    .array(
      z.object({
        id: waypointCodeSchema,
        label: z.string().min(1),
        coordinate: coordinateSchema.optional(),
      }),
    )
    .min(1),
  edges: z.array(
    z.object({
      from: waypointCodeSchema,
      to: waypointCodeSchema,
      cost: z.number().finite().nonnegative().optional(),
      directed: z.boolean().optional(),
      hint: turnHintSchema.optional(),
      reverseHint: turnHintSchema.optional(),
    }),
  ),
}) satisfies z.ZodType<Topology>;

/** Validate an untyped topology description. */
export function parseTopology(raw: unknown): Topology {
  const result = topologySchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidTopologyError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Read a topology JSON file.
 *
 * Accepts a bare name ("default" -> configs/topology/default.json) or a path.
 */
export function loadTopologyFile(nameOrPath: string): Topology {
  const filePath =
    isAbsolute(nameOrPath) || nameOrPath.endsWith(".json")
      ? nameOrPath
      : join(findConfigsRoot(), "topology", `${nameOrPath}.json`);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidTopologyError([`cannot read ${filePath}: ${reason}`]);
  }
  return parseTopology(raw);
}
