import { describe, it, expect } from "vitest";
import { loadTopologyFile, parseTopology } from "./topology.js";
import { WaypointGraph } from "./waypoint-graph.js";
import { InvalidTopologyError } from "../domain/errors.js";

describe("parseTopology", () => {
  it("accepts a minimal topology", () => {
    const parsed = parseTopology({ waypoints: [{ id: "B3", label: "Corner" }], edges: [] });
    expect(parsed.waypoints).toEqual([{ id: "B3", label: "Corner" }]);
  });

  it("rejects unknown turn hints", () => {
    expect(() =>
      parseTopology({
        waypoints: [
          { id: "A1", label: "x" },
          { id: "A2", label: "y" },
        ],
        edges: [{ from: "A1", to: "A2", hint: "jump" }],
      }),
    ).toThrow(InvalidTopologyError);
  });

  it("rejects leading zeros in waypoint ids", () => {
    expect(() => parseTopology({ waypoints: [{ id: "A01", label: "x" }], edges: [] })).toThrow(
      InvalidTopologyError,
    );
  });
});

describe("loadTopologyFile", () => {
  it("loads the default floor topology", () => {
    const graph = WaypointGraph.load(loadTopologyFile("default"));

    expect(graph.name).toBe("fifth-floor");
    expect(graph.size).toBe(29);
    expect(graph.edgeCount).toBe(58);
    expect(graph.components()).toHaveLength(1);
    expect(graph.label("A12")).toBe("Lift");
    expect(graph.neighbors("A11").map((n) => n.id)).toEqual(["B9", "B10", "A12"]);
  });

  it("fails with InvalidTopologyError for a missing file", () => {
    expect(() => loadTopologyFile("/nonexistent/topology.json")).toThrow(InvalidTopologyError);
  });
});
