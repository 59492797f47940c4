/**
 * Error taxonomy of the navigation engine.
 *
 * Only InvalidTopologyError is fatal. The other two are raised by graph and
 * pathfinder lookups and converted into session results before they reach
 * any caller of the session.
 */

export class InvalidTopologyError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid topology: ${issues.join("; ")}`);
    this.name = "InvalidTopologyError";
    this.issues = issues;
  }
}

export class UnknownWaypointError extends Error {
  readonly waypointId: string;

  constructor(waypointId: string) {
    super(`Unknown waypoint: ${waypointId}`);
    this.name = "UnknownWaypointError";
    this.waypointId = waypointId;
  }
}

export class NoPathExistsError extends Error {
  readonly origin: string;
  readonly destination: string;

  constructor(origin: string, destination: string) {
    super(`No path from ${origin} to ${destination}`);
    this.name = "NoPathExistsError";
    this.origin = origin;
    this.destination = destination;
  }
}
