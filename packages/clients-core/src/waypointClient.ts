import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { Waypoint, WaypointListResponse } from "./types.js";

export class WaypointClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/waypoints", config);
  }

  public async list(): Promise<WaypointListResponse> {
    return this.client.get<WaypointListResponse>();
  }

  /** Rejects with a 404 for codes outside the topology */
  public async get(waypointId: string): Promise<Waypoint> {
    return this.client.get<Waypoint>({ path: [waypointId] });
  }
}
