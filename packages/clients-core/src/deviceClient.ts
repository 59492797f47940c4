import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  DestinationRequest,
  DiagnosticsResponse,
  GuidanceListResponse,
  IngestResponse,
  PositionRequest,
  ScanRequest,
  SessionResponse,
} from "./types.js";

/**
 * Client bound to one device's session: the camera, GPS and voice adapters
 * of a phone post through it, monitoring screens read through it.
 */
export class DeviceClient {
  private client: BaseClient;
  readonly deviceId: string;

  constructor(deviceId: string, config: ClientConfig) {
    this.client = new BaseClient("api/devices", config);
    this.deviceId = deviceId;
  }

  public async reportScan(request: ScanRequest): Promise<IngestResponse> {
    return this.client.post<IngestResponse>({ path: [this.deviceId, "scans"], body: request });
  }

  public async reportPosition(request: PositionRequest): Promise<IngestResponse> {
    return this.client.post<IngestResponse>({ path: [this.deviceId, "positions"], body: request });
  }

  /** Choose by code, or pass the recognizer's text as `spoken` */
  public async chooseDestination(request: DestinationRequest): Promise<IngestResponse> {
    return this.client.post<IngestResponse>({ path: [this.deviceId, "destination"], body: request });
  }

  public async cancel(): Promise<IngestResponse> {
    return this.client.post<IngestResponse>({ path: [this.deviceId, "cancel"] });
  }

  /** End the device's session on the server */
  public async remove(): Promise<void> {
    return this.client.delete({ path: [this.deviceId] });
  }

  public async getSession(): Promise<SessionResponse> {
    return this.client.get<SessionResponse>({ path: [this.deviceId, "session"] });
  }

  public async getGuidance(limit?: number): Promise<GuidanceListResponse> {
    return this.client.get<GuidanceListResponse>({
      path: [this.deviceId, "guidance"],
      query: limit !== undefined ? { limit } : undefined,
    });
  }

  public async getDiagnostics(): Promise<DiagnosticsResponse> {
    return this.client.get<DiagnosticsResponse>({ path: [this.deviceId, "diagnostics"] });
  }
}
