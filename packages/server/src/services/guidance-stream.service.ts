import type { GuidanceMessage } from "@waymark/types";
import type { SessionRegistry } from "@waymark/navigation";
import { DeviceNotFoundError } from "./navigation.service.js";

/** One Server-Sent Events frame */
export function formatSseEvent(message: GuidanceMessage): string {
  return `data: ${JSON.stringify(message)}\n\n`;
}

/**
 * Pushes a device's guidance messages to live listeners (monitoring UIs,
 * companion apps) as they are emitted.
 */
export class GuidanceStreamService {
  private readonly registry: SessionRegistry;
  private openStreams = 0;

  constructor(registry: SessionRegistry) {
    this.registry = registry;
  }

  /**
   * Start forwarding frames to `write`; returns the function that stops it.
   * Throws DeviceNotFoundError for a device without a session.
   */
  open(deviceId: string, write: (frame: string) => void): () => void {
    const runtime = this.registry.find(deviceId);
    if (!runtime) throw new DeviceNotFoundError(deviceId);
    const unsubscribe = runtime.speech.subscribe((message) => {
      write(formatSseEvent(message));
    });
    this.openStreams++;
    console.log(`[stream] Guidance stream opened for ${deviceId} (${this.openStreams} open)`);

    let closed = false;
    return () => {
      if (closed) return;
      closed = true;
      unsubscribe();
      this.openStreams--;
      console.log(`[stream] Guidance stream closed for ${deviceId}`);
    };
  }

  get streams(): number {
    return this.openStreams;
  }
}
