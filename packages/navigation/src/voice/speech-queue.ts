import type { GuidanceMessage } from "@waymark/types";
import type { VoiceOutput } from "./voice-output.js";

/** Accepts guidance without blocking the caller */
export interface SpeechSink {
  enqueue(message: GuidanceMessage): void;
}

export type GuidanceListener = (message: GuidanceMessage) => void;

/**
 * Serializes messages onto a voice output, one utterance at a time.
 *
 * `enqueue` returns immediately. Output failures are logged here and never
 * reach the session. A bounded history and listener set back the monitoring
 * endpoints.
 */
export class SpeechQueue implements SpeechSink {
  private readonly output: VoiceOutput;
  private readonly historyLimit: number;
  private readonly history: GuidanceMessage[] = [];
  private readonly listeners = new Set<GuidanceListener>();
  private tail: Promise<void> = Promise.resolve();
  private pendingCount = 0;
  private failureCount = 0;

  constructor(output: VoiceOutput, historyLimit = 100) {
    this.output = output;
    this.historyLimit = historyLimit;
  }

  enqueue(message: GuidanceMessage): void {
    this.history.push(message);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }

    for (const listener of this.listeners) {
      try {
        listener(message);
      } catch (err) {
        console.error(`[speech] Listener failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    this.pendingCount++;
    this.tail = this.tail
      .then(() => this.output.speak(message.text))
      .catch((err: unknown) => {
        this.failureCount++;
        console.error(
          `[speech] Voice output failed for "${message.text}": ${err instanceof Error ? err.message : String(err)}`,
        );
      })
      .finally(() => {
        this.pendingCount--;
      });
  }

  /** Most recent messages, oldest first */
  recent(limit: number = this.historyLimit): GuidanceMessage[] {
    return limit <= 0 ? [] : this.history.slice(-limit);
  }

  subscribe(listener: GuidanceListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once everything enqueued so far has been spoken (or failed) */
  idle(): Promise<void> {
    return this.tail;
  }

  get pending(): number {
    return this.pendingCount;
  }

  get failures(): number {
    return this.failureCount;
  }
}
