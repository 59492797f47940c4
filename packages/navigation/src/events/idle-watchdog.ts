import type { EventRouter } from "./event-router.js";

/** Milliseconds on the same clock the sensor timestamps use */
export type Clock = () => number;

/** Periodically asks the router whether an idle timeout is due */
export class IdleWatchdog {
  private readonly router: EventRouter;
  private readonly clock: Clock;
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | null = null;

  constructor(router: EventRouter, clock: Clock, intervalMs: number) {
    this.router = router;
    this.clock = clock;
    this.intervalMs = intervalMs;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.router.checkIdle(this.clock());
    }, this.intervalMs);
    // never keep the process alive on its own
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }
}
