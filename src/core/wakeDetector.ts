import { silentLogger, type Logger } from "../logger.js";

export type WakeDetectorOptions = {
  checkIntervalMs?: number;
  // A tick that arrives this much later than scheduled counts as a resume.
  driftThresholdMs?: number;
  now?: () => number;
  logger?: Logger;
};

/**
 * Detects system resume from timer drift: while the machine sleeps the
 * interval does not fire, so the first tick after waking sees a clock jump.
 */
export class WakeDetector {
  private timer: ReturnType<typeof setInterval> | null = null;
  private lastTick = 0;
  private readonly checkIntervalMs: number;
  private readonly driftThresholdMs: number;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly onWake: () => void,
    opts: WakeDetectorOptions = {}
  ) {
    this.checkIntervalMs = opts.checkIntervalMs ?? 30_000;
    this.driftThresholdMs = opts.driftThresholdMs ?? 60_000;
    this.now = opts.now ?? (() => Date.now());
    this.log = opts.logger ?? silentLogger;
  }

  get running(): boolean {
    return this.timer != null;
  }

  start(): void {
    if (this.timer) return;
    this.lastTick = this.now();
    this.timer = setInterval(() => this.tick(), this.checkIntervalMs);
    // Never keep the process alive on its own.
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private tick(): void {
    const now = this.now();
    const elapsed = now - this.lastTick;
    this.lastTick = now;
    if (elapsed - this.checkIntervalMs < this.driftThresholdMs) return;

    this.log.info("system wake detected; refreshing", { sleptMs: elapsed - this.checkIntervalMs });
    this.onWake();
  }
}
