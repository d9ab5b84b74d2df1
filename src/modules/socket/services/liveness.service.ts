/**
 * Liveness Monitor
 * Detects silently-dead device connections for one session
 */

import type { LivenessConfig } from '@/shared/config';

export interface LivenessHandlers {
  /** Idle past the heartbeat interval: ping the device */
  onIdle: () => void;
  /** No activity within the timeout window: the connection is dead */
  onTimeout: (idleMs: number) => void;
}

const MIN_CHECK_INTERVAL_MS = 250;

export class LivenessMonitor {
  private lastActivity = Date.now();
  private pingSentAt: number | null = null;
  private timer?: NodeJS.Timeout;
  private timedOut = false;

  constructor(
    private readonly config: LivenessConfig,
    private readonly handlers: LivenessHandlers
  ) {}

  get timeoutMs(): number {
    return this.config.heartbeatIntervalMs * this.config.timeoutMultiple;
  }

  get checkIntervalMs(): number {
    return Math.max(MIN_CHECK_INTERVAL_MS, Math.floor(this.config.heartbeatIntervalMs / 2));
  }

  start(): void {
    if (this.timer) return;
    this.lastActivity = Date.now();
    this.timer = setInterval(() => this.check(), this.checkIntervalMs);
    // Do not keep the process alive just for heartbeats
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Record activity. Any received frame counts, control or binary.
   */
  touch(): void {
    this.lastActivity = Date.now();
    this.pingSentAt = null;
  }

  getLastActivity(): number {
    return this.lastActivity;
  }

  check(now: number = Date.now()): void {
    if (this.timedOut) return;

    const idleMs = now - this.lastActivity;

    if (idleMs >= this.timeoutMs) {
      this.timedOut = true;
      this.stop();
      this.handlers.onTimeout(idleMs);
      return;
    }

    if (idleMs >= this.config.heartbeatIntervalMs && this.pingSentAt === null) {
      this.pingSentAt = now;
      this.handlers.onIdle();
    }
  }
}
