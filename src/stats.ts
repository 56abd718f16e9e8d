import { Logger, createLogger } from "./logger";
import { NoopNotifier, Notifier } from "./notifier";

export const STATUS_INTERVAL_MS = 5000;

export type StatsSample = {
  activeSessions: number;
  connectionsProxied: number;
  ratePerSecond: number;
};

/**
 * Process-wide counters shared by every forwarder. JavaScript runs them on
 * one thread, so plain increments cannot interleave.
 */
export class GlobalStats {
  private proxied = 0;
  private pipes = 0;

  get connectionsProxied(): number {
    return this.proxied;
  }

  get pipesActive(): number {
    return this.pipes;
  }

  recordConnection(): void {
    this.proxied++;
  }

  pipeOpened(): void {
    this.pipes++;
  }

  pipeClosed(): void {
    this.pipes = Math.max(0, this.pipes - 1);
  }
}

export function computeRate(
  proxiedDelta: number,
  elapsedMs: number
): number {
  if (elapsedMs <= 0) return 0;
  return proxiedDelta / (elapsedMs / 1000);
}

export function formatStatus(sample: StatsSample): string {
  return `Active connections: ${sample.activeSessions}, proxied: ${sample.connectionsProxied}, rate: ${sample.ratePerSecond.toFixed(1)}/sec`;
}

export type StatsReporterOptions = {
  intervalMs?: number;
  notifier?: Notifier;
  logger?: Logger;
  now?: () => number;
};

export class StatsReporter {
  private readonly stats: GlobalStats;
  private readonly interval: number;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private periodStart: number;
  private periodProxied: number;

  constructor(stats: GlobalStats, options: StatsReporterOptions = {}) {
    this.stats = stats;
    this.interval = options.intervalMs ?? STATUS_INTERVAL_MS;
    this.notifier = options.notifier ?? new NoopNotifier();
    this.logger = options.logger ?? createLogger("Stats");
    this.now = options.now ?? Date.now;
    this.periodStart = this.now();
    this.periodProxied = stats.connectionsProxied;
  }

  start(): void {
    if (this.timer) return;
    this.periodStart = this.now();
    this.periodProxied = this.stats.connectionsProxied;
    this.timer = setInterval(() => {
      this.report().catch((err: unknown) =>
        this.logger.error("Status report failed:", err instanceof Error ? err.message : err)
      );
    }, this.interval);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  sample(): StatsSample {
    const now = this.now();
    const proxied = this.stats.connectionsProxied;
    const ratePerSecond = computeRate(proxied - this.periodProxied, now - this.periodStart);

    this.periodStart = now;
    this.periodProxied = proxied;

    return {
      activeSessions: Math.floor(this.stats.pipesActive / 2),
      connectionsProxied: proxied,
      ratePerSecond,
    };
  }

  async report(): Promise<string> {
    const status = formatStatus(this.sample());

    if (!this.notifier.enabled) {
      this.logger.log(status);
      return status;
    }

    try {
      await this.notifier.status(status);
    } catch (err) {
      this.logger.warn(
        "Failed to push status to supervisor:",
        err instanceof Error ? err.message : err
      );
    }
    return status;
  }
}
