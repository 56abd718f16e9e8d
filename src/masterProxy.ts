import { Config } from "./config";
import { Logger, createLogger } from "./logger";
import { NoopNotifier, Notifier } from "./notifier";
import { PortSupervisor } from "./portSupervisor";
import { GlobalStats, StatsReporter } from "./stats";
import { Probe } from "./types";

export type MasterProxyOptions = {
  notifier?: Notifier;
  logger?: Logger;
  probe?: Probe;
  statusIntervalMs?: number;
};

export class MasterProxy {
  private config: Config;
  private readonly stats: GlobalStats;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly reporter: StatsReporter;
  readonly supervisors: PortSupervisor[];

  constructor(config: Config, options: MasterProxyOptions = {}) {
    this.config = config;
    this.stats = new GlobalStats();
    this.notifier = options.notifier ?? new NoopNotifier();
    this.logger = options.logger ?? createLogger("Proxy");
    this.reporter = new StatsReporter(this.stats, {
      intervalMs: options.statusIntervalMs,
      notifier: this.notifier,
      logger: options.logger,
    });
    this.supervisors = config.ports.map(
      (port) =>
        new PortSupervisor({
          port,
          nodes: config.nodes,
          auth: config.auth,
          probeTimeoutMs: config.probeTimeoutMs,
          stats: this.stats,
          probe: options.probe,
          logger: options.logger,
        })
    );
  }

  get activeSessions(): number {
    return this.supervisors.reduce((sum, s) => sum + s.forwarder.sessionCount, 0);
  }

  async start(): Promise<void> {
    this.logger.log(`Watching the following redis servers: ${this.config.nodes.join(", ")}`);
    this.logger.log(`Serving the following ports: ${this.config.ports.join(", ")}`);

    const results = await Promise.allSettled(this.supervisors.map((s) => s.start()));
    const failure = results.find(
      (r): r is PromiseRejectedResult => r.status === "rejected"
    );
    if (failure) {
      await this.stopSupervisors();
      throw failure.reason;
    }

    try {
      await this.notifier.ready();
    } catch (err) {
      this.logger.warn(
        "Failed to notify ready to supervisor:",
        err instanceof Error ? err.message : err
      );
    }

    this.reporter.start();
  }

  async stop(): Promise<void> {
    this.reporter.stop();
    await this.stopSupervisors();
  }

  private async stopSupervisors(): Promise<void> {
    await Promise.all(this.supervisors.map((s) => s.stop()));
  }

  destroySessions(): void {
    this.supervisors.forEach((s) => s.forwarder.destroySessions());
  }

  /**
   * Stops accepting, then waits for open sessions to drain. Resolves true
   * when every session closed on its own before the timeout.
   */
  async shutdown(): Promise<boolean> {
    this.logger.log(`Shutting down, active connections: ${this.activeSessions}`);
    await this.stop();
    this.logger.log("Listeners closed. New connections not accepted");

    return new Promise((resolve) => {
      const check = () => {
        if (this.activeSessions === 0) {
          clearInterval(checkInterval);
          clearTimeout(deadline);
          this.logger.log("All connections gracefully closed");
          resolve(true);
          return;
        }
        this.logger.log(`Waiting for ${this.activeSessions} connections to close`);
      };

      const checkInterval = setInterval(check, 1000);

      const deadline = setTimeout(() => {
        clearInterval(checkInterval);
        this.logger.log(
          `Timeout reached: All ${this.activeSessions} connections will be forcefully closed`
        );
        this.destroySessions();
        resolve(false);
      }, this.config.shutdown.timeout);

      check();
    });
  }

  setupShutdownHandler(exit: (code: number) => void = (code) => process.exit(code)): void {
    let shuttingDown = false;
    const onSignal = (signal: NodeJS.Signals) => {
      if (shuttingDown) return;
      shuttingDown = true;
      this.logger.log(`Received ${signal}`);
      this.shutdown().then(
        (drained) => exit(drained ? 0 : 1),
        (err: unknown) => {
          this.logger.error("Shutdown failed:", err instanceof Error ? err.message : err);
          exit(1);
        }
      );
    };

    process.once("SIGTERM", onSignal);
    process.once("SIGINT", onSignal);
  }
}
