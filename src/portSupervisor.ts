import { ConnectionForwarder, ForwarderOptions } from "./forwarder";
import { Logger, createLogger } from "./logger";
import { MasterElector } from "./masterElector";
import { PortBinding } from "./portBinding";
import { GlobalStats } from "./stats";
import { Probe } from "./types";

export type PortSupervisorOptions = {
  port: number;
  nodes: readonly string[];
  auth?: string;
  probeTimeoutMs: number;
  stats: GlobalStats;
  host?: string;
  probe?: Probe;
  electionIntervalMs?: number;
  forwarder?: Omit<ForwarderOptions, "logger">;
  logger?: Logger;
};

/**
 * Couples the elector and the forwarder of one listening port through
 * their shared PortBinding.
 */
export class PortSupervisor {
  readonly binding: PortBinding;
  readonly elector: MasterElector;
  readonly forwarder: ConnectionForwarder;
  private readonly host?: string;

  constructor(options: PortSupervisorOptions) {
    this.binding = new PortBinding(options.port);
    this.host = options.host;

    this.elector = new MasterElector({
      binding: this.binding,
      nodes: options.nodes,
      auth: options.auth,
      probeTimeoutMs: options.probeTimeoutMs,
      intervalMs: options.electionIntervalMs,
      probe: options.probe,
      logger: options.logger ?? createLogger(`Elector:${options.port}`),
    });

    this.forwarder = new ConnectionForwarder(this.binding, options.stats, {
      ...options.forwarder,
      logger: options.logger ?? createLogger(`Forwarder:${options.port}`),
    });
  }

  get port(): number {
    return this.binding.port;
  }

  async start(): Promise<void> {
    this.elector.start();
    try {
      await this.forwarder.listen(this.binding.port, this.host);
    } catch (err) {
      await this.elector.stop();
      throw err;
    }
  }

  async stop(): Promise<void> {
    await Promise.all([this.elector.stop(), this.forwarder.close()]);
  }
}
