import { probeNode } from "./healthProber";
import { Logger, createLogger } from "./logger";
import { PortBinding, formatAddress } from "./portBinding";
import { MasterAddress, Probe } from "./types";

export const MAX_ELECTION_ATTEMPTS = 3;
export const ELECTION_INTERVAL_MS = 1000;

export function probeTimeoutForAttempt(baseMs: number, attempt: number): number {
  if (!Number.isInteger(attempt) || attempt < 1) {
    throw new RangeError(`Attempt must be a positive integer, got ${attempt}`);
  }
  return baseMs * attempt;
}

export type MasterElectorOptions = {
  binding: PortBinding;
  nodes: readonly string[];
  auth?: string;
  probeTimeoutMs: number;
  intervalMs?: number;
  probe?: Probe;
  logger?: Logger;
};

export class MasterElector {
  private readonly binding: PortBinding;
  private readonly nodes: readonly string[];
  private readonly auth?: string;
  private readonly probeTimeoutMs: number;
  private readonly interval: number;
  private readonly probe: Probe;
  private readonly logger: Logger;

  private running = false;
  private loop: Promise<void> | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(options: MasterElectorOptions) {
    this.binding = options.binding;
    this.nodes = options.nodes;
    this.auth = options.auth;
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.interval = options.intervalMs ?? ELECTION_INTERVAL_MS;
    this.probe = options.probe ?? probeNode;
    this.logger = options.logger ?? createLogger(`Elector:${options.binding.port}`);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wake?.();
    await this.loop;
    this.loop = null;
  }

  /**
   * Runs up to MAX_ELECTION_ATTEMPTS ordered passes over the candidates and
   * publishes the outcome to the port binding.
   */
  async determineMaster(): Promise<MasterAddress | null> {
    let master: MasterAddress | null = null;

    for (let attempt = 1; attempt <= MAX_ELECTION_ATTEMPTS && !master; attempt++) {
      master = await this.runCycle(probeTimeoutForAttempt(this.probeTimeoutMs, attempt));
    }

    this.publish(master);
    return master;
  }

  private async runCycle(timeoutMs: number): Promise<MasterAddress | null> {
    const port = this.binding.port;

    for (const node of this.nodes) {
      const result = await this.probe(node, port, { auth: this.auth, timeoutMs });

      switch (result.status) {
        case "master":
          return result.address;
        case "auth-rejected":
          this.logger.warn(`${node}:${port}: NOAUTH Authentication required`);
          break;
        case "connect-failed":
          this.logger.log(`Can't connect to ${node}:${port}: ${result.error.message}`);
          break;
        case "read-failed":
          this.logger.log(`Can't read reply from ${node}:${port}: ${result.error.message}`);
          break;
        case "not-master":
          break;
      }
    }

    return null;
  }

  private publish(master: MasterAddress | null): void {
    const changed = this.binding.update(master);

    if (master && changed) {
      this.logger.log(`Changing master to ${formatAddress(master)}`);
    } else if (!master) {
      this.logger.warn(
        `No masters found for port ${this.binding.port}! Will not serve new connections until master is found...`
      );
    }
  }

  private async run(): Promise<void> {
    while (this.running) {
      try {
        await this.determineMaster();
      } catch (err) {
        this.logger.error(
          "Election round failed:",
          err instanceof Error ? err.message : err
        );
      }
      if (!this.running) break;
      await this.sleep();
    }
  }

  private sleep(): Promise<void> {
    return new Promise((resolve) => {
      this.wake = () => {
        this.wake = null;
        resolve();
      };
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake?.();
      }, this.interval);
    });
  }
}
