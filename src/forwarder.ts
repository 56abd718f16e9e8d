import * as net from "net";
import { BindError, DialError } from "./errors";
import { Logger, createLogger } from "./logger";
import { PortBinding, formatAddress } from "./portBinding";
import { ProxiedSession } from "./session";
import { GlobalStats } from "./stats";
import { MasterAddress } from "./types";

export const DIAL_TIMEOUT_MS = 3000;
export const KEEP_ALIVE_MS = 5000;

export type Dialer = (master: MasterAddress) => net.Socket;

const dialMaster: Dialer = (master) => net.connect({ host: master.host, port: master.port });

export type ForwarderOptions = {
  dialTimeoutMs?: number;
  dial?: Dialer;
  keepAliveMs?: number;
  logger?: Logger;
};

export class ConnectionForwarder {
  private readonly binding: PortBinding;
  private readonly stats: GlobalStats;
  private readonly dialTimeout: number;
  private readonly keepAlive: number;
  private readonly dialer: Dialer;
  private readonly logger: Logger;
  private server: net.Server | null;
  private sessions: Set<ProxiedSession>;
  private pendingDials: Set<net.Socket>;

  constructor(binding: PortBinding, stats: GlobalStats, options: ForwarderOptions = {}) {
    this.binding = binding;
    this.stats = stats;
    this.dialTimeout = options.dialTimeoutMs ?? DIAL_TIMEOUT_MS;
    this.keepAlive = options.keepAliveMs ?? KEEP_ALIVE_MS;
    this.dialer = options.dial ?? dialMaster;
    this.logger = options.logger ?? createLogger(`Forwarder:${binding.port}`);
    this.server = null;
    this.sessions = new Set();
    this.pendingDials = new Set();
  }

  get sessionCount(): number {
    return this.sessions.size + this.pendingDials.size;
  }

  listen(port: number, host?: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = net.createServer({ pauseOnConnect: true }, (clientSocket) =>
        this.handleConnection(clientSocket)
      );

      const onListenError = (err: Error) => reject(new BindError(port, err));
      server.once("error", onListenError);
      server.listen(port, host, () => {
        server.removeListener("error", onListenError);
        server.on("error", (err) =>
          this.logger.error(`Can't accept connection on port ${this.binding.port}: ${err.message}`)
        );
        this.server = server;
        resolve();
      });
    });
  }

  address(): net.AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === "object" ? address : null;
  }

  // Stops accepting. Open sessions are left to drain on their own.
  async close(): Promise<void> {
    const server = this.server;
    this.server = null;
    server?.close();
  }

  destroySessions(): void {
    this.pendingDials.forEach((socket) => socket.destroy());
    this.sessions.forEach((session) => session.destroy());
  }

  handleConnection(clientSocket: net.Socket): void {
    const master = this.binding.current();

    if (!master) {
      clientSocket.destroy();
      return;
    }

    this.stats.recordConnection();
    this.dial(master, clientSocket);
  }

  private dial(master: MasterAddress, clientSocket: net.Socket): void {
    const target = formatAddress(master);
    const serverSocket = this.dialer(master);
    this.pendingDials.add(serverSocket);
    let settled = false;

    const abandon = (err: DialError) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      this.pendingDials.delete(serverSocket);
      this.logger.error(err.message);
      serverSocket.destroy();
      clientSocket.destroy();
    };

    const timeout = setTimeout(
      () => abandon(new DialError(target, `timed out after ${this.dialTimeout}ms`)),
      this.dialTimeout
    );

    const onDialError = (err: Error) => abandon(new DialError(target, err.message));
    serverSocket.once("error", onDialError);

    // a client hanging up before the dial completes must not leak the dial
    const onClientGone = () => abandon(new DialError(target, "client went away"));
    clientSocket.once("error", onClientGone);
    clientSocket.once("close", onClientGone);

    serverSocket.once("connect", () => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      this.pendingDials.delete(serverSocket);
      serverSocket.removeListener("error", onDialError);
      clientSocket.removeListener("error", onClientGone);
      clientSocket.removeListener("close", onClientGone);

      clientSocket.setKeepAlive(true, this.keepAlive);
      serverSocket.setKeepAlive(true, this.keepAlive);

      const session: ProxiedSession = new ProxiedSession(
        clientSocket,
        serverSocket,
        this.stats,
        this.logger,
        () => this.sessions.delete(session)
      );
      this.sessions.add(session);
    });
  }
}
