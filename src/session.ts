import * as net from "net";
import { GlobalStats } from "./stats";
import { Logger } from "./logger";

type Direction = "client->master" | "master->client";

/**
 * One client socket spliced to one master socket. Each direction is an
 * independent pipe; whichever ends first tears down both sockets, which in
 * turn ends the other pipe.
 */
export class ProxiedSession {
  private readonly clientSocket: net.Socket;
  private readonly serverSocket: net.Socket;
  private readonly stats: GlobalStats;
  private readonly logger: Logger;
  private readonly onClose?: () => void;
  private openPipes = 0;

  constructor(
    clientSocket: net.Socket,
    serverSocket: net.Socket,
    stats: GlobalStats,
    logger: Logger,
    onClose?: () => void
  ) {
    this.clientSocket = clientSocket;
    this.serverSocket = serverSocket;
    this.stats = stats;
    this.logger = logger;
    this.onClose = onClose;

    this.pipe(clientSocket, serverSocket, "client->master");
    this.pipe(serverSocket, clientSocket, "master->client");
  }

  destroy(): void {
    this.clientSocket.destroy();
    this.serverSocket.destroy();
  }

  private pipe(source: net.Socket, sink: net.Socket, direction: Direction): void {
    let finished = false;
    let paused = false;

    this.openPipes++;
    this.stats.pipeOpened();

    const finish = () => {
      if (finished) return;
      finished = true;

      source.removeListener("data", onData);
      if (sink.destroyed) {
        source.destroy();
      } else {
        sink.end(() => sink.destroy());
        source.destroy();
      }

      this.stats.pipeClosed();
      this.openPipes--;
      if (this.openPipes === 0) this.onClose?.();
    };

    const onData = (chunk: Buffer) => {
      if (!sink.writable) return;
      const canWrite = sink.write(chunk);
      if (!canWrite && !paused) {
        paused = true;
        source.pause();
        sink.once("drain", () => {
          paused = false;
          source.resume();
        });
      }
    };

    source.on("data", onData);
    source.on("end", finish);
    source.on("close", finish);
    source.on("error", (err) => {
      this.logger.log(`Session ${direction} error: ${err.message}`);
      finish();
    });

    source.resume();
  }
}
