import * as net from "net";
import { MasterAddress, ProbeOptions, ProbeResult } from "./types";

export const PROBE_BUFFER_SIZE = 4096;

const MASTER_MARKER = Buffer.from("role:master");
const NOAUTH_MARKER = Buffer.from("-NOAUTH");

export type ReplyClass = "master" | "auth-rejected" | "not-master";

export function buildProbeCommand(auth?: string): string {
  if (auth) {
    return `AUTH ${auth}\r\ninfo replication\r\n`;
  }
  return "info replication\r\n";
}

export function classifyReply(reply: Buffer): ReplyClass {
  const window = reply.subarray(0, PROBE_BUFFER_SIZE);
  if (window.includes(MASTER_MARKER)) return "master";
  if (window.includes(NOAUTH_MARKER)) return "auth-rejected";
  return "not-master";
}

/**
 * Connects to one candidate node, asks for its replication role and reads
 * a single reply. Never rejects: every failure becomes a ProbeResult.
 */
export function probeNode(
  node: string,
  port: number,
  options: ProbeOptions
): Promise<ProbeResult> {
  return new Promise((resolve) => {
    const socket = net.connect({ host: node, port });
    let connected = false;
    let settled = false;

    const finish = (result: ProbeResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      socket.destroy();
      resolve(result);
    };

    const fail = (error: Error) =>
      finish(
        connected
          ? { status: "read-failed", node, error }
          : { status: "connect-failed", node, error }
      );

    let timeout = setTimeout(
      () => fail(new Error(`connect timed out after ${options.timeoutMs}ms`)),
      options.timeoutMs
    );

    socket.on("connect", () => {
      connected = true;
      clearTimeout(timeout);
      timeout = setTimeout(
        () => fail(new Error(`read timed out after ${options.timeoutMs}ms`)),
        options.timeoutMs
      );
      socket.write(buildProbeCommand(options.auth));
    });

    socket.once("data", (chunk: Buffer) => {
      const reply = classifyReply(chunk);
      if (reply === "master") {
        const address: MasterAddress = {
          host: socket.remoteAddress ?? node,
          port: socket.remotePort ?? port,
          family: socket.remoteFamily ?? "IPv4",
        };
        finish({ status: "master", node, address });
        return;
      }
      finish({ status: reply, node });
    });

    socket.on("end", () => fail(new Error("connection closed before reply")));
    socket.on("error", (err) => fail(err));
  });
}
