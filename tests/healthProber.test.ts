import * as net from "net";
import { afterEach, describe, expect, it } from "vitest";
import {
  PROBE_BUFFER_SIZE,
  buildProbeCommand,
  classifyReply,
  probeNode,
} from "../src/healthProber";
import { FakeNode, closedPort, listenOnLoopback, startRedisNode } from "./helpers/fakeNodes";

const MASTER_REPLY = "$62\r\n# Replication\r\nrole:master\r\nconnected_slaves:1\r\nmaster_repl_offset:42\r\n";
const REPLICA_REPLY = "$40\r\n# Replication\r\nrole:slave\r\nmaster_port:6379\r\n";

describe("buildProbeCommand", () => {
  it("sends only the role query without a credential", () => {
    expect(buildProbeCommand()).toBe("info replication\r\n");
  });

  it("authenticates before the role query", () => {
    expect(buildProbeCommand("test-secret")).toBe("AUTH test-secret\r\ninfo replication\r\n");
  });
});

describe("classifyReply", () => {
  it("recognises the master marker", () => {
    expect(classifyReply(Buffer.from(MASTER_REPLY))).toBe("master");
  });

  it("recognises a rejected credential", () => {
    expect(classifyReply(Buffer.from("-NOAUTH Authentication required.\r\n"))).toBe("auth-rejected");
  });

  it("treats replicas and garbage as not master", () => {
    expect(classifyReply(Buffer.from(REPLICA_REPLY))).toBe("not-master");
    expect(classifyReply(Buffer.from("-ERR unknown command\r\n"))).toBe("not-master");
  });

  it("prefers the master marker when both markers are present", () => {
    expect(classifyReply(Buffer.from(`-NOAUTH Authentication required.\r\n${MASTER_REPLY}`))).toBe("master");
  });

  it("ignores a marker past the probe buffer", () => {
    const reply = Buffer.concat([Buffer.alloc(PROBE_BUFFER_SIZE, "x"), Buffer.from("role:master")]);
    expect(classifyReply(reply)).toBe("not-master");
  });
});

describe("probeNode", () => {
  let node: FakeNode | null = null;

  afterEach(async () => {
    await node?.close();
    node = null;
  });

  it("returns the resolved address of a master", async () => {
    node = await startRedisNode(MASTER_REPLY);

    const result = await probeNode("127.0.0.1", node.port, { timeoutMs: 1000 });

    expect(result).toEqual({
      status: "master",
      node: "127.0.0.1",
      address: { host: "127.0.0.1", port: node.port, family: "IPv4" },
    });
    expect(node.received).toEqual(["info replication\r\n"]);
  });

  it("sends the credential when one is configured", async () => {
    node = await startRedisNode(`+OK\r\n${MASTER_REPLY}`);

    const result = await probeNode("127.0.0.1", node.port, { auth: "test-secret", timeoutMs: 1000 });

    expect(result.status).toBe("master");
    expect(node.received).toEqual(["AUTH test-secret\r\ninfo replication\r\n"]);
  });

  it("reports a rejected credential", async () => {
    node = await startRedisNode("-NOAUTH Authentication required.\r\n");

    const result = await probeNode("127.0.0.1", node.port, { timeoutMs: 1000 });

    expect(result).toEqual({ status: "auth-rejected", node: "127.0.0.1" });
  });

  it("reports a replica as not master", async () => {
    node = await startRedisNode(REPLICA_REPLY);

    const result = await probeNode("127.0.0.1", node.port, { timeoutMs: 1000 });

    expect(result).toEqual({ status: "not-master", node: "127.0.0.1" });
  });

  it("reports a refused connection as a connect failure", async () => {
    const port = await closedPort();

    const result = await probeNode("127.0.0.1", port, { timeoutMs: 1000 });

    expect(result.status).toBe("connect-failed");
  });

  it("reports a node that hangs up before replying as a read failure", async () => {
    const server = net.createServer((socket) => socket.end());
    const port = await listenOnLoopback(server);

    try {
      const result = await probeNode("127.0.0.1", port, { timeoutMs: 1000 });
      expect(result.status).toBe("read-failed");
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });

  it("gives up on a node that never answers", async () => {
    node = await startRedisNode(null);

    const result = await probeNode("127.0.0.1", node.port, { timeoutMs: 200 });

    expect(result.status).toBe("read-failed");
    if (result.status === "read-failed") {
      expect(result.error.message).toBe("read timed out after 200ms");
    }
  });
});
