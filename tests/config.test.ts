import { describe, expect, it } from "vitest";
import { createConfig, loadConfig, parseCli, splitList } from "../src/config";
import { ConfigError } from "../src/errors";

describe("splitList", () => {
  it("trims entries and drops empty ones", () => {
    expect(splitList(" redis-a, redis-b ,,redis-c ")).toEqual(["redis-a", "redis-b", "redis-c"]);
    expect(splitList(undefined)).toEqual([]);
  });
});

describe("parseCli", () => {
  it("reads every flag", () => {
    expect(
      parseCli([
        "--nodes", "redis-a,redis-b",
        "--ports", "6379,6380",
        "--auth", "test-secret",
        "--timeout", "0.5",
        "--shutdown-timeout", "5000",
      ])
    ).toEqual({
      nodes: "redis-a,redis-b",
      ports: "6379,6380",
      auth: "test-secret",
      timeout: "0.5",
      shutdownTimeout: "5000",
    });
  });
});

describe("createConfig", () => {
  it("builds the configuration from flags with defaults", () => {
    expect(createConfig({ nodes: "redis-a,redis-b", ports: "6379,6380" }, {})).toEqual({
      nodes: ["redis-a", "redis-b"],
      ports: [6379, 6380],
      auth: undefined,
      probeTimeoutMs: 1000,
      shutdown: { timeout: 30000 },
    });
  });

  it("falls back to the environment", () => {
    const config = createConfig(
      {},
      { REDIS_NODES: "redis-a", LISTEN_PORTS: "6379", REDIS_AUTH: "test-secret", PROBE_TIMEOUT: "2" }
    );

    expect(config.nodes).toEqual(["redis-a"]);
    expect(config.ports).toEqual([6379]);
    expect(config.auth).toBe("test-secret");
    expect(config.probeTimeoutMs).toBe(2000);
  });

  it("lets flags win over the environment", () => {
    const config = loadConfig(
      ["--nodes", "redis-b", "--ports", "7000", "--timeout", "0.25"],
      { REDIS_NODES: "redis-a", LISTEN_PORTS: "6379", PROBE_TIMEOUT: "2" }
    );

    expect(config.nodes).toEqual(["redis-b"]);
    expect(config.ports).toEqual([7000]);
    expect(config.probeTimeoutMs).toBe(250);
  });

  it("treats an empty credential as no credential", () => {
    expect(createConfig({ nodes: "redis-a", ports: "6379", auth: "" }, {}).auth).toBeUndefined();
    expect(createConfig({ nodes: "redis-a", ports: "6379" }, { REDIS_AUTH: "" }).auth).toBeUndefined();
  });

  it("refuses to start without nodes or ports", () => {
    let caught: unknown;
    try {
      createConfig({}, {});
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toEqual([
        "nodes: Must specify at least one redis node",
        "ports: Must specify at least one listening port",
      ]);
    }
  });

  it("rejects ports outside the TCP range", () => {
    expect(() => createConfig({ nodes: "redis-a", ports: "6379,70000" }, {})).toThrow(
      "ports.1: Port must be between 1 and 65535"
    );
  });
});
