import { Command } from "commander";
import { z } from "zod";
import { ConfigError } from "./errors";

const NodeSchema = z.string().min(1, "Node hostname cannot be empty");

const PortSchema = z
  .number()
  .int()
  .min(1)
  .max(65535, "Port must be between 1 and 65535");

const ShutdownConfigSchema = z.object({
  timeout: z
    .number()
    .int()
    .min(1000, "Shutdown timeout must be at least 1000ms"),
});

const ConfigSchema = z.object({
  nodes: z.array(NodeSchema).min(1, "Must specify at least one redis node"),
  ports: z.array(PortSchema).min(1, "Must specify at least one listening port"),
  auth: z.string().min(1).optional(),
  probeTimeoutMs: z
    .number()
    .int()
    .min(100, "Probe timeout must be at least 100ms"),
  shutdown: ShutdownConfigSchema,
});

const EnvSchema = z.object({
  REDIS_NODES: z.string().optional(),
  LISTEN_PORTS: z.string().optional(),
  REDIS_AUTH: z.string().optional(),
  PROBE_TIMEOUT: z
    .string()
    .optional()
    .transform((val) => (val ? parseFloat(val) : 1)),
  SHUTDOWN_TIMEOUT: z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : 30000)),
});

export type ShutdownConfig = z.infer<typeof ShutdownConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type EnvConfig = z.infer<typeof EnvSchema>;

export type CliOptions = {
  nodes?: string;
  ports?: string;
  auth?: string;
  timeout?: string;
  shutdownTimeout?: string;
};

export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseCli(argv: readonly string[]): CliOptions {
  const program = new Command()
    .name("redis-master-forwarder")
    .description("Forward TCP traffic to whichever redis node is currently master")
    .option("--nodes <list>", "comma-separated list of redis nodes hostnames")
    .option("--ports <list>", "comma-separated list of listening ports")
    .option("--auth <secret>", "redis auth string")
    .option("--timeout <seconds>", "base timeout for each master probe")
    .option("--shutdown-timeout <ms>", "how long to wait for sessions on shutdown")
    .exitOverride();

  program.parse([...argv], { from: "user" });
  return program.opts<CliOptions>();
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

export function createConfig(
  cli: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const envResult = EnvSchema.safeParse(env);
  if (!envResult.success) {
    throw new ConfigError(describeIssues(envResult.error));
  }
  const fromEnv = envResult.data;

  const timeoutSeconds = cli.timeout !== undefined ? parseFloat(cli.timeout) : fromEnv.PROBE_TIMEOUT;
  const shutdownTimeout =
    cli.shutdownTimeout !== undefined ? parseInt(cli.shutdownTimeout, 10) : fromEnv.SHUTDOWN_TIMEOUT;

  const config = {
    nodes: splitList(cli.nodes ?? fromEnv.REDIS_NODES),
    ports: splitList(cli.ports ?? fromEnv.LISTEN_PORTS).map(Number),
    auth: (cli.auth ?? fromEnv.REDIS_AUTH) || undefined,
    probeTimeoutMs: Math.round(timeoutSeconds * 1000),
    shutdown: {
      timeout: shutdownTimeout,
    },
  };

  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(describeIssues(result.error));
  }
  return result.data;
}

export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Config {
  return createConfig(parseCli(argv), env);
}

export { ConfigSchema, EnvSchema, ShutdownConfigSchema };
