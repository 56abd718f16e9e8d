export type MasterAddress = {
  host: string;
  port: number;
  family: string;
};

export type ProbeResult =
  | { status: "master"; node: string; address: MasterAddress }
  | { status: "not-master"; node: string }
  | { status: "auth-rejected"; node: string }
  | { status: "connect-failed"; node: string; error: Error }
  | { status: "read-failed"; node: string; error: Error };

export type ProbeOptions = {
  auth?: string;
  timeoutMs: number;
};

export type Probe = (
  node: string,
  port: number,
  options: ProbeOptions
) => Promise<ProbeResult>;

export type ElectorState = "searching" | "locked";
