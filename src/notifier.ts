import { execFile } from "child_process";

export interface Notifier {
  readonly enabled: boolean;
  ready(): Promise<void>;
  status(text: string): Promise<void>;
}

export class NoopNotifier implements Notifier {
  readonly enabled = false;

  async ready(): Promise<void> {}

  async status(): Promise<void> {}
}

export type CommandRunner = (file: string, args: string[]) => Promise<void>;

const runCommand: CommandRunner = (file, args) =>
  new Promise((resolve, reject) => {
    execFile(file, args, (err) => (err ? reject(err) : resolve()));
  });

/**
 * Talks to systemd through the systemd-notify helper, which reads
 * NOTIFY_SOCKET from the environment it inherits.
 */
export class SystemdNotifier implements Notifier {
  readonly enabled: boolean;
  private readonly run: CommandRunner;

  constructor(env: NodeJS.ProcessEnv = process.env, run: CommandRunner = runCommand) {
    this.enabled = Boolean(env.NOTIFY_SOCKET);
    this.run = run;
  }

  async ready(): Promise<void> {
    if (!this.enabled) return;
    await this.run("systemd-notify", [`--pid=${process.pid}`, "--ready"]);
  }

  async status(text: string): Promise<void> {
    if (!this.enabled) return;
    await this.run("systemd-notify", [`--pid=${process.pid}`, `--status=${text}`]);
  }
}

export function createNotifier(env: NodeJS.ProcessEnv = process.env): Notifier {
  return env.NOTIFY_SOCKET ? new SystemdNotifier(env) : new NoopNotifier();
}
