import { ElectorState, MasterAddress } from "./types";

export function sameAddress(
  a: MasterAddress | null,
  b: MasterAddress | null
): boolean {
  if (a === null || b === null) return a === b;
  return a.host === b.host && a.port === b.port;
}

export function formatAddress(address: MasterAddress): string {
  return address.family === "IPv6"
    ? `[${address.host}]:${address.port}`
    : `${address.host}:${address.port}`;
}

/**
 * The current master for one listening port. Written only by that port's
 * elector, read by its forwarder on every accept. Both happen on the event
 * loop, so a read always sees a whole address or none.
 */
export class PortBinding {
  readonly port: number;
  private master: MasterAddress | null;

  constructor(port: number) {
    this.port = port;
    this.master = null;
  }

  current(): MasterAddress | null {
    return this.master ? { ...this.master } : null;
  }

  get state(): ElectorState {
    return this.master ? "locked" : "searching";
  }

  // Returns true when the stored address actually changed.
  update(next: MasterAddress | null): boolean {
    const changed = !sameAddress(this.master, next);
    this.master = next ? { ...next } : null;
    return changed;
  }
}
