export class ForwarderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ForwarderError";
  }
}

export class ConfigError extends ForwarderError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export class BindError extends ForwarderError {
  constructor(public readonly port: number, originalError: Error) {
    super(`Can't open listening socket for port ${port}: ${originalError.message}`);
    this.name = "BindError";
  }
}

export class DialError extends ForwarderError {
  constructor(target: string, reason: string) {
    super(`Can't dial master ${target}: ${reason}`);
    this.name = "DialError";
  }
}
