export type Result = Success | Failure;

export class Success {
  constructor(public readonly events: number) {}
}

export class Failure extends Error {
  constructor(
    public readonly reason: string,
    public readonly events: number
  ) {
    super(`Unable to send ${events} events: ${reason}`);
    this.name = 'Failure';
  }
}

export class ShapingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShapingError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
