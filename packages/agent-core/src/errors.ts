export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export class PlannerError extends Error {
  readonly retryable: boolean;

  constructor(message: string, options: { retryable: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "PlannerError";
    this.retryable = options.retryable;
  }
}

export class DispatchError extends Error {
  readonly reason: "sink_busy" | "sink_unreachable" | "sink_closed" | "superseded";

  constructor(reason: DispatchError["reason"], message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DispatchError";
    this.reason = reason;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
