import type { LifecycleState } from "@testbed/schemas";

/** Thrown when a lifecycle operation is called in the wrong state. */
export class LifecycleError extends Error {
  constructor(
    message: string,
    public readonly state: LifecycleState,
  ) {
    super(message);
    this.name = "LifecycleError";
  }
}

/** Thrown when the integration configuration is missing or malformed. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}
