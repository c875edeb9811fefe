export class PlatformError extends Error {
  constructor(
    readonly status: number,
    readonly method: string,
    readonly path: string,
    detail: string,
  ) {
    super(`${method} ${path} failed with ${status}${detail ? `: ${detail}` : ""}`);
    this.name = "PlatformError";
  }
}

export class RateLimitError extends Error {
  constructor(
    message: string,
    readonly retryAfterSec: number,
  ) {
    super(message);
    this.name = "RateLimitError";
  }
}

/** A local quota is exhausted. Callers report this as a blocked action, not a fault. */
export class DailyLimitError extends Error {
  constructor(
    readonly action: "comment",
    readonly limit: number,
  ) {
    super(`Daily ${action} limit of ${limit} reached`);
    this.name = "DailyLimitError";
  }
}

export class NameTakenError extends Error {
  constructor(readonly rejectedName: string) {
    super(`Name '${rejectedName}' is already taken`);
    this.name = "NameTakenError";
  }
}
