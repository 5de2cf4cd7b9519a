/**
 * Error types raised at the site's boundaries
 */

export class MissingEnvironmentError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing required environment variables ${missing.join(",")}`);
    this.name = "MissingEnvironmentError";
  }
}

export class BackendError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BackendError";
  }
}
