/**
 * Error types raised while talking to the event platform.
 */

/**
 * The HTTP call itself failed: connection error, timeout, or a non-2xx
 * status. `status` is set when the server answered.
 */
export class TransportError extends Error {
  override name = "TransportError";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * The server answered with JSON that lacks the expected shape (no `data`,
 * no `people`, GraphQL `errors`). List fetches downgrade this to an empty
 * page; it only surfaces from callers that want the raw failure.
 */
export class MalformedResponseError extends Error {
  override name = "MalformedResponseError";
}

/** One or more environment variables are missing or invalid. */
export class ConfigError extends Error {
  override name = "ConfigError";

  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
  }
}
