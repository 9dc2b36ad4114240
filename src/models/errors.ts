export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class UnauthenticatedError extends HttpError {
  constructor(message = "User not authenticated") {
    super(401, message);
    this.name = "UnauthenticatedError";
  }
}

/** A completion or Google API call failed; the message carries the upstream detail. */
export class UpstreamError extends HttpError {
  constructor(message: string) {
    super(500, message);
    this.name = "UpstreamError";
  }
}

// Never rendered as a status code: the OAuth callback turns it into a redirect.
export class AuthExchangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthExchangeError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
