export type UserId = string;

/**
 * Token endpoint response, kept as issued. Only `access_token` is checked on
 * the way in; the other fields pass through untouched.
 */
export interface TokenBundle {
  access_token: string;
  refresh_token?: string;
  expires_in?: number;
  scope?: string;
  token_type?: string;
  [field: string]: unknown;
}

export interface SessionStore {
  get(userId: UserId): TokenBundle | undefined;
  /** Replaces any bundle already stored for the user. */
  set(userId: UserId, tokens: TokenBundle): void;
  has(userId: UserId): boolean;
}

// Process-lifetime store: no eviction, nothing survives a restart.
export class InMemorySessionStore implements SessionStore {
  private readonly tokens = new Map<UserId, TokenBundle>();

  get(userId: UserId): TokenBundle | undefined {
    return this.tokens.get(userId);
  }

  set(userId: UserId, tokens: TokenBundle): void {
    this.tokens.set(userId, tokens);
  }

  has(userId: UserId): boolean {
    return this.tokens.has(userId);
  }

  get size(): number {
    return this.tokens.size;
  }
}

export function isTokenBundle(data: unknown): data is TokenBundle {
  return (
    typeof data === "object" &&
    data !== null &&
    "access_token" in data &&
    typeof data.access_token === "string" &&
    data.access_token.length > 0
  );
}
