import fetch from "node-fetch";
import type { GoogleOAuthConfig } from "../config/env.js";
import type { AuthStatus } from "../models/chat.js";
import { AuthExchangeError, errorMessage } from "../models/errors.js";
import { err, ok, type Result } from "../models/result.js";
import { isTokenBundle, type SessionStore, type UserId } from "../models/session.js";
import logger from "../utils/logger.js";

const GOOGLE_AUTH_URL = "https://accounts.google.com/o/oauth2/auth";
const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";
const GOOGLE_USERINFO_URL = "https://www.googleapis.com/oauth2/v2/userinfo";

export const GOOGLE_SCOPES = [
  "openid",
  "email",
  "profile",
  "https://www.googleapis.com/auth/gmail.readonly",
  "https://www.googleapis.com/auth/calendar.readonly",
  "https://www.googleapis.com/auth/drive.readonly",
];

// Reported on connect regardless of which scopes the user actually granted.
export const CONNECTED_SERVICES = ["gmail", "calendar", "drive"];

export const CALLBACK_PATH = "/auth/google/callback";

export function callbackUrl(requestBaseUrl: string): string {
  return `${requestBaseUrl.replace(/\/+$/, "")}${CALLBACK_PATH}`;
}

function userIdOf(profile: unknown): UserId | undefined {
  if (typeof profile !== "object" || profile === null || !("id" in profile)) return undefined;
  const { id } = profile;
  if (typeof id === "string" && id) return id;
  if (typeof id === "number") return String(id);
  return undefined;
}

/**
 * Google authorization-code flow. Tokens land in the injected store keyed by
 * the Google profile id.
 *
 * The authorization URL carries no `state` parameter, so the callback has no
 * anti-forgery check.
 */
export class AuthBroker {
  constructor(
    private readonly config: GoogleOAuthConfig,
    private readonly sessions: SessionStore
  ) {}

  beginAuth(requestBaseUrl: string): { authUrl: string } {
    if (!this.config.clientId) {
      throw new Error("GOOGLE_CLIENT_ID is not configured");
    }
    const params = new URLSearchParams({
      client_id: this.config.clientId,
      redirect_uri: callbackUrl(requestBaseUrl),
      scope: GOOGLE_SCOPES.join(" "),
      response_type: "code",
      access_type: "offline",
      prompt: "consent",
    });
    return { authUrl: `${GOOGLE_AUTH_URL}?${params.toString()}` };
  }

  /** Never throws: every failure comes back as an `AuthExchangeError`. */
  async completeAuth(code: string, requestBaseUrl: string): Promise<Result<UserId, AuthExchangeError>> {
    try {
      const tokenResponse = await fetch(GOOGLE_TOKEN_URL, {
        method: "POST",
        body: new URLSearchParams({
          client_id: this.config.clientId,
          client_secret: this.config.clientSecret,
          code,
          grant_type: "authorization_code",
          redirect_uri: callbackUrl(requestBaseUrl),
        }),
      });
      const tokens = await tokenResponse.json();
      if (!isTokenBundle(tokens)) {
        logger.warn(`Token exchange failed with status ${tokenResponse.status}`);
        return err(new AuthExchangeError("Failed to get access token"));
      }

      const userInfoResponse = await fetch(GOOGLE_USERINFO_URL, {
        headers: { Authorization: `Bearer ${tokens.access_token}` },
      });
      const userId = userIdOf(await userInfoResponse.json());
      if (!userId) {
        logger.warn(`Userinfo lookup failed with status ${userInfoResponse.status}`);
        return err(new AuthExchangeError("Failed to get user info"));
      }

      this.sessions.set(userId, tokens);
      logger.info(`Stored Google tokens for user ${userId}`);
      return ok(userId);
    } catch (e) {
      logger.warn(`OAuth callback failed: ${errorMessage(e)}`);
      return err(new AuthExchangeError(errorMessage(e)));
    }
  }

  authStatus(userId: UserId): AuthStatus {
    if (this.sessions.has(userId)) {
      return { connected: true, services: [...CONNECTED_SERVICES] };
    }
    return { connected: false, services: [] };
  }
}
