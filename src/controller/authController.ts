import type { Request, Response } from "express";
import { z } from "zod";
import { AuthExchangeError, errorMessage } from "../models/errors.js";
import { err, type Result } from "../models/result.js";
import type { UserId } from "../models/session.js";
import type { AuthBroker } from "../services/authService.js";
import logger from "../utils/logger.js";
import { issuesToDetail } from "../utils/validation.js";

const callbackQuerySchema = z.object({
  code: z.string().optional(),
  error: z.string().optional(),
});

const statusQuerySchema = z.object({
  user_id: z.string({ required_error: "user_id is required" }).min(1, "user_id is required"),
});

export function requestBaseUrl(req: Request): string {
  return `${req.protocol}://${req.get("host") ?? ""}`;
}

/** The only place an OAuth outcome becomes a frontend redirect. */
export function authRedirectUrl(frontendUrl: string, result: Result<UserId, AuthExchangeError>): string {
  const url = new URL(frontendUrl);
  if (result.ok) {
    url.searchParams.set("auth", "success");
    url.searchParams.set("user_id", result.value);
  } else {
    url.searchParams.set("auth", "error");
    url.searchParams.set("message", result.error.message);
  }
  return url.toString();
}

export function googleAuthHandler(broker: AuthBroker) {
  return (req: Request, res: Response) => {
    try {
      const { authUrl } = broker.beginAuth(requestBaseUrl(req));
      res.json({ auth_url: authUrl });
    } catch (error) {
      logger.error(`OAuth initiation failed: ${errorMessage(error)}`);
      res.status(500).json({ detail: `OAuth initiation failed: ${errorMessage(error)}` });
    }
  };
}

// The caller is a browser mid-navigation: every outcome is a redirect.
export function googleCallbackHandler(broker: AuthBroker, frontendUrl: string) {
  return async (req: Request, res: Response) => {
    const parsed = callbackQuerySchema.safeParse(req.query);
    const query: z.infer<typeof callbackQuerySchema> = parsed.success ? parsed.data : {};

    let result: Result<UserId, AuthExchangeError>;
    if (query.error) {
      result = err(new AuthExchangeError(`Authorization denied: ${query.error}`));
    } else if (!query.code) {
      result = err(new AuthExchangeError("Missing authorization code"));
    } else {
      result = await broker.completeAuth(query.code, requestBaseUrl(req));
    }
    res.redirect(authRedirectUrl(frontendUrl, result));
  };
}

export function authStatusHandler(broker: AuthBroker) {
  return (req: Request, res: Response) => {
    const parsed = statusQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ detail: issuesToDetail(parsed.error) });
      return;
    }
    res.json(broker.authStatus(parsed.data.user_id));
  };
}
