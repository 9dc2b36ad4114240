import express from "express";
import type { NextFunction, Request, Response } from "express";
import cors from "cors";
import { CORS_ORIGINS, TRUST_PROXY, parseFrontendUrl } from "./config/env.js";
import { HttpError, errorMessage } from "./models/errors.js";
import type { ChatRelay } from "./services/aiServices.js";
import type { AuthBroker } from "./services/authService.js";
import type { GmailAccessor } from "./services/gmailService.js";
import authRoutes from "./routes/authRoutes.js";
import chatRoutes from "./routes/chatRoutes.js";
import googleRoutes from "./routes/googleRoutes.js";
import healthRoute from "./routes/healthRoute.js";
import { corsOptions } from "./utils/cors.js";
import logger from "./utils/logger.js";

export interface AppDependencies {
  authBroker: AuthBroker;
  chatRelay: ChatRelay;
  gmailAccessor: GmailAccessor;
  frontendUrl: string;
  corsOrigins?: string[];
}

function statusOf(error: unknown): number {
  if (error instanceof HttpError) return error.status;
  // body-parser errors (malformed JSON, oversized body) carry their own status
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return 500;
}

export function createApp(deps: AppDependencies) {
  const frontendUrl = parseFrontendUrl(deps.frontendUrl);
  const app = express();
  app.set("trust proxy", TRUST_PROXY);
  app.use(cors(corsOptions(deps.corsOrigins ?? CORS_ORIGINS)));
  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on("finish", () => {
      logger.info(`${req.method} ${req.path} ${res.statusCode} ${Date.now() - started}ms`);
    });
    next();
  });

  app.use(healthRoute);
  app.use(authRoutes(deps.authBroker, frontendUrl));
  app.use(chatRoutes(deps.chatRelay));
  app.use(googleRoutes(deps.gmailAccessor));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ detail: "Not Found" });
  });

  // Express only treats four-argument middleware as an error handler
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(error);
    if (status >= 500) logger.error(`❌ ${req.method} ${req.path}: ${errorMessage(error)}`);
    res.status(status).json({ detail: errorMessage(error) });
  });

  return app;
}
