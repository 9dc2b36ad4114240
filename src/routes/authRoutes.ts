import { Router } from "express";
import { authStatusHandler, googleAuthHandler, googleCallbackHandler } from "../controller/authController.js";
import type { AuthBroker } from "../services/authService.js";

export default function authRoutes(broker: AuthBroker, frontendUrl: string): Router {
  const router = Router();
  router.get("/auth/google", googleAuthHandler(broker));
  router.get("/auth/google/callback", googleCallbackHandler(broker, frontendUrl));
  router.get("/auth/status", authStatusHandler(broker));
  return router;
}
