import { Router } from "express";
import { gmailHandler } from "../controller/gmailController.js";
import type { GmailAccessor } from "../services/gmailService.js";

export default function googleRoutes(accessor: GmailAccessor): Router {
  const router = Router();
  router.get("/google/gmail", gmailHandler(accessor));
  return router;
}
