import { Router } from "express";
import { chatHandler } from "../controller/chatController.js";
import type { ChatRelay } from "../services/aiServices.js";

export default function chatRoutes(relay: ChatRelay): Router {
  const router = Router();
  router.post("/chat", chatHandler(relay));
  return router;
}
