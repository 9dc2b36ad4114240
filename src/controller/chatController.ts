import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { HttpError, errorMessage } from "../models/errors.js";
import type { ChatRelay } from "../services/aiServices.js";
import logger from "../utils/logger.js";
import { issuesToDetail } from "../utils/validation.js";

const chatBodySchema = z.object({
  message: z.string({ required_error: "message is required" }),
  user_id: z.string().nullish(),
});

export function chatHandler(relay: ChatRelay) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const parsed = chatBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ detail: issuesToDetail(parsed.error) });
      return;
    }
    const { message, user_id } = parsed.data;

    try {
      const reply = await relay.chat({ text: message, userId: user_id ?? undefined });
      logger.info(`💬 Chat reply for ${user_id ?? "anonymous"} (intent: ${reply.intent ?? "none"})`);
      res.json({ response: reply.text, intent: reply.intent, data: reply.data });
    } catch (error) {
      next(new HttpError(500, `Chat processing failed: ${errorMessage(error)}`));
    }
  };
}
