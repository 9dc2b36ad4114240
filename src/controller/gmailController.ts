import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import type { GmailAccessor } from "../services/gmailService.js";
import { issuesToDetail } from "../utils/validation.js";

const gmailQuerySchema = z.object({
  user_id: z.string({ required_error: "user_id is required" }).min(1, "user_id is required"),
  limit: z.coerce.number().int().positive().max(500).default(10),
});

export function gmailHandler(accessor: GmailAccessor) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const parsed = gmailQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ detail: issuesToDetail(parsed.error) });
      return;
    }

    try {
      res.json(await accessor.listGmail(parsed.data.user_id, parsed.data.limit));
    } catch (error) {
      next(error);
    }
  };
}
