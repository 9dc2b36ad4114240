import express from "express";
import type { Request, Response } from "express";
import { APP_VERSION } from "../config/env.js";

const router = express.Router();

router.get("/", (req: Request, res: Response) => {
  res.status(200).json({ message: "Google Chatbot API is running", version: APP_VERSION });
});

router.get("/health", (req: Request, res: Response) => {
  res.status(200).json({ status: "healthy", services: ["cerebras", "google-oauth"] });
});

export default router;
