import dotenv from "dotenv";
import { z } from "zod";
dotenv.config();

export const NODE_ENV = process.env.NODE_ENV || "development";
export const PORT = Number(process.env.PORT) || 8000;
export const HOST = process.env.HOST || "0.0.0.0";
export const LOG_LEVEL = process.env.LOG_LEVEL || "info";
export const TRUST_PROXY = process.env.TRUST_PROXY === "true";

export const APP_VERSION = "1.0.0";

const DEFAULT_CORS_ORIGINS = [
  "http://localhost:3000",
  "http://localhost:3002",
  "https://v0-google-integration-chatbot.vercel.app",
  "https://*.v0.app",
  "https://*.vusercontent.net",
];

export const CORS_ORIGINS = process.env.CORS_ORIGINS
  ? process.env.CORS_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean)
  : DEFAULT_CORS_ORIGINS;

export interface GoogleOAuthConfig {
  clientId: string;
  clientSecret: string;
  frontendUrl: string;
}

export interface LlmConfig {
  apiUrl: string;
  apiKey: string;
  model: string;
}

const absoluteUrl = z.string().url();

/** The OAuth callback redirects here, so a value `new URL` cannot parse stops startup. */
export function parseFrontendUrl(value: string): string {
  const parsed = absoluteUrl.safeParse(value);
  if (!parsed.success) {
    throw new Error(`FRONTEND_URL must be an absolute URL, got "${value}"`);
  }
  return parsed.data;
}

export const googleOAuthConfig: GoogleOAuthConfig = {
  clientId: process.env.GOOGLE_CLIENT_ID ?? "",
  clientSecret: process.env.GOOGLE_CLIENT_SECRET ?? "",
  frontendUrl: parseFrontendUrl(process.env.FRONTEND_URL || "https://v0-google-integration-chatbot.vercel.app"),
};

export const llmConfig: LlmConfig = {
  apiUrl: process.env.LLM_API_URL || "https://api.cerebras.ai/v1/chat/completions",
  apiKey: process.env.CEREBRAS_API_KEY ?? "",
  model: process.env.LLM_MODEL || "llama3.1-8b",
};
