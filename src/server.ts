import { createApp } from "./app.js";
import { HOST, PORT, googleOAuthConfig, llmConfig } from "./config/env.js";
import { InMemorySessionStore } from "./models/session.js";
import { ChatRelay } from "./services/aiServices.js";
import { AuthBroker } from "./services/authService.js";
import { GmailAccessor } from "./services/gmailService.js";
import logger from "./utils/logger.js";

const sessions = new InMemorySessionStore();

const app = createApp({
  authBroker: new AuthBroker(googleOAuthConfig, sessions),
  chatRelay: new ChatRelay(llmConfig),
  gmailAccessor: new GmailAccessor(sessions),
  frontendUrl: googleOAuthConfig.frontendUrl,
});

if (!googleOAuthConfig.clientId) logger.warn("⚠️ GOOGLE_CLIENT_ID is not set, /auth/google will fail");
if (!llmConfig.apiKey) logger.warn("⚠️ CEREBRAS_API_KEY is not set, /chat will be rejected upstream");

const server = app.listen(PORT, HOST, () => {
  logger.info(`🚀 Backend ready on http://${HOST}:${PORT}`);
});

function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close((error) => {
    if (error) {
      logger.error(`Shutdown failed: ${error.message}`);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
