import fetch from "node-fetch";
import type { LlmConfig } from "../config/env.js";
import type { ChatMessage, ChatReply } from "../models/chat.js";
import { UpstreamError } from "../models/errors.js";
import logger from "../utils/logger.js";
import { detectIntent } from "./intentService.js";

export const SYSTEM_PROMPT =
  "You are a helpful assistant that can access Google services like Gmail, Calendar, and Drive. Analyze user requests and provide helpful responses.";

interface LMChoice {
  message: { role: "assistant" | "user" | "system"; content: string };
}
interface LMResponse {
  choices: LMChoice[];
}

function isLMResponse(data: unknown): data is LMResponse {
  if (typeof data !== "object" || data === null || !("choices" in data)) return false;
  const { choices } = data;
  if (!Array.isArray(choices) || choices.length === 0) return false;
  const first: unknown = choices[0];
  return (
    typeof first === "object" &&
    first !== null &&
    "message" in first &&
    typeof first.message === "object" &&
    first.message !== null &&
    "content" in first.message &&
    typeof first.message.content === "string"
  );
}

export class ChatRelay {
  constructor(private readonly config: LlmConfig) {}

  async generateAIResponse(text: string): Promise<string> {
    const lmResponse = await fetch(this.config.apiUrl, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.config.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: text },
        ],
        max_tokens: 500,
        temperature: 0.7,
        stream: false,
      }),
    });

    if (!lmResponse.ok) {
      const body = await lmResponse.text();
      logger.error(`Completion API returned ${lmResponse.status}: ${body}`);
      throw new UpstreamError(`Completion API error: ${body}`);
    }

    const raw = await lmResponse.json();
    if (!isLMResponse(raw)) throw new UpstreamError("Unexpected completion response");
    return raw.choices[0].message.content;
  }

  async chat(message: ChatMessage): Promise<ChatReply> {
    const text = await this.generateAIResponse(message.text);
    const intent = detectIntent(message.text);
    return intent ? { text, intent } : { text };
  }
}
