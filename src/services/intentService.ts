import type { Intent } from "../models/chat.js";

function normalize(text: string): string {
  return text.toLowerCase();
}

const intentKeywords: Record<Intent, string[]> = {
  gmail: ["email", "mail", "gmail"],
  calendar: ["calendar", "schedule", "meeting"],
  drive: ["drive", "file", "document"],
};

// first match wins
const INTENT_PRIORITY: Intent[] = ["gmail", "calendar", "drive"];

// -------------------- Intent detection --------------------
export function detectIntent(message: string): Intent | undefined {
  const normalized = normalize(message);
  return INTENT_PRIORITY.find((intent) =>
    intentKeywords[intent].some((kw) => normalized.includes(kw))
  );
}
