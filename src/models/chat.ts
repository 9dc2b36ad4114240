export type Intent = "gmail" | "calendar" | "drive";

export interface ChatMessage {
  text: string;
  userId?: string;
}

export interface ChatReply {
  text: string;
  intent?: Intent;
  data?: Record<string, unknown>;
}

export interface EmailSummary {
  id: string;
  subject: string;
  sender: string;
  snippet: string;
}

export interface AuthStatus {
  connected: boolean;
  services: string[];
}
