import { google, type gmail_v1 } from "googleapis";
import type { EmailSummary } from "../models/chat.js";
import { UnauthenticatedError, UpstreamError, errorMessage } from "../models/errors.js";
import type { SessionStore, UserId } from "../models/session.js";
import logger from "../utils/logger.js";

/** Full message detail is fetched for at most this many ids, whatever the list limit. */
export const DETAIL_FETCH_CAP = 5;

const MAILBOX = "me";

function headerValue(headers: gmail_v1.Schema$MessagePartHeader[], name: string): string | undefined {
  return headers.find((h) => h.name === name)?.value ?? undefined;
}

export function toEmailSummary(id: string, message: gmail_v1.Schema$Message): EmailSummary {
  const headers = message.payload?.headers ?? [];
  return {
    id,
    subject: headerValue(headers, "Subject") ?? "No Subject",
    sender: headerValue(headers, "From") ?? "Unknown Sender",
    snippet: message.snippet ?? "",
  };
}

export class GmailAccessor {
  constructor(private readonly sessions: SessionStore) {}

  private client(accessToken: string): gmail_v1.Gmail {
    // access token only: an expired token fails at Google, it is never refreshed
    const auth = new google.auth.OAuth2();
    auth.setCredentials({ access_token: accessToken });
    return google.gmail({ version: "v1", auth });
  }

  async listGmail(userId: UserId, limit = 10): Promise<{ emails: EmailSummary[] }> {
    const tokens = this.sessions.get(userId);
    if (!tokens) throw new UnauthenticatedError();

    const gmail = this.client(tokens.access_token);
    try {
      const list = await gmail.users.messages.list({ userId: MAILBOX, maxResults: limit });
      const ids = (list.data.messages ?? [])
        .flatMap((m) => (m.id ? [m.id] : []))
        .slice(0, DETAIL_FETCH_CAP);

      const emails: EmailSummary[] = [];
      for (const id of ids) {
        const message = await gmail.users.messages.get({ userId: MAILBOX, id });
        emails.push(toEmailSummary(id, message.data));
      }
      return { emails };
    } catch (e) {
      logger.error(`Gmail request for user ${userId} failed: ${errorMessage(e)}`);
      throw new UpstreamError(`Gmail access failed: ${errorMessage(e)}`);
    }
  }
}
