import { describe, test, expect, beforeEach, vi } from "vitest";

const { mockGmail, setCredentials } = vi.hoisted(() => ({
  mockGmail: {
    users: {
      messages: {
        list: vi.fn(),
        get: vi.fn(),
      },
    },
  },
  setCredentials: vi.fn(),
}));

vi.mock("googleapis", () => ({
  google: {
    auth: {
      OAuth2: class {
        setCredentials = setCredentials;
      },
    },
    gmail: () => mockGmail,
  },
}));

import { DETAIL_FETCH_CAP, GmailAccessor, toEmailSummary } from "../gmailService.js";
import { InMemorySessionStore } from "../../models/session.js";
import { UnauthenticatedError, UpstreamError } from "../../models/errors.js";

function messageWithHeaders(id: string) {
  return {
    data: {
      id,
      snippet: `Snippet for ${id}`,
      payload: {
        headers: [
          { name: "From", value: `Sender ${id} <sender-${id}@example.com>` },
          { name: "Subject", value: `Subject ${id}` },
        ],
      },
    },
  };
}

let sessions: InMemorySessionStore;
let accessor: GmailAccessor;

beforeEach(() => {
  vi.clearAllMocks();
  sessions = new InMemorySessionStore();
  sessions.set("42", { access_token: "test-access-token", expires_in: 3599, scope: "openid", token_type: "Bearer" });
  accessor = new GmailAccessor(sessions);
  mockGmail.users.messages.get.mockImplementation(async ({ id }: { id: string }) => messageWithHeaders(id));
});

describe("GmailAccessor.listGmail", () => {
  test("rejects an unknown user without calling Google", async () => {
    await expect(accessor.listGmail("nobody")).rejects.toBeInstanceOf(UnauthenticatedError);
    expect(setCredentials).not.toHaveBeenCalled();
    expect(mockGmail.users.messages.list).not.toHaveBeenCalled();
    expect(mockGmail.users.messages.get).not.toHaveBeenCalled();
  });

  test("authenticates with the stored access token only", async () => {
    mockGmail.users.messages.list.mockResolvedValue({ data: { messages: [] } });

    await accessor.listGmail("42");

    expect(setCredentials).toHaveBeenCalledWith({ access_token: "test-access-token" });
  });

  test("lists up to limit ids for the signed-in mailbox", async () => {
    mockGmail.users.messages.list.mockResolvedValue({ data: {} });

    const result = await accessor.listGmail("42", 25);

    expect(mockGmail.users.messages.list).toHaveBeenCalledWith({ userId: "me", maxResults: 25 });
    expect(result).toEqual({ emails: [] });
  });

  test("defaults the list limit to 10", async () => {
    mockGmail.users.messages.list.mockResolvedValue({ data: { messages: [] } });

    await accessor.listGmail("42");

    expect(mockGmail.users.messages.list).toHaveBeenCalledWith({ userId: "me", maxResults: 10 });
  });

  test("fetches detail for at most five messages", async () => {
    const ids = ["m1", "m2", "m3", "m4", "m5", "m6", "m7"];
    mockGmail.users.messages.list.mockResolvedValue({ data: { messages: ids.map((id) => ({ id })) } });

    const { emails } = await accessor.listGmail("42", 10);

    expect(DETAIL_FETCH_CAP).toBe(5);
    expect(mockGmail.users.messages.get).toHaveBeenCalledTimes(5);
    expect(emails.map((e) => e.id)).toEqual(["m1", "m2", "m3", "m4", "m5"]);
  });

  test("fetches fewer when the list is shorter than the cap", async () => {
    mockGmail.users.messages.list.mockResolvedValue({ data: { messages: [{ id: "m1" }, { id: "m2" }] } });

    const { emails } = await accessor.listGmail("42", 2);

    expect(mockGmail.users.messages.get).toHaveBeenCalledTimes(2);
    expect(mockGmail.users.messages.get).toHaveBeenNthCalledWith(1, { userId: "me", id: "m1" });
    expect(mockGmail.users.messages.get).toHaveBeenNthCalledWith(2, { userId: "me", id: "m2" });
    expect(emails).toEqual([
      { id: "m1", subject: "Subject m1", sender: "Sender m1 <sender-m1@example.com>", snippet: "Snippet for m1" },
      { id: "m2", subject: "Subject m2", sender: "Sender m2 <sender-m2@example.com>", snippet: "Snippet for m2" },
    ]);
  });

  test("wraps Google API failures", async () => {
    mockGmail.users.messages.list.mockRejectedValue(new Error("Invalid Credentials"));

    const error = await accessor.listGmail("42").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ status: 500, message: "Gmail access failed: Invalid Credentials" });
  });
});

describe("toEmailSummary", () => {
  test("falls back when headers and snippet are missing", () => {
    expect(toEmailSummary("m9", { payload: {} })).toEqual({
      id: "m9",
      subject: "No Subject",
      sender: "Unknown Sender",
      snippet: "",
    });
  });

  test("matches header names exactly", () => {
    const summary = toEmailSummary("m9", {
      snippet: "hi",
      payload: { headers: [{ name: "subject", value: "lowercase" }, { name: "From", value: "a@example.com" }] },
    });

    expect(summary.subject).toBe("No Subject");
    expect(summary.sender).toBe("a@example.com");
  });
});
