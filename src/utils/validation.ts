import type { ZodError } from "zod";

export function issuesToDetail(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "request"}: ${i.message}`).join("; ");
}
