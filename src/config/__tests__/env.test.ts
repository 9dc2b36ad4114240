import { describe, test, expect } from "vitest";
import { parseFrontendUrl } from "../env.js";

describe("parseFrontendUrl", () => {
  test("accepts an absolute URL", () => {
    expect(parseFrontendUrl("https://frontend.example.com")).toBe("https://frontend.example.com");
    expect(parseFrontendUrl("http://localhost:3000")).toBe("http://localhost:3000");
  });

  test("rejects a host without a scheme", () => {
    expect(() => parseFrontendUrl("frontend.example.com")).toThrow(
      'FRONTEND_URL must be an absolute URL, got "frontend.example.com"'
    );
  });

  test("rejects an empty value", () => {
    expect(() => parseFrontendUrl("")).toThrow('FRONTEND_URL must be an absolute URL, got ""');
  });
});
