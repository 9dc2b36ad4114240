import type { CorsOptions } from "cors";

function escapeRegex(text: string): string {
  return text.replace(/[.+?^${}()|[\]\\]/g, "\\$&");
}

// "https://*.v0.app" matches any subdomain depth but not the bare domain
function patternToRegex(pattern: string): RegExp {
  const source = pattern.split("*").map(escapeRegex).join("[a-z0-9-]+(?:\\.[a-z0-9-]+)*");
  return new RegExp(`^${source}$`, "i");
}

export function isAllowedOrigin(origin: string, patterns: string[]): boolean {
  return patterns.some((p) => (p.includes("*") ? patternToRegex(p).test(origin) : p === origin));
}

export function corsOptions(patterns: string[]): CorsOptions {
  return {
    origin: (origin, callback) => {
      // same-origin and non-browser requests carry no Origin header
      callback(null, !origin || isAllowedOrigin(origin, patterns));
    },
    credentials: true,
  };
}
