import { createHash, timingSafeEqual } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";

const BEARER = /^bearer\s+(\S+)$/i;

/**
 * Pull the internal credential out of `headerName`.
 *
 * Accepts either the raw secret or a `Bearer <secret>` wrapper and returns
 * the bare secret.  Anything else (absent, empty, repeated, or containing
 * whitespace) is treated as no credential at all.
 */
export function extractCredential(
  headers: IncomingHttpHeaders,
  headerName: string,
): string | undefined {
  const raw = headers[headerName.toLowerCase()];
  if (typeof raw !== "string") return undefined;

  const value = raw.trim();
  if (!value) return undefined;

  const bearer = BEARER.exec(value);
  if (bearer) return bearer[1];

  return /\s/.test(value) ? undefined : value;
}

/** Constant-time comparison against the configured secret. */
export function credentialMatches(
  candidate: string | undefined,
  secret: string | undefined,
): boolean {
  if (candidate === undefined || secret === undefined) return false;
  // Digests give equal-length buffers, so length never leaks either.
  const a = createHash("sha256").update(candidate).digest();
  const b = createHash("sha256").update(secret).digest();
  return timingSafeEqual(a, b);
}
