import type { UpstreamConfig } from "../config.js";
import type { SerperQuery } from "./catalog.js";

export type UpstreamResult =
  | { ok: true; data: unknown }
  | { ok: false; error: string; endpoint: string; status?: number };

/**
 * POST the query to `endpoint` on the upstream API.
 *
 * Never throws: transport and HTTP failures come back as `{ ok: false }`
 * so callers can report them as ordinary tool errors.
 */
export async function callUpstream(
  upstream: UpstreamConfig,
  endpoint: string,
  query: SerperQuery,
): Promise<UpstreamResult> {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (upstream.apiKey) {
    headers["X-API-KEY"] = upstream.apiKey;
    headers["Authorization"] = `Bearer ${upstream.apiKey}`;
  }

  // Drop unset optionals so the upstream applies its own defaults.
  const body = Object.fromEntries(
    Object.entries(query).filter(([, value]) => value !== undefined),
  );

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), upstream.timeoutMs);

  try {
    const res = await fetch(`${upstream.baseUrl}${endpoint}`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    if (!res.ok) {
      const text = await res.text();
      return {
        ok: false,
        error: `Upstream ${endpoint} failed (${res.status}): ${text}`,
        endpoint,
        status: res.status,
      };
    }

    return { ok: true, data: await res.json() };
  } catch (err) {
    const message = err instanceof Error ? err.message : "Upstream unreachable";
    return { ok: false, error: message, endpoint };
  } finally {
    clearTimeout(timeout);
  }
}
