import type { Request, Response } from "express";
import type { PriceRegistry } from "@paywire/pricing";
import { generateDiscovery, serializeDiscovery, type DiscoveryOptions } from "./generator.js";

/**
 * Returns an Express route handler that serves the discovery document.
 *
 * ```ts
 * app.get("/.well-known/x402", discoveryHandler(registry, { publicBaseUrl, payTo }));
 * ```
 *
 * The registry is immutable, so the document is rendered once.
 */
export function discoveryHandler(
  registry: PriceRegistry,
  opts: DiscoveryOptions,
) {
  const body = serializeDiscovery(generateDiscovery(registry, opts));

  return (_req: Request, res: Response) => {
    res
      .set("Content-Type", "application/json")
      .set("Cache-Control", "public, max-age=300")
      .send(body);
  };
}
