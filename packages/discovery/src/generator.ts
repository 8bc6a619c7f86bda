import {
  acceptedProofFormats,
  type PriceDescriptor,
  type PriceRegistry,
  type ProofFormat,
} from "@paywire/pricing";

// ---------------------------------------------------------------------------
// Discovery document
//
// Served at GET /.well-known/x402 so wallets and agents can learn every
// paid tool, its price and how to pay for it without triggering a 402.
// ---------------------------------------------------------------------------

/** Top-level discovery document. */
export interface Discovery {
  x402Version: 2;
  name: string;
  description: string;
  url: string;
  /** Address every payment must be made out to. */
  payTo: string;
  tools: DiscoveryTool[];
}

/** One paid tool in the discovery document. */
export interface DiscoveryTool {
  toolId: string;
  description: string;
  /** Public URL the tool can be invoked at. */
  resource: string;
  price: PriceDescriptor;
  acceptedProofFormats: ProofFormat[];
}

export interface DiscoveryOptions {
  name?: string;
  description?: string;
  /** Public base URL used to build resource URIs. */
  publicBaseUrl: string;
  payTo: string;
  /** Per-tool descriptions, keyed by tool id. */
  descriptions?: Readonly<Record<string, string>>;
}

/**
 * Generate a discovery document from a PriceRegistry.
 *
 * ```ts
 * const doc = generateDiscovery(registry, {
 *   publicBaseUrl: "https://tools.example.com",
 *   payTo: "0xabc…",
 * });
 * ```
 */
export function generateDiscovery(
  registry: PriceRegistry,
  opts: DiscoveryOptions,
): Discovery {
  const base = opts.publicBaseUrl.replace(/\/+$/, "");

  return {
    x402Version: 2,
    name: opts.name ?? "paywire",
    description: opts.description ?? "Payment-gated tool gateway",
    url: base,
    payTo: opts.payTo,
    tools: registry.all().map((p) => ({
      toolId: p.toolId,
      description: opts.descriptions?.[p.toolId] ?? "",
      resource: `${base}/tools/${encodeURIComponent(p.toolId)}`,
      price: p,
      acceptedProofFormats: acceptedProofFormats(p, opts.payTo),
    })),
  };
}

export function serializeDiscovery(doc: Discovery): string {
  return JSON.stringify(doc, null, 2);
}
