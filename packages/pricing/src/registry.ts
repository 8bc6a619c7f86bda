import type {
  PriceDescriptor,
  PriceTerms,
  PricedTool,
  ProofFormat,
} from "./types.js";

// ---------------------------------------------------------------------------
// Wire header names (lower-case, as Node exposes them).
// ---------------------------------------------------------------------------

export const PAYMENT_HEADERS = {
  /** Server → Client: base64 JSON denial body (on 402). */
  REQUIRED: "payment-required",

  /** Client → Server: base64 JSON payment proof. */
  SIGNATURE: "payment-signature",

  /** Server → Client: base64 JSON settlement receipt (on 200). */
  RESPONSE: "payment-response",
} as const;

/** Fields every decoded payment proof must carry. */
export const PROOF_FIELDS = [
  "payerAddress",
  "signature",
  "nonce",
  "price",
  "expiry",
] as const;

const MAX_DECIMALS = 36;

export class PricingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PricingError";
  }
}

// ---------------------------------------------------------------------------
// PriceRegistry — built once from the tool catalogue, read-only afterwards.
// ---------------------------------------------------------------------------

export class PriceRegistry {
  private constructor(
    private readonly prices: ReadonlyMap<string, PriceDescriptor>,
  ) {}

  /**
   * Build the registry from every registered tool. Throws a PricingError
   * naming all offending tools if any tool is unpriced, duplicated, or
   * carries malformed terms.
   */
  static fromTools(tools: readonly PricedTool[]): PriceRegistry {
    const prices = new Map<string, PriceDescriptor>();
    const seen = new Set<string>();
    const problems: string[] = [];

    for (const tool of tools) {
      if (seen.has(tool.id)) {
        problems.push(`${tool.id}: registered more than once`);
        continue;
      }
      seen.add(tool.id);
      if (!tool.price) {
        problems.push(`${tool.id}: no price declared`);
        continue;
      }
      const issues = termIssues(tool.price);
      if (issues.length > 0) {
        problems.push(`${tool.id}: ${issues.join(", ")}`);
        continue;
      }
      prices.set(tool.id, Object.freeze({ toolId: tool.id, ...tool.price }));
    }

    if (problems.length > 0) {
      throw new PricingError(`Cannot price tools: ${problems.join("; ")}`);
    }
    return new PriceRegistry(prices);
  }

  resolve(toolId: string): PriceDescriptor | undefined {
    return this.prices.get(toolId);
  }

  has(toolId: string): boolean {
    return this.prices.has(toolId);
  }

  /** All descriptors in registration order (defensive copy). */
  all(): readonly PriceDescriptor[] {
    return [...this.prices.values()];
  }

  get size(): number {
    return this.prices.size;
  }
}

function termIssues(terms: PriceTerms): string[] {
  const issues: string[] = [];
  if (!/^\d+$/.test(terms.amount)) {
    issues.push(`amount "${terms.amount}" is not a non-negative integer`);
  }
  if (
    !Number.isInteger(terms.assetDecimals) ||
    terms.assetDecimals < 0 ||
    terms.assetDecimals > MAX_DECIMALS
  ) {
    issues.push(`assetDecimals ${terms.assetDecimals} is out of range`);
  }
  if (!terms.assetAddress) issues.push("assetAddress is empty");
  if (!terms.network) issues.push("network is empty");
  if (!terms.signingDomainName) issues.push("signingDomainName is empty");
  if (!terms.signingDomainVersion) issues.push("signingDomainVersion is empty");
  return issues;
}

// ---------------------------------------------------------------------------
// Structural comparison
// ---------------------------------------------------------------------------

/**
 * True when two descriptors describe the same price. Amounts compare as
 * integers and asset addresses ignore hex checksum casing; every other
 * field must match exactly.
 */
export function samePrice(a: PriceDescriptor, b: PriceDescriptor): boolean {
  return (
    a.toolId === b.toolId &&
    sameAmount(a.amount, b.amount) &&
    a.assetAddress.toLowerCase() === b.assetAddress.toLowerCase() &&
    a.assetDecimals === b.assetDecimals &&
    a.network === b.network &&
    a.signingDomainName === b.signingDomainName &&
    a.signingDomainVersion === b.signingDomainVersion
  );
}

function sameAmount(a: string, b: string): boolean {
  if (!/^\d+$/.test(a) || !/^\d+$/.test(b)) return false;
  return BigInt(a) === BigInt(b);
}

// ---------------------------------------------------------------------------
// 402 helpers
// ---------------------------------------------------------------------------

/** Proof formats a caller may use to pay for `price`. */
export function acceptedProofFormats(
  price: PriceDescriptor,
  receivingAddress: string,
): ProofFormat[] {
  return [
    {
      scheme: "exact",
      header: PAYMENT_HEADERS.SIGNATURE,
      encoding: "base64-json",
      network: price.network,
      payTo: receivingAddress,
      signingDomain: {
        name: price.signingDomainName,
        version: price.signingDomainVersion,
      },
      fields: PROOF_FIELDS,
    },
  ];
}
