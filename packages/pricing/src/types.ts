// ---------------------------------------------------------------------------
// Payment protocol types — shared across all paywire packages
// ---------------------------------------------------------------------------

/** Priced terms a tool declares, independent of which tool they belong to. */
export interface PriceTerms {
  /** Integer amount in the asset's smallest unit, as a decimal string. */
  amount: string;
  /** Token contract address the payment is made in. */
  assetAddress: string;
  assetDecimals: number;
  /** Chain the payment settles on, e.g. "sepolia". */
  network: string;
  /** Typed-data signing domain the payer signs under. */
  signingDomainName: string;
  signingDomainVersion: string;
}

/** The resolved, immutable price of one registered tool. */
export interface PriceDescriptor extends PriceTerms {
  toolId: string;
}

/** Anything the registry can be built from: a tool id plus its declared price. */
export interface PricedTool {
  id: string;
  description?: string;
  price?: PriceTerms;
}

// ── Proof formats advertised in 402 responses ─────────────────────────────

export interface ProofFormat {
  scheme: "exact";
  /** Request header the proof travels in. */
  header: string;
  encoding: "base64-json";
  network: string;
  /** Address the payment must be made out to. */
  payTo: string;
  signingDomain: { name: string; version: string };
  /** Fields the decoded proof object must carry. */
  fields: readonly string[];
}

/** Receipt attached to a successful paid call via the payment-response header. */
export interface PaymentReceipt {
  txHash?: string;
  network: string;
  payer: string;
  amount: string;
  timestamp: number;
  settled: boolean;
}
