import type { PriceDescriptor, ProofFormat } from "@paywire/pricing";

// ---------------------------------------------------------------------------
// Re-export canonical types from @paywire/pricing.
// ---------------------------------------------------------------------------

export type {
  PriceDescriptor,
  PriceTerms,
  ProofFormat,
  PaymentReceipt,
} from "@paywire/pricing";
export { PAYMENT_HEADERS } from "@paywire/pricing";

// ---------------------------------------------------------------------------
// Decoded structure of the PAYMENT-SIGNATURE header.
//
// The payer signs a transfer of `price` under the price's signing domain
// and base64-encodes this JSON object.  The gateway checks the embedded
// price against the registry, then hands the proof to the settlement
// authority, which owns signature, balance and replay checks.
// ---------------------------------------------------------------------------

export interface PaymentProof {
  payerAddress: string;
  signature: string;
  nonce: string;
  /** The price the payer believes they are paying. */
  price: PriceDescriptor;
  /** Unix timestamp (seconds) after which the proof is void. */
  expiry: number;
}

// ---------------------------------------------------------------------------
// Admission
// ---------------------------------------------------------------------------

export type AdmissionReason =
  | "CredentialValid"
  | "PaymentVerified"
  | "TestingModeBypass";

export type DenialReason =
  | "PaymentRequired"
  | "PriceMismatch"
  | "PaymentRejected"
  | "SettlementUnavailable";

export type Admitted =
  | { kind: "admitted"; reason: "CredentialValid" | "TestingModeBypass" }
  | {
      kind: "admitted";
      reason: "PaymentVerified";
      /** Kept for post-invocation settlement; never handed to tools. */
      payment: { proof: PaymentProof; price: PriceDescriptor; payer?: string };
    };

export interface Denied {
  kind: "denied";
  httpStatus: 402;
  reasonCode: DenialReason;
  price: PriceDescriptor;
  acceptedProofFormats: ProofFormat[];
  /** Diagnostic detail, e.g. the settlement authority's rejection reason. */
  detail?: string;
}

export type AdmissionResult = Admitted | Denied;

/** Body (and base64 PAYMENT-REQUIRED header) of every 402 response. */
export interface DenialBody {
  x402Version: 2;
  error: string;
  reasonCode: DenialReason;
  price: PriceDescriptor;
  acceptedProofFormats: ProofFormat[];
  payTo: string;
  detail?: string;
}
