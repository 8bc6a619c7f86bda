import { acceptedProofFormats, type PriceRegistry } from "@paywire/pricing";
import type { Logger } from "../utils/logger.js";
import type { PaymentProofValidator } from "./validator.js";
import { credentialMatches } from "./credential.js";
import type {
  AdmissionResult,
  Denied,
  DenialReason,
  PaymentProof,
  PriceDescriptor,
} from "../types.js";

export interface AdmissionRequest {
  toolId: string;
  credential?: string;
  proof?: PaymentProof;
}

export interface AdmissionEngineOptions {
  registry: PriceRegistry;
  validator: PaymentProofValidator;
  receivingAddress: string;
  internalCredential?: string;
  testingMode: boolean;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// AdmissionEngine
//
// Decides whether one tool call may run.  Rules, first match wins:
//
//   1. Testing mode           → admit (TestingModeBypass)
//   2. Internal credential    → admit (CredentialValid)
//   3. Payment proof          → price check, then settlement authority
//   4. Nothing                → deny (PaymentRequired)
//
// Holds no per-request state; safe to share across concurrent requests.
// ---------------------------------------------------------------------------

export class AdmissionEngine {
  private readonly log: Logger;

  constructor(private readonly opts: AdmissionEngineOptions) {
    this.log = opts.logger.child({ component: "admission" });
  }

  async decide(
    request: AdmissionRequest,
    signal?: AbortSignal,
  ): Promise<AdmissionResult> {
    const { toolId, credential, proof } = request;
    const price = this.opts.registry.resolve(toolId);
    if (!price) {
      throw new Error(`No price registered for tool "${toolId}"`);
    }

    if (this.opts.testingMode) {
      this.log.warn(
        { toolId },
        "TESTING MODE: admitting tool call without payment or credential",
      );
      return { kind: "admitted", reason: "TestingModeBypass" };
    }

    if (credentialMatches(credential, this.opts.internalCredential)) {
      this.log.debug({ toolId }, "Admitted with internal credential");
      return { kind: "admitted", reason: "CredentialValid" };
    }

    if (proof) {
      const check = await this.opts.validator.check(proof, price, signal);
      switch (check.outcome) {
        case "verified":
          this.log.info(
            { toolId, payer: check.payer ?? proof.payerAddress, nonce: proof.nonce },
            "Payment verified",
          );
          return {
            kind: "admitted",
            reason: "PaymentVerified",
            payment: { proof, price, payer: check.payer },
          };
        case "price-mismatch":
          return this.deny(price, "PriceMismatch", "proof was signed for a different price");
        case "rejected":
          return this.deny(price, "PaymentRejected", check.reason);
        case "unavailable":
          this.log.warn({ toolId, reason: check.reason }, "Settlement authority unavailable");
          return this.deny(price, "SettlementUnavailable", check.reason);
      }
    }

    return this.deny(price, "PaymentRequired");
  }

  /** Build (and log) a 402 denial for `price`. */
  deny(
    price: PriceDescriptor,
    reasonCode: DenialReason,
    detail?: string,
  ): Denied {
    this.log.info({ toolId: price.toolId, reasonCode, detail }, "Admission denied");
    return {
      kind: "denied",
      httpStatus: 402,
      reasonCode,
      price,
      acceptedProofFormats: acceptedProofFormats(price, this.opts.receivingAddress),
      ...(detail ? { detail } : {}),
    };
  }
}
