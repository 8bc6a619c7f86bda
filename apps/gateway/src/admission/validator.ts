import { samePrice } from "@paywire/pricing";
import type { SettlementClient, SettlementVerdict } from "../settlement/client.js";
import type { PaymentProof, PriceDescriptor } from "../types.js";

export type ProofCheck =
  | { outcome: "verified"; payer?: string }
  | { outcome: "price-mismatch" }
  | { outcome: "rejected"; reason: string }
  | { outcome: "unavailable"; reason: string };

export interface PaymentProofValidatorOptions {
  settlement: SettlementClient;
  receivingAddress: string;
  /** Upper bound on one authority call. */
  timeoutMs: number;
  now?: () => number;
}

/**
 * Structural pre-checks (price snapshot, local expiry) followed by a single
 * bounded call to the settlement authority.  Signature, balance and replay
 * checks are the authority's alone.
 */
export class PaymentProofValidator {
  private readonly now: () => number;

  constructor(private readonly opts: PaymentProofValidatorOptions) {
    this.now = opts.now ?? Date.now;
  }

  async check(
    proof: PaymentProof,
    price: PriceDescriptor,
    signal?: AbortSignal,
  ): Promise<ProofCheck> {
    if (!samePrice(proof.price, price)) {
      return { outcome: "price-mismatch" };
    }
    if (proof.expiry * 1000 <= this.now()) {
      return { outcome: "rejected", reason: "proof expired" };
    }

    const verdict = await this.verifyWithin(proof, price, signal);
    switch (verdict.status) {
      case "valid":
        return { outcome: "verified", payer: verdict.payer };
      case "invalid":
        return { outcome: "rejected", reason: verdict.reason };
      case "unreachable":
        return { outcome: "unavailable", reason: verdict.reason };
    }
  }

  private async verifyWithin(
    proof: PaymentProof,
    price: PriceDescriptor,
    signal?: AbortSignal,
  ): Promise<SettlementVerdict> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });
    if (signal?.aborted) controller.abort();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<SettlementVerdict>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          status: "unreachable",
          reason: `settlement authority did not answer within ${this.opts.timeoutMs}ms`,
        });
      }, this.opts.timeoutMs);
    });

    const call = this.opts.settlement
      .verify(proof, price, this.opts.receivingAddress, { signal: controller.signal })
      .catch((error: unknown): SettlementVerdict => ({
        status: "unreachable",
        reason: error instanceof Error ? error.message : String(error),
      }));

    try {
      return await Promise.race([call, deadline]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
