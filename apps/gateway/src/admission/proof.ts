import { z } from "zod";
import type { PaymentProof } from "../types.js";
import { toBase64 } from "../utils/base64.js";

// ---------------------------------------------------------------------------
// PAYMENT-SIGNATURE decoding
//
// A header that is not base64 JSON of the expected shape is treated as if
// no proof had been sent: the caller gets a 402 telling them how to pay.
// ---------------------------------------------------------------------------

const nonEmpty = z.string().trim().min(1);

const priceSchema = z.object({
  toolId: nonEmpty,
  amount: z.string().regex(/^\d+$/),
  assetAddress: nonEmpty,
  assetDecimals: z.number().int().min(0),
  network: nonEmpty,
  signingDomainName: nonEmpty,
  signingDomainVersion: nonEmpty,
});

const proofSchema = z.object({
  payerAddress: nonEmpty,
  signature: nonEmpty,
  nonce: nonEmpty,
  price: priceSchema,
  expiry: z.number().int().positive(),
});

const BASE64 = /^[A-Za-z0-9+/_-]+={0,2}$/;

export type ProofParse =
  | { ok: true; proof: PaymentProof }
  | { ok: false; problem: string };

export function parsePaymentProof(raw: string): ProofParse {
  const compact = raw.trim();
  if (!BASE64.test(compact)) {
    return { ok: false, problem: "not base64" };
  }

  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(compact, "base64").toString("utf-8"));
  } catch {
    return { ok: false, problem: "not JSON" };
  }

  const parsed = proofSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "(root)");
    return { ok: false, problem: `invalid fields: ${[...new Set(fields)].join(", ")}` };
  }
  return { ok: true, proof: parsed.data };
}

/** Encode a proof the way clients send it. */
export function encodePaymentProof(proof: PaymentProof): string {
  return toBase64(proof);
}
