import type { Request, Response, NextFunction } from "express";
import type { GatewayContext } from "../context.js";
import { extractCredential } from "../admission/credential.js";
import { parsePaymentProof } from "../admission/proof.js";
import {
  PAYMENT_HEADERS,
  type Admitted,
  type Denied,
  type DenialBody,
  type DenialReason,
  type PaymentProof,
} from "../types.js";
import { toBase64 } from "../utils/base64.js";

// ---------------------------------------------------------------------------
// Admission gate
//
// Runs in front of every tool transport.  For each priced tool the request
// wants to call it asks the AdmissionEngine for a decision; the first
// denial ends the request with a 402, otherwise one admission per call is
// stored on res.locals.admissions and the request continues.  Nothing
// downstream runs unless every call was admitted, and a payment proof is
// never stretched over more than one call.
// ---------------------------------------------------------------------------

const DENIAL_MESSAGES: Record<DenialReason, string> = {
  PaymentRequired: "Payment required",
  PriceMismatch: "Payment proof does not match the current price",
  PaymentRejected: "Payment rejected by the settlement authority",
  SettlementUnavailable: "Settlement authority unavailable; payment could not be verified",
};

export function denialBody(denial: Denied, payTo: string): DenialBody {
  return {
    x402Version: 2,
    error: DENIAL_MESSAGES[denial.reasonCode],
    reasonCode: denial.reasonCode,
    price: denial.price,
    acceptedProofFormats: denial.acceptedProofFormats,
    payTo,
    ...(denial.detail ? { detail: denial.detail } : {}),
  };
}

export function sendDenial(res: Response, denial: Denied, payTo: string): void {
  const body = denialBody(denial, payTo);
  res
    .status(denial.httpStatus)
    .set(PAYMENT_HEADERS.REQUIRED, toBase64(body))
    .json(body);
}

/** Decode the proof header, treating anything malformed as absent. */
function readProof(ctx: GatewayContext, req: Request): PaymentProof | undefined {
  const raw = req.headers[PAYMENT_HEADERS.SIGNATURE];
  if (typeof raw !== "string" || raw.trim() === "") return undefined;

  const parsed = parsePaymentProof(raw);
  if (!parsed.ok) {
    ctx.logger.debug({ problem: parsed.problem }, "Ignoring malformed payment proof");
    return undefined;
  }
  return parsed.proof;
}

/** Admissions for one request, one entry per priced call, keyed by tool id. */
export type Admissions = Map<string, Admitted[]>;

/** Use up one recorded admission for `toolId`; undefined once none are left. */
export function takeAdmission(
  locals: { admissions?: Admissions },
  toolId: string,
): Admitted | undefined {
  return locals.admissions?.get(toolId)?.shift();
}

/** Names of the priced tools a request calls, one entry per call. */
export type ToolSelector = (req: Request) => string[];

export function admissionGate(ctx: GatewayContext, selectTools: ToolSelector) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const calls = selectTools(req).filter((id) => ctx.registry.has(id));

    // Not a priced call → nothing to gate
    if (calls.length === 0) return next();

    // Client gone → abort any pending settlement call
    const controller = new AbortController();
    const onClose = () => controller.abort();
    res.on("close", onClose);

    try {
      const credential = extractCredential(req.headers, ctx.config.credentialHeader);
      const proof = readProof(ctx, req);

      const decided = new Map<string, Admitted>();
      let denial: Denied | undefined;
      for (const toolId of new Set(calls)) {
        const result = await ctx.engine.decide(
          { toolId, credential, proof },
          controller.signal,
        );
        if (result.kind === "denied") {
          denial = result;
          break;
        }
        // A payment proof pays for exactly one call
        if (result.reason === "PaymentVerified" && calls.length > 1) {
          denial = ctx.engine.deny(
            result.payment.price,
            "PaymentRejected",
            `one payment proof covers one tool call, got ${calls.length}`,
          );
          break;
        }
        decided.set(toolId, result);
      }

      if (controller.signal.aborted) {
        ctx.logger.info({ toolIds: calls }, "Client disconnected before admission completed");
        return;
      }
      if (denial) {
        sendDenial(res, denial, ctx.config.receivingAddress);
        return;
      }

      const admissions: Admissions = new Map();
      for (const toolId of calls) {
        const admitted = decided.get(toolId);
        if (!admitted) continue;
        admissions.set(toolId, [...(admissions.get(toolId) ?? []), admitted]);
      }
      res.locals.admissions = admissions;
      return next();
    } catch (err) {
      return next(err);
    } finally {
      res.off("close", onClose);
    }
  };
}
