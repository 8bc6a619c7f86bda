import type { PaymentProof, PaymentReceipt, PriceDescriptor } from "../types.js";

// ---------------------------------------------------------------------------
// Settlement authority contract
//
// The authority is the single source of truth for whether a proof pays:
// signature, balance, expiry and at-most-once (replay) acceptance all live
// there.  Implementations must be safe to call concurrently.
// ---------------------------------------------------------------------------

export type SettlementVerdict =
  | { status: "valid"; payer?: string }
  | { status: "invalid"; reason: string }
  | { status: "unreachable"; reason: string };

export interface SettlementCallOptions {
  signal?: AbortSignal;
}

export interface SettlementClient {
  verify(
    proof: PaymentProof,
    price: PriceDescriptor,
    receivingAddress: string,
    options?: SettlementCallOptions,
  ): Promise<SettlementVerdict>;

  /** Capture a verified payment. Resolves undefined when settlement failed. */
  settle(
    proof: PaymentProof,
    price: PriceDescriptor,
    receivingAddress: string,
    options?: SettlementCallOptions,
  ): Promise<PaymentReceipt | undefined>;
}

// ── Facilitator wire DTOs ─────────────────────────────────────────────────

export interface FacilitatorRequest {
  proof: PaymentProof;
  price: PriceDescriptor;
  receivingAddress: string;
}

export interface FacilitatorVerifyResponse {
  isValid: boolean;
  invalidReason?: string;
  payer?: string;
}

export interface FacilitatorSettleResponse {
  success: boolean;
  transaction?: string;
  network?: string;
  payer?: string;
  errorReason?: string;
}

interface FacilitatorReply {
  status: number;
  /** Parsed JSON, or undefined when the body was not JSON or never arrived. */
  body: unknown;
}

// ---------------------------------------------------------------------------
// HTTP facilitator client: POST {endpoint}/verify and {endpoint}/settle
// ---------------------------------------------------------------------------

export class HttpSettlementClient implements SettlementClient {
  constructor(
    private readonly endpoint: string,
    private readonly timeoutMs: number,
  ) {}

  async verify(
    proof: PaymentProof,
    price: PriceDescriptor,
    receivingAddress: string,
    options: SettlementCallOptions = {},
  ): Promise<SettlementVerdict> {
    let reply: FacilitatorReply;
    try {
      reply = await this.post("/verify", { proof, price, receivingAddress }, options.signal);
    } catch (error) {
      return { status: "unreachable", reason: describeFailure(error, "verify") };
    }

    const { status, body } = reply;
    if (status >= 500 || !isVerifyResponse(body)) {
      return {
        status: "unreachable",
        reason: `facilitator /verify answered ${status} without a verdict`,
      };
    }
    if (body.isValid) {
      return { status: "valid", payer: body.payer };
    }
    return { status: "invalid", reason: body.invalidReason ?? "payment rejected" };
  }

  async settle(
    proof: PaymentProof,
    price: PriceDescriptor,
    receivingAddress: string,
    options: SettlementCallOptions = {},
  ): Promise<PaymentReceipt | undefined> {
    const { status, body } = await this.post(
      "/settle",
      { proof, price, receivingAddress },
      options.signal,
    );
    if (status < 200 || status >= 300 || !isSettleResponse(body) || !body.success) {
      return undefined;
    }
    return {
      txHash: body.transaction,
      network: body.network ?? price.network,
      payer: body.payer ?? proof.payerAddress,
      amount: price.amount,
      timestamp: Date.now(),
      settled: true,
    };
  }

  /** POST and read the JSON reply; the timeout covers the body as well as the headers. */
  private async post(
    path: string,
    body: FacilitatorRequest,
    signal?: AbortSignal,
  ): Promise<FacilitatorReply> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });
    if (signal?.aborted) controller.abort();

    try {
      const response = await fetch(`${this.endpoint}${path}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      return { status: response.status, body: await readJson(response) };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}

async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isVerifyResponse(value: unknown): value is FacilitatorVerifyResponse {
  return (
    isRecord(value) &&
    typeof value.isValid === "boolean" &&
    (value.invalidReason === undefined || typeof value.invalidReason === "string") &&
    (value.payer === undefined || typeof value.payer === "string")
  );
}

function isSettleResponse(value: unknown): value is FacilitatorSettleResponse {
  return (
    isRecord(value) &&
    typeof value.success === "boolean" &&
    (value.transaction === undefined || typeof value.transaction === "string") &&
    (value.network === undefined || typeof value.network === "string") &&
    (value.payer === undefined || typeof value.payer === "string")
  );
}

function describeFailure(error: unknown, call: string): string {
  if (error instanceof Error && error.name === "AbortError") {
    return `facilitator /${call} timed out or was aborted`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `facilitator /${call} failed: ${message}`;
}

/**
 * Stand-in used when no facilitator is configured (testing mode only, which
 * never reaches the authority).  Fails closed if it is ever consulted.
 */
export class UnconfiguredSettlementClient implements SettlementClient {
  async verify(): Promise<SettlementVerdict> {
    return { status: "unreachable", reason: "no settlement authority configured" };
  }

  async settle(): Promise<PaymentReceipt | undefined> {
    return undefined;
  }
}
