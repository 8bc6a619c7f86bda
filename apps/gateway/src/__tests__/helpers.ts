import express, { type Express, type Response } from "express";
import type { Server } from "http";
import { price, type PriceDescriptor } from "@paywire/pricing";
import { createLogger, type Logger } from "../utils/logger.js";
import type { GatewayContext } from "../context.js";
import type { PaymentProof } from "../types.js";

// ---------------------------------------------------------------------------
// Shared fixtures for the gateway tests
// ---------------------------------------------------------------------------

export const ASSET = "0x3e17730bb2ca51a8D5deD7E44c003A2e95a4d822";
export const PAY_TO = "0x00000000000000000000000000000000000000aA";
export const PAYER = "0x00000000000000000000000000000000000000bB";

export const SEARCH_TERMS = price()
  .costs("10000000000000")
  .asset(ASSET, 6)
  .on("sepolia")
  .domain("IATPWallet", "1")
  .build();

let nonceCounter = 0;

/** A structurally valid proof for `priced`, expiring ten minutes from now. */
export function makeProof(
  priced: PriceDescriptor,
  overrides: Partial<PaymentProof> = {},
): PaymentProof {
  nonceCounter++;
  return {
    payerAddress: PAYER,
    signature: `0xsig-${nonceCounter}`,
    nonce: `nonce-${nonceCounter}`,
    price: { ...priced },
    expiry: Math.floor(Date.now() / 1000) + 600,
    ...overrides,
  };
}

export { toBase64 } from "../utils/base64.js";

/** Decode a base64 JSON header back to its value. */
export function decodeHeader(encoded: string | null): unknown {
  if (encoded === null) return undefined;
  return JSON.parse(Buffer.from(encoded, "base64").toString("utf-8"));
}

export function priceOf(ctx: GatewayContext, toolId: string): PriceDescriptor {
  const found = ctx.registry.resolve(toolId);
  if (!found) throw new Error(`fixture tool ${toolId} is not priced`);
  return found;
}

// ── Log capture ────────────────────────────────────────────────────────────

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export function captureLogs(level = "debug"): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLogger(level, {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  });
  return { logger, lines };
}

// ── In-process servers ─────────────────────────────────────────────────────

export async function listen(app: Express): Promise<{ server: Server; baseUrl: string }> {
  return new Promise((resolve) => {
    const server = app.listen(0, () => {
      const addr = server.address();
      const port = typeof addr === "object" && addr ? addr.port : 0;
      resolve({ server, baseUrl: `http://127.0.0.1:${port}` });
    });
  });
}

export function close(server: Server | undefined): void {
  server?.closeAllConnections();
  server?.close();
}

export interface CannedResponse {
  status: number;
  body: unknown;
}

export interface FacilitatorState {
  verifyCalls: unknown[];
  settleCalls: unknown[];
  verify: CannedResponse;
  settle: CannedResponse;
  /** Delay before /verify answers. */
  delayMs: number;
  /** Send headers and half a body, then never finish. */
  stallBody: boolean;
}

/** Settlement authority stand-in: records every call and answers canned verdicts. */
export function fakeFacilitator() {
  const state: FacilitatorState = {
    verifyCalls: [],
    settleCalls: [],
    verify: { status: 200, body: { isValid: true, payer: PAYER } },
    settle: {
      status: 200,
      body: { success: true, transaction: "0xtx", network: "sepolia", payer: PAYER },
    },
    delayMs: 0,
    stallBody: false,
  };

  const app = express();
  app.use(express.json());

  const stall = (res: Response) => {
    res.writeHead(200, { "Content-Type": "application/json" });
    res.write('{"success":');
  };

  app.post("/verify", (req, res) => {
    state.verifyCalls.push(req.body);
    if (state.stallBody) return stall(res);
    const { status, body } = state.verify;
    setTimeout(() => res.status(status).json(body), state.delayMs);
  });

  app.post("/settle", (req, res) => {
    state.settleCalls.push(req.body);
    if (state.stallBody) return stall(res);
    res.status(state.settle.status).json(state.settle.body);
  });

  const reset = () => {
    state.verifyCalls.length = 0;
    state.settleCalls.length = 0;
    state.verify = { status: 200, body: { isValid: true, payer: PAYER } };
    state.settle = {
      status: 200,
      body: { success: true, transaction: "0xtx", network: "sepolia", payer: PAYER },
    };
    state.delayMs = 0;
    state.stallBody = false;
  };

  return { app, state, reset };
}

export interface UpstreamCall {
  path: string;
  apiKey: string | undefined;
  authorization: string | undefined;
  body: unknown;
}

/** Serper stand-in: answers every query with one organic result. */
export function fakeSerper() {
  const state: { calls: UpstreamCall[]; failWith?: number } = { calls: [] };

  const app = express();
  app.use(express.json());

  app.post(["/search", "/news", "/scholar"], (req, res) => {
    state.calls.push({
      path: req.path,
      apiKey: req.get("x-api-key"),
      authorization: req.get("authorization"),
      body: req.body,
    });
    if (state.failWith) {
      res.status(state.failWith).send("upstream down");
      return;
    }
    const q = typeof req.body?.q === "string" ? req.body.q : "";
    res.json({ organic: [{ title: `Result for ${q}` }] });
  });

  const reset = () => {
    state.calls.length = 0;
    state.failWith = undefined;
  };

  return { app, state, reset };
}
