import { describe, it, expect, beforeAll, beforeEach, afterAll } from "vitest";
import type { Server } from "http";
import {
  HttpSettlementClient,
  UnconfiguredSettlementClient,
} from "../settlement/client.js";
import {
  close,
  fakeFacilitator,
  listen,
  makeProof,
  PAY_TO,
  PAYER,
  SEARCH_TERMS,
} from "./helpers.js";

const searchPrice = { toolId: "search", ...SEARCH_TERMS };
const facilitator = fakeFacilitator();

let server: Server;
let client: HttpSettlementClient;

beforeAll(async () => {
  const started = await listen(facilitator.app);
  server = started.server;
  client = new HttpSettlementClient(started.baseUrl, 100);
});

afterAll(() => close(server));

beforeEach(() => facilitator.reset());

// ═══════════════════════════════════════════════════════════════════════════
// 1. verify
// ═══════════════════════════════════════════════════════════════════════════
describe("HttpSettlementClient.verify", () => {
  it("posts the proof, price and receiving address", async () => {
    const proof = makeProof(searchPrice);
    const verdict = await client.verify(proof, searchPrice, PAY_TO);

    expect(verdict).toEqual({ status: "valid", payer: PAYER });
    expect(facilitator.state.verifyCalls).toEqual([
      { proof, price: searchPrice, receivingAddress: PAY_TO },
    ]);
  });

  it("maps isValid=false to an invalid verdict with the reason", async () => {
    facilitator.state.verify = {
      status: 200,
      body: { isValid: false, invalidReason: "insufficient_funds" },
    };
    const verdict = await client.verify(makeProof(searchPrice), searchPrice, PAY_TO);

    expect(verdict).toEqual({ status: "invalid", reason: "insufficient_funds" });
  });

  it("accepts a verdict carried by a 4xx response", async () => {
    facilitator.state.verify = { status: 400, body: { isValid: false } };
    const verdict = await client.verify(makeProof(searchPrice), searchPrice, PAY_TO);

    expect(verdict).toEqual({ status: "invalid", reason: "payment rejected" });
  });

  it("treats a 5xx as unreachable even when it carries a verdict", async () => {
    facilitator.state.verify = { status: 500, body: { isValid: true } };
    const verdict = await client.verify(makeProof(searchPrice), searchPrice, PAY_TO);

    expect(verdict).toEqual({
      status: "unreachable",
      reason: "facilitator /verify answered 500 without a verdict",
    });
  });

  it("treats a response without a verdict as unreachable", async () => {
    facilitator.state.verify = { status: 200, body: { ok: true } };
    const verdict = await client.verify(makeProof(searchPrice), searchPrice, PAY_TO);

    expect(verdict).toEqual({
      status: "unreachable",
      reason: "facilitator /verify answered 200 without a verdict",
    });
  });

  it("gives up after its timeout", async () => {
    facilitator.state.delayMs = 500;
    const verdict = await client.verify(makeProof(searchPrice), searchPrice, PAY_TO);

    expect(verdict).toEqual({
      status: "unreachable",
      reason: "facilitator /verify timed out or was aborted",
    });
  });

  it("gives up when the body stalls after the headers", async () => {
    facilitator.state.stallBody = true;
    const verdict = await client.verify(makeProof(searchPrice), searchPrice, PAY_TO);

    expect(verdict).toEqual({
      status: "unreachable",
      reason: "facilitator /verify answered 200 without a verdict",
    });
  });

  it("stops when the caller aborts", async () => {
    facilitator.state.delayMs = 500;
    const controller = new AbortController();
    controller.abort();
    const verdict = await client.verify(makeProof(searchPrice), searchPrice, PAY_TO, {
      signal: controller.signal,
    });

    expect(verdict).toEqual({
      status: "unreachable",
      reason: "facilitator /verify timed out or was aborted",
    });
  });

  it("reports a refused connection as unreachable", async () => {
    const offline = new HttpSettlementClient("http://127.0.0.1:1", 1_000);
    const verdict = await offline.verify(makeProof(searchPrice), searchPrice, PAY_TO);

    expect(verdict.status).toBe("unreachable");
    expect(verdict).toMatchObject({ reason: expect.stringMatching(/^facilitator \/verify failed: /) });
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// 2. settle
// ═══════════════════════════════════════════════════════════════════════════
describe("HttpSettlementClient.settle", () => {
  it("returns a receipt for the captured amount", async () => {
    const proof = makeProof(searchPrice);
    const receipt = await client.settle(proof, searchPrice, PAY_TO);

    expect(receipt).toEqual({
      txHash: "0xtx",
      network: "sepolia",
      payer: PAYER,
      amount: "10000000000000",
      timestamp: expect.any(Number),
      settled: true,
    });
    expect(facilitator.state.settleCalls).toEqual([
      { proof, price: searchPrice, receivingAddress: PAY_TO },
    ]);
  });

  it("falls back to the proof's payer and the price's network", async () => {
    facilitator.state.settle = { status: 200, body: { success: true } };
    const receipt = await client.settle(makeProof(searchPrice), searchPrice, PAY_TO);

    expect(receipt).toMatchObject({ network: "sepolia", payer: PAYER, settled: true });
    expect(receipt?.txHash).toBeUndefined();
  });

  it("returns undefined when the authority declines", async () => {
    facilitator.state.settle = {
      status: 200,
      body: { success: false, errorReason: "nonce_already_used" },
    };
    await expect(client.settle(makeProof(searchPrice), searchPrice, PAY_TO)).resolves.toBeUndefined();
  });

  it("returns undefined when the body stalls after the headers", async () => {
    facilitator.state.stallBody = true;
    await expect(client.settle(makeProof(searchPrice), searchPrice, PAY_TO)).resolves.toBeUndefined();
    expect(facilitator.state.settleCalls).toHaveLength(1);
  });

  it("returns undefined on an error status", async () => {
    facilitator.state.settle = { status: 502, body: { success: true } };
    await expect(client.settle(makeProof(searchPrice), searchPrice, PAY_TO)).resolves.toBeUndefined();
  });
});

describe("UnconfiguredSettlementClient", () => {
  it("fails closed", async () => {
    const unconfigured = new UnconfiguredSettlementClient();
    await expect(unconfigured.verify()).resolves.toEqual({
      status: "unreachable",
      reason: "no settlement authority configured",
    });
    await expect(unconfigured.settle()).resolves.toBeUndefined();
  });
});
