import type { GatewayContext } from "../context.js";
import type { Admitted, PaymentReceipt } from "../types.js";
import type { SerperQuery, ToolDefinition } from "./catalog.js";
import { callUpstream, type UpstreamResult } from "./upstream.js";

export interface Invocation {
  result: UpstreamResult;
  receipt?: PaymentReceipt;
}

/**
 * Run an admitted tool call, then capture the payment if the call was paid
 * for and succeeded.  The upstream call sees only the query; payment
 * details stay on this side.
 */
export async function invokeTool(
  ctx: GatewayContext,
  tool: ToolDefinition,
  query: SerperQuery,
  admission: Admitted,
): Promise<Invocation> {
  const log = ctx.logger.child({ component: "tools", toolId: tool.id });

  const result = await callUpstream(ctx.config.upstream, tool.endpoint, query);
  if (!result.ok) {
    log.error({ endpoint: result.endpoint, status: result.status, error: result.error }, "Upstream call failed");
    return { result };
  }

  if (admission.reason !== "PaymentVerified") {
    return { result };
  }

  const { proof, price } = admission.payment;
  try {
    const receipt = await ctx.settlement.settle(proof, price, ctx.config.receivingAddress);
    if (!receipt) {
      log.error({ nonce: proof.nonce }, "Settlement declined after successful tool call");
    }
    return { result, receipt };
  } catch (err) {
    log.error({ err, nonce: proof.nonce }, "Settlement failed after successful tool call");
    return { result };
  }
}
