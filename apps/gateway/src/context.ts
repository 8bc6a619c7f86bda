import { PriceRegistry } from "@paywire/pricing";
import { ConfigurationError, type GatewayConfig } from "./config.js";
import { AdmissionEngine } from "./admission/engine.js";
import { PaymentProofValidator } from "./admission/validator.js";
import {
  HttpSettlementClient,
  UnconfiguredSettlementClient,
  type SettlementClient,
} from "./settlement/client.js";
import { TOOLS, type ToolDefinition } from "./tools/catalog.js";
import type { Logger } from "./utils/logger.js";

/** Everything a request handler needs, built once at startup. */
export interface GatewayContext {
  config: Readonly<GatewayConfig>;
  logger: Logger;
  registry: PriceRegistry;
  tools: ReadonlyMap<string, ToolDefinition>;
  settlement: SettlementClient;
  engine: AdmissionEngine;
}

export interface GatewayContextOptions {
  config: Readonly<GatewayConfig>;
  logger: Logger;
  settlement?: SettlementClient;
  tools?: readonly ToolDefinition[];
}

export function createGatewayContext(opts: GatewayContextOptions): GatewayContext {
  const { config, logger } = opts;
  const toolList = opts.tools ?? TOOLS;

  const registry = PriceRegistry.fromTools(toolList);
  const offNetwork = registry.all().filter((p) => p.network !== config.network);
  if (offNetwork.length > 0) {
    throw new ConfigurationError(
      `Tools priced outside NETWORK=${config.network}: ` +
        offNetwork.map((p) => `${p.toolId} (${p.network})`).join(", "),
    );
  }

  const settlement =
    opts.settlement ??
    (config.settlementEndpoint
      ? new HttpSettlementClient(config.settlementEndpoint, config.settlementTimeoutMs)
      : new UnconfiguredSettlementClient());

  const validator = new PaymentProofValidator({
    settlement,
    receivingAddress: config.receivingAddress,
    timeoutMs: config.settlementTimeoutMs,
  });

  const engine = new AdmissionEngine({
    registry,
    validator,
    receivingAddress: config.receivingAddress,
    internalCredential: config.internalCredential,
    testingMode: config.testingMode,
    logger,
  });

  return {
    config,
    logger,
    registry,
    tools: new Map(toolList.map((tool) => [tool.id, tool])),
    settlement,
    engine,
  };
}
