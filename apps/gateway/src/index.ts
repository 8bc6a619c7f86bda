import "dotenv/config";
import { loadConfig } from "./config.js";
import { createGatewayContext, type GatewayContext } from "./context.js";
import { createApp } from "./app.js";
import { createLogger } from "./utils/logger.js";

// ---------------------------------------------------------------------------
// Boot: config → logger → registry/engine → app → listen.
// Any configuration or pricing error stops the process before it serves.
// ---------------------------------------------------------------------------

function boot(): GatewayContext {
  try {
    const config = loadConfig();
    const logger = createLogger(config.logLevel);
    return createGatewayContext({ config, logger });
  } catch (err) {
    createLogger().fatal({ err }, "Gateway configuration is invalid; refusing to start");
    process.exit(1);
  }
}

function main(): void {
  const ctx = boot();
  const { config, logger, registry } = ctx;

  if (config.testingMode) {
    logger.warn(
      "TESTING_MODE is enabled: every tool call is admitted without payment or credential. Never run this in production.",
    );
  }
  if (!config.upstream.apiKey) {
    logger.warn("SERPER_API_KEY not set: upstream calls will be unauthenticated");
  }

  const app = createApp(ctx);
  app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        network: config.network,
        payTo: config.receivingAddress,
        tools: registry.all().map((p) => p.toolId),
        settlement: config.testingMode ? "bypassed" : config.settlementEndpoint,
        internalCredential: config.internalCredential !== undefined,
      },
      "paywire gateway listening",
    );
  });
}

main();
