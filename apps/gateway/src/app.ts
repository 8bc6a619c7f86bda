import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { discoveryHandler } from "@paywire/discovery";
import type { GatewayContext } from "./context.js";
import healthRouter from "./routes/health.js";
import { toolsRouter } from "./routes/tools.js";
import { mcpRouter } from "./routes/mcp.js";
import { PAYMENT_HEADERS } from "./types.js";

export function createApp(ctx: GatewayContext): Express {
  const app = express();

  // -------------------------------------------------------------------------
  // Global middleware
  // -------------------------------------------------------------------------
  app.use(
    cors({
      origin: ctx.config.corsOrigins.includes("*") ? "*" : ctx.config.corsOrigins,
      exposedHeaders: [PAYMENT_HEADERS.REQUIRED, PAYMENT_HEADERS.RESPONSE, "mcp-session-id"],
    }),
  );
  app.use(express.json({ limit: "1mb" }));

  // -------------------------------------------------------------------------
  // Public routes
  // -------------------------------------------------------------------------
  app.use(healthRouter);

  app.get(
    "/.well-known/x402",
    discoveryHandler(ctx.registry, {
      name: "paywire gateway",
      description: "Payment-gated Serper search tools",
      publicBaseUrl: ctx.config.publicBaseUrl,
      payTo: ctx.config.receivingAddress,
      descriptions: Object.fromEntries(
        [...ctx.tools.values()].map((tool) => [tool.id, tool.description]),
      ),
    }),
  );

  // -------------------------------------------------------------------------
  // Tool transports (each gated per call)
  // -------------------------------------------------------------------------
  app.use(toolsRouter(ctx));
  app.use(mcpRouter(ctx));

  // -------------------------------------------------------------------------
  // Errors
  // -------------------------------------------------------------------------
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    void _next;
    // body-parser marks client errors (bad JSON, oversized body) with a status
    const status = clientErrorStatus(error);
    if (status) {
      ctx.logger.warn({ err: error, path: req.path }, "Rejected malformed request");
    } else {
      ctx.logger.error({ err: error, path: req.path }, "Unhandled gateway error");
    }
    if (res.headersSent) return;

    res.status(status ?? 500).json({
      success: false,
      error: status ? "Malformed request body" : "Unexpected server error",
    });
  });

  return app;
}

function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) return undefined;
  const status = error.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}
