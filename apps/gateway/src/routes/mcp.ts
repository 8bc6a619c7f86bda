import { Router, type IRouter, type Request, type Response } from "express";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { GatewayContext } from "../context.js";
import { admissionGate, takeAdmission, type Admissions } from "../middleware/admission.js";
import { serperQueryShape } from "../tools/catalog.js";
import { invokeTool } from "../tools/invoke.js";
import { PAYMENT_HEADERS } from "../types.js";
import { toBase64 } from "../utils/base64.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Names of every tool a JSON-RPC body asks to call, one entry per call.
 * Only `tools/call` messages are considered; tool arguments are never read.
 */
export function calledTools(body: unknown): string[] {
  const messages = Array.isArray(body) ? body : [body];
  const names: string[] = [];
  for (const message of messages) {
    if (!isRecord(message) || message.method !== "tools/call") continue;
    const params = message.params;
    if (isRecord(params) && typeof params.name === "string") {
      names.push(params.name);
    }
  }
  return names;
}

/**
 * A fresh MCP server per request.  Each call uses up one admission the gate
 * recorded for its tool; a call with none left refuses to run.
 */
function buildServer(ctx: GatewayContext, res: Response, admissions: Admissions): McpServer {
  const server = new McpServer({ name: "paywire-gateway", version: "0.1.0" });

  for (const tool of ctx.tools.values()) {
    server.registerTool(
      tool.id,
      { description: tool.description, inputSchema: serperQueryShape },
      async (args) => {
        const admission = takeAdmission({ admissions }, tool.id);
        if (!admission) {
          return {
            content: [{ type: "text" as const, text: `Tool ${tool.id} was not admitted` }],
            isError: true,
          };
        }

        const { result, receipt } = await invokeTool(ctx, tool, args, admission);
        if (receipt && !res.headersSent) {
          res.setHeader(PAYMENT_HEADERS.RESPONSE, toBase64(receipt));
        }

        if (!result.ok) {
          return {
            content: [
              {
                type: "text" as const,
                text: JSON.stringify({ error: result.error, endpoint: result.endpoint }),
              },
            ],
            isError: true,
          };
        }
        return {
          content: [{ type: "text" as const, text: JSON.stringify(result.data) }],
        };
      },
    );
  }

  return server;
}

// ---------------------------------------------------------------------------
// POST /mcp — stateless streamable HTTP
//
// The admission gate inspects the JSON-RPC body for tools/call messages
// before the MCP server ever sees the request, so a denial is a real HTTP
// 402 rather than a JSON-RPC error.
// ---------------------------------------------------------------------------

export function mcpRouter(ctx: GatewayContext): IRouter {
  const router: IRouter = Router();

  router.post(
    "/mcp",
    admissionGate(ctx, (req) => calledTools(req.body)),
    async (req: Request, res: Response) => {
      const server = buildServer(ctx, res, res.locals.admissions ?? new Map());
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      res.on("close", () => {
        server.close().catch((err: unknown) => {
          ctx.logger.debug({ err }, "MCP server close failed");
        });
      });

      try {
        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (err) {
        ctx.logger.error({ err }, "MCP request failed");
        if (!res.headersSent) {
          res.status(500).json({
            jsonrpc: "2.0",
            error: { code: -32603, message: "Internal server error" },
            id: null,
          });
        }
      }
    },
  );

  // Stateless: no server-initiated streams and no sessions to delete.
  router.all("/mcp", (_req, res) => {
    res.status(405).set("Allow", "POST").json({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Method not allowed." },
      id: null,
    });
  });

  return router;
}
